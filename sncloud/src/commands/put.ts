import type { CloudClient } from '../cloudClient.js';

export async function putCommand(
  client: CloudClient,
  localFile: string,
  parent: string | undefined,
  print: (line: string) => void,
): Promise<void> {
  print(`Uploaded file: ${await client.put(localFile, parent)}`);
}
