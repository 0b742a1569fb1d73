import type { CloudClient } from '../cloudClient.js';

export async function mkdirCommand(
  client: CloudClient,
  folderName: string,
  parent: string | undefined,
  print: (line: string) => void,
): Promise<void> {
  print(`Created folder: ${await client.mkdir(folderName, parent)}`);
}
