import type { CloudClient } from '../cloudClient.js';

export async function rmCommand(client: CloudClient, paths: string[], print: (line: string) => void): Promise<void> {
  print(`Deleted: ${await client.delete(paths)}`);
}
