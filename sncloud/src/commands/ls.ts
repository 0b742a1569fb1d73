import type { CloudClient } from '../cloudClient.js';
import type { Entry } from '../types.js';

export function formatEntry(entry: Entry): string {
  switch (entry.kind) {
    case 'directory':
      return `📁 ${entry.fileName}`;
    case 'file':
      return `📄 ${entry.fileName}`;
  }
}

export async function lsCommand(
  client: CloudClient,
  directory: string | undefined,
  print: (line: string) => void,
): Promise<void> {
  const entries = await client.ls(directory);
  for (const entry of entries) {
    print(formatEntry(entry));
  }
}
