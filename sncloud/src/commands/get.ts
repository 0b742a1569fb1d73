import type { CloudClient } from '../cloudClient.js';
import { InvalidArgumentError } from '../errors.js';

export type GetOptions = {
  output?: string;
  pdf: boolean;
  png: boolean;
  pages?: string;
};

export function parsePages(value: string | undefined): number[] {
  if (value === undefined || value.trim() === '') {
    return [];
  }
  return value.split(',').map((part) => {
    const trimmed = part.trim();
    if (!/^\d+$/.test(trimmed)) {
      throw new InvalidArgumentError('Pages must be comma-separated integers');
    }
    return Number.parseInt(trimmed, 10);
  });
}

export async function getCommand(
  client: CloudClient,
  filePath: string,
  options: GetOptions,
  print: (line: string) => void,
): Promise<void> {
  if (options.pdf && options.png) {
    throw new InvalidArgumentError('Choose only one of --pdf and --png');
  }
  const outputDir = options.output ?? '.';
  const pages = parsePages(options.pages);

  if (options.pdf) {
    print(`Downloaded PDF to ${await client.getPdf(filePath, outputDir, pages)}`);
  } else if (options.png) {
    print(`Downloaded PNG to ${(await client.getPng(filePath, outputDir, pages)).join(', ')}`);
  } else {
    print(`Downloaded file to ${await client.get(filePath, outputDir)}`);
  }
}
