import fs from 'fs/promises';

import { z } from 'zod';

const manifestSchema = z.object({
  name: z.literal('sncloud'),
  version: z.string().min(1),
});

// sncloud/src/ when run from source, dist/ when built.
const MANIFEST_CANDIDATES = ['../../package.json', '../package.json'];

/** Reads the version from the package manifest beside the sources or the build output. */
export async function readPackageVersion(): Promise<string> {
  for (const candidate of MANIFEST_CANDIDATES) {
    let raw: string;
    try {
      raw = await fs.readFile(new URL(candidate, import.meta.url), 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        continue;
      }
      throw error;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      continue;
    }
    const parsed = manifestSchema.safeParse(json);
    if (parsed.success) {
      return parsed.data.version;
    }
  }
  return 'unknown';
}
