import fs from 'fs/promises';
import path from 'path';

import { z } from 'zod';

const storedConfigSchema = z.object({
  access_token: z.string().min(1),
});

/** Persists the bearer token as `config.json` inside the config directory. */
export class TokenStore {
  readonly filePath: string;

  constructor(private readonly configDir: string) {
    this.filePath = path.join(configDir, 'config.json');
  }

  async load(): Promise<string | undefined> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return undefined;
      }
      throw error;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      return undefined;
    }
    const parsed = storedConfigSchema.safeParse(json);
    return parsed.success ? parsed.data.access_token : undefined;
  }

  async save(token: string): Promise<void> {
    await fs.mkdir(this.configDir, { recursive: true });
    await fs.writeFile(this.filePath, JSON.stringify({ access_token: token }), { encoding: 'utf8', mode: 0o600 });
  }

  async clear(): Promise<void> {
    await fs.rm(this.filePath, { force: true });
  }
}
