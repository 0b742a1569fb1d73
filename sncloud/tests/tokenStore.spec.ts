import fs from 'fs/promises';
import os from 'os';
import path from 'path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { TokenStore } from '../src/tokenStore.js';

describe('TokenStore', () => {
  let configDir: string;

  beforeEach(async () => {
    configDir = path.join(await fs.mkdtemp(path.join(os.tmpdir(), 'sncloud-token-')), 'nested');
  });

  afterEach(async () => {
    await fs.rm(path.dirname(configDir), { recursive: true, force: true });
  });

  it('returns nothing before a token is saved', async () => {
    expect(await new TokenStore(configDir).load()).toBeUndefined();
  });

  it('saves and loads the token, creating the directory', async () => {
    const store = new TokenStore(configDir);

    await store.save('test-token');

    expect(await store.load()).toBe('test-token');
    expect(JSON.parse(await fs.readFile(path.join(configDir, 'config.json'), 'utf8'))).toEqual({
      access_token: 'test-token',
    });
  });

  it('ignores unreadable or unexpected content', async () => {
    const store = new TokenStore(configDir);
    await fs.mkdir(configDir, { recursive: true });

    await fs.writeFile(store.filePath, '{not json');
    expect(await store.load()).toBeUndefined();

    await fs.writeFile(store.filePath, JSON.stringify({ token: 'elsewhere' }));
    expect(await store.load()).toBeUndefined();
  });

  it('clears the stored token', async () => {
    const store = new TokenStore(configDir);
    await store.save('test-token');

    await store.clear();

    expect(await store.load()).toBeUndefined();
  });
});
