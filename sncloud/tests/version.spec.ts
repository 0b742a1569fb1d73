import { describe, expect, it } from 'vitest';

import { readPackageVersion } from '../src/version.js';

describe('readPackageVersion', () => {
  it('reads the version from the package manifest', async () => {
    expect(await readPackageVersion()).toBe('0.1.0');
  });
});
