import { describe, expect, it, vi } from 'vitest';

import { AuthRequiredError } from '../src/errors.js';
import { Session } from '../src/session.js';

describe('Session', () => {
  it('initialises once, even for concurrent callers', async () => {
    const session = new Session();
    const fetchToken = vi.fn(async () => 'xsrf-test');

    await Promise.all([session.ensureInitialized(fetchToken), session.ensureInitialized(fetchToken)]);
    await session.ensureInitialized(fetchToken);

    expect(fetchToken).toHaveBeenCalledTimes(1);
    expect(session.initialized).toBe(true);
    expect(session.antiForgeryToken).toBe('xsrf-test');
  });

  it('retries initialisation after a failed fetch', async () => {
    const session = new Session();
    const fetchToken = vi.fn().mockRejectedValueOnce(new Error('offline')).mockResolvedValueOnce('xsrf-test');

    await expect(session.ensureInitialized(fetchToken)).rejects.toThrow('offline');
    await session.ensureInitialized(fetchToken);

    expect(fetchToken).toHaveBeenCalledTimes(2);
    expect(session.initialized).toBe(true);
  });

  it('requires an access token', () => {
    const session = new Session();

    expect(() => session.requireAccessToken('upload files')).toThrow(
      new AuthRequiredError('upload files'),
    );
    session.accessToken = 'test-token';
    expect(session.requireAccessToken('upload files')).toBe('test-token');
  });

  it('keeps the latest value of each cookie', () => {
    const session = new Session();

    expect(session.cookieHeader()).toBeUndefined();
    session.rememberCookies(['redisKey=abc; Path=/; HttpOnly', 'lang=en']);
    session.rememberCookies(['redisKey=def; Path=/', 'malformed']);

    expect(session.cookieHeader()).toBe('redisKey=def; lang=en');
  });
});
