import { createHash } from 'crypto';

export function md5Hex(data: string | Buffer): string {
  return createHash('md5').update(data).digest('hex');
}

export function sha256Hex(text: string): string {
  return createHash('sha256').update(text, 'utf8').digest('hex');
}

/** Login payload digest: SHA-256 over the password's MD5 hex followed by the one-time code. */
export function passwordDigest(password: string, randomCode: string): string {
  return sha256Hex(md5Hex(password) + randomCode);
}
