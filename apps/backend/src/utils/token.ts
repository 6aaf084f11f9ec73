import crypto from 'node:crypto';

export const SHARE_TOKEN_BYTES = 16;
const STORAGE_PREFIX_BYTES = 8;

/**
 * Anonymous-access credential for a file or bundle. 128 bits of CSPRNG
 * output, base64url so it can sit in a URL path unescaped. Issued once per
 * entity and never regenerated.
 */
export function generateShareToken(): string {
  return crypto.randomBytes(SHARE_TOKEN_BYTES).toString('base64url');
}

export function generateStoragePrefix(bytes: number = STORAGE_PREFIX_BYTES): string {
  return crypto.randomBytes(bytes).toString('hex');
}
