import path from 'node:path';
import { generateStoragePrefix } from './token.js';

/** Last path component, whichever separator the client used. */
export function stripDirectories(value: string): string {
  return value.split(/[/\\]/).pop() ?? '';
}

/**
 * Reduce a user-supplied filename to a single safe path segment: directory
 * components, separators, `..` runs, control and reserved characters are
 * removed. Never returns an empty string.
 */
export function sanitizeFilename(value: string): string {
  let sanitized = stripDirectories(value)
    // eslint-disable-next-line no-control-regex
    .replace(/[\x00-\x1f\x7f<>:"|?*]/g, '')
    .replace(/\s+/g, '_')
    .replace(/\.{2,}/g, '.')
    .replace(/_+/g, '_');
  sanitized = sanitized.replace(/^[._]+|[._]+$/g, '');
  return sanitized || 'file';
}

/** Lowercase extension without the dot, or null when there is none. */
export function extractExtension(filename: string): string | null {
  const ext = path.extname(filename);
  if (!ext || ext === '.') return null;
  return ext.slice(1).toLowerCase();
}

export function isAllowedExtension(filename: string, allowed: readonly string[]): boolean {
  const ext = extractExtension(filename);
  return ext !== null && allowed.includes(ext);
}

/** Longest original filename a file row can hold. */
export const MAX_FILENAME_LENGTH = 255;

/** Most filesystems refuse a single path segment longer than this. */
export const MAX_STORAGE_NAME_BYTES = 255;

/**
 * Shorten `filename` to at most `maxBytes` of UTF-8, cutting the base name
 * and keeping the extension. Characters are never split.
 */
export function truncateFilename(filename: string, maxBytes: number): string {
  if (Buffer.byteLength(filename) <= maxBytes) return filename;

  let ext = path.extname(filename);
  if (Buffer.byteLength(ext) >= maxBytes) ext = '';
  const budget = maxBytes - Buffer.byteLength(ext);

  let base = '';
  let used = 0;
  for (const char of filename.slice(0, filename.length - ext.length)) {
    const size = Buffer.byteLength(char);
    if (used + size > budget) break;
    base += char;
    used += size;
  }
  return `${base}${ext}`;
}

/**
 * `<random hex>_<sanitized name>`, unique per upload and safe as a blob key.
 * Long names are shortened to fit within `MAX_STORAGE_NAME_BYTES`.
 */
export function buildStorageName(originalFilename: string, prefix?: string): string {
  const tag = prefix ? `${prefix}_${generateStoragePrefix(4)}` : generateStoragePrefix();
  const budget = MAX_STORAGE_NAME_BYTES - Buffer.byteLength(tag) - 1;
  return `${tag}_${truncateFilename(sanitizeFilename(originalFilename), budget)}`;
}
