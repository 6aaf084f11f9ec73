import type { MultipartFields } from '@fastify/multipart';
import { INLINE_DOCUMENT_EXTENSIONS, INLINE_IMAGE_EXTENSIONS } from '@sharebox/shared';

const MIME_TYPES: Record<string, string> = {
  png: 'image/png',
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  gif: 'image/gif',
  pdf: 'application/pdf',
  txt: 'text/plain; charset=utf-8',
  doc: 'application/msword',
  docx: 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
  zip: 'application/zip',
};

/** `fileType` is the stored lowercase extension without the dot. */
export function getMimeType(fileType: string): string {
  return MIME_TYPES[fileType] ?? 'application/octet-stream';
}

export function isInlineViewable(fileType: string): boolean {
  return (
    INLINE_IMAGE_EXTENSIONS.some((ext) => ext === fileType) ||
    INLINE_DOCUMENT_EXTENSIONS.some((ext) => ext === fileType)
  );
}

/**
 * RFC 6266 header value. The quoted `filename` is an ASCII fallback; the
 * exact name travels in `filename*`.
 */
export function contentDisposition(kind: 'inline' | 'attachment', filename: string): string {
  const fallback = filename.replace(/[^\x20-\x7e]|["\\]/g, '_');
  const encoded = encodeURIComponent(filename).replace(
    /['()*]/g,
    (ch) => `%${ch.charCodeAt(0).toString(16).toUpperCase()}`,
  );
  return `${kind}; filename="${fallback}"; filename*=UTF-8''${encoded}`;
}

/** First text value posted under `name`, if any. */
export function multipartField(fields: MultipartFields, name: string): string | undefined {
  const entry = fields[name];
  const first = Array.isArray(entry) ? entry[0] : entry;
  if (first && first.type === 'field' && typeof first.value === 'string') {
    return first.value;
  }
  return undefined;
}
