export const DEFAULT_ALLOWED_EXTENSIONS = [
  'png',
  'jpg',
  'jpeg',
  'gif',
  'pdf',
  'doc',
  'docx',
  'txt',
  'zip',
] as const;

export const LOGO_EXTENSIONS = ['png', 'jpg', 'jpeg', 'gif'] as const;

// Types the viewer serves inline; everything else is sent as an attachment.
export const INLINE_IMAGE_EXTENSIONS = ['jpg', 'jpeg', 'png', 'gif'] as const;
export const INLINE_DOCUMENT_EXTENSIONS = ['pdf'] as const;

export const MIN_PASSWORD_LENGTH = 6;

export const ErrorCodes = {
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  UNSUPPORTED_TYPE: 'UNSUPPORTED_TYPE',
  NOT_FOUND: 'NOT_FOUND',
  UNAUTHORIZED: 'UNAUTHORIZED',
  FORBIDDEN: 'FORBIDDEN',
  CONFLICT: 'CONFLICT',
  STORAGE_ERROR: 'STORAGE_ERROR',
  INCONSISTENT: 'INCONSISTENT',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
