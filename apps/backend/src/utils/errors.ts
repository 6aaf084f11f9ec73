import { ErrorCodes } from '@sharebox/shared';

export class AppError extends Error {
  constructor(
    public code: string,
    public statusCode: number,
    message: string,
    public field?: string,
  ) {
    super(message);
    this.name = 'AppError';
  }
}

// One message for every access denial so responses never say why.
export const ACCESS_DENIED_MESSAGE = 'Access denied';

export function notFound(message: string): AppError {
  return new AppError(ErrorCodes.NOT_FOUND, 404, message);
}

export function unauthorized(message: string): AppError {
  return new AppError(ErrorCodes.UNAUTHORIZED, 401, message);
}

export function forbidden(message: string = ACCESS_DENIED_MESSAGE): AppError {
  return new AppError(ErrorCodes.FORBIDDEN, 403, message);
}

export function conflict(message: string, field?: string): AppError {
  return new AppError(ErrorCodes.CONFLICT, 409, message, field);
}

export function validationError(message: string, field?: string): AppError {
  return new AppError(ErrorCodes.VALIDATION_ERROR, 400, message, field);
}

export function unsupportedType(message: string, field?: string): AppError {
  return new AppError(ErrorCodes.UNSUPPORTED_TYPE, 400, message, field);
}

export function storageError(message: string): AppError {
  return new AppError(ErrorCodes.STORAGE_ERROR, 500, message);
}

export function inconsistent(message: string): AppError {
  return new AppError(ErrorCodes.INCONSISTENT, 500, message);
}

export function internalError(message: string): AppError {
  return new AppError(ErrorCodes.INTERNAL_ERROR, 500, message);
}

export function isAppError(err: unknown, code?: string): err is AppError {
  return err instanceof AppError && (code === undefined || err.code === code);
}

const PG_UNIQUE_VIOLATION = '23505';

function errorCode(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null || !('code' in err)) return undefined;
  return typeof err.code === 'string' ? err.code : undefined;
}

/**
 * True when a database error (or the error it wraps) is a Postgres
 * unique-constraint violation.
 */
export function isUniqueViolation(err: unknown): boolean {
  if (errorCode(err) === PG_UNIQUE_VIOLATION) return true;
  if (err instanceof Error && err.cause !== undefined) {
    return errorCode(err.cause) === PG_UNIQUE_VIOLATION;
  }
  return false;
}
