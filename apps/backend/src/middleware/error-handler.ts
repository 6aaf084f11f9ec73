import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { ZodError } from 'zod';
import { ErrorCodes } from '@sharebox/shared';
import { AppError } from '../utils/errors.js';

function codeForStatus(statusCode: number): string {
  switch (statusCode) {
    case 401:
      return ErrorCodes.UNAUTHORIZED;
    case 403:
      return ErrorCodes.FORBIDDEN;
    case 404:
      return ErrorCodes.NOT_FOUND;
    case 409:
      return ErrorCodes.CONFLICT;
    default:
      return ErrorCodes.VALIDATION_ERROR;
  }
}

export function errorHandler(
  error: FastifyError | AppError | ZodError | Error,
  request: FastifyRequest,
  reply: FastifyReply,
): void {
  if (error instanceof AppError) {
    if (error.statusCode >= 500) {
      request.log.error(
        { service: 'ErrorHandler', err: error, url: request.url, method: request.method },
        'Request failed',
      );
    }
    reply.status(error.statusCode).send({
      data: null,
      meta: null,
      errors: [
        {
          code: error.code,
          field: error.field ?? null,
          message: error.message,
        },
      ],
    });
    return;
  }

  if (error instanceof ZodError) {
    const firstIssue = error.issues[0];
    reply.status(400).send({
      data: null,
      meta: null,
      errors: [
        {
          code: ErrorCodes.VALIDATION_ERROR,
          field: firstIssue?.path.join('.') ?? null,
          message: firstIssue?.message ?? 'Validation failed',
        },
      ],
    });
    return;
  }

  // Fastify's own client errors (bad JSON, oversized multipart parts) expose a statusCode
  const statusCode = 'statusCode' in error ? error.statusCode : undefined;
  if (typeof statusCode === 'number' && statusCode >= 400 && statusCode < 500) {
    reply.status(statusCode).send({
      data: null,
      meta: null,
      errors: [
        {
          code: codeForStatus(statusCode),
          field: null,
          message: error.message || 'Bad request',
        },
      ],
    });
    return;
  }

  // Unexpected error: log full detail, send generic message to client
  request.log.error(
    {
      service: 'ErrorHandler',
      err: error,
      requestId: request.id,
      url: request.url,
      method: request.method,
    },
    'Unhandled error',
  );

  reply.status(500).send({
    data: null,
    meta: null,
    errors: [
      {
        code: ErrorCodes.INTERNAL_ERROR,
        field: null,
        message: 'An unexpected error occurred',
      },
    ],
  });
}
