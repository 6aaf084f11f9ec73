import type { z } from 'zod';
import { validationError } from '../utils/errors.js';

/**
 * Parse request input against a schema, throwing a VALIDATION_ERROR that
 * names the first offending field. Returns the parsed/coerced output so
 * handlers get clean data.
 */
export function parseInput<S extends z.ZodTypeAny>(schema: S, value: unknown): z.infer<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const firstIssue = result.error.issues[0];
    const field = firstIssue?.path.join('.') || undefined;
    const message = firstIssue?.message ?? 'Validation failed';
    throw validationError(message, field);
  }
  return result.data;
}
