import { z } from 'zod';

const uuidSchema = z.string().uuid();

/** Row ids are uuids; anything else cannot match a row. */
export function isUuid(value: string): boolean {
  return uuidSchema.safeParse(value).success;
}
