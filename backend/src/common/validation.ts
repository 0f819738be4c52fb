/**
 * Request validation with zod.
 * Failures surface as ValidationError (400) through the global handler.
 */

import type { ZodType, ZodTypeDef } from 'zod';
import { ValidationError } from './errors.js';

export function parseInput<T>(schema: ZodType<T, ZodTypeDef, unknown>, input: unknown): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    const message = result.error.issues
      .map((i) => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message))
      .join('; ');
    throw new ValidationError(message);
  }
  return result.data;
}
