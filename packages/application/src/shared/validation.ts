import type { z } from 'zod';
import { ValidationError } from '@medisync/core';

/**
 * Parse use-case input at the application boundary
 *
 * @throws ValidationError carrying the flattened zod issues
 */
export function parseInput<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  label: string
): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(`Invalid ${label}`, result.error.flatten());
  }
  return result.data;
}
