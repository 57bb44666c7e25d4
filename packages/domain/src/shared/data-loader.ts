import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import type { z } from 'zod';
import { ValidationError } from '@medisync/core';

/**
 * Resolve a file in the package's data directory
 */
export function dataFilePath(fileName: string): string {
  return fileURLToPath(new URL(`../../data/${fileName}`, import.meta.url));
}

/**
 * Read and validate a bundled JSON data file
 *
 * Data files ship with the package, so a failure here is a packaging defect
 * and is raised immediately.
 */
export function loadDataFile<S extends z.ZodTypeAny>(
  fileName: string,
  schema: S,
  path: string = dataFilePath(fileName)
): z.output<S> {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  const result = schema.safeParse(raw);

  if (!result.success) {
    throw new ValidationError(`Invalid data file ${fileName}`, result.error.flatten());
  }

  return result.data;
}

/**
 * Deep-freeze a parsed data structure
 */
export function deepFreeze<T>(value: T): Readonly<T> {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}
