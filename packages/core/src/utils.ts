/**
 * Utility functions for the application
 */

import { randomUUID } from 'crypto';

/**
 * Retry a function with exponential backoff
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: {
    maxRetries?: number;
    baseDelayMs?: number;
    maxDelayMs?: number;
    shouldRetry?: (error: unknown) => boolean;
  } = {}
): Promise<T> {
  const {
    maxRetries = 3,
    baseDelayMs = 1000,
    maxDelayMs = 30000,
    shouldRetry = () => true,
  } = options;

  let lastError: unknown;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (attempt === maxRetries || !shouldRetry(error)) {
        throw error;
      }

      const delay = Math.min(baseDelayMs * Math.pow(2, attempt), maxDelayMs);
      await sleep(delay);
    }
  }

  throw lastError;
}

/**
 * Sleep for a specified duration
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Build a short prefixed record identifier, e.g. `rx-1a2b3c4d` or `SCN-1A2B3C4D`
 */
export function generateRecordId(
  prefix: string,
  length = 8,
  options: { uppercase?: boolean } = {}
): string {
  const hex = randomUUID().replace(/-/g, '').substring(0, length);
  return `${prefix}-${options.uppercase ? hex.toUpperCase() : hex}`;
}

/**
 * Current time as an ISO-8601 string
 */
export function nowIso(): string {
  return new Date().toISOString();
}

/**
 * Truncate text to a preview length
 */
export function preview(text: string, length: number): string {
  return text.length > length ? text.substring(0, length) : text;
}
