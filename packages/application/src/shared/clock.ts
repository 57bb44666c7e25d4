import { nowIso } from '@medisync/core';

/** Returns the current time as an ISO-8601 string */
export type Clock = () => string;

export const systemClock: Clock = nowIso;

/**
 * Newest first by ISO timestamp; equal timestamps keep their relative order
 */
export function newestFirst<T>(items: readonly T[], timestampOf: (item: T) => string): T[] {
  return [...items].sort((a, b) => timestampOf(b).localeCompare(timestampOf(a)));
}

/**
 * The last `n` items in their original order
 */
export function lastN<T>(items: readonly T[], n: number): T[] {
  return items.slice(Math.max(0, items.length - n));
}
