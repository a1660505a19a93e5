import type { CacheEntry } from './types.js';

/**
 * Creates a frozen cache entry.
 */
export const createCacheEntry = <V>(value: V, fetchedAt: number, freshForMs: number): CacheEntry<V> =>
  Object.freeze({ value, fetchedAt, freshForMs });

/**
 * An entry is stale once more than `freshForMs` has elapsed since it was fetched.
 * At exactly `freshForMs` it is still fresh.
 */
export const isStale = <V>(entry: CacheEntry<V>, now: number): boolean =>
  now - entry.fetchedAt > entry.freshForMs;
