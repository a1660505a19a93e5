/**
 * Key identifying one cached item within a domain.
 * A plain string is a singleton marker or an id; a tuple is a composite
 * `(parentId, childId)` key.
 */
export type CacheKey = string | readonly string[];

/**
 * A cached value with the time it was fetched and how long it stays fresh.
 * Entries are frozen and replaced, never mutated in place.
 */
export interface CacheEntry<V> {
  readonly value: V;
  /** Epoch milliseconds at which the value was stored */
  readonly fetchedAt: number;
  /** Freshness window in milliseconds */
  readonly freshForMs: number;
}

/**
 * Keyed store of {@link CacheEntry} values with freshness checks.
 */
export interface KeyedCache<V, K extends CacheKey = string> {
  /**
   * Gets a value only when its entry exists and is still fresh.
   * @returns The cached value, or undefined on a miss or a stale entry
   */
  readonly get: (key: K) => V | undefined;

  /**
   * Gets the entry regardless of staleness.
   */
  readonly getRaw: (key: K) => CacheEntry<V> | undefined;

  /**
   * Creates or replaces the entry, stamping the current time.
   * @param freshForMs - Overrides the store's freshness window for this entry
   */
  readonly set: (key: K, value: V, freshForMs?: number) => void;

  /**
   * Removes one entry.
   * @returns true if the key existed
   */
  readonly remove: (key: K) => boolean;

  /**
   * Removes every entry whose key and value match the predicate.
   * @returns The number of removed entries
   */
  readonly removeAll: (predicate: (key: K, value: V) => boolean) => number;

  /** Removes every entry. */
  readonly clear: () => void;

  /** Keys currently held, fresh or stale. */
  readonly keys: () => readonly K[];

  /** Number of entries, fresh or stale. */
  readonly size: () => number;

  /**
   * Write counter for a key, bumped by every set, remove and clear touching it.
   * Lets a loader detect that its result was overtaken while it was in flight.
   */
  readonly revision: (key: K) => number;
}

/**
 * Options for creating a keyed cache.
 */
export interface KeyedCacheOptions {
  /** Default freshness window in milliseconds */
  readonly freshForMs: number;
  /** Clock source, defaults to Date.now */
  readonly now?: (() => number) | undefined;
}
