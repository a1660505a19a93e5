import { createCacheEntry, isStale } from './cache-entry.js';
import { serializeKey } from './cache-key.js';
import type { CacheEntry, CacheKey, KeyedCache, KeyedCacheOptions } from './types.js';

interface StoredEntry<V, K> {
  readonly key: K;
  readonly entry: CacheEntry<V>;
}

/**
 * Creates an in-memory keyed cache with per-store and per-entry freshness.
 *
 * Every operation is synchronous over a single Map, so a reader always sees
 * either the previous or the next complete entry.
 *
 * @param options - Default freshness window and optional clock
 * @returns A KeyedCache instance
 *
 * @example
 * ```typescript
 * const cache = createKeyedCache<Portfolio[]>({ freshForMs: FRESHNESS.portfolios });
 * cache.set('all', portfolios);
 * cache.get('all'); // portfolios, until 60s have passed
 * ```
 */
export const createKeyedCache = <V, K extends CacheKey = string>(
  options: KeyedCacheOptions
): KeyedCache<V, K> => {
  const { freshForMs: defaultFreshForMs } = options;
  const now = options.now ?? ((): number => Date.now());

  const store = new Map<string, StoredEntry<V, K>>();
  const revisions = new Map<string, number>();
  let clock = 0;
  let clearedAt = 0;

  const touch = (serialized: string): void => {
    clock += 1;
    revisions.set(serialized, clock);
  };

  const get = (key: K): V | undefined => {
    const stored = store.get(serializeKey(key));
    if (stored === undefined) {
      return undefined;
    }

    // Stale entries stay in place for getRaw
    if (isStale(stored.entry, now())) {
      return undefined;
    }

    return stored.entry.value;
  };

  const getRaw = (key: K): CacheEntry<V> | undefined => store.get(serializeKey(key))?.entry;

  const set = (key: K, value: V, freshForMs?: number): void => {
    const serialized = serializeKey(key);
    store.set(serialized, {
      key,
      entry: createCacheEntry(value, now(), freshForMs ?? defaultFreshForMs),
    });
    touch(serialized);
  };

  const remove = (key: K): boolean => {
    const serialized = serializeKey(key);
    touch(serialized);
    return store.delete(serialized);
  };

  const removeAll = (predicate: (key: K, value: V) => boolean): number => {
    let removed = 0;
    for (const [serialized, stored] of store.entries()) {
      if (predicate(stored.key, stored.entry.value)) {
        store.delete(serialized);
        touch(serialized);
        removed += 1;
      }
    }
    return removed;
  };

  const clear = (): void => {
    store.clear();
    revisions.clear();
    clock += 1;
    clearedAt = clock;
  };

  const keys = (): readonly K[] => Array.from(store.values(), (stored) => stored.key);

  const size = (): number => store.size;

  const revision = (key: K): number => Math.max(revisions.get(serializeKey(key)) ?? 0, clearedAt);

  return {
    get,
    getRaw,
    set,
    remove,
    removeAll,
    clear,
    keys,
    size,
    revision,
  };
};
