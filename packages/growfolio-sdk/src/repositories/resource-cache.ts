import { ok } from 'neverthrow';
import type { Result } from 'neverthrow';
import type { Logger } from 'pino';
import { createKeyedCache } from '../cache/keyed-cache.js';
import type { CacheEntry, CacheKey } from '../cache/types.js';
import { createSingleFlight } from '../single-flight/single-flight.js';
import type { Producer } from '../single-flight/single-flight.js';
import type { RepositoryError } from '../errors/types.js';

export interface LoadOptions {
  /** Skip the fresh-entry check, e.g. for pull-to-refresh */
  readonly force?: boolean | undefined;
  /** Stops this caller's wait; the shared fetch still completes and is cached */
  readonly signal?: AbortSignal | undefined;
}

export interface ResourceCacheOptions<V> {
  /** Name used in log lines */
  readonly name: string;
  /** Freshness window of this resource */
  readonly freshForMs: number;
  readonly logger: Logger;
  readonly now?: (() => number) | undefined;
  /** Per-value freshness, e.g. until a quoted rate expires */
  readonly freshForValue?: ((value: V, now: number) => number) | undefined;
}

/**
 * Cache-aside store for one resource: a keyed cache plus single-flight loading.
 */
export interface ResourceCache<V, K extends CacheKey = string> {
  /**
   * Returns the fresh cached value, or runs `producer` once for all
   * concurrent callers and stores its result.
   *
   * A result is only stored if nothing wrote or invalidated the key while it
   * was in flight. A failure leaves any existing entry untouched.
   */
  readonly load: (
    key: K,
    producer: Producer<V>,
    options?: LoadOptions
  ) => Promise<Result<V, RepositoryError>>;

  /** Fresh value only. */
  readonly get: (key: K) => V | undefined;

  /** Entry regardless of staleness. */
  readonly peek: (key: K) => CacheEntry<V> | undefined;

  /** Stores a value written by a mutation; the entry becomes fresh. */
  readonly put: (key: K, value: V) => void;

  /**
   * Replaces an existing entry (fresh or stale) with `fn(value)`, restamped fresh.
   * Without an entry the key is invalidated instead, so a load already in
   * flight cannot store a result that predates the write.
   * @returns false when there was no entry to update
   */
  readonly update: (key: K, fn: (value: V) => V) => boolean;

  /** Removes one key, or every key, and detaches in-flight loads. */
  readonly invalidate: (key?: K) => void;

  readonly invalidateWhere: (predicate: (key: K, value: V) => boolean) => void;

  readonly keys: () => readonly K[];
}

/**
 * Creates the cache-aside core shared by every repository.
 *
 * @example
 * ```typescript
 * const goals = createResourceCache<Goal[]>({ name: 'goals', freshForMs: FRESHNESS.goals, logger });
 * const result = await goals.load('all', () => remote.listGoals());
 * ```
 */
export const createResourceCache = <V, K extends CacheKey = string>(
  options: ResourceCacheOptions<V>
): ResourceCache<V, K> => {
  const { name, freshForMs, logger, freshForValue } = options;
  const now = options.now ?? ((): number => Date.now());
  const cache = createKeyedCache<V, K>({ freshForMs, now });
  const flights = createSingleFlight<V, K>();

  const store = (key: K, value: V): void => {
    cache.set(key, value, freshForValue?.(value, now()));
  };

  const load = (
    key: K,
    producer: Producer<V>,
    loadOptions: LoadOptions = {}
  ): Promise<Result<V, RepositoryError>> => {
    if (loadOptions.force !== true) {
      const cached = cache.get(key);
      if (cached !== undefined) {
        logger.debug({ cache: name, key }, 'cache hit');
        return Promise.resolve(ok(cached));
      }
    }

    return flights.run(
      key,
      async () => {
        logger.debug({ cache: name, key }, 'cache miss, fetching');
        const startRevision = cache.revision(key);
        const result = await producer();

        if (result.isErr()) {
          logger.warn({ cache: name, key, code: result.error.code }, 'fetch failed');
          return result;
        }

        if (cache.revision(key) === startRevision) {
          store(key, result.value);
        } else {
          logger.debug({ cache: name, key }, 'fetch overtaken by a write, result not cached');
        }
        return result;
      },
      { signal: loadOptions.signal }
    );
  };

  const update = (key: K, fn: (value: V) => V): boolean => {
    const entry = cache.getRaw(key);
    if (entry === undefined) {
      invalidate(key);
      return false;
    }
    store(key, fn(entry.value));
    return true;
  };

  const invalidate = (key?: K): void => {
    if (key === undefined) {
      cache.clear();
      flights.forgetAll();
      logger.debug({ cache: name }, 'invalidated all');
      return;
    }
    cache.remove(key);
    flights.forget(key);
    logger.debug({ cache: name, key }, 'invalidated');
  };

  const invalidateWhere = (predicate: (key: K, value: V) => boolean): void => {
    const matching = cache.keys().filter((key) => {
      const entry = cache.getRaw(key);
      return entry !== undefined && predicate(key, entry.value);
    });
    for (const key of matching) {
      invalidate(key);
    }
  };

  return {
    load,
    get: cache.get,
    peek: cache.getRaw,
    put: store,
    update,
    invalidate,
    invalidateWhere,
    keys: cache.keys,
  };
};
