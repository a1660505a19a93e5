import { err } from 'neverthrow';
import type { Result } from 'neverthrow';
import { serializeKey } from '../cache/cache-key.js';
import type { CacheKey } from '../cache/types.js';
import { createCancelledError } from '../errors/errors.js';
import type { RepositoryError } from '../errors/types.js';

/**
 * Producer of a single remote value. Expected failures resolve to `err`.
 */
export type Producer<V> = () => Promise<Result<V, RepositoryError>>;

export interface RunOptions {
  /** Aborts this caller's wait only; the shared producer keeps running. */
  readonly signal?: AbortSignal | undefined;
}

/**
 * Coordinates at most one in-flight producer per key.
 */
export interface SingleFlight<V, K extends CacheKey = string> {
  /**
   * Runs the producer for `key`, or joins the run already in flight.
   * The slot is released when the producer settles, so a failure is never replayed.
   */
  readonly run: (
    key: K,
    producer: Producer<V>,
    options?: RunOptions
  ) => Promise<Result<V, RepositoryError>>;

  /**
   * Detaches the in-flight run for `key`. Current waiters still get its
   * outcome; the next caller starts a new producer.
   * @returns true if a run was in flight
   */
  readonly forget: (key: K) => boolean;

  /** Detaches every in-flight run. */
  readonly forgetAll: () => void;

  readonly isInFlight: (key: K) => boolean;

  readonly inFlightCount: () => number;
}

interface Flight<V> {
  readonly promise: Promise<Result<V, RepositoryError>>;
}

/**
 * Resolves with the shared outcome, or with CANCELLED as soon as the caller's
 * signal aborts.
 */
const observe = <V>(
  promise: Promise<Result<V, RepositoryError>>,
  signal: AbortSignal | undefined
): Promise<Result<V, RepositoryError>> => {
  if (signal === undefined) {
    return promise;
  }

  return new Promise((resolve, reject) => {
    const onAbort = (): void => {
      resolve(err(createCancelledError(signal.reason)));
    };
    signal.addEventListener('abort', onAbort, { once: true });

    promise.then(
      (result) => {
        signal.removeEventListener('abort', onAbort);
        resolve(result);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
};

/**
 * Creates a single-flight coordinator.
 *
 * @returns A SingleFlight instance
 *
 * @example
 * ```typescript
 * const flights = createSingleFlight<Goal[]>();
 * // Both calls share one request
 * const [a, b] = await Promise.all([
 *   flights.run('all', () => remote.listGoals()),
 *   flights.run('all', () => remote.listGoals()),
 * ]);
 * ```
 */
export const createSingleFlight = <V, K extends CacheKey = string>(): SingleFlight<V, K> => {
  const pending = new Map<string, Flight<V>>();

  const run = (
    key: K,
    producer: Producer<V>,
    options: RunOptions = {}
  ): Promise<Result<V, RepositoryError>> => {
    const { signal } = options;

    if (signal?.aborted === true) {
      return Promise.resolve(err(createCancelledError(signal.reason)));
    }

    const serialized = serializeKey(key);
    const existing = pending.get(serialized);
    if (existing !== undefined) {
      return observe(existing.promise, signal);
    }

    const flight: Flight<V> = {
      promise: producer().finally(() => {
        // A forgotten flight must not release its successor's slot
        if (pending.get(serialized) === flight) {
          pending.delete(serialized);
        }
      }),
    };
    pending.set(serialized, flight);

    return observe(flight.promise, signal);
  };

  const forget = (key: K): boolean => pending.delete(serializeKey(key));

  const forgetAll = (): void => {
    pending.clear();
  };

  const isInFlight = (key: K): boolean => pending.has(serializeKey(key));

  const inFlightCount = (): number => pending.size;

  return {
    run,
    forget,
    forgetAll,
    isInFlight,
    inFlightCount,
  };
};
