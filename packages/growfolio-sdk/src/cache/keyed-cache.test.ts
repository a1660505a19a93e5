import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createKeyedCache } from './keyed-cache.js';
import { createCacheEntry, isStale } from './cache-entry.js';
import { ONE_HOUR_MS } from '../test/fixtures.js';

/** Freshness window used by most tests */
const FRESH_FOR_MS = 60_000;

describe('createKeyedCache', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('get', () => {
    describe('given key does not exist', () => {
      it('returns undefined', () => {
        const cache = createKeyedCache<string>({ freshForMs: FRESH_FOR_MS });

        expect(cache.get('nonexistent')).toBeUndefined();
      });
    });

    describe('given a fresh entry', () => {
      it('returns the cached value', () => {
        const cache = createKeyedCache<string>({ freshForMs: FRESH_FOR_MS });
        cache.set('user', 'value');

        vi.advanceTimersByTime(FRESH_FOR_MS - 1);

        expect(cache.get('user')).toBe('value');
      });
    });

    describe('given an entry exactly at its freshness boundary', () => {
      it('still returns the value', () => {
        const cache = createKeyedCache<string>({ freshForMs: FRESH_FOR_MS });
        cache.set('user', 'value');

        vi.advanceTimersByTime(FRESH_FOR_MS);

        expect(cache.get('user')).toBe('value');
      });
    });

    describe('given a stale entry', () => {
      it('returns undefined but keeps the entry for getRaw', () => {
        const cache = createKeyedCache<string>({ freshForMs: FRESH_FOR_MS });
        cache.set('user', 'value');

        vi.advanceTimersByTime(FRESH_FOR_MS + 1);

        expect(cache.get('user')).toBeUndefined();
        expect(cache.getRaw('user')?.value).toBe('value');
        expect(cache.size()).toBe(1);
      });
    });
  });

  describe('set', () => {
    describe('given a per-entry freshness override', () => {
      it('uses the override instead of the store default', () => {
        const cache = createKeyedCache<string>({ freshForMs: ONE_HOUR_MS });
        cache.set('rate', 'value', 1000);

        vi.advanceTimersByTime(1001);

        expect(cache.get('rate')).toBeUndefined();
        expect(cache.getRaw('rate')?.freshForMs).toBe(1000);
      });
    });

    describe('given an existing key', () => {
      it('replaces the entry and restamps the fetch time', () => {
        const cache = createKeyedCache<string>({ freshForMs: FRESH_FOR_MS });
        cache.set('user', 'first');
        const first = cache.getRaw('user');

        vi.advanceTimersByTime(FRESH_FOR_MS / 2);
        cache.set('user', 'second');
        vi.advanceTimersByTime(FRESH_FOR_MS / 2 + 1);

        expect(cache.get('user')).toBe('second');
        // Old entry object is untouched
        expect(first?.value).toBe('first');
        expect(Object.isFrozen(cache.getRaw('user'))).toBe(true);
      });
    });

    describe('given an injected clock', () => {
      it('stamps entries with the injected time', () => {
        let time = 1_000;
        const cache = createKeyedCache<string>({ freshForMs: 10, now: () => time });
        cache.set('quote', 'value');

        time = 1_011;

        expect(cache.getRaw('quote')?.fetchedAt).toBe(1_000);
        expect(cache.get('quote')).toBeUndefined();
      });
    });
  });

  describe('composite keys', () => {
    it('stores tuple keys independently of their parts', () => {
      const cache = createKeyedCache<string, readonly [string, string]>({
        freshForMs: FRESH_FOR_MS,
      });
      cache.set(['portfolio-1', 'holding-1'], 'a');
      cache.set(['portfolio-1', 'holding-2'], 'b');

      expect(cache.get(['portfolio-1', 'holding-1'])).toBe('a');
      expect(cache.get(['portfolio-1', 'holding-2'])).toBe('b');
      expect(cache.keys()).toEqual([
        ['portfolio-1', 'holding-1'],
        ['portfolio-1', 'holding-2'],
      ]);
    });

    it('does not confuse a string key with a tuple key', () => {
      const cache = createKeyedCache<string, string | readonly string[]>({
        freshForMs: FRESH_FOR_MS,
      });
      cache.set('["a"]', 'string');
      cache.set(['a'], 'tuple');

      expect(cache.get('["a"]')).toBe('string');
      expect(cache.get(['a'])).toBe('tuple');
    });
  });

  describe('remove', () => {
    describe('given key exists', () => {
      it('removes the entry and returns true', () => {
        const cache = createKeyedCache<string>({ freshForMs: FRESH_FOR_MS });
        cache.set('user', 'value');

        expect(cache.remove('user')).toBe(true);
        expect(cache.getRaw('user')).toBeUndefined();
      });
    });

    describe('given key does not exist', () => {
      it('returns false', () => {
        const cache = createKeyedCache<string>({ freshForMs: FRESH_FOR_MS });

        expect(cache.remove('nonexistent')).toBe(false);
      });
    });
  });

  describe('removeAll', () => {
    it('removes only matching entries', () => {
      const cache = createKeyedCache<number>({ freshForMs: FRESH_FOR_MS });
      cache.set('a', 1);
      cache.set('b', 2);
      cache.set('c', 3);

      const removed = cache.removeAll((_key, value) => value % 2 === 1);

      expect(removed).toBe(2);
      expect(cache.keys()).toEqual(['b']);
    });
  });

  describe('clear', () => {
    it('removes all entries', () => {
      const cache = createKeyedCache<string>({ freshForMs: FRESH_FOR_MS });
      cache.set('key1', 'value1');
      cache.set('key2', 'value2');

      cache.clear();

      expect(cache.size()).toBe(0);
      expect(cache.getRaw('key1')).toBeUndefined();
    });
  });

  describe('revision', () => {
    it('changes on set, remove and clear of a key', () => {
      const cache = createKeyedCache<string>({ freshForMs: FRESH_FOR_MS });
      const initial = cache.revision('user');

      cache.set('user', 'value');
      const afterSet = cache.revision('user');
      cache.remove('user');
      const afterRemove = cache.revision('user');
      cache.clear();
      const afterClear = cache.revision('user');

      expect(afterSet).toBeGreaterThan(initial);
      expect(afterRemove).toBeGreaterThan(afterSet);
      expect(afterClear).toBeGreaterThan(afterRemove);
    });

    it('does not change when another key is written', () => {
      const cache = createKeyedCache<string>({ freshForMs: FRESH_FOR_MS });
      const before = cache.revision('user');

      cache.set('family', 'value');

      expect(cache.revision('user')).toBe(before);
    });

    it('changes for a key removed by removeAll', () => {
      const cache = createKeyedCache<string>({ freshForMs: FRESH_FOR_MS });
      cache.set('user', 'value');
      const before = cache.revision('user');

      cache.removeAll(() => true);

      expect(cache.revision('user')).toBeGreaterThan(before);
    });
  });
});

describe('isStale', () => {
  it('is false at the boundary and true one millisecond past it', () => {
    const entry = createCacheEntry('value', 1_000, 500);

    expect(isStale(entry, 1_500)).toBe(false);
    expect(isStale(entry, 1_501)).toBe(true);
  });
});
