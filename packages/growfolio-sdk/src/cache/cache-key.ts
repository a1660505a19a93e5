import type { CacheKey } from './types.js';

/**
 * Serializes a key so that a plain string never collides with a tuple.
 */
export const serializeKey = (key: CacheKey): string =>
  typeof key === 'string' ? `s:${key}` : `t:${JSON.stringify(key)}`;
