export { createKeyedCache } from './keyed-cache.js';
export { createCacheEntry, isStale } from './cache-entry.js';
export { serializeKey } from './cache-key.js';
export { FRESHNESS } from './freshness.js';
export type { FreshnessPolicy } from './freshness.js';
export type { CacheEntry, CacheKey, KeyedCache, KeyedCacheOptions } from './types.js';
