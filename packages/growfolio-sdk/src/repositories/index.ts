export { createResourceCache } from './resource-cache.js';
export type { LoadOptions, ResourceCache, ResourceCacheOptions } from './resource-cache.js';
export { findById, removeById, upsertById } from './collection.js';
