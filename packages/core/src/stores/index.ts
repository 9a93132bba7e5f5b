export type { CacheStore } from './cache-store.js';
export { InMemoryCacheStore } from './in-memory-cache-store.js';
export { createCacheKey } from './cache-key.js';
