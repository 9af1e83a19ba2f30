export { createMemoryCache } from './memory-cache.js';
export type { Cache, MemoryCacheOptions } from './types.js';
