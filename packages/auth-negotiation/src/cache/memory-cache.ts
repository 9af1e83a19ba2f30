import type { Cache, MemoryCacheOptions } from './types.js';

/** Default TTL: 1 hour */
const DEFAULT_TTL_MS = 60 * 60 * 1000;

interface CacheEntry<T> {
  readonly value: T;
  readonly expiresAt: number;
}

/**
 * Creates an in-memory cache with TTL support. Used for identity provider
 * metadata, which changes rarely.
 *
 * @example
 * ```typescript
 * const cache = createMemoryCache<DiscoveryDocument>({ defaultTtlMs: 60_000 });
 * cache.set('https://idp.example.com', document);
 * ```
 */
export const createMemoryCache = <T>(options: MemoryCacheOptions = {}): Cache<T> => {
  const defaultTtlMs = options.defaultTtlMs ?? DEFAULT_TTL_MS;
  const now = options.now ?? Date.now;
  const store = new Map<string, CacheEntry<T>>();

  const get = (key: string): T | undefined => {
    const entry = store.get(key);
    if (entry === undefined) {
      return undefined;
    }

    if (now() >= entry.expiresAt) {
      store.delete(key);
      return undefined;
    }

    return entry.value;
  };

  const set = (key: string, value: T, ttlMs?: number): void => {
    const current = now();
    for (const [k, entry] of store.entries()) {
      if (current >= entry.expiresAt) {
        store.delete(k);
      }
    }
    store.set(key, { value, expiresAt: current + (ttlMs ?? defaultTtlMs) });
  };

  return {
    get,
    set,
    delete: (key) => store.delete(key),
    clear: () => {
      store.clear();
    },
  };
};
