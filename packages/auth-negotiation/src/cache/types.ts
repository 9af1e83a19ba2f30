/**
 * Generic cache interface for storing values with a TTL.
 */
export interface Cache<T> {
  /**
   * Gets a value from the cache.
   * @returns The cached value or undefined if not found/expired
   */
  readonly get: (key: string) => T | undefined;

  /**
   * Sets a value in the cache.
   * @param ttlMs - Overrides the default TTL
   */
  readonly set: (key: string, value: T, ttlMs?: number) => void;

  /**
   * Deletes a value from the cache.
   * @returns true if the key existed, false otherwise
   */
  readonly delete: (key: string) => boolean;

  /**
   * Clears all values from the cache.
   */
  readonly clear: () => void;
}

/**
 * Options for {@link createMemoryCache}.
 */
export interface MemoryCacheOptions {
  /** Default TTL in milliseconds (default: 1 hour) */
  readonly defaultTtlMs?: number | undefined;
  /** Clock, in epoch milliseconds */
  readonly now?: (() => number) | undefined;
}
