import type { SecureStorage } from './types.js';

/**
 * In-memory store with change tracking, for tests and short-lived processes.
 */
export interface MemoryStorage extends SecureStorage {
  /** Snapshot of the current entries */
  readonly entries: () => ReadonlyMap<string, string>;
  /** Number of `set` calls so far */
  readonly writeCount: () => number;
}

/**
 * Creates an in-memory secret store. Values are lost when the process exits.
 *
 * @param initial - Entries present from the start
 *
 * @example
 * ```typescript
 * const storage = createMemoryStorage();
 * const manager = createOidcTokenManager({ ...options, storage });
 * ```
 */
export const createMemoryStorage = (
  initial: Readonly<Record<string, string>> = {}
): MemoryStorage => {
  const store = new Map<string, string>(Object.entries(initial));
  let writes = 0;

  return {
    get: (key) => Promise.resolve(store.get(key)),
    set: (key, value) => {
      writes++;
      store.set(key, value);
      return Promise.resolve();
    },
    delete: (key) => Promise.resolve(store.delete(key)),
    entries: () => new Map(store),
    writeCount: () => writes,
  };
};
