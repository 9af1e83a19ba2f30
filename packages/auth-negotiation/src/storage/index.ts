/**
 * Secret storage for OIDC token sets.
 *
 * @packageDocumentation
 */

export { createMemoryStorage } from './memory-storage.js';
export type { MemoryStorage } from './memory-storage.js';
export type { SecureStorage } from './types.js';
