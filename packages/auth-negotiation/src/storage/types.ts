/**
 * Secret store for OIDC tokens.
 *
 * Backed by whatever the host offers: an OS keychain, an encrypted file, a vault.
 * When configured it holds the canonical copy of a token set; the token manager's
 * in-memory copy is a cache of it. Implementations may reject; callers treat a
 * rejected read as a miss.
 */
export interface SecureStorage {
  /**
   * Gets a secret.
   * @returns The stored value or undefined if absent
   */
  readonly get: (key: string) => Promise<string | undefined>;

  /**
   * Stores a secret, replacing any previous value.
   */
  readonly set: (key: string, value: string) => Promise<void>;

  /**
   * Deletes a secret.
   * @returns true if the key existed
   */
  readonly delete: (key: string) => Promise<boolean>;
}
