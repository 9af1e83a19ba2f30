/**
 * PKCE (Proof Key for Code Exchange) per RFC 7636, S256 method.
 *
 * @packageDocumentation
 */

import { createHash, randomBytes } from 'node:crypto';
import type { DiscoveryDocument, PkceChallenge } from './types.js';

/**
 * Characters allowed in PKCE verifier (unreserved URI characters).
 * Per RFC 7636 Section 4.1: [A-Z] / [a-z] / [0-9] / "-" / "." / "_" / "~"
 */
const VERIFIER_CHARSET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789-._~';

const VERIFIER_MIN_LENGTH = 43;
const VERIFIER_MAX_LENGTH = 128;
const VERIFIER_DEFAULT_LENGTH = 64;

/**
 * Generates a random PKCE verifier.
 *
 * @param length - Clamped to 43..128 (default: 64)
 */
export const generatePkceVerifier = (length: number = VERIFIER_DEFAULT_LENGTH): string => {
  const clampedLength = Math.max(VERIFIER_MIN_LENGTH, Math.min(VERIFIER_MAX_LENGTH, length));
  const bytes = randomBytes(clampedLength);

  let verifier = '';
  for (const byte of bytes) {
    verifier += VERIFIER_CHARSET.charAt(byte % VERIFIER_CHARSET.length);
  }
  return verifier;
};

/**
 * Base64url SHA-256 of the verifier.
 */
export const computePkceChallenge = (verifier: string): string =>
  createHash('sha256').update(verifier, 'ascii').digest('base64url');

/**
 * Generates a verifier and its S256 challenge.
 *
 * @example
 * ```typescript
 * const { verifier, challenge } = createPkceChallengePair();
 * // send `challenge` on the authorization request, `verifier` on the code exchange
 * ```
 */
export const createPkceChallengePair = (
  verifierLength: number = VERIFIER_DEFAULT_LENGTH
): PkceChallenge => {
  const verifier = generatePkceVerifier(verifierLength);
  return { verifier, challenge: computePkceChallenge(verifier), method: 'S256' };
};

/**
 * False only when the metadata lists challenge methods and S256 is not one of
 * them. Metadata that lists none is given the benefit of the doubt.
 */
export const supportsS256 = (discovery: DiscoveryDocument): boolean =>
  discovery.code_challenge_methods_supported === undefined ||
  discovery.code_challenge_methods_supported.includes('S256');
