/**
 * OIDC authorization-code flow, token refresh and token persistence.
 *
 * @packageDocumentation
 */

// Types
export type {
  AuthorizationCallback,
  AuthorizationCodeReceiver,
  CallbackListener,
  DiscoveryDocument,
  OidcClientSettings,
  OidcError,
  OidcState,
  OidcTokenManager,
  PkceChallenge,
  TokenSet,
} from './types.js';

// PKCE and state
export {
  generatePkceVerifier,
  computePkceChallenge,
  createPkceChallengePair,
  supportsS256,
} from './pkce.js';
export { generateState, validateAuthorizationCallback } from './state.js';
export { buildAuthorizationUrl } from './authorization-url.js';

// Identity provider metadata
export { createDiscoveryFetcher, buildDiscoveryUrls, normalizeAuthority } from './discovery.js';
export type { DiscoveryError, DiscoveryFetcher, DiscoveryFetcherOptions } from './discovery.js';

// Token endpoint
export { createTokenClient, toTokenSet } from './token-client.js';
export type { TokenClient, TokenClientError, TokenClientOptions } from './token-client.js';

// Callback capture
export {
  createLoopbackCallbackReceiver,
  handleCallbackRequest,
  loopbackAddress,
} from './callback-receiver.js';
export type { CallbackReply } from './callback-receiver.js';

// Token manager (main orchestrator)
export {
  createOidcTokenManager,
  tokenStorageKey,
  DEFAULT_LOGIN_TIMEOUT_MS,
  DEFAULT_REFRESH_SKEW_MS,
} from './token-manager.js';
export type { OidcTokenManagerOptions } from './token-manager.js';
