export type {
  AnonymousStrategy,
  AuthStrategy,
  BasicStrategy,
  MutualAuthContext,
  MutualAuthFailure,
  MutualAuthProvider,
  MutualAuthScheme,
  MutualAuthStep,
  MutualAuthStrategy,
  MutualAuthTarget,
  OidcStrategy,
  RequestExchange,
  RetryDecision,
} from './types.js';
export { createAnonymousStrategy } from './anonymous.js';
export { createBasicStrategy } from './basic.js';
export type { BasicCredentialOptions } from './basic.js';
export { createMutualAuthStrategy, DEFAULT_MAX_HANDSHAKE_ROUNDS } from './mutual-auth.js';
export { createOidcStrategy } from './oidc.js';
export { beginExchange, describeStrategy } from './exchange.js';
