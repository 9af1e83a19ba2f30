/**
 * auth-negotiation - authenticated HTTP sessions negotiated from the server's
 * WWW-Authenticate challenge (Basic, NTLM, Negotiate, OpenID Connect)
 *
 * @packageDocumentation
 */

// ============================================================================
// CORE: Session negotiation
// ============================================================================

export {
  createSessionBuilder,
  createSession,
  resolveRequestUrl,
  resolveSessionConfiguration,
  applyConfiguration,
  createTransport,
  defaultUserAgent,
  selectScheme,
  resolveOidcSettings,
  configuredSchemeName,
  SCHEME_PRECEDENCE,
  PACKAGE_NAME,
  PACKAGE_VERSION,
} from './session/index.js';
export type {
  Session,
  SessionOptions,
  SessionRequestInit,
  SessionConfiguration,
  ResolvedSessionConfiguration,
  SessionBuilder,
  SessionBuilderOptions,
  SessionBuilderState,
  ConfiguredSessionBuilder,
  CredentialConfig,
  CredentialResult,
  OidcCredentialOptions,
  NegotiatedScheme,
  SchemeSelection,
} from './session/index.js';

// ============================================================================
// CORE: Challenge parsing
// ============================================================================

export {
  parseChallenges,
  parseChallengesWithIssues,
  formatChallenges,
  findChallenge,
  hasScheme,
  listSchemes,
} from './challenge/index.js';
export type {
  Challenge,
  ChallengeHeaderInput,
  ChallengeParseIssue,
  ChallengeParseResult,
} from './challenge/index.js';

// ============================================================================
// Strategies
// ============================================================================

export {
  createAnonymousStrategy,
  createBasicStrategy,
  createMutualAuthStrategy,
  createOidcStrategy,
  beginExchange,
  describeStrategy,
  DEFAULT_MAX_HANDSHAKE_ROUNDS,
} from './strategy/index.js';
export type {
  AuthStrategy,
  AnonymousStrategy,
  BasicStrategy,
  BasicCredentialOptions,
  MutualAuthStrategy,
  OidcStrategy,
  MutualAuthContext,
  MutualAuthFailure,
  MutualAuthProvider,
  MutualAuthScheme,
  MutualAuthStep,
  MutualAuthTarget,
  RequestExchange,
  RetryDecision,
} from './strategy/index.js';

// ============================================================================
// OpenID Connect
// ============================================================================

export {
  createOidcTokenManager,
  tokenStorageKey,
  DEFAULT_LOGIN_TIMEOUT_MS,
  DEFAULT_REFRESH_SKEW_MS,
  createTokenClient,
  toTokenSet,
  createDiscoveryFetcher,
  buildDiscoveryUrls,
  normalizeAuthority,
  createLoopbackCallbackReceiver,
  handleCallbackRequest,
  loopbackAddress,
  buildAuthorizationUrl,
  generatePkceVerifier,
  computePkceChallenge,
  createPkceChallengePair,
  supportsS256,
  generateState,
  validateAuthorizationCallback,
} from './oidc/index.js';
export type {
  OidcTokenManager,
  OidcTokenManagerOptions,
  OidcClientSettings,
  OidcError,
  OidcState,
  TokenSet,
  TokenClient,
  TokenClientError,
  TokenClientOptions,
  DiscoveryDocument,
  DiscoveryError,
  DiscoveryFetcher,
  DiscoveryFetcherOptions,
  AuthorizationCallback,
  AuthorizationCodeReceiver,
  CallbackListener,
  CallbackReply,
  PkceChallenge,
} from './oidc/index.js';

// ============================================================================
// Errors
// ============================================================================

export {
  SessionError,
  ConfigurationError,
  ConnectionError,
  AuthenticationMismatchError,
  ReauthenticationRequiredError,
  TimeoutError,
  HandshakeFailedError,
  AuthorizationFailedError,
  isSessionError,
  isSessionErrorCode,
} from './errors/index.js';
export type { SessionErrorCode, AnySessionError } from './errors/index.js';

// ============================================================================
// Infrastructure
// ============================================================================

// HTTP transport
export {
  createFetchClient,
  createDispatcher,
  parseJsonBody,
  toSessionError,
  setHeader,
  mergeHeaders,
  DEFAULT_TIMEOUT_MS,
} from './http/index.js';
export type {
  FetchLike,
  HttpClient,
  HttpClientOptions,
  HttpError,
  HttpMethod,
  HttpRequest,
  HttpResponse,
  TlsOptions,
} from './http/index.js';

// Secret storage
export { createMemoryStorage } from './storage/index.js';
export type { SecureStorage, MemoryStorage } from './storage/index.js';

// Caching
export { createMemoryCache } from './cache/index.js';
export type { Cache, MemoryCacheOptions } from './cache/index.js';

// Logging
export { noopLog, withMinimumLevel, parseLogLevel } from './logging/index.js';
export type { Log, LogLevel, LogData } from './logging/index.js';

// Concurrency
export { createSingleFlight, withTimeout } from './util/index.js';
export type { SingleFlight } from './util/index.js';
