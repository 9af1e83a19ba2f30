/**
 * OIDC types: token sets, client settings and the token manager surface.
 *
 * @packageDocumentation
 */

import type { Result } from 'neverthrow';
import type {
  AuthorizationFailedError,
  ConfigurationError,
  ConnectionError,
  ReauthenticationRequiredError,
  TimeoutError,
} from '../errors/errors.js';

// ============================================================================
// Tokens
// ============================================================================

/**
 * Token set held by the token manager, and persisted to the secret store.
 */
export interface TokenSet {
  readonly accessToken: string;
  /** Absent when the authority issues no refresh tokens */
  readonly refreshToken?: string | undefined;
  /** Absolute expiry of the access token (epoch ms), fixed at issuance */
  readonly expiresAt: number;
  readonly tokenType: string;
  /** Granted scopes, space separated, when the authority reports them */
  readonly scope?: string | undefined;
  readonly idToken?: string | undefined;
}

/**
 * Lifecycle of the token held by one manager.
 *
 * - `no_token`: nothing acquired yet
 * - `authorizing`: interactive authorization-code flow in progress
 * - `authorized`: a token is held
 * - `refreshing`: a refresh request is in flight
 * - `expired`: the refresh token was rejected; only {@link OidcTokenManager.authorize} leaves this state
 */
export type OidcState = 'no_token' | 'authorizing' | 'authorized' | 'refreshing' | 'expired';

// ============================================================================
// Settings
// ============================================================================

/**
 * Fully resolved client settings. Missing values have already been filled in from
 * the server's Bearer challenge.
 */
export interface OidcClientSettings {
  /** Issuer base URL */
  readonly authority: string;
  readonly clientId: string;
  /** Confidential clients only; sent as HTTP Basic to the token endpoint */
  readonly clientSecret?: string | undefined;
  /** Loopback URI the authorization code is delivered to */
  readonly redirectUri: string;
  readonly scopes: readonly string[];
  /** API audience, for authorities that issue audience-bound tokens */
  readonly audience?: string | undefined;
}

// ============================================================================
// Discovery
// ============================================================================

/**
 * The part of the identity provider metadata this package uses.
 */
export interface DiscoveryDocument {
  readonly issuer?: string | undefined;
  readonly authorization_endpoint: string;
  readonly token_endpoint: string;
  readonly code_challenge_methods_supported?: readonly string[] | undefined;
}

// ============================================================================
// PKCE and callback
// ============================================================================

/**
 * PKCE verifier/challenge pair (RFC 7636, S256 only).
 */
export interface PkceChallenge {
  readonly verifier: string;
  readonly challenge: string;
  readonly method: 'S256';
}

/**
 * Query parameters delivered to the redirect URI.
 */
export interface AuthorizationCallback {
  readonly code?: string | undefined;
  readonly state?: string | undefined;
  readonly error?: string | undefined;
  readonly errorDescription?: string | undefined;
}

/**
 * A listener waiting for one authorization callback.
 */
export interface CallbackListener {
  /** Resolves with the first callback, or undefined once the listener is aborted or closed */
  readonly callback: Promise<AuthorizationCallback | undefined>;
  readonly close: () => Promise<void>;
}

/**
 * Captures the authorization code after the user signs in.
 */
export interface AuthorizationCodeReceiver {
  /**
   * Starts listening on the redirect URI. Resolves once ready to receive, so the
   * browser is only sent to the authority after this succeeds.
   */
  readonly listen: (
    redirectUri: string,
    signal: AbortSignal
  ) => Promise<Result<CallbackListener, ConnectionError>>;
}

// ============================================================================
// Token manager
// ============================================================================

/**
 * Everything the token manager can fail with.
 */
export type OidcError =
  | ConfigurationError
  | ConnectionError
  | TimeoutError
  | ReauthenticationRequiredError
  | AuthorizationFailedError;

/**
 * Owns the token of one session. Refreshes are single-flight: concurrent callers
 * share one request to the token endpoint.
 */
export interface OidcTokenManager {
  /**
   * Returns a currently valid access token, acquiring or refreshing first when the
   * held token is missing or within the skew margin of its expiry.
   */
  readonly getAccessToken: () => Promise<Result<string, OidcError>>;

  /**
   * Refreshes because the server rejected `staleAccessToken`. When another caller
   * already replaced that token, the replacement is returned without a new refresh.
   */
  readonly forceRefresh: (staleAccessToken: string) => Promise<Result<string, OidcError>>;

  /**
   * Runs the interactive authorization-code flow, replacing any held token.
   * The way out of the `expired` state.
   */
  readonly authorize: () => Promise<Result<TokenSet, OidcError>>;

  readonly getState: () => OidcState;

  readonly getToken: () => TokenSet | undefined;

  /**
   * Forgets the held token and removes it from the secret store.
   */
  readonly clear: () => Promise<void>;
}
