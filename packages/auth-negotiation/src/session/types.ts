import type { Result } from 'neverthrow';
import type { ConfigurationError, SessionError } from '../errors/errors.js';
import type { HttpClient } from '../http/types.js';
import type { Log } from '../logging/logger.js';
import type { AuthorizationCodeReceiver } from '../oidc/types.js';
import type { SecureStorage } from '../storage/types.js';
import type { BasicCredentialOptions } from '../strategy/basic.js';
import type { MutualAuthProvider } from '../strategy/types.js';
import type { SessionConfiguration } from './configuration.js';
import type { Session } from './session.js';

// ============================================================================
// Credentials
// ============================================================================

/**
 * OIDC client options. `authority`, `clientId`, `redirectUri`, `scopes` and
 * `audience` may be left out when the server's Bearer challenge supplies them.
 */
export interface OidcCredentialOptions {
  readonly authority?: string | undefined;
  readonly clientId?: string | undefined;
  readonly clientSecret?: string | undefined;
  readonly redirectUri?: string | undefined;
  readonly scopes?: readonly string[] | undefined;
  readonly audience?: string | undefined;
  /** Secret store holding the canonical token */
  readonly storage?: SecureStorage | undefined;
  /** Refresh token to redeem instead of an interactive login */
  readonly refreshToken?: string | undefined;
  /** Allow the interactive login (default: true) */
  readonly interactive?: boolean | undefined;
  readonly openAuthorizationUrl?: ((url: string) => void | Promise<void>) | undefined;
  readonly codeReceiver?: AuthorizationCodeReceiver | undefined;
  readonly loginTimeoutMs?: number | undefined;
  readonly refreshSkewMs?: number | undefined;
  /** Options for the calls to the identity provider; the session's apply when unset */
  readonly identityProviderConfiguration?: SessionConfiguration | undefined;
  /** Transport to the identity provider; built from the configuration when unset */
  readonly identityProviderHttpClient?: HttpClient | undefined;
  /** Clock, in epoch milliseconds */
  readonly now?: (() => number) | undefined;
}

/**
 * The one credential a builder holds.
 */
export type CredentialConfig =
  | { readonly kind: 'anonymous' }
  | {
      readonly kind: 'basic';
      readonly username: string;
      readonly password: string;
      readonly domain?: string | undefined;
    }
  | { readonly kind: 'windows'; readonly provider: MutualAuthProvider }
  | { readonly kind: 'oidc'; readonly options: OidcCredentialOptions };

// ============================================================================
// Builder
// ============================================================================

export interface SessionBuilderOptions {
  readonly configuration?: SessionConfiguration | undefined;
  /** Transport to the API; built from the configuration when unset */
  readonly httpClient?: HttpClient | undefined;
  readonly log?: Log | undefined;
  /** NTLM/Negotiate round limit per request (default: 3) */
  readonly maxHandshakeRounds?: number | undefined;
}

/**
 * `empty → configured → finalized`. `finalized` is reached once a connect
 * result is cached.
 */
export type SessionBuilderState = 'empty' | 'configured' | 'finalized';

/**
 * Builder after a credential was chosen: it can only connect.
 */
export interface ConfiguredSessionBuilder {
  readonly credential: CredentialConfig;
  /**
   * Probes the server and builds the session. Single-flight; a successful
   * session and an authentication mismatch are cached, other failures may be
   * retried.
   */
  readonly connect: () => Promise<Result<Session, SessionError>>;
}

export type CredentialResult = Result<ConfiguredSessionBuilder, ConfigurationError>;

/**
 * Entry point. Exactly one `with…` call succeeds per builder; a second one is a
 * {@link ConfigurationError}.
 */
export interface SessionBuilder {
  readonly state: () => SessionBuilderState;
  readonly withAnonymous: () => CredentialResult;
  readonly withCredentials: (
    username: string,
    password: string,
    options?: BasicCredentialOptions
  ) => CredentialResult;
  /** Windows-integrated authentication through the platform's provider */
  readonly withAutologon: (provider: MutualAuthProvider) => CredentialResult;
  readonly withOidc: (options?: OidcCredentialOptions) => CredentialResult;
  /** Same as the configured builder's connect; fails while no credential is set */
  readonly connect: () => Promise<Result<Session, SessionError>>;
}
