/**
 * Authentication strategies: one closed variant per supported scheme.
 *
 * @packageDocumentation
 */

import type { Result } from 'neverthrow';
import type { SessionError } from '../errors/errors.js';
import type { HttpRequest, HttpResponse } from '../http/types.js';
import type { OidcTokenManager } from '../oidc/types.js';

// ============================================================================
// Mutual authentication capability
// ============================================================================

/**
 * Connection-oriented schemes whose tokens come from the platform's security
 * library (SSPI, GSSAPI).
 */
export type MutualAuthScheme = 'Negotiate' | 'NTLM';

/**
 * Where a handshake is addressed. `proxy` is true when answering a 407.
 */
export interface MutualAuthTarget {
  readonly url: string;
  readonly host: string;
  readonly proxy: boolean;
}

/**
 * Output of one handshake step.
 */
export interface MutualAuthStep {
  /** Token to send back; absent when the provider has nothing more to say */
  readonly token?: string | undefined;
  /** True once the security context is established */
  readonly complete: boolean;
}

/**
 * Failure reported by the provider.
 */
export interface MutualAuthFailure {
  readonly message: string;
  readonly cause?: unknown;
}

/**
 * Security context of one request sequence. Never shared between requests.
 */
export interface MutualAuthContext {
  /**
   * Produces the next token. `serverToken` is undefined on the first round and
   * is the server's token68 afterwards (including the final one on a 2xx).
   */
  readonly step: (
    serverToken: string | undefined
  ) => Promise<Result<MutualAuthStep, MutualAuthFailure>>;
}

/**
 * Platform-specific producer of NTLM/Negotiate tokens (Kerberos ticket cache,
 * Windows single sign-on). Injected; this package ships no implementation.
 */
export interface MutualAuthProvider {
  /** Schemes this provider can serve on the current platform */
  readonly supportedSchemes: readonly MutualAuthScheme[];
  readonly createContext: (scheme: MutualAuthScheme, target: MutualAuthTarget) => MutualAuthContext;
}

// ============================================================================
// Strategies
// ============================================================================

export interface AnonymousStrategy {
  readonly kind: 'anonymous';
}

export interface BasicStrategy {
  readonly kind: 'basic';
  /** Username as sent, `DOMAIN\user` when a domain was given */
  readonly username: string;
  /** Complete `Authorization` header value */
  readonly authorization: string;
}

export interface MutualAuthStrategy {
  readonly kind: 'mutual';
  readonly scheme: MutualAuthScheme;
  readonly provider: MutualAuthProvider;
  /** Round limit per request sequence */
  readonly maxRounds: number;
}

export interface OidcStrategy {
  readonly kind: 'oidc';
  readonly manager: OidcTokenManager;
}

/**
 * The strategy a Session authenticates with.
 */
export type AuthStrategy = AnonymousStrategy | BasicStrategy | MutualAuthStrategy | OidcStrategy;

// ============================================================================
// Request exchange
// ============================================================================

/**
 * Outcome of inspecting a response.
 */
export type RetryDecision =
  | { readonly retry: false }
  | { readonly retry: true; readonly request: HttpRequest };

/**
 * Per-request authentication state: created for one logical request and dropped
 * once its response is final. Handshake continuation and the OIDC
 * retry-once flag live here, not on the Session.
 */
export interface RequestExchange {
  /** Attaches credentials before the first send */
  readonly prepareRequest: (request: HttpRequest) => Promise<Result<HttpRequest, SessionError>>;
  /** Decides whether to send again, with the request to send */
  readonly handleResponse: (
    response: HttpResponse<string>,
    request: HttpRequest
  ) => Promise<Result<RetryDecision, SessionError>>;
}
