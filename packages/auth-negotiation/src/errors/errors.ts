/**
 * Error taxonomy for session negotiation.
 *
 * Every failure reported by this package is one of these classes, so callers can
 * tell "fix your configuration" apart from "retry the network" and from
 * "re-authenticate interactively" by checking `code` (or `instanceof`).
 *
 * @packageDocumentation
 */

/**
 * Discriminant carried by every {@link SessionError}.
 */
export type SessionErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'CONNECTION_ERROR'
  | 'AUTHENTICATION_MISMATCH'
  | 'REAUTHENTICATION_REQUIRED'
  | 'TIMEOUT'
  | 'HANDSHAKE_FAILED'
  | 'AUTHORIZATION_FAILED';

/**
 * Base class of all negotiation errors.
 */
export abstract class SessionError extends Error {
  abstract readonly code: SessionErrorCode;

  constructor(message: string, options?: { readonly cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
  }
}

/**
 * The builder was misused: a second credential was configured, `connect()` was
 * called before any credential, or required OIDC parameters are missing.
 * Not retryable.
 */
export class ConfigurationError extends SessionError {
  readonly code = 'CONFIGURATION_ERROR' as const;
  override readonly name = 'ConfigurationError';
}

/**
 * The transport failed, or the server answered with a status that is neither a
 * success nor an authentication challenge.
 */
export class ConnectionError extends SessionError {
  readonly code = 'CONNECTION_ERROR' as const;
  override readonly name = 'ConnectionError';
  /** HTTP status, when the server did answer */
  readonly status: number | undefined;
  /** URL of the failed request */
  readonly url: string | undefined;

  constructor(
    message: string,
    options: {
      readonly status?: number | undefined;
      readonly url?: string | undefined;
      readonly cause?: unknown;
    } = {}
  ) {
    super(message, { cause: options.cause });
    this.status = options.status;
    this.url = options.url;
  }
}

/**
 * None of the schemes the server advertised can be satisfied by the configured
 * credential. Terminal for the builder that produced it.
 */
export class AuthenticationMismatchError extends SessionError {
  readonly code = 'AUTHENTICATION_MISMATCH' as const;
  override readonly name = 'AuthenticationMismatchError';
  readonly configuredScheme: string;
  readonly advertisedSchemes: readonly string[];

  constructor(configuredScheme: string, advertisedSchemes: readonly string[]) {
    const advertised =
      advertisedSchemes.length > 0 ? advertisedSchemes.join(', ') : 'no authentication schemes';
    super(
      `Configured authentication "${configuredScheme}" cannot satisfy the server, which advertised: ${advertised}`
    );
    this.configuredScheme = configuredScheme;
    this.advertisedSchemes = advertisedSchemes;
  }
}

/**
 * The OIDC refresh token was rejected or is missing. The caller must run the
 * interactive authorization again; this is never done implicitly mid-request.
 */
export class ReauthenticationRequiredError extends SessionError {
  readonly code = 'REAUTHENTICATION_REQUIRED' as const;
  override readonly name = 'ReauthenticationRequiredError';
}

/**
 * A bounded operation (probe, token exchange, login capture) exceeded its deadline.
 */
export class TimeoutError extends SessionError {
  readonly code = 'TIMEOUT' as const;
  override readonly name = 'TimeoutError';
  readonly operation: string;
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number, options?: { readonly cause?: unknown }) {
    super(`${operation} timed out after ${String(timeoutMs)}ms`, options);
    this.operation = operation;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * An NTLM/Negotiate handshake was rejected by the mutual-auth provider or did not
 * complete within the allowed number of rounds.
 */
export class HandshakeFailedError extends SessionError {
  readonly code = 'HANDSHAKE_FAILED' as const;
  override readonly name = 'HandshakeFailedError';
  readonly scheme: string;
  readonly rounds: number;

  constructor(
    scheme: string,
    rounds: number,
    message: string,
    options?: { readonly cause?: unknown }
  ) {
    super(`${scheme} handshake failed after ${String(rounds)} round(s): ${message}`, options);
    this.scheme = scheme;
    this.rounds = rounds;
  }
}

/**
 * The interactive authorization-code flow failed: the identity provider returned an
 * error on the callback, the state did not match, or the code exchange was refused.
 */
export class AuthorizationFailedError extends SessionError {
  readonly code = 'AUTHORIZATION_FAILED' as const;
  override readonly name = 'AuthorizationFailedError';
  /** OAuth error code reported by the authority, if any */
  readonly oauthError: string | undefined;

  constructor(
    message: string,
    options: { readonly oauthError?: string | undefined; readonly cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.oauthError = options.oauthError;
  }
}

/**
 * Type guard for any negotiation error.
 */
export const isSessionError = (value: unknown): value is SessionError =>
  value instanceof SessionError;

/**
 * Narrows a value to the error class carrying `code`.
 */
export const isSessionErrorCode = <C extends SessionErrorCode>(
  value: unknown,
  code: C
): value is Extract<AnySessionError, { readonly code: C }> =>
  isSessionError(value) && value.code === code;

/**
 * Closed union of the concrete error classes.
 */
export type AnySessionError =
  | ConfigurationError
  | ConnectionError
  | AuthenticationMismatchError
  | ReauthenticationRequiredError
  | TimeoutError
  | HandshakeFailedError
  | AuthorizationFailedError;
