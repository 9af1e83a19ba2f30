/**
 * Cross-cutting session options: headers, timeouts, TLS and proxy.
 *
 * @packageDocumentation
 */

import { err, ok, type Result } from 'neverthrow';
import { ConfigurationError } from '../errors/errors.js';
import { createFetchClient, DEFAULT_TIMEOUT_MS } from '../http/fetch-client.js';
import { mergeHeaders } from '../http/headers.js';
import type { FetchLike, HttpClient, HttpRequest, TlsOptions } from '../http/types.js';

export const PACKAGE_NAME = 'auth-negotiation';
export const PACKAGE_VERSION = '0.1.0';

/**
 * Options independent of the authentication scheme. Read-only to strategies.
 */
export interface SessionConfiguration {
  /** Sent with every request, the probe included */
  readonly headers?: Readonly<Record<string, string>> | undefined;
  /** Per-request deadline (default: 31000) */
  readonly requestTimeoutMs?: number | undefined;
  /** Default: `auth-negotiation/<version> node/<version> (<platform>)` */
  readonly userAgent?: string | undefined;
  readonly tls?: TlsOptions | undefined;
  readonly proxyUrl?: string | undefined;
}

/**
 * Configuration with defaults applied.
 */
export interface ResolvedSessionConfiguration {
  readonly headers: Readonly<Record<string, string>>;
  readonly requestTimeoutMs: number;
  readonly userAgent: string;
  readonly tls?: TlsOptions | undefined;
  readonly proxyUrl?: string | undefined;
}

export const defaultUserAgent = (): string =>
  `${PACKAGE_NAME}/${PACKAGE_VERSION} node/${process.versions.node} (${process.platform})`;

/**
 * Validates a configuration and fills in the defaults.
 *
 * @example
 * ```typescript
 * const resolved = resolveSessionConfiguration({ requestTimeoutMs: 10_000 });
 * // ok({ headers: {}, requestTimeoutMs: 10000, userAgent: 'auth-negotiation/0.1.0 node/20.11.1 (linux)' })
 * ```
 */
export const resolveSessionConfiguration = (
  configuration: SessionConfiguration = {}
): Result<ResolvedSessionConfiguration, ConfigurationError> => {
  const { requestTimeoutMs = DEFAULT_TIMEOUT_MS, proxyUrl, tls } = configuration;

  if (!Number.isFinite(requestTimeoutMs) || requestTimeoutMs <= 0) {
    return err(
      new ConfigurationError(
        `requestTimeoutMs must be a positive number of milliseconds, got ${String(requestTimeoutMs)}`
      )
    );
  }

  if (proxyUrl !== undefined) {
    try {
      new URL(proxyUrl);
    } catch (error) {
      return err(new ConfigurationError(`Invalid proxy URL "${proxyUrl}"`, { cause: error }));
    }
  }

  return ok({
    headers: { ...configuration.headers },
    requestTimeoutMs,
    userAgent: configuration.userAgent ?? defaultUserAgent(),
    ...(tls !== undefined ? { tls } : {}),
    ...(proxyUrl !== undefined ? { proxyUrl } : {}),
  });
};

/**
 * Default transport for a configuration: undici fetch with its TLS and proxy.
 * The user agent and configured headers go out with every request it sends.
 *
 * @param fetch - Replaces undici's fetch
 */
export const createTransport = (
  configuration: ResolvedSessionConfiguration,
  fetch?: FetchLike
): HttpClient =>
  createFetchClient({
    timeoutMs: configuration.requestTimeoutMs,
    baseHeaders: mergeHeaders({ 'User-Agent': configuration.userAgent }, configuration.headers),
    tls: configuration.tls,
    proxyUrl: configuration.proxyUrl,
    fetch,
  });

/**
 * Adds the configured headers and deadline to a request. Headers already on the
 * request win.
 */
export const applyConfiguration = (
  request: HttpRequest,
  configuration: ResolvedSessionConfiguration
): HttpRequest => ({
  ...request,
  headers: mergeHeaders({ 'User-Agent': configuration.userAgent }, configuration.headers, request.headers),
  timeoutMs: request.timeoutMs ?? configuration.requestTimeoutMs,
});
