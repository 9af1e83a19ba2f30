/**
 * The negotiated session: a transport plus the strategy selected for the server.
 *
 * @packageDocumentation
 */

import { err, ok, type Result } from 'neverthrow';
import type { SessionError } from '../errors/errors.js';
import { toSessionError } from '../http/errors.js';
import type { HttpClient, HttpMethod, HttpRequest, HttpResponse } from '../http/types.js';
import { noopLog, type Log } from '../logging/logger.js';
import { beginExchange } from '../strategy/exchange.js';
import type { AuthStrategy } from '../strategy/types.js';
import { applyConfiguration, type ResolvedSessionConfiguration } from './configuration.js';

/**
 * Per-request options.
 */
export interface SessionRequestInit {
  /** Default: GET */
  readonly method?: HttpMethod | undefined;
  readonly headers?: Readonly<Record<string, string>> | undefined;
  readonly body?: string | undefined;
  readonly signal?: AbortSignal | undefined;
  readonly timeoutMs?: number | undefined;
}

/**
 * An authenticated session. Immutable once built; safe to share between
 * concurrent callers.
 */
export interface Session {
  readonly baseUrl: string;
  readonly strategy: AuthStrategy;
  readonly configuration: ResolvedSessionConfiguration;
  /**
   * Sends a request relative to the base URL, authenticating it with the
   * strategy. Any HTTP status is a response; errors are transport failures and
   * authentication failures.
   */
  readonly request: (
    path?: string,
    init?: SessionRequestInit
  ) => Promise<Result<HttpResponse<string>, SessionError>>;
}

export interface SessionOptions {
  readonly baseUrl: string;
  readonly strategy: AuthStrategy;
  readonly configuration: ResolvedSessionConfiguration;
  readonly httpClient: HttpClient;
  readonly log?: Log | undefined;
}

/**
 * Joins a request path onto the base URL. Absolute URLs are used as they are.
 *
 * @example
 * ```typescript
 * resolveRequestUrl('https://api.example.com/v1/', '/items'); // 'https://api.example.com/v1/items'
 * ```
 */
export const resolveRequestUrl = (baseUrl: string, path = ''): string => {
  if (/^https?:\/\//i.test(path)) {
    return path;
  }
  if (path === '') {
    return baseUrl;
  }
  return `${baseUrl.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
};

export const createSession = (options: SessionOptions): Session => {
  const { baseUrl, strategy, configuration, httpClient } = options;
  const log = options.log ?? noopLog;

  const request = async (
    path?: string,
    init: SessionRequestInit = {}
  ): Promise<Result<HttpResponse<string>, SessionError>> => {
    const exchange = beginExchange(strategy, log);
    const initial: HttpRequest = applyConfiguration(
      {
        url: resolveRequestUrl(baseUrl, path),
        method: init.method ?? 'GET',
        ...(init.headers !== undefined ? { headers: init.headers } : {}),
        ...(init.body !== undefined ? { body: init.body } : {}),
        ...(init.signal !== undefined ? { signal: init.signal } : {}),
        ...(init.timeoutMs !== undefined ? { timeoutMs: init.timeoutMs } : {}),
      },
      configuration
    );

    const prepared = await exchange.prepareRequest(initial);
    if (prepared.isErr()) {
      return err(prepared.error);
    }

    // Strategies bound the number of retries they ask for.
    let current = prepared.value;
    for (;;) {
      const response = await httpClient.send(current);
      if (response.isErr()) {
        return err(toSessionError(response.error, `${current.method} ${current.url}`));
      }

      const decision = await exchange.handleResponse(response.value, current);
      if (decision.isErr()) {
        return err(decision.error);
      }
      if (!decision.value.retry) {
        return ok(response.value);
      }
      current = decision.value.request;
    }
  };

  return { baseUrl, strategy, configuration, request };
};
