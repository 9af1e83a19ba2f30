/**
 * Identity provider metadata discovery.
 *
 * Tries `{authority}/.well-known/openid-configuration` first, then the RFC 8414
 * form `{origin}/.well-known/oauth-authorization-server{path}`. A transport failure
 * stops the chain; an unusable answer moves on to the next URL.
 *
 * @packageDocumentation
 */

import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';
import { createMemoryCache } from '../cache/memory-cache.js';
import type { Cache } from '../cache/types.js';
import { ConfigurationError, ConnectionError, type TimeoutError } from '../errors/errors.js';
import { toSessionError } from '../http/errors.js';
import { parseJsonBody } from '../http/fetch-client.js';
import type { HttpClient } from '../http/types.js';
import { noopLog, type Log } from '../logging/logger.js';
import type { DiscoveryDocument } from './types.js';

const discoveryDocumentSchema = z.object({
  issuer: z.string().optional(),
  authorization_endpoint: z.string().url(),
  token_endpoint: z.string().url(),
  code_challenge_methods_supported: z.array(z.string()).optional(),
});

export type DiscoveryError = ConfigurationError | ConnectionError | TimeoutError;

/**
 * Fetches and caches identity provider metadata, per authority.
 */
export interface DiscoveryFetcher {
  readonly fetch: (authority: string) => Promise<Result<DiscoveryDocument, DiscoveryError>>;
  readonly clear: () => void;
}

export interface DiscoveryFetcherOptions {
  readonly httpClient: HttpClient;
  readonly cache?: Cache<DiscoveryDocument> | undefined;
  readonly log?: Log | undefined;
}

/**
 * Normalizes an authority for use as a cache or storage key.
 */
export const normalizeAuthority = (authority: string): string => authority.replace(/\/+$/, '');

/**
 * Discovery URLs for an authority, in the order they are tried.
 *
 * @example
 * ```typescript
 * buildDiscoveryUrls('https://idp.example.com/tenant/');
 * // ['https://idp.example.com/tenant/.well-known/openid-configuration',
 * //  'https://idp.example.com/.well-known/oauth-authorization-server/tenant']
 * ```
 */
export const buildDiscoveryUrls = (
  authority: string
): Result<readonly string[], ConfigurationError> => {
  let parsed: URL;
  try {
    parsed = new URL(authority);
  } catch (error) {
    return err(new ConfigurationError(`Invalid OIDC authority URL "${authority}"`, { cause: error }));
  }

  const base = normalizeAuthority(authority);
  const path = parsed.pathname.replace(/\/+$/, '');
  const urls = [`${base}/.well-known/openid-configuration`];
  urls.push(`${parsed.origin}/.well-known/oauth-authorization-server${path}`);
  return ok(urls);
};

/**
 * Creates a discovery fetcher. Concurrent fetches for one authority share a request.
 *
 * @example
 * ```typescript
 * const discovery = createDiscoveryFetcher({ httpClient: createFetchClient() });
 * const result = await discovery.fetch('https://idp.example.com');
 * if (result.isOk()) {
 *   console.log(result.value.token_endpoint);
 * }
 * ```
 */
export const createDiscoveryFetcher = (options: DiscoveryFetcherOptions): DiscoveryFetcher => {
  const { httpClient } = options;
  const cache = options.cache ?? createMemoryCache<DiscoveryDocument>();
  const log = options.log ?? noopLog;
  const inFlight = new Map<string, Promise<Result<DiscoveryDocument, DiscoveryError>>>();

  const tryUrl = async (
    url: string
  ): Promise<Result<DiscoveryDocument, { readonly fatal: boolean; readonly error: DiscoveryError }>> => {
    const response = await httpClient.send({
      url,
      method: 'GET',
      headers: { Accept: 'application/json' },
    });

    if (response.isErr()) {
      return err({ fatal: true, error: toSessionError(response.error, 'Identity provider discovery') });
    }

    const { status } = response.value;
    if (status < 200 || status >= 300) {
      return err({
        fatal: false,
        error: new ConnectionError(`HTTP ${String(status)} from ${url}`, { status, url }),
      });
    }

    const body = parseJsonBody(response.value);
    if (body.isErr()) {
      return err({ fatal: false, error: new ConnectionError(`${body.error.message} from ${url}`, { url }) });
    }

    const document = discoveryDocumentSchema.safeParse(body.value);
    if (!document.success) {
      const missing = document.error.issues.map((issue) => issue.path.join('.')).join(', ');
      return err({
        fatal: false,
        error: new ConnectionError(`Metadata from ${url} is missing or has invalid: ${missing}`, {
          url,
        }),
      });
    }

    return ok(document.data);
  };

  const load = async (authority: string): Promise<Result<DiscoveryDocument, DiscoveryError>> => {
    const urls = buildDiscoveryUrls(authority);
    if (urls.isErr()) {
      return err(urls.error);
    }

    const failures: string[] = [];
    for (const url of urls.value) {
      log('info', 'Fetching identity provider metadata', { url });
      const result = await tryUrl(url);
      if (result.isOk()) {
        log('debug', 'Identity provider metadata received', {
          authorization_endpoint: result.value.authorization_endpoint,
          token_endpoint: result.value.token_endpoint,
        });
        return ok(result.value);
      }
      if (result.error.fatal) {
        return err(result.error.error);
      }
      failures.push(result.error.error.message);
    }

    return err(
      new ConnectionError(
        `Could not read identity provider metadata for ${authority}: ${failures.join('; ')}`
      )
    );
  };

  const fetch = (authority: string): Promise<Result<DiscoveryDocument, DiscoveryError>> => {
    const key = normalizeAuthority(authority);
    const cached = cache.get(key);
    if (cached !== undefined) {
      return Promise.resolve(ok(cached));
    }

    const pending = inFlight.get(key);
    if (pending !== undefined) {
      return pending;
    }

    const request = load(authority).then((result) => {
      inFlight.delete(key);
      if (result.isOk()) {
        cache.set(key, result.value);
      }
      return result;
    });
    inFlight.set(key, request);
    return request;
  };

  return {
    fetch,
    clear: () => {
      cache.clear();
    },
  };
};
