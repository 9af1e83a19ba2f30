import type { Result } from 'neverthrow';
import type { Dispatcher } from 'undici';

/**
 * HTTP methods the transport issues.
 */
export type HttpMethod = 'GET' | 'HEAD' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'OPTIONS';

/**
 * HTTP request configuration.
 */
export interface HttpRequest {
  readonly url: string;
  readonly method: HttpMethod;
  readonly headers?: Readonly<Record<string, string>> | undefined;
  readonly body?: string | undefined;
  /** Aborts the request when signalled */
  readonly signal?: AbortSignal | undefined;
  /** Overrides the client-wide timeout for this request */
  readonly timeoutMs?: number | undefined;
}

/**
 * HTTP response. Header names are lower-case; repeated headers are joined with ", ".
 */
export interface HttpResponse<T> {
  readonly url: string;
  readonly status: number;
  readonly statusText: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly body: T;
}

/**
 * Transport-level failure. A response with any status code is not an error.
 */
export interface HttpError {
  readonly type: 'network' | 'timeout' | 'aborted' | 'parse';
  readonly message: string;
  readonly url: string;
  /** Deadline that expired, for `timeout` */
  readonly timeoutMs?: number | undefined;
  readonly cause?: unknown;
}

/**
 * The transport capability: one request in, one response out.
 * Abstraction over fetch for dependency injection and testing.
 */
export interface HttpClient {
  readonly send: (request: HttpRequest) => Promise<Result<HttpResponse<string>, HttpError>>;
}

/**
 * TLS material, PEM encoded.
 */
export interface TlsOptions {
  /** Trusted CA certificates */
  readonly ca?: string | readonly string[] | undefined;
  /** Client certificate chain */
  readonly cert?: string | undefined;
  /** Client private key */
  readonly key?: string | undefined;
  readonly passphrase?: string | undefined;
  /** Default: true */
  readonly rejectUnauthorized?: boolean | undefined;
}

/**
 * Subset of the fetch signature the client relies on.
 */
export type FetchLike = (
  url: string,
  init: {
    readonly method: string;
    readonly headers: Record<string, string>;
    readonly body?: string;
    readonly signal: AbortSignal;
    readonly dispatcher?: Dispatcher;
  }
) => Promise<{
  readonly url: string;
  readonly status: number;
  readonly statusText: string;
  readonly headers: { forEach: (callback: (value: string, key: string) => void) => void };
  readonly text: () => Promise<string>;
}>;

/**
 * Options for creating an HTTP client.
 */
export interface HttpClientOptions {
  /** Request timeout in milliseconds (default: 31000) */
  readonly timeoutMs?: number | undefined;
  /** Base headers to include in all requests */
  readonly baseHeaders?: Readonly<Record<string, string>> | undefined;
  readonly tls?: TlsOptions | undefined;
  /** Route every request through this HTTP(S) proxy */
  readonly proxyUrl?: string | undefined;
  /** Replaces undici's fetch */
  readonly fetch?: FetchLike | undefined;
}
