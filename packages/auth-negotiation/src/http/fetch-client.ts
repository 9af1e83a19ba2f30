import { ok, err, type Result } from 'neverthrow';
import { Agent, ProxyAgent, fetch as undiciFetch, type Dispatcher } from 'undici';
import type { buildConnector } from 'undici';
import { mergeHeaders } from './headers.js';
import type {
  FetchLike,
  HttpClient,
  HttpClientOptions,
  HttpError,
  HttpRequest,
  HttpResponse,
  TlsOptions,
} from './types.js';

/** Default request timeout: 31 seconds */
export const DEFAULT_TIMEOUT_MS = 31_000;

/**
 * Extracts headers from a fetch Response into a plain object.
 */
const extractHeaders = (headers: {
  forEach: (callback: (value: string, key: string) => void) => void;
}): Record<string, string> => {
  const result: Record<string, string> = {};
  headers.forEach((value, key) => {
    result[key.toLowerCase()] = value;
  });
  return result;
};

const toConnectOptions = (tls: TlsOptions): buildConnector.BuildOptions => ({
  ...(tls.ca !== undefined ? { ca: typeof tls.ca === 'string' ? tls.ca : [...tls.ca] } : {}),
  ...(tls.cert !== undefined ? { cert: tls.cert } : {}),
  ...(tls.key !== undefined ? { key: tls.key } : {}),
  ...(tls.passphrase !== undefined ? { passphrase: tls.passphrase } : {}),
  ...(tls.rejectUnauthorized !== undefined ? { rejectUnauthorized: tls.rejectUnauthorized } : {}),
});

/**
 * Builds the undici dispatcher carrying TLS and proxy settings. Returns undefined
 * when neither is configured, so the global dispatcher is used.
 */
export const createDispatcher = (
  options: Pick<HttpClientOptions, 'tls' | 'proxyUrl'>
): Dispatcher | undefined => {
  const connect = options.tls !== undefined ? toConnectOptions(options.tls) : undefined;

  if (options.proxyUrl !== undefined) {
    return new ProxyAgent({
      uri: options.proxyUrl,
      ...(connect !== undefined ? { requestTls: connect } : {}),
    });
  }

  if (connect !== undefined) {
    return new Agent({ connect });
  }

  return undefined;
};

/**
 * Reads a response body as JSON.
 */
export const parseJsonBody = (response: HttpResponse<string>): Result<unknown, HttpError> => {
  try {
    const body: unknown = JSON.parse(response.body);
    return ok(body);
  } catch (error) {
    return err({
      type: 'parse',
      message: `Failed to parse JSON response (HTTP ${String(response.status)})`,
      url: response.url,
      cause: error,
    });
  }
};

/**
 * Creates an HTTP client on undici's fetch. Every status code is returned as a
 * response; only transport failures are errors.
 *
 * @param options - Optional client configuration
 * @returns An HttpClient instance
 *
 * @example
 * ```typescript
 * const client = createFetchClient({
 *   timeoutMs: 5000,
 *   tls: { ca: readFileSync('corp-root.pem', 'utf8') },
 * });
 * const result = await client.send({ url: 'https://api.example.com/', method: 'GET' });
 *
 * if (result.isOk()) {
 *   console.log(result.value.status, result.value.headers['www-authenticate']);
 * } else {
 *   console.error(result.error.message);
 * }
 * ```
 */
export const createFetchClient = (options: HttpClientOptions = {}): HttpClient => {
  const { timeoutMs = DEFAULT_TIMEOUT_MS, baseHeaders = {} } = options;
  const fetchImpl: FetchLike = options.fetch ?? undiciFetch;
  const dispatcher = createDispatcher(options);

  const send = async (request: HttpRequest): Promise<Result<HttpResponse<string>, HttpError>> => {
    const requestTimeoutMs = request.timeoutMs ?? timeoutMs;
    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, requestTimeoutMs);

    const onCallerAbort = (): void => {
      controller.abort();
    };
    if (request.signal?.aborted === true) {
      controller.abort();
    } else {
      request.signal?.addEventListener('abort', onCallerAbort, { once: true });
    }

    try {
      const response = await fetchImpl(request.url, {
        method: request.method,
        headers: mergeHeaders(baseHeaders, request.headers),
        signal: controller.signal,
        ...(request.body !== undefined ? { body: request.body } : {}),
        ...(dispatcher !== undefined ? { dispatcher } : {}),
      });
      const body = await response.text();

      return ok({
        url: response.url !== '' ? response.url : request.url,
        status: response.status,
        statusText: response.statusText,
        headers: extractHeaders(response.headers),
        body,
      });
    } catch (error) {
      if (timedOut) {
        return err({
          type: 'timeout',
          message: `Request timed out after ${String(requestTimeoutMs)}ms`,
          url: request.url,
          timeoutMs: requestTimeoutMs,
          cause: error,
        });
      }

      if (controller.signal.aborted) {
        return err({
          type: 'aborted',
          message: 'Request was aborted',
          url: request.url,
          cause: error,
        });
      }

      return err({
        type: 'network',
        message: error instanceof Error ? error.message : 'Network error',
        url: request.url,
        cause: error,
      });
    } finally {
      clearTimeout(timeoutId);
      request.signal?.removeEventListener('abort', onCallerAbort);
    }
  };

  return { send };
};
