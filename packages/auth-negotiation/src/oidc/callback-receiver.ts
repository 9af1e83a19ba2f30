/**
 * Loopback HTTP listener that captures the authorization code (RFC 8252 section 7.3).
 *
 * @packageDocumentation
 */

import { createServer } from 'node:http';
import { err, ok, type Result } from 'neverthrow';
import { ConnectionError } from '../errors/errors.js';
import type {
  AuthorizationCallback,
  AuthorizationCodeReceiver,
  CallbackListener,
} from './types.js';

const SUCCESS_PAGE =
  '<html><body style="font-family: system-ui; padding: 40px; text-align: center;">' +
  '<h1>Login successful</h1>' +
  '<p>You can close this window and return to the application.</p>' +
  '</body></html>';

const FAILURE_PAGE =
  '<html><body style="font-family: system-ui; padding: 40px; text-align: center;">' +
  '<h1>Login failed</h1>' +
  '<p>The identity provider did not return an authorization code.</p>' +
  '</body></html>';

/**
 * What the listener answers to one incoming request.
 */
export interface CallbackReply {
  readonly status: number;
  readonly body: string;
  /** Present when the request was the authorization callback */
  readonly callback?: AuthorizationCallback | undefined;
}

/**
 * Decides the reply to a request reaching the listener. Requests for any other
 * path (a browser asking for /favicon.ico) get a 404 and do not count.
 */
export const handleCallbackRequest = (requestUrl: string, redirectUri: string): CallbackReply => {
  const expected = new URL(redirectUri);
  const url = new URL(requestUrl, expected.origin);

  if (url.pathname !== expected.pathname) {
    return { status: 404, body: '' };
  }

  const parameter = (name: string): string | undefined => url.searchParams.get(name) ?? undefined;
  const callback: AuthorizationCallback = {
    code: parameter('code'),
    state: parameter('state'),
    error: parameter('error'),
    errorDescription: parameter('error_description'),
  };

  const succeeded = callback.code !== undefined && callback.error === undefined;
  return { status: succeeded ? 200 : 400, body: succeeded ? SUCCESS_PAGE : FAILURE_PAGE, callback };
};

/**
 * Host and port to bind for a loopback redirect URI.
 */
export const loopbackAddress = (
  redirectUri: string
): Result<{ readonly host: string; readonly port: number }, ConnectionError> => {
  let url: URL;
  try {
    url = new URL(redirectUri);
  } catch (error) {
    return err(new ConnectionError(`Invalid redirect URI "${redirectUri}"`, { cause: error }));
  }

  if (url.protocol !== 'http:') {
    return err(new ConnectionError(`Redirect URI "${redirectUri}" is not a loopback http URI`));
  }

  const host = url.hostname === 'localhost' ? '127.0.0.1' : url.hostname.replace(/^\[|\]$/g, '');
  const port = url.port === '' ? 80 : Number(url.port);
  return ok({ host, port });
};

const abortedListenError = (): ConnectionError =>
  new ConnectionError('The login callback listener was aborted before it started');

/**
 * Creates the default receiver: an HTTP server on the redirect URI's port that
 * resolves on the first request to the redirect path, then shuts down.
 *
 * @example
 * ```typescript
 * const manager = createOidcTokenManager({
 *   ...options,
 *   codeReceiver: createLoopbackCallbackReceiver(),
 * });
 * ```
 */
export const createLoopbackCallbackReceiver = (): AuthorizationCodeReceiver => ({
  listen: (redirectUri, signal) => {
    const address = loopbackAddress(redirectUri);
    if (address.isErr()) {
      return Promise.resolve(err(address.error));
    }
    const { host, port } = address.value;
    if (signal.aborted) {
      return Promise.resolve(err(abortedListenError()));
    }

    return new Promise<Result<CallbackListener, ConnectionError>>((resolveListen) => {
      let settle: (callback: AuthorizationCallback | undefined) => void = () => undefined;
      const callback = new Promise<AuthorizationCallback | undefined>((resolve) => {
        settle = resolve;
      });

      const server = createServer((req, res) => {
        const reply = handleCallbackRequest(req.url ?? '/', redirectUri);
        res.writeHead(reply.status, { 'Content-Type': 'text/html; charset=utf-8' });
        res.end(reply.body);
        if (reply.callback !== undefined) {
          settle(reply.callback);
        }
      });

      const close = (): Promise<void> =>
        new Promise<void>((resolveClose) => {
          settle(undefined);
          if (!server.listening) {
            resolveClose();
            return;
          }
          server.close(() => {
            resolveClose();
          });
          server.closeAllConnections();
        });

      signal.addEventListener(
        'abort',
        () => {
          resolveListen(err(abortedListenError()));
          void close();
        },
        { once: true }
      );

      server.once('error', (error: NodeJS.ErrnoException) => {
        const reason =
          error.code === 'EADDRINUSE' ? `port ${String(port)} is already in use` : error.message;
        resolveListen(
          err(new ConnectionError(`Cannot listen for the login callback: ${reason}`, { cause: error }))
        );
      });

      server.listen(port, host, () => {
        if (signal.aborted) {
          void close();
          return;
        }
        resolveListen(ok({ callback, close }));
      });
    });
  },
});
