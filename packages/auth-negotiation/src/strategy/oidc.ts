import { err, ok, type Result } from 'neverthrow';
import type { SessionError } from '../errors/errors.js';
import { setHeader } from '../http/headers.js';
import type { HttpRequest } from '../http/types.js';
import type { Log } from '../logging/logger.js';
import type { OidcTokenManager } from '../oidc/types.js';
import type { OidcStrategy, RequestExchange, RetryDecision } from './types.js';

export const createOidcStrategy = (manager: OidcTokenManager): OidcStrategy => ({
  kind: 'oidc',
  manager,
});

const withBearer = (request: HttpRequest, accessToken: string): HttpRequest => ({
  ...request,
  headers: setHeader(request.headers, 'Authorization', `Bearer ${accessToken}`),
});

/**
 * Attaches a currently valid bearer token. A 401 is taken as a token revoked
 * server-side: the token is refreshed and the request sent once more. A second
 * 401 is returned to the caller.
 */
export const beginOidcExchange = (strategy: OidcStrategy, log: Log): RequestExchange => {
  let sentToken: string | undefined;
  let refreshed = false;

  const prepareRequest = async (request: HttpRequest): Promise<Result<HttpRequest, SessionError>> => {
    const token = await strategy.manager.getAccessToken();
    if (token.isErr()) {
      return err(token.error);
    }
    sentToken = token.value;
    return ok(withBearer(request, token.value));
  };

  const handleResponse = async (
    response: { readonly status: number },
    request: HttpRequest
  ): Promise<Result<RetryDecision, SessionError>> => {
    if (response.status !== 401 || refreshed || sentToken === undefined) {
      return ok({ retry: false });
    }

    refreshed = true;
    log('debug', 'Bearer token rejected; refreshing and retrying once', { url: request.url });
    const token = await strategy.manager.forceRefresh(sentToken);
    if (token.isErr()) {
      return err(token.error);
    }
    sentToken = token.value;
    return ok({ retry: true, request: withBearer(request, token.value) });
  };

  return { prepareRequest, handleResponse };
};
