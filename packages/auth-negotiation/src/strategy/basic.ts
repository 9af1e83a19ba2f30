import { ok } from 'neverthrow';
import { setHeader } from '../http/headers.js';
import type { BasicStrategy, RequestExchange } from './types.js';

export interface BasicCredentialOptions {
  /** Windows domain; the username is then sent as `DOMAIN\username` */
  readonly domain?: string | undefined;
}

/**
 * Creates a Basic strategy. The header value is computed once; the password is
 * not kept.
 *
 * @example
 * ```typescript
 * const strategy = createBasicStrategy('svc-reports', 'test-secret', { domain: 'CORP' });
 * strategy.username; // 'CORP\\svc-reports'
 * ```
 */
export const createBasicStrategy = (
  username: string,
  password: string,
  options: BasicCredentialOptions = {}
): BasicStrategy => {
  const qualified =
    options.domain !== undefined && options.domain !== '' ? `${options.domain}\\${username}` : username;
  const encoded = Buffer.from(`${qualified}:${password}`, 'utf8').toString('base64');
  return { kind: 'basic', username: qualified, authorization: `Basic ${encoded}` };
};

/**
 * Attaches the Authorization header. A 401 is final.
 */
export const beginBasicExchange = (strategy: BasicStrategy): RequestExchange => ({
  prepareRequest: (request) =>
    Promise.resolve(
      ok({ ...request, headers: setHeader(request.headers, 'Authorization', strategy.authorization) })
    ),
  handleResponse: () => Promise.resolve(ok({ retry: false })),
});
