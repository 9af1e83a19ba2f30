/**
 * Token endpoint client: authorization code exchange and refresh.
 *
 * @packageDocumentation
 */

import { decodeJwt } from 'jose';
import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';
import { AuthorizationFailedError, ConnectionError } from '../errors/errors.js';
import { toSessionError } from '../http/errors.js';
import { parseJsonBody } from '../http/fetch-client.js';
import type { HttpClient } from '../http/types.js';
import type { DiscoveryError, DiscoveryFetcher } from './discovery.js';
import type { OidcClientSettings, TokenSet } from './types.js';

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().optional(),
  expires_in: z
    .union([z.number().nonnegative(), z.string().regex(/^\d+$/).transform(Number)])
    .optional(),
  refresh_token: z.string().min(1).optional(),
  scope: z.string().optional(),
  id_token: z.string().optional(),
});

const errorResponseSchema = z.object({
  error: z.string(),
  error_description: z.string().optional(),
});

type TokenResponse = z.infer<typeof tokenResponseSchema>;

/**
 * A rejection from the authority surfaces as {@link AuthorizationFailedError};
 * callers decide what a rejection means for their grant.
 */
export type TokenClientError = DiscoveryError | AuthorizationFailedError;

export interface TokenClient {
  /**
   * Exchanges an authorization code (with its PKCE verifier) for tokens.
   */
  readonly exchangeCode: (options: {
    readonly code: string;
    readonly codeVerifier: string;
  }) => Promise<Result<TokenSet, TokenClientError>>;

  /**
   * Redeems a refresh token. The audience is deliberately not sent: several
   * authorities drop the audience from tokens issued on a refresh that names one.
   */
  readonly refresh: (refreshToken: string) => Promise<Result<TokenSet, TokenClientError>>;
}

export interface TokenClientOptions {
  readonly settings: OidcClientSettings;
  readonly httpClient: HttpClient;
  readonly discovery: DiscoveryFetcher;
  /** Clock, in epoch milliseconds */
  readonly now?: (() => number) | undefined;
  /** Per-request deadline; the transport's default applies when unset */
  readonly requestTimeoutMs?: number | undefined;
}

/**
 * Expiry from the `exp` claim, when the access token is a JWT.
 */
const expiryFromJwt = (accessToken: string): number | undefined => {
  try {
    const { exp } = decodeJwt(accessToken);
    return exp !== undefined ? exp * 1000 : undefined;
  } catch {
    return undefined;
  }
};

/**
 * Converts a token response to a TokenSet, fixing the absolute expiry at issuance.
 */
export const toTokenSet = (
  response: TokenResponse,
  issuedAt: number
): Result<TokenSet, ConnectionError> => {
  const expiresAt =
    response.expires_in !== undefined
      ? issuedAt + response.expires_in * 1000
      : expiryFromJwt(response.access_token);

  if (expiresAt === undefined) {
    return err(
      new ConnectionError(
        'Token response has no expires_in and the access token carries no exp claim'
      )
    );
  }

  return ok({
    accessToken: response.access_token,
    expiresAt,
    tokenType: response.token_type ?? 'Bearer',
    ...(response.refresh_token !== undefined ? { refreshToken: response.refresh_token } : {}),
    ...(response.scope !== undefined ? { scope: response.scope } : {}),
    ...(response.id_token !== undefined ? { idToken: response.id_token } : {}),
  });
};

/**
 * Creates a token endpoint client.
 *
 * @example
 * ```typescript
 * const client = createTokenClient({ settings, httpClient, discovery });
 * const result = await client.refresh(storedRefreshToken);
 * if (result.isErr() && result.error instanceof AuthorizationFailedError) {
 *   // the authority refused the refresh token
 * }
 * ```
 */
export const createTokenClient = (options: TokenClientOptions): TokenClient => {
  const { settings, httpClient, discovery } = options;
  const now = options.now ?? Date.now;

  const requestTokens = async (
    grant: 'authorization_code' | 'refresh_token',
    parameters: Readonly<Record<string, string>>
  ): Promise<Result<TokenSet, TokenClientError>> => {
    const metadata = await discovery.fetch(settings.authority);
    if (metadata.isErr()) {
      return err(metadata.error);
    }
    const tokenEndpoint = metadata.value.token_endpoint;

    const headers: Record<string, string> = {
      Accept: 'application/json',
      'Content-Type': 'application/x-www-form-urlencoded;charset=UTF-8',
    };
    const body = new URLSearchParams({ grant_type: grant, ...parameters });
    if (settings.clientSecret !== undefined) {
      const credentials = `${encodeURIComponent(settings.clientId)}:${encodeURIComponent(settings.clientSecret)}`;
      headers['Authorization'] = `Basic ${Buffer.from(credentials, 'utf8').toString('base64')}`;
    } else {
      body.set('client_id', settings.clientId);
    }

    const issuedAt = now();
    const response = await httpClient.send({
      url: tokenEndpoint,
      method: 'POST',
      headers,
      body: body.toString(),
      ...(options.requestTimeoutMs !== undefined ? { timeoutMs: options.requestTimeoutMs } : {}),
    });

    if (response.isErr()) {
      return err(toSessionError(response.error, 'Token request'));
    }

    const { status } = response.value;
    const json = parseJsonBody(response.value);

    if (status === 400 || status === 401) {
      const rejection = json.isOk() ? errorResponseSchema.safeParse(json.value) : undefined;
      if (rejection?.success === true) {
        const description =
          rejection.data.error_description !== undefined
            ? `: ${rejection.data.error_description}`
            : '';
        return err(
          new AuthorizationFailedError(
            `The token endpoint rejected the ${grant} grant (${rejection.data.error})${description}`,
            { oauthError: rejection.data.error }
          )
        );
      }
      return err(
        new AuthorizationFailedError(
          `The token endpoint rejected the ${grant} grant (HTTP ${String(status)})`
        )
      );
    }

    if (status < 200 || status >= 300) {
      return err(
        new ConnectionError(`Token request failed with HTTP ${String(status)}`, {
          status,
          url: tokenEndpoint,
        })
      );
    }

    if (json.isErr()) {
      return err(new ConnectionError(json.error.message, { url: tokenEndpoint, cause: json.error.cause }));
    }

    const parsed = tokenResponseSchema.safeParse(json.value);
    if (!parsed.success) {
      const fields = parsed.error.issues.map((issue) => issue.path.join('.')).join(', ');
      return err(
        new ConnectionError(`Token endpoint returned an invalid response (${fields})`, {
          url: tokenEndpoint,
        })
      );
    }

    return toTokenSet(parsed.data, issuedAt);
  };

  return {
    exchangeCode: ({ code, codeVerifier }) =>
      requestTokens('authorization_code', {
        code,
        redirect_uri: settings.redirectUri,
        code_verifier: codeVerifier,
        ...(settings.audience !== undefined ? { audience: settings.audience } : {}),
      }),
    refresh: (refreshToken) => requestTokens('refresh_token', { refresh_token: refreshToken }),
  };
};
