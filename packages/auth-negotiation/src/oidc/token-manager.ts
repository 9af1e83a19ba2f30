/**
 * OIDC token manager: acquires, caches, persists and refreshes the token of one
 * session.
 *
 * State machine: `no_token → authorizing → authorized ⇄ refreshing → expired`.
 * Every path that may touch the network runs behind one single-flight gate, so
 * concurrent callers observing an expiring token share a single refresh.
 *
 * @packageDocumentation
 */

import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';
import {
  AuthorizationFailedError,
  ConfigurationError,
  ReauthenticationRequiredError,
  type ConnectionError,
} from '../errors/errors.js';
import type { HttpClient } from '../http/types.js';
import { noopLog, type Log } from '../logging/logger.js';
import type { SecureStorage } from '../storage/types.js';
import { createSingleFlight } from '../util/single-flight.js';
import { withTimeout } from '../util/timeout.js';
import { buildAuthorizationUrl } from './authorization-url.js';
import { createLoopbackCallbackReceiver } from './callback-receiver.js';
import { createDiscoveryFetcher, normalizeAuthority, type DiscoveryFetcher } from './discovery.js';
import { createPkceChallengePair, supportsS256 } from './pkce.js';
import { generateState, validateAuthorizationCallback } from './state.js';
import { createTokenClient } from './token-client.js';
import type {
  AuthorizationCodeReceiver,
  OidcClientSettings,
  OidcError,
  OidcState,
  OidcTokenManager,
  TokenSet,
} from './types.js';

/** Refresh this long before the access token expires: 30 seconds */
export const DEFAULT_REFRESH_SKEW_MS = 30_000;

/** Time the user has to complete an interactive login: 60 seconds */
export const DEFAULT_LOGIN_TIMEOUT_MS = 60_000;

const storedTokenSchema = z.object({
  accessToken: z.string().min(1),
  refreshToken: z.string().min(1).optional(),
  expiresAt: z.number(),
  tokenType: z.string(),
  scope: z.string().optional(),
  idToken: z.string().optional(),
});

/**
 * Token manager configuration.
 */
export interface OidcTokenManagerOptions {
  readonly settings: OidcClientSettings;
  /** Transport to the identity provider */
  readonly httpClient: HttpClient;
  /** Secret store; when set it holds the canonical copy of the token */
  readonly storage?: SecureStorage | undefined;
  /** Refresh token to redeem on first use, when the store holds nothing */
  readonly refreshToken?: string | undefined;
  /** Allow the interactive flow on first use (default: true) */
  readonly interactive?: boolean | undefined;
  /** Sends the user to the authorization URL; the default logs it */
  readonly openAuthorizationUrl?: ((url: string) => void | Promise<void>) | undefined;
  /** Default: loopback listener on the redirect URI */
  readonly codeReceiver?: AuthorizationCodeReceiver | undefined;
  /** Default: 60000 */
  readonly loginTimeoutMs?: number | undefined;
  /** Default: 30000 */
  readonly refreshSkewMs?: number | undefined;
  /** Deadline for each token endpoint request */
  readonly requestTimeoutMs?: number | undefined;
  readonly discovery?: DiscoveryFetcher | undefined;
  readonly log?: Log | undefined;
  /** Clock, in epoch milliseconds */
  readonly now?: (() => number) | undefined;
}

/**
 * Secret store key for a client at an authority.
 */
export const tokenStorageKey = (settings: Pick<OidcClientSettings, 'authority' | 'clientId'>): string =>
  `oidc-token:${normalizeAuthority(settings.authority)}#${settings.clientId}`;

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * Creates a token manager.
 *
 * @example
 * ```typescript
 * const manager = createOidcTokenManager({
 *   settings: {
 *     authority: 'https://idp.example.com',
 *     clientId: 'api-client',
 *     redirectUri: 'http://localhost:32284/',
 *     scopes: ['openid', 'offline_access'],
 *   },
 *   httpClient: createFetchClient(),
 *   storage: createMemoryStorage(),
 * });
 *
 * const token = await manager.getAccessToken();
 * if (token.isErr() && token.error.code === 'REAUTHENTICATION_REQUIRED') {
 *   await manager.authorize();
 * }
 * ```
 */
export const createOidcTokenManager = (options: OidcTokenManagerOptions): OidcTokenManager => {
  const { settings, httpClient, storage } = options;
  const log = options.log ?? noopLog;
  const now = options.now ?? Date.now;
  const skewMs = options.refreshSkewMs ?? DEFAULT_REFRESH_SKEW_MS;
  const loginTimeoutMs = options.loginTimeoutMs ?? DEFAULT_LOGIN_TIMEOUT_MS;
  const interactive = options.interactive ?? true;
  const storageKey = tokenStorageKey(settings);
  const discovery = options.discovery ?? createDiscoveryFetcher({ httpClient, log });
  const tokenClient = createTokenClient({
    settings,
    httpClient,
    discovery,
    now,
    requestTimeoutMs: options.requestTimeoutMs,
  });
  const receiver = options.codeReceiver ?? createLoopbackCallbackReceiver();
  const openAuthorizationUrl =
    options.openAuthorizationUrl ??
    ((url: string): void => {
      log('info', 'Open this URL in a browser to sign in', { url });
    });
  const gate = createSingleFlight<Result<TokenSet, OidcError>>();

  let state: OidcState = 'no_token';
  let token: TokenSet | undefined;
  let providedRefreshToken = options.refreshToken;

  const transition = (next: OidcState): void => {
    if (next !== state) {
      log('debug', 'OIDC token state changed', { from: state, to: next });
      state = next;
    }
  };

  const isExpiring = (candidate: TokenSet): boolean => now() >= candidate.expiresAt - skewMs;

  // ==========================================================================
  // Secret store
  // ==========================================================================

  const readStored = async (): Promise<TokenSet | undefined> => {
    if (storage === undefined) {
      return undefined;
    }

    let raw: string | undefined;
    try {
      raw = await storage.get(storageKey);
    } catch (error) {
      log('warn', 'Could not read the token from the secret store', { reason: describeError(error) });
      return undefined;
    }
    if (raw === undefined) {
      return undefined;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      log('warn', 'Ignoring an unreadable token in the secret store', { reason: describeError(error) });
      return undefined;
    }

    const parsed = storedTokenSchema.safeParse(json);
    if (!parsed.success) {
      log('warn', 'Ignoring a malformed token in the secret store');
      return undefined;
    }
    return parsed.data;
  };

  const adopt = (next: TokenSet): void => {
    token = next;
    transition('authorized');
  };

  const persist = async (next: TokenSet): Promise<void> => {
    adopt(next);
    if (storage === undefined) {
      return;
    }
    try {
      await storage.set(storageKey, JSON.stringify(next));
    } catch (error) {
      log('warn', 'Could not write the token to the secret store', { reason: describeError(error) });
    }
  };

  const expire = async (message: string, cause?: unknown): Promise<ReauthenticationRequiredError> => {
    token = undefined;
    transition('expired');
    if (storage !== undefined) {
      try {
        await storage.delete(storageKey);
      } catch (error) {
        log('warn', 'Could not remove the token from the secret store', {
          reason: describeError(error),
        });
      }
    }
    return new ReauthenticationRequiredError(message, { cause });
  };

  // ==========================================================================
  // Refresh
  // ==========================================================================

  const redeem = async (refreshToken: string): Promise<Result<TokenSet, OidcError>> => {
    transition('refreshing');
    const result = await tokenClient.refresh(refreshToken);

    if (result.isErr()) {
      if (result.error instanceof AuthorizationFailedError) {
        return err(
          await expire(
            'The refresh token was rejected; interactive authorization is required',
            result.error
          )
        );
      }
      transition(token !== undefined ? 'authorized' : 'no_token');
      return err(result.error);
    }

    // Authorities that do not rotate refresh tokens omit them from the response.
    const refreshed: TokenSet =
      result.value.refreshToken !== undefined ? result.value : { ...result.value, refreshToken };
    await persist(refreshed);
    log('debug', 'Access token refreshed', {
      expiresAt: new Date(refreshed.expiresAt).toISOString(),
    });
    return ok(refreshed);
  };

  const refreshHeld = async (held: TokenSet): Promise<Result<TokenSet, OidcError>> => {
    const stored = await readStored();
    const storedIsNewer = stored !== undefined && stored.accessToken !== held.accessToken;

    if (storedIsNewer && !isExpiring(stored)) {
      log('debug', 'Adopting a newer token from the secret store');
      adopt(stored);
      return ok(stored);
    }

    const refreshToken = storedIsNewer ? stored.refreshToken : held.refreshToken;
    if (refreshToken === undefined) {
      return err(await expire('The access token expired and no refresh token is available'));
    }
    return redeem(refreshToken);
  };

  // ==========================================================================
  // Interactive authorization
  // ==========================================================================

  const runAuthorizationCodeFlow = async (): Promise<Result<TokenSet, OidcError>> => {
    const metadata = await discovery.fetch(settings.authority);
    if (metadata.isErr()) {
      return err(metadata.error);
    }
    if (!supportsS256(metadata.value)) {
      return err(new ConfigurationError('The identity provider does not support PKCE with S256'));
    }

    const pkce = createPkceChallengePair();
    const expectedState = generateState();
    const url = buildAuthorizationUrl(metadata.value.authorization_endpoint, settings, {
      state: expectedState,
      pkce,
    });

    const code = await withTimeout(
      async (signal): Promise<Result<string, ConnectionError | AuthorizationFailedError>> => {
        const listening = await receiver.listen(settings.redirectUri, signal);
        if (listening.isErr()) {
          return err(listening.error);
        }

        const listener = listening.value;
        try {
          try {
            await openAuthorizationUrl(url);
          } catch (error) {
            return err(
              new AuthorizationFailedError('Could not open the authorization URL', { cause: error })
            );
          }

          const callback = await listener.callback;
          if (callback === undefined) {
            return err(new AuthorizationFailedError('The login ended before the callback arrived'));
          }
          return validateAuthorizationCallback(callback, expectedState);
        } finally {
          await listener.close();
        }
      },
      loginTimeoutMs,
      'Interactive login'
    );

    if (code.isErr()) {
      return err(code.error);
    }
    return tokenClient.exchangeCode({ code: code.value, codeVerifier: pkce.verifier });
  };

  const authorizeInteractively = async (): Promise<Result<TokenSet, OidcError>> => {
    const before = state;
    transition('authorizing');

    const result = await runAuthorizationCodeFlow();
    if (result.isErr()) {
      transition(before);
      return err(result.error);
    }

    await persist(result.value);
    log('info', 'Interactive authorization completed');
    return ok(result.value);
  };

  // ==========================================================================
  // Acquisition
  // ==========================================================================

  const acquire = async (): Promise<Result<TokenSet, OidcError>> => {
    const stored = await readStored();
    if (stored !== undefined) {
      log('debug', 'Using the token from the secret store');
      adopt(stored);
      return isExpiring(stored) ? refreshHeld(stored) : ok(stored);
    }

    if (providedRefreshToken !== undefined) {
      log('debug', 'Redeeming the provided refresh token');
      const result = await redeem(providedRefreshToken);
      if (result.isOk() || result.error instanceof ReauthenticationRequiredError) {
        providedRefreshToken = undefined;
      }
      return result;
    }

    if (!interactive) {
      return err(
        new ReauthenticationRequiredError(
          'No token is available and interactive authorization is disabled'
        )
      );
    }
    return authorizeInteractively();
  };

  const recoverFromExpired = async (): Promise<Result<TokenSet, OidcError>> => {
    const stored = await readStored();
    if (stored !== undefined && !isExpiring(stored)) {
      log('debug', 'Adopting a token written to the secret store after expiry');
      adopt(stored);
      return ok(stored);
    }
    return err(new ReauthenticationRequiredError('The session requires interactive authorization'));
  };

  const ensureToken = (): Promise<Result<TokenSet, OidcError>> =>
    gate.run(async () => {
      if (state === 'expired') {
        return recoverFromExpired();
      }
      if (token === undefined) {
        return acquire();
      }
      return isExpiring(token) ? refreshHeld(token) : ok(token);
    });

  const replaceStale = (staleAccessToken: string): Promise<Result<TokenSet, OidcError>> =>
    gate.run(async () => {
      if (state === 'expired') {
        return recoverFromExpired();
      }
      if (token === undefined) {
        return acquire();
      }
      if (token.accessToken !== staleAccessToken && !isExpiring(token)) {
        return ok(token);
      }
      log('debug', 'Access token was rejected by the server; refreshing');
      return refreshHeld(token);
    });

  // ==========================================================================
  // Public surface
  // ==========================================================================

  const getAccessToken = async (): Promise<Result<string, OidcError>> => {
    if (token !== undefined && state === 'authorized' && !gate.isInFlight() && !isExpiring(token)) {
      return ok(token.accessToken);
    }
    const result = await ensureToken();
    return result.map((current) => current.accessToken);
  };

  const forceRefresh = async (staleAccessToken: string): Promise<Result<string, OidcError>> => {
    let result = await replaceStale(staleAccessToken);
    // Joined a flight that started before the rejection and still carries the stale token.
    if (result.isOk() && result.value.accessToken === staleAccessToken) {
      result = await replaceStale(staleAccessToken);
    }
    return result.map((current) => current.accessToken);
  };

  const clear = async (): Promise<void> => {
    token = undefined;
    transition('no_token');
    if (storage !== undefined) {
      await storage.delete(storageKey);
    }
  };

  return {
    getAccessToken,
    forceRefresh,
    authorize: () => gate.run(authorizeInteractively),
    getState: () => state,
    getToken: () => token,
    clear,
  };
};
