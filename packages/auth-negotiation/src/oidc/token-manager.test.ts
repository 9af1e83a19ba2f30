import { describe, it, expect } from 'vitest';
import { ok } from 'neverthrow';
import { createOidcTokenManager, tokenStorageKey, type OidcTokenManagerOptions } from './token-manager.js';
import { computePkceChallenge } from './pkce.js';
import type { OidcTokenManager } from './types.js';
import {
  AuthorizationFailedError,
  ConnectionError,
  ReauthenticationRequiredError,
  TimeoutError,
} from '../errors/errors.js';
import { createMemoryStorage, type MemoryStorage } from '../storage/memory-storage.js';
import {
  approveWith,
  createFakeClock,
  createRecordingLog,
  createScriptedHttpClient,
  createStubLogin,
  httpResponse,
  jsonResponse,
  type FakeClock,
  type ScriptedHttpClient,
  type SendResult,
  type StubLogin,
} from '../test/mocks.js';
import {
  createClientSettings,
  createDiscoveryDocument,
  createTokenResponse,
  createTokenSet,
  ONE_HOUR_MS,
  T0,
  TEST_AUTHORIZATION_ENDPOINT,
  TEST_DISCOVERY_URL,
  TEST_REDIRECT_URI,
  TEST_TOKEN_ENDPOINT,
} from '../test/fixtures.js';

const STORAGE_KEY = 'oidc-token:https://idp.example.com/tenant#test-client-id';

interface Harness {
  readonly manager: OidcTokenManager;
  readonly httpClient: ScriptedHttpClient;
  readonly storage: MemoryStorage;
  readonly clock: FakeClock;
  readonly login: StubLogin;
  readonly tokenRequests: () => URLSearchParams[];
}

/**
 * Identity provider fake: serves discovery, and plays `tokenReplies` in order on
 * the token endpoint.
 */
const setup = (
  tokenReplies: readonly SendResult[],
  options: Partial<OidcTokenManagerOptions> & { readonly stored?: string } = {}
): Harness => {
  let served = 0;
  const httpClient = createScriptedHttpClient((request) => {
    if (request.url === TEST_DISCOVERY_URL) {
      return jsonResponse(200, createDiscoveryDocument());
    }
    const reply = tokenReplies[served] ?? ok(httpResponse(599));
    served++;
    return reply;
  });
  const storage = createMemoryStorage(
    options.stored !== undefined ? { [STORAGE_KEY]: options.stored } : {}
  );
  const clock = createFakeClock(T0);
  const login = createStubLogin();

  const manager = createOidcTokenManager({
    settings: createClientSettings(),
    httpClient,
    storage,
    now: clock.now,
    codeReceiver: login.receiver,
    openAuthorizationUrl: login.openAuthorizationUrl,
    ...options,
  });

  return {
    manager,
    httpClient,
    storage,
    clock,
    login,
    tokenRequests: () =>
      httpClient.requests
        .filter((request) => request.url === TEST_TOKEN_ENDPOINT)
        .map((request) => new URLSearchParams(request.body ?? '')),
  };
};

const stored = (overrides: Parameters<typeof createTokenSet>[0] = {}): string =>
  JSON.stringify(createTokenSet(overrides));

const storedEntry = (storage: MemoryStorage): unknown => {
  const raw = storage.entries().get(STORAGE_KEY);
  return raw === undefined ? undefined : JSON.parse(raw);
};

describe('tokenStorageKey', () => {
  it('tokenStorageKey_TrailingSlash_IsNormalized', () => {
    const key = tokenStorageKey({ authority: 'https://idp.example.com/tenant/', clientId: 'test-client-id' });

    expect(key).toBe(STORAGE_KEY);
  });
});

describe('createOidcTokenManager', () => {
  describe('given a stored token that is still valid', () => {
    it('returns it without contacting the identity provider', async () => {
      const { manager, httpClient } = setup([], { stored: stored() });

      const result = await manager.getAccessToken();

      expect(result._unsafeUnwrap()).toBe('stored-access');
      expect(manager.getState()).toBe('authorized');
      expect(httpClient.requests).toHaveLength(0);
    });
  });

  describe('given a token expiring within the skew margin', () => {
    it('refreshes exactly once and persists the new token', async () => {
      // Arrange: 10 seconds left, 30 second skew
      const { manager, storage, tokenRequests } = setup([jsonResponse(200, createTokenResponse())], {
        stored: stored({ expiresAt: T0 + 10_000 }),
        refreshSkewMs: 30_000,
      });

      // Act
      const result = await manager.getAccessToken();

      // Assert
      expect(result._unsafeUnwrap()).toBe('access-1');
      expect(tokenRequests()).toHaveLength(1);
      expect(tokenRequests()[0]?.get('refresh_token')).toBe('stored-refresh');
      expect(storedEntry(storage)).toEqual({
        accessToken: 'access-1',
        refreshToken: 'refresh-1',
        expiresAt: T0 + ONE_HOUR_MS,
        tokenType: 'Bearer',
      });
    });

    it('shares one refresh between concurrent callers', async () => {
      // Arrange
      const { manager, tokenRequests } = setup([jsonResponse(200, createTokenResponse())], {
        stored: stored({ expiresAt: T0 - 1 }),
      });

      // Act
      const [first, second] = await Promise.all([
        manager.getAccessToken(),
        manager.getAccessToken(),
      ]);
      const third = await manager.getAccessToken();

      // Assert
      expect(first._unsafeUnwrap()).toBe('access-1');
      expect(second._unsafeUnwrap()).toBe('access-1');
      expect(third._unsafeUnwrap()).toBe('access-1');
      expect(tokenRequests()).toHaveLength(1);
    });

    it('getAccessToken_HeldTokenExpiresUnderConcurrentCallers_RefreshesOnce', async () => {
      // Arrange: the token is loaded into memory, then the clock passes its skew margin
      const { manager, clock, tokenRequests } = setup([jsonResponse(200, createTokenResponse())], {
        stored: stored(),
      });
      expect((await manager.getAccessToken())._unsafeUnwrap()).toBe('stored-access');
      clock.set(T0 + ONE_HOUR_MS - 10_000);

      // Act
      const [first, second] = await Promise.all([
        manager.getAccessToken(),
        manager.getAccessToken(),
      ]);

      // Assert
      expect(first._unsafeUnwrap()).toBe('access-1');
      expect(second._unsafeUnwrap()).toBe('access-1');
      expect(tokenRequests()).toHaveLength(1);
      expect(tokenRequests()[0]?.get('grant_type')).toBe('refresh_token');
      expect(tokenRequests()[0]?.get('refresh_token')).toBe('stored-refresh');
    });

    it('keeps the previous refresh token when the response omits one', async () => {
      const response = createTokenResponse();
      delete response['refresh_token'];
      const { manager } = setup([jsonResponse(200, response)], {
        stored: stored({ expiresAt: T0 }),
      });

      await manager.getAccessToken();

      expect(manager.getToken()?.refreshToken).toBe('stored-refresh');
    });

    it('adopts a fresher token written to the store instead of refreshing', async () => {
      // Arrange
      const { manager, storage, clock, tokenRequests } = setup([], { stored: stored() });
      await manager.getAccessToken();
      await storage.set(
        STORAGE_KEY,
        stored({ accessToken: 'other-process-access', expiresAt: T0 + 2 * ONE_HOUR_MS })
      );
      clock.set(T0 + ONE_HOUR_MS - 10_000);

      // Act
      const result = await manager.getAccessToken();

      // Assert
      expect(result._unsafeUnwrap()).toBe('other-process-access');
      expect(tokenRequests()).toHaveLength(0);
    });
  });

  describe('given the authority rejects the refresh token', () => {
    it('moves to expired, deletes the stored token and requires reauthentication', async () => {
      // Arrange
      const { manager, storage } = setup(
        [jsonResponse(400, { error: 'invalid_grant', error_description: 'Token revoked' })],
        { stored: stored({ expiresAt: T0 }) }
      );

      // Act
      const result = await manager.getAccessToken();

      // Assert
      const error = result._unsafeUnwrapErr();
      expect(error).toBeInstanceOf(ReauthenticationRequiredError);
      expect(error.message).toBe('The refresh token was rejected; interactive authorization is required');
      expect(error.cause).toBeInstanceOf(AuthorizationFailedError);
      expect(manager.getState()).toBe('expired');
      expect(manager.getToken()).toBeUndefined();
      expect(storage.entries().has(STORAGE_KEY)).toBe(false);
    });

    it('keeps failing without network calls until authorize', async () => {
      // Arrange
      const { manager, tokenRequests } = setup(
        [
          jsonResponse(400, { error: 'invalid_grant' }),
          jsonResponse(200, createTokenResponse({ access_token: 'access-after-login' })),
        ],
        { stored: stored({ expiresAt: T0 }) }
      );
      await manager.getAccessToken();

      // Act
      const again = await manager.getAccessToken();
      const authorized = await manager.authorize();
      const afterLogin = await manager.getAccessToken();

      // Assert
      expect(again._unsafeUnwrapErr().message).toBe('The session requires interactive authorization');
      expect(authorized.isOk()).toBe(true);
      expect(afterLogin._unsafeUnwrap()).toBe('access-after-login');
      expect(manager.getState()).toBe('authorized');
      expect(tokenRequests().map((form) => form.get('grant_type'))).toEqual([
        'refresh_token',
        'authorization_code',
      ]);
    });
  });

  describe('given the token endpoint is unavailable during refresh', () => {
    it('keeps the held token and reports the connection error', async () => {
      const { manager, storage } = setup([ok(httpResponse(503))], {
        stored: stored({ expiresAt: T0 + 5_000 }),
      });

      const result = await manager.getAccessToken();

      expect(result._unsafeUnwrapErr()).toBeInstanceOf(ConnectionError);
      expect(manager.getState()).toBe('authorized');
      expect(manager.getToken()?.accessToken).toBe('stored-access');
      expect(storage.entries().has(STORAGE_KEY)).toBe(true);
    });
  });

  describe('given a caller-provided refresh token', () => {
    it('redeems it on first use', async () => {
      const { manager, tokenRequests } = setup([jsonResponse(200, createTokenResponse())], {
        refreshToken: 'provided-refresh',
        interactive: false,
      });

      const result = await manager.getAccessToken();

      expect(result._unsafeUnwrap()).toBe('access-1');
      expect(tokenRequests()[0]?.get('refresh_token')).toBe('provided-refresh');
    });
  });

  describe('given nothing to start from and interactive login disabled', () => {
    it('requires reauthentication without any request', async () => {
      const { manager, httpClient } = setup([], { interactive: false });

      const result = await manager.getAccessToken();

      expect(result._unsafeUnwrapErr().message).toBe(
        'No token is available and interactive authorization is disabled'
      );
      expect(manager.getState()).toBe('no_token');
      expect(httpClient.requests).toHaveLength(0);
    });

    it('ignores a malformed stored entry with a warning', async () => {
      const recording = createRecordingLog();
      const { manager } = setup([], { interactive: false, stored: 'not json', log: recording.log });

      const result = await manager.getAccessToken();

      expect(result._unsafeUnwrapErr()).toBeInstanceOf(ReauthenticationRequiredError);
      expect(
        recording.entries.filter((entry) => entry.level === 'warn').map((entry) => entry.message)
      ).toEqual(['Ignoring an unreadable token in the secret store']);
    });
  });

  describe('interactive authorization', () => {
    it('runs the code flow with PKCE and stores the token', async () => {
      // Arrange
      const { manager, login, storage, tokenRequests } = setup([jsonResponse(200, createTokenResponse())]);

      // Act
      const result = await manager.getAccessToken();

      // Assert
      expect(result._unsafeUnwrap()).toBe('access-1');
      expect(login.listenedOn).toEqual([TEST_REDIRECT_URI]);
      expect(login.closeCount()).toBe(1);

      const opened = new URL(login.openedUrls[0] ?? '');
      expect(`${opened.origin}${opened.pathname}`).toBe(TEST_AUTHORIZATION_ENDPOINT);
      expect(opened.searchParams.get('client_id')).toBe('test-client-id');
      expect(opened.searchParams.get('scope')).toBe('openid offline_access');

      const form = tokenRequests()[0];
      expect(form?.get('grant_type')).toBe('authorization_code');
      expect(form?.get('code')).toBe('test-code');
      expect(computePkceChallenge(form?.get('code_verifier') ?? '')).toBe(
        opened.searchParams.get('code_challenge')
      );
      expect(manager.getState()).toBe('authorized');
      expect(storage.writeCount()).toBe(1);
    });

    it('rejects a callback whose state does not match', async () => {
      // Arrange
      const login = createStubLogin(() => ({ code: 'test-code', state: 'forged-state' }));
      const { manager, tokenRequests } = setup([], {
        codeReceiver: login.receiver,
        openAuthorizationUrl: login.openAuthorizationUrl,
      });

      // Act
      const result = await manager.getAccessToken();

      // Assert
      const error = result._unsafeUnwrapErr();
      expect(error).toBeInstanceOf(AuthorizationFailedError);
      expect(error.message).toBe('The authorization response state does not match the request');
      expect(manager.getState()).toBe('no_token');
      expect(tokenRequests()).toHaveLength(0);
    });

    it('fails with a timeout when the user never completes the login', async () => {
      const login = createStubLogin(() => undefined);
      const { manager } = setup([], {
        codeReceiver: login.receiver,
        openAuthorizationUrl: login.openAuthorizationUrl,
        loginTimeoutMs: 20,
      });

      const result = await manager.getAccessToken();

      const error = result._unsafeUnwrapErr();
      expect(error).toBeInstanceOf(TimeoutError);
      expect(error.message).toBe('Interactive login timed out after 20ms');
      expect(manager.getState()).toBe('no_token');
    });

    it('reports an opener that throws as an authorization failure', async () => {
      const login = createStubLogin(approveWith('test-code'));
      const { manager } = setup([], {
        codeReceiver: login.receiver,
        openAuthorizationUrl: () => {
          throw new Error('no browser available');
        },
      });

      const result = await manager.authorize();

      const error = result._unsafeUnwrapErr();
      expect(error.message).toBe('Could not open the authorization URL');
      expect(login.closeCount()).toBe(1);
    });
  });

  describe('forceRefresh', () => {
    it('refreshes when the rejected token is the current one', async () => {
      const { manager, tokenRequests } = setup([jsonResponse(200, createTokenResponse())], {
        stored: stored(),
      });
      await manager.getAccessToken();

      const result = await manager.forceRefresh('stored-access');

      expect(result._unsafeUnwrap()).toBe('access-1');
      expect(tokenRequests()).toHaveLength(1);
    });

    it('returns the replacement when the rejected token was already replaced', async () => {
      const { manager, tokenRequests } = setup([jsonResponse(200, createTokenResponse())], {
        stored: stored(),
      });
      await manager.getAccessToken();
      await manager.forceRefresh('stored-access');

      const result = await manager.forceRefresh('stored-access');

      expect(result._unsafeUnwrap()).toBe('access-1');
      expect(tokenRequests()).toHaveLength(1);
    });
  });

  describe('clear', () => {
    it('forgets the token and removes it from the store', async () => {
      const { manager, storage } = setup([], { stored: stored() });
      await manager.getAccessToken();

      await manager.clear();

      expect(manager.getState()).toBe('no_token');
      expect(manager.getToken()).toBeUndefined();
      expect(storage.entries().has(STORAGE_KEY)).toBe(false);
    });
  });
});
