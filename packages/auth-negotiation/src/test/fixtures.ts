/**
 * Shared test fixtures and constants.
 */

import type { DiscoveryDocument, OidcClientSettings, TokenSet } from '../oidc/types.js';

// ============================================================================
// Time Constants
// ============================================================================

/** One hour in milliseconds */
export const ONE_HOUR_MS = 60 * 60 * 1000;

/** Fixed wall clock for tests: 2024-01-01T00:00:00.000Z */
export const T0 = Date.UTC(2024, 0, 1);

// ============================================================================
// URL Constants
// ============================================================================

export const TEST_API_URL = 'https://api.example.com/v1';
export const TEST_AUTHORITY = 'https://idp.example.com/tenant';
export const TEST_DISCOVERY_URL = `${TEST_AUTHORITY}/.well-known/openid-configuration`;
export const TEST_AUTHORIZATION_ENDPOINT = `${TEST_AUTHORITY}/authorize`;
export const TEST_TOKEN_ENDPOINT = `${TEST_AUTHORITY}/token`;
export const TEST_REDIRECT_URI = 'http://localhost:8765/callback';

// ============================================================================
// Client Configuration
// ============================================================================

export const TEST_CLIENT_ID = 'test-client-id';
export const TEST_CLIENT_SECRET = 'test-client-secret';

export const createClientSettings = (
  overrides: Partial<OidcClientSettings> = {}
): OidcClientSettings => ({
  authority: TEST_AUTHORITY,
  clientId: TEST_CLIENT_ID,
  redirectUri: TEST_REDIRECT_URI,
  scopes: ['openid', 'offline_access'],
  ...overrides,
});

// ============================================================================
// Identity provider responses
// ============================================================================

export const createDiscoveryDocument = (
  overrides: Partial<DiscoveryDocument> = {}
): DiscoveryDocument => ({
  issuer: TEST_AUTHORITY,
  authorization_endpoint: TEST_AUTHORIZATION_ENDPOINT,
  token_endpoint: TEST_TOKEN_ENDPOINT,
  code_challenge_methods_supported: ['S256'],
  ...overrides,
});

/**
 * Token endpoint JSON body.
 */
export const createTokenResponse = (
  overrides: Record<string, unknown> = {}
): Record<string, unknown> => ({
  access_token: 'access-1',
  token_type: 'Bearer',
  expires_in: 3600,
  refresh_token: 'refresh-1',
  ...overrides,
});

export const createTokenSet = (overrides: Partial<TokenSet> = {}): TokenSet => ({
  accessToken: 'stored-access',
  refreshToken: 'stored-refresh',
  expiresAt: T0 + ONE_HOUR_MS,
  tokenType: 'Bearer',
  ...overrides,
});

// ============================================================================
// JWT Test Data
// ============================================================================

const base64url = (value: string): string => Buffer.from(value, 'utf8').toString('base64url');

/**
 * A JWT-shaped string with the given payload. The signature is a placeholder;
 * nothing here is verified.
 */
export const unsignedJwt = (payload: Record<string, unknown>): string =>
  `${base64url('{"alg":"none","typ":"JWT"}')}.${base64url(JSON.stringify(payload))}.test-signature`;
