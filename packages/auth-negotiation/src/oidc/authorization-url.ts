import type { OidcClientSettings, PkceChallenge } from './types.js';

/**
 * Builds the authorization request URL (authorization code flow with PKCE).
 *
 * @example
 * ```typescript
 * const url = buildAuthorizationUrl('https://idp.example.com/authorize', settings, {
 *   state: generateState(),
 *   pkce: createPkceChallengePair(),
 * });
 * ```
 */
export const buildAuthorizationUrl = (
  authorizationEndpoint: string,
  settings: Pick<OidcClientSettings, 'clientId' | 'redirectUri' | 'scopes' | 'audience'>,
  request: { readonly state: string; readonly pkce: PkceChallenge }
): string => {
  const url = new URL(authorizationEndpoint);

  url.searchParams.set('response_type', 'code');
  url.searchParams.set('client_id', settings.clientId);
  url.searchParams.set('redirect_uri', settings.redirectUri);
  if (settings.scopes.length > 0) {
    url.searchParams.set('scope', settings.scopes.join(' '));
  }
  url.searchParams.set('state', request.state);
  url.searchParams.set('code_challenge', request.pkce.challenge);
  url.searchParams.set('code_challenge_method', request.pkce.method);

  if (settings.audience !== undefined) {
    url.searchParams.set('audience', settings.audience);
  }

  return url.toString();
};
