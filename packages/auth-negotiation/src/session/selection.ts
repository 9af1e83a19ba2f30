/**
 * Matching the configured credential against the server's challenges.
 *
 * @packageDocumentation
 */

import { err, ok, type Result } from 'neverthrow';
import { findChallenge, listSchemes } from '../challenge/parser.js';
import type { Challenge } from '../challenge/types.js';
import { AuthenticationMismatchError, ConfigurationError } from '../errors/errors.js';
import type { OidcClientSettings } from '../oidc/types.js';
import type { MutualAuthScheme } from '../strategy/types.js';
import type { CredentialConfig, OidcCredentialOptions } from './types.js';

/**
 * Schemes a credential can satisfy, named after the challenge they answer.
 */
export type NegotiatedScheme = 'OIDC' | MutualAuthScheme | 'Basic';

/** Strongest first */
export const SCHEME_PRECEDENCE: readonly NegotiatedScheme[] = ['OIDC', 'Negotiate', 'NTLM', 'Basic'];

const CHALLENGE_SCHEME: Readonly<Record<NegotiatedScheme, string>> = {
  OIDC: 'Bearer',
  Negotiate: 'Negotiate',
  NTLM: 'NTLM',
  Basic: 'Basic',
};

const satisfiableSchemes = (credential: CredentialConfig): readonly NegotiatedScheme[] => {
  switch (credential.kind) {
    case 'anonymous':
      return [];
    case 'basic':
      return ['Basic'];
    case 'windows':
      return credential.provider.supportedSchemes;
    case 'oidc':
      return ['OIDC'];
    default: {
      const unsupported: never = credential;
      return unsupported;
    }
  }
};

/**
 * Name of the configured credential in mismatch errors.
 */
export const configuredSchemeName = (credential: CredentialConfig): string => {
  switch (credential.kind) {
    case 'anonymous':
      return 'Anonymous';
    case 'basic':
      return 'Basic';
    case 'windows':
      return credential.provider.supportedSchemes.length > 0
        ? credential.provider.supportedSchemes.join('/')
        : 'Windows integrated';
    case 'oidc':
      return 'OIDC';
    default: {
      const unsupported: never = credential;
      return unsupported;
    }
  }
};

export interface SchemeSelection {
  readonly scheme: NegotiatedScheme;
  /** The challenge that was matched */
  readonly challenge: Challenge;
  /** Every matching scheme, strongest first; more than one means a tie-break happened */
  readonly matching: readonly NegotiatedScheme[];
}

/**
 * Picks the strongest scheme that the credential can satisfy and the server
 * advertised, in the order of {@link SCHEME_PRECEDENCE}.
 */
export const selectScheme = (
  credential: CredentialConfig,
  challenges: readonly Challenge[]
): Result<SchemeSelection, AuthenticationMismatchError> => {
  const satisfiable = satisfiableSchemes(credential);
  const matches: { readonly scheme: NegotiatedScheme; readonly challenge: Challenge }[] = [];

  for (const scheme of SCHEME_PRECEDENCE) {
    if (!satisfiable.includes(scheme)) {
      continue;
    }
    const challenge = findChallenge(challenges, CHALLENGE_SCHEME[scheme]);
    if (challenge !== undefined) {
      matches.push({ scheme, challenge });
    }
  }

  const [strongest] = matches;
  if (strongest === undefined) {
    return err(new AuthenticationMismatchError(configuredSchemeName(credential), listSchemes(challenges)));
  }

  return ok({ ...strongest, matching: matches.map((match) => match.scheme) });
};

/**
 * Completes the OIDC client settings from the Bearer challenge parameters
 * (`authority`, `clientid`, `redirecturi`, `scope`, `apiaudience`). Options
 * given by the caller take precedence.
 */
export const resolveOidcSettings = (
  options: OidcCredentialOptions,
  bearer: Challenge
): Result<OidcClientSettings, ConfigurationError> => {
  const { parameters } = bearer;
  const authority = options.authority ?? parameters['authority'];
  const clientId = options.clientId ?? parameters['clientid'];
  const redirectUri = options.redirectUri ?? parameters['redirecturi'];
  const scopes =
    options.scopes ?? (parameters['scope'] ?? '').split(/\s+/).filter((scope) => scope !== '');
  const audience = options.audience ?? parameters['apiaudience'];

  if (authority === undefined || clientId === undefined || redirectUri === undefined) {
    const missing = [
      ...(authority === undefined ? ['authority'] : []),
      ...(clientId === undefined ? ['clientId'] : []),
      ...(redirectUri === undefined ? ['redirectUri'] : []),
    ];
    return err(
      new ConfigurationError(
        `OIDC parameters missing from both the options and the Bearer challenge: ${missing.join(', ')}`
      )
    );
  }

  return ok({
    authority,
    clientId,
    redirectUri,
    scopes,
    ...(options.clientSecret !== undefined ? { clientSecret: options.clientSecret } : {}),
    ...(audience !== undefined ? { audience } : {}),
  });
};
