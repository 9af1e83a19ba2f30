/**
 * Session builder: takes exactly one credential, probes the server, and selects
 * the strategy that satisfies its challenge.
 *
 * @packageDocumentation
 */

import { err, ok, type Result } from 'neverthrow';
import { listSchemes, parseChallengesWithIssues } from '../challenge/parser.js';
import type { Challenge } from '../challenge/types.js';
import {
  AuthenticationMismatchError,
  ConfigurationError,
  ConnectionError,
  type SessionError,
} from '../errors/errors.js';
import { toSessionError } from '../http/errors.js';
import type { HttpClient } from '../http/types.js';
import { noopLog } from '../logging/logger.js';
import { createOidcTokenManager } from '../oidc/token-manager.js';
import { createAnonymousStrategy } from '../strategy/anonymous.js';
import { createBasicStrategy } from '../strategy/basic.js';
import { describeStrategy } from '../strategy/exchange.js';
import { createMutualAuthStrategy, DEFAULT_MAX_HANDSHAKE_ROUNDS } from '../strategy/mutual-auth.js';
import { createOidcStrategy } from '../strategy/oidc.js';
import type { AuthStrategy } from '../strategy/types.js';
import { createSingleFlight } from '../util/single-flight.js';
import {
  applyConfiguration,
  createTransport,
  resolveSessionConfiguration,
  type ResolvedSessionConfiguration,
} from './configuration.js';
import { configuredSchemeName, resolveOidcSettings, selectScheme } from './selection.js';
import { createSession, type Session } from './session.js';
import type {
  ConfiguredSessionBuilder,
  CredentialConfig,
  CredentialResult,
  OidcCredentialOptions,
  SessionBuilder,
  SessionBuilderOptions,
  SessionBuilderState,
} from './types.js';

interface IdentityProviderTransport {
  readonly httpClient: HttpClient;
  readonly requestTimeoutMs: number;
}

const isChallengeStatus = (status: number): boolean => status === 401 || status === 403;

/**
 * Creates a builder for the API at `baseUrl`.
 *
 * @example
 * ```typescript
 * const builder = createSessionBuilder('https://api.example.com/v1', { log });
 * const configured = builder.withCredentials('svc-reports', password, { domain: 'CORP' });
 * if (configured.isErr()) throw configured.error;
 *
 * const session = await configured.value.connect();
 * if (session.isErr()) {
 *   if (session.error.code === 'AUTHENTICATION_MISMATCH') {
 *     console.error(session.error.advertisedSchemes);
 *   }
 *   return;
 * }
 * const items = await session.value.request('/items');
 * ```
 */
export const createSessionBuilder = (
  baseUrl: string,
  options: SessionBuilderOptions = {}
): SessionBuilder => {
  const log = options.log ?? noopLog;
  const maxHandshakeRounds = options.maxHandshakeRounds ?? DEFAULT_MAX_HANDSHAKE_ROUNDS;
  const gate = createSingleFlight<Result<Session, SessionError>>();

  let credential: CredentialConfig | undefined;
  let settled: Result<Session, SessionError> | undefined;

  // ==========================================================================
  // Strategy instantiation
  // ==========================================================================

  /**
   * Transport and deadline for the identity provider calls. They follow
   * `identityProviderConfiguration` when given, the session's otherwise.
   */
  const identityProviderTransport = (
    oidc: OidcCredentialOptions,
    configuration: ResolvedSessionConfiguration
  ): Result<IdentityProviderTransport, ConfigurationError> => {
    const resolved: Result<ResolvedSessionConfiguration, ConfigurationError> =
      oidc.identityProviderConfiguration === undefined
        ? ok(configuration)
        : resolveSessionConfiguration(oidc.identityProviderConfiguration);

    return resolved.map((idp) => ({
      httpClient: oidc.identityProviderHttpClient ?? createTransport(idp),
      requestTimeoutMs: idp.requestTimeoutMs,
    }));
  };

  const startOidc = async (
    oidc: OidcCredentialOptions,
    bearer: Challenge,
    configuration: ResolvedSessionConfiguration
  ): Promise<Result<AuthStrategy, SessionError>> => {
    const settings = resolveOidcSettings(oidc, bearer);
    if (settings.isErr()) {
      return err(settings.error);
    }
    const transport = identityProviderTransport(oidc, configuration);
    if (transport.isErr()) {
      return err(transport.error);
    }

    const manager = createOidcTokenManager({
      settings: settings.value,
      httpClient: transport.value.httpClient,
      log,
      requestTimeoutMs: transport.value.requestTimeoutMs,
      storage: oidc.storage,
      refreshToken: oidc.refreshToken,
      interactive: oidc.interactive,
      openAuthorizationUrl: oidc.openAuthorizationUrl,
      codeReceiver: oidc.codeReceiver,
      loginTimeoutMs: oidc.loginTimeoutMs,
      refreshSkewMs: oidc.refreshSkewMs,
      now: oidc.now,
    });

    const token = await manager.getAccessToken();
    if (token.isErr()) {
      return err(token.error);
    }
    return ok(createOidcStrategy(manager));
  };

  const instantiate = async (
    selected: CredentialConfig,
    challenges: readonly Challenge[],
    configuration: ResolvedSessionConfiguration
  ): Promise<Result<AuthStrategy, SessionError>> => {
    const selection = selectScheme(selected, challenges);
    if (selection.isErr()) {
      return err(selection.error);
    }

    const { scheme, challenge, matching } = selection.value;
    if (matching.length > 1) {
      log('debug', 'Several advertised schemes match the credential; using the strongest', {
        matching,
        selected: scheme,
      });
    }

    switch (selected.kind) {
      case 'basic':
        return ok(createBasicStrategy(selected.username, selected.password, { domain: selected.domain }));
      case 'windows':
        if (scheme !== 'Negotiate' && scheme !== 'NTLM') {
          return err(new AuthenticationMismatchError(configuredSchemeName(selected), listSchemes(challenges)));
        }
        return ok(createMutualAuthStrategy(scheme, selected.provider, maxHandshakeRounds));
      case 'oidc':
        return startOidc(selected.options, challenge, configuration);
      case 'anonymous':
        return err(new AuthenticationMismatchError('Anonymous', listSchemes(challenges)));
      default: {
        const unsupported: never = selected;
        return unsupported;
      }
    }
  };

  // ==========================================================================
  // Negotiation
  // ==========================================================================

  const negotiate = async (selected: CredentialConfig): Promise<Result<Session, SessionError>> => {
    const configuration = resolveSessionConfiguration(options.configuration);
    if (configuration.isErr()) {
      return err(configuration.error);
    }
    try {
      const { protocol } = new URL(baseUrl);
      if (protocol !== 'http:' && protocol !== 'https:') {
        return err(new ConfigurationError(`Base URL "${baseUrl}" is not an http(s) URL`));
      }
    } catch (error) {
      return err(new ConfigurationError(`Invalid base URL "${baseUrl}"`, { cause: error }));
    }

    const httpClient = options.httpClient ?? createTransport(configuration.value);
    const finish = (strategy: AuthStrategy): Session => {
      log('info', 'Selected authentication strategy', { strategy: describeStrategy(strategy) });
      const session = createSession({
        baseUrl,
        strategy,
        configuration: configuration.value,
        httpClient,
        log,
      });
      log('info', 'Session created', { baseUrl });
      return session;
    };

    log('debug', 'Probing server', { url: baseUrl });
    const probe = await httpClient.send(
      applyConfiguration({ url: baseUrl, method: 'GET' }, configuration.value)
    );
    if (probe.isErr()) {
      return err(toSessionError(probe.error, 'Probe request'));
    }

    const { status, headers } = probe.value;
    if (!isChallengeStatus(status)) {
      if (selected.kind === 'anonymous') {
        return ok(finish(createAnonymousStrategy()));
      }
      if (status >= 400) {
        return err(
          new ConnectionError(`Probe request to ${baseUrl} failed with HTTP ${String(status)}`, {
            status,
            url: baseUrl,
          })
        );
      }
      log('warn', 'Server accepts anonymous connections, continuing without credentials', { status });
      return ok(finish(createAnonymousStrategy()));
    }

    const parsed = parseChallengesWithIssues(headers['www-authenticate']);
    for (const issue of parsed.issues) {
      log('debug', 'Ignored part of the authentication challenge', {
        position: issue.position,
        fragment: issue.fragment,
        reason: issue.reason,
      });
    }
    log('debug', 'Detected authentication methods', { schemes: listSchemes(parsed.challenges) });

    const strategy = await instantiate(selected, parsed.challenges, configuration.value);
    return strategy.map(finish);
  };

  // ==========================================================================
  // State machine
  // ==========================================================================

  const connect = async (): Promise<Result<Session, SessionError>> => {
    if (settled !== undefined) {
      return settled;
    }
    const selected = credential;
    if (selected === undefined) {
      return err(
        new ConfigurationError(
          'No credentials configured; call withAnonymous, withCredentials, withAutologon or withOidc first'
        )
      );
    }

    return gate.run(async () => {
      const result = await negotiate(selected);
      if (result.isOk() || result.error instanceof AuthenticationMismatchError) {
        settled = result;
      }
      return result;
    });
  };

  const configure = (next: CredentialConfig): CredentialResult => {
    if (credential !== undefined) {
      return err(
        new ConfigurationError(
          `A ${configuredSchemeName(credential)} credential is already configured; a builder takes exactly one`
        )
      );
    }
    credential = next;
    const configured: ConfiguredSessionBuilder = { credential: next, connect };
    return ok(configured);
  };

  const state = (): SessionBuilderState => {
    if (settled?.isOk() === true) {
      return 'finalized';
    }
    return credential === undefined ? 'empty' : 'configured';
  };

  return {
    state,
    withAnonymous: () => configure({ kind: 'anonymous' }),
    withCredentials: (username, password, credentialOptions = {}) =>
      configure({ kind: 'basic', username, password, domain: credentialOptions.domain }),
    withAutologon: (provider) => configure({ kind: 'windows', provider }),
    withOidc: (oidcOptions = {}) => configure({ kind: 'oidc', options: oidcOptions }),
    connect,
  };
};
