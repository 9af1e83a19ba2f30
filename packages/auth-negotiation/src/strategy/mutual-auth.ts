/**
 * NTLM and Negotiate: connection-oriented handshakes whose tokens come from an
 * injected {@link MutualAuthProvider}.
 *
 * A 401 continues the handshake with the origin server (`WWW-Authenticate` in,
 * `Authorization` out); a 407 does the same with a proxy
 * (`Proxy-Authenticate` in, `Proxy-Authorization` out).
 *
 * @packageDocumentation
 */

import { err, ok, type Result } from 'neverthrow';
import { parseChallenges, findChallenge } from '../challenge/parser.js';
import { HandshakeFailedError } from '../errors/errors.js';
import { setHeader } from '../http/headers.js';
import type { HttpRequest, HttpResponse } from '../http/types.js';
import type { Log } from '../logging/logger.js';
import type {
  MutualAuthContext,
  MutualAuthProvider,
  MutualAuthScheme,
  MutualAuthStrategy,
  RequestExchange,
  RetryDecision,
} from './types.js';

/** Rounds allowed per request sequence before the handshake is abandoned */
export const DEFAULT_MAX_HANDSHAKE_ROUNDS = 3;

export const createMutualAuthStrategy = (
  scheme: MutualAuthScheme,
  provider: MutualAuthProvider,
  maxRounds: number = DEFAULT_MAX_HANDSHAKE_ROUNDS
): MutualAuthStrategy => ({ kind: 'mutual', scheme, provider, maxRounds });

type Party = 'server' | 'proxy';

const PARTIES = {
  server: { status: 401, challengeHeader: 'www-authenticate', replyHeader: 'Authorization' },
  proxy: { status: 407, challengeHeader: 'proxy-authenticate', replyHeader: 'Proxy-Authorization' },
} as const;

interface Handshake {
  readonly context: MutualAuthContext;
  rounds: number;
  complete: boolean;
}

const partyFor = (status: number): Party | undefined => {
  if (status === PARTIES.server.status) {
    return 'server';
  }
  if (status === PARTIES.proxy.status) {
    return 'proxy';
  }
  return undefined;
};

/**
 * Starts the handshake state of one request sequence.
 */
export const beginMutualAuthExchange = (strategy: MutualAuthStrategy, log: Log): RequestExchange => {
  const { scheme } = strategy;
  const handshakes = new Map<Party, Handshake>();

  const failure = (rounds: number, message: string, cause?: unknown): HandshakeFailedError =>
    new HandshakeFailedError(scheme, rounds, message, { cause });

  const handshakeFor = (party: Party, request: HttpRequest): Handshake => {
    const existing = handshakes.get(party);
    if (existing !== undefined) {
      return existing;
    }
    const created: Handshake = {
      context: strategy.provider.createContext(scheme, {
        url: request.url,
        host: new URL(request.url).host,
        proxy: party === 'proxy',
      }),
      rounds: 0,
      complete: false,
    };
    handshakes.set(party, created);
    return created;
  };

  const step = async (
    handshake: Handshake,
    serverToken: string | undefined
  ): Promise<Result<string | undefined, HandshakeFailedError>> => {
    const result = await handshake.context.step(serverToken);
    handshake.rounds++;
    if (result.isErr()) {
      return err(failure(handshake.rounds, result.error.message, result.error.cause));
    }
    handshake.complete = result.value.complete;
    return ok(result.value.token);
  };

  const sendToken = async (
    party: Party,
    request: HttpRequest,
    serverToken: string | undefined
  ): Promise<Result<HttpRequest, HandshakeFailedError>> => {
    const handshake = handshakeFor(party, request);
    if (handshake.rounds >= strategy.maxRounds) {
      return err(failure(handshake.rounds, 'the server kept challenging'));
    }

    const token = await step(handshake, serverToken);
    if (token.isErr()) {
      return err(token.error);
    }
    if (token.value === undefined) {
      return err(failure(handshake.rounds, 'the provider produced no token'));
    }

    log('debug', 'Sending handshake token', { scheme, round: handshake.rounds, proxy: party === 'proxy' });
    return ok({
      ...request,
      headers: setHeader(request.headers, PARTIES[party].replyHeader, `${scheme} ${token.value}`),
    });
  };

  /**
   * A final server token on a non-challenge response authenticates the server
   * (Kerberos mutual authentication).
   */
  const verifyServer = async (
    response: HttpResponse<string>
  ): Promise<Result<RetryDecision, HandshakeFailedError>> => {
    const handshake = handshakes.get('server');
    const challenge = findChallenge(
      parseChallenges(response.headers[PARTIES.server.challengeHeader]),
      scheme
    );
    if (handshake === undefined || handshake.complete || challenge?.token68 === undefined) {
      return ok({ retry: false });
    }

    const verified = await step(handshake, challenge.token68);
    if (verified.isErr()) {
      return err(verified.error);
    }
    return ok({ retry: false });
  };

  const handleResponse = async (
    response: HttpResponse<string>,
    request: HttpRequest
  ): Promise<Result<RetryDecision, HandshakeFailedError>> => {
    const party = partyFor(response.status);
    if (party === undefined) {
      return verifyServer(response);
    }

    const challenge = findChallenge(
      parseChallenges(response.headers[PARTIES[party].challengeHeader]),
      scheme
    );
    if (challenge === undefined) {
      return ok({ retry: false });
    }

    // A bare challenge after a token was sent means the token was refused.
    const existing = handshakes.get(party);
    if (existing !== undefined && challenge.token68 === undefined) {
      return err(failure(existing.rounds, 'the credentials were rejected'));
    }

    const next = await sendToken(party, request, challenge.token68);
    if (next.isErr()) {
      return err(next.error);
    }
    return ok({ retry: true, request: next.value });
  };

  return {
    prepareRequest: (request) => sendToken('server', request, undefined),
    handleResponse,
  };
};
