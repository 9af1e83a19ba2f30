import type { Challenge } from './types.js';

const quote = (value: string): string => `"${value.replace(/[\\"]/g, (char) => `\\${char}`)}"`;

const formatChallenge = (challenge: Challenge): string => {
  if (challenge.token68 !== undefined) {
    return `${challenge.scheme} ${challenge.token68}`;
  }

  const parameters = Object.entries(challenge.parameters).map(
    ([key, value]) => `${key}=${quote(value)}`
  );
  return parameters.length > 0 ? `${challenge.scheme} ${parameters.join(', ')}` : challenge.scheme;
};

/**
 * Renders challenges as one header value. Parameter values are always quoted.
 * When a challenge has a token68 its parameters are not written.
 *
 * @example
 * ```typescript
 * formatChallenges([
 *   { scheme: 'Bearer', parameters: { realm: 'api', scope: 'read write' } },
 *   { scheme: 'Negotiate', parameters: {} },
 * ]);
 * // 'Bearer realm="api", scope="read write", Negotiate'
 * ```
 */
export const formatChallenges = (challenges: readonly Challenge[]): string =>
  challenges.map(formatChallenge).join(', ');
