/**
 * Permissive parser for `WWW-Authenticate` / `Proxy-Authenticate` values.
 *
 * Grammar (RFC 7235 section 4.1):
 *
 *   challenge  = auth-scheme [ 1*SP ( token68 / #auth-param ) ]
 *   auth-param = token BWS "=" BWS ( token / quoted-string )
 *
 * Challenges and parameters share the comma as separator; a bare token that is not
 * followed by "=" starts a new challenge. Malformed fragments are skipped up to the
 * next comma outside quotes and reported as issues. Parsing never fails.
 *
 * @packageDocumentation
 */

import type {
  Challenge,
  ChallengeHeaderInput,
  ChallengeParseIssue,
  ChallengeParseResult,
} from './types.js';

const TCHAR = /[!#$%&'*+\-.^_`|~0-9A-Za-z]/;
const TOKEN68 = /^([A-Za-z0-9\-._~+/]+=*)[ \t]*(?=,|$)/;

const isTchar = (char: string | undefined): boolean => char !== undefined && TCHAR.test(char);
const isWhitespace = (char: string | undefined): boolean => char === ' ' || char === '\t';

interface PendingChallenge {
  readonly scheme: string;
  readonly parameters: Map<string, string>;
  token68: string | undefined;
}

/**
 * Cursor over one header value.
 */
interface Scanner {
  readonly position: () => number;
  readonly peek: () => string | undefined;
  readonly atEnd: () => boolean;
  readonly advance: () => void;
  readonly skipWhitespace: () => void;
  readonly skipSeparators: () => void;
  readonly readToken: () => string;
  /** Reads a quoted-string starting at the opening quote; undefined if unterminated */
  readonly readQuoted: () => string | undefined;
  readonly readToken68: () => string | undefined;
  /** Moves to the next comma outside a quoted string */
  readonly skipToNextComma: () => void;
}

const createScanner = (input: string): Scanner => {
  let pos = 0;

  const readToken = (): string => {
    const start = pos;
    while (isTchar(input[pos])) {
      pos++;
    }
    return input.slice(start, pos);
  };

  const readQuoted = (): string | undefined => {
    pos++;
    let value = '';
    while (pos < input.length) {
      const char = input[pos];
      if (char === '\\' && pos + 1 < input.length) {
        value += input[pos + 1] ?? '';
        pos += 2;
      } else if (char === '"') {
        pos++;
        return value;
      } else {
        value += char ?? '';
        pos++;
      }
    }
    return undefined;
  };

  const readToken68 = (): string | undefined => {
    const match = TOKEN68.exec(input.slice(pos));
    const token = match?.[1];
    if (match === null || token === undefined) {
      return undefined;
    }
    pos += match[0].length;
    return token;
  };

  const skipToNextComma = (): void => {
    let inQuotes = false;
    while (pos < input.length) {
      const char = input[pos];
      if (inQuotes && char === '\\') {
        pos += 2;
        continue;
      }
      if (char === '"') {
        inQuotes = !inQuotes;
      } else if (char === ',' && !inQuotes) {
        break;
      }
      pos++;
    }
    pos = Math.min(pos, input.length);
  };

  return {
    position: () => pos,
    peek: () => input[pos],
    atEnd: () => pos >= input.length,
    advance: () => {
      pos++;
    },
    skipWhitespace: () => {
      while (isWhitespace(input[pos])) {
        pos++;
      }
    },
    skipSeparators: () => {
      while (isWhitespace(input[pos]) || input[pos] === ',') {
        pos++;
      }
    },
    readToken,
    readQuoted,
    readToken68,
    skipToNextComma,
  };
};

const toChallenge = (pending: PendingChallenge): Challenge => ({
  scheme: pending.scheme,
  parameters: Object.fromEntries(pending.parameters),
  ...(pending.token68 !== undefined ? { token68: pending.token68 } : {}),
});

const normalizeInput = (header: ChallengeHeaderInput): string => {
  if (header === undefined) {
    return '';
  }
  if (typeof header === 'string') {
    return header;
  }
  return header.filter((value) => value.trim() !== '').join(', ');
};

/**
 * Parses challenge headers and reports every fragment that was skipped.
 *
 * Repeated header instances may be passed as an array; they are joined with ", "
 * and issue positions refer to the joined value.
 *
 * @example
 * ```typescript
 * const { challenges, issues } = parseChallengesWithIssues('Negotiate, Basic realm="test", =oops');
 * // challenges: [{ scheme: 'Negotiate', parameters: {} }, { scheme: 'Basic', parameters: { realm: 'test' } }]
 * // issues: [{ position: 31, fragment: '=oops', reason: 'Expected a scheme or parameter name' }]
 * ```
 */
export const parseChallengesWithIssues = (header: ChallengeHeaderInput): ChallengeParseResult => {
  const input = normalizeInput(header);
  const scanner = createScanner(input);
  const challenges: Challenge[] = [];
  const issues: ChallengeParseIssue[] = [];
  let current: PendingChallenge | undefined;

  const skipFragment = (position: number, reason: string): void => {
    scanner.skipToNextComma();
    issues.push({ position, fragment: input.slice(position, scanner.position()).trim(), reason });
  };

  const closeCurrent = (): void => {
    if (current !== undefined) {
      challenges.push(toChallenge(current));
      current = undefined;
    }
  };

  for (;;) {
    scanner.skipSeparators();
    if (scanner.atEnd()) {
      break;
    }

    const start = scanner.position();
    const name = scanner.readToken();
    if (name === '') {
      skipFragment(start, 'Expected a scheme or parameter name');
      continue;
    }

    scanner.skipWhitespace();

    if (scanner.peek() !== '=') {
      closeCurrent();
      current = { scheme: name, parameters: new Map(), token68: undefined };
      if (!scanner.atEnd() && scanner.peek() !== ',') {
        current.token68 = scanner.readToken68();
      }
      continue;
    }

    if (current === undefined) {
      skipFragment(start, 'Parameter appears before any scheme');
      continue;
    }
    if (current.token68 !== undefined) {
      skipFragment(start, `Parameter follows the token68 credential of ${current.scheme}`);
      continue;
    }

    scanner.advance();
    scanner.skipWhitespace();

    let value: string | undefined;
    if (scanner.peek() === '"') {
      value = scanner.readQuoted();
      if (value === undefined) {
        issues.push({
          position: start,
          fragment: input.slice(start).trim(),
          reason: `Unterminated quoted value for "${name}"`,
        });
        break;
      }
    } else {
      value = scanner.readToken();
      if (value === '') {
        skipFragment(start, `Missing value for "${name}"`);
        continue;
      }
    }

    // A value followed by stray text is dropped whole rather than truncated.
    scanner.skipWhitespace();
    if (!scanner.atEnd() && scanner.peek() !== ',') {
      skipFragment(start, `Unexpected text after the value of "${name}"`);
      continue;
    }

    current.parameters.set(name.toLowerCase(), value);
  }

  closeCurrent();
  return { challenges, issues };
};

/**
 * Parses challenge headers, dropping malformed fragments.
 *
 * @example
 * ```typescript
 * parseChallenges('Negotiate, Basic realm="test"');
 * // [{ scheme: 'Negotiate', parameters: {} }, { scheme: 'Basic', parameters: { realm: 'test' } }]
 * ```
 */
export const parseChallenges = (header: ChallengeHeaderInput): readonly Challenge[] =>
  parseChallengesWithIssues(header).challenges;

/**
 * First challenge whose scheme matches, ignoring case.
 */
export const findChallenge = (
  challenges: readonly Challenge[],
  scheme: string
): Challenge | undefined => {
  const wanted = scheme.toLowerCase();
  return challenges.find((challenge) => challenge.scheme.toLowerCase() === wanted);
};

/**
 * Whether any challenge carries the scheme, ignoring case.
 */
export const hasScheme = (challenges: readonly Challenge[], scheme: string): boolean =>
  findChallenge(challenges, scheme) !== undefined;

/**
 * Distinct scheme names in order of first appearance, ignoring case.
 */
export const listSchemes = (challenges: readonly Challenge[]): readonly string[] => {
  const seen = new Set<string>();
  const schemes: string[] = [];
  for (const { scheme } of challenges) {
    const key = scheme.toLowerCase();
    if (!seen.has(key)) {
      seen.add(key);
      schemes.push(scheme);
    }
  }
  return schemes;
};
