/**
 * One authentication scheme advertised by a server, with its parameters.
 *
 * Scheme names are compared case-insensitively. Parameter keys are stored lower-case;
 * when a key repeats, the last value wins.
 */
export interface Challenge {
  /** Scheme name as the server wrote it, e.g. "Negotiate" */
  readonly scheme: string;
  /** Parameters in the order they first appeared */
  readonly parameters: Readonly<Record<string, string>>;
  /** Opaque credential following the scheme, e.g. a Negotiate continuation token */
  readonly token68?: string | undefined;
}

/**
 * A fragment of the header the parser could not make sense of and skipped.
 */
export interface ChallengeParseIssue {
  /** Offset of the fragment in the (joined) header value */
  readonly position: number;
  readonly fragment: string;
  readonly reason: string;
}

/**
 * Parsed challenges plus whatever was dropped on the way.
 */
export interface ChallengeParseResult {
  readonly challenges: readonly Challenge[];
  readonly issues: readonly ChallengeParseIssue[];
}

/**
 * Raw value of one `WWW-Authenticate` header, or of several header instances.
 */
export type ChallengeHeaderInput = string | readonly string[] | undefined;
