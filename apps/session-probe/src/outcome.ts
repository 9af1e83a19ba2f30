import { ConfigurationError, type HttpResponse, type SessionError } from 'auth-negotiation';

/**
 * Process exit codes.
 */
export const EXIT_CODES = {
  success: 0,
  httpFailure: 1,
  configuration: 2,
  session: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export const exitCodeForStatus = (status: number): ExitCode =>
  status >= 200 && status < 300 ? EXIT_CODES.success : EXIT_CODES.httpFailure;

export const exitCodeForError = (error: SessionError): ExitCode =>
  error instanceof ConfigurationError ? EXIT_CODES.configuration : EXIT_CODES.session;

/**
 * `200 OK`, or just the status when the server sent no reason phrase.
 */
export const formatStatusLine = (response: Pick<HttpResponse<string>, 'status' | 'statusText'>): string =>
  response.statusText === '' ? String(response.status) : `${String(response.status)} ${response.statusText}`;

/**
 * `[TIMEOUT] Probe request timed out after 31000ms`
 */
export const formatError = (error: SessionError): string => `[${error.code}] ${error.message}`;
