import { ConnectionError, TimeoutError } from '../errors/errors.js';
import type { HttpError } from './types.js';

/**
 * Maps a transport failure onto the session error taxonomy.
 *
 * @param operation - Name used when the failure is a timeout
 */
export const toSessionError = (
  error: HttpError,
  operation: string
): ConnectionError | TimeoutError => {
  if (error.type === 'timeout' && error.timeoutMs !== undefined) {
    return new TimeoutError(operation, error.timeoutMs, { cause: error.cause });
  }
  return new ConnectionError(`${operation} failed: ${error.message}`, {
    url: error.url,
    cause: error.cause,
  });
};
