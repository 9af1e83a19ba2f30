import { err, type Result } from 'neverthrow';
import { TimeoutError } from '../errors/errors.js';

/**
 * Runs `operation` with a deadline. When it expires the signal handed to the
 * operation is aborted and the result is a {@link TimeoutError}.
 *
 * @param operation - Work to run; should stop when `signal` aborts
 * @param timeoutMs - Deadline in milliseconds
 * @param operationName - Used in the error message, e.g. "Probe request"
 */
export const withTimeout = async <T, E>(
  operation: (signal: AbortSignal) => Promise<Result<T, E>>,
  timeoutMs: number,
  operationName: string
): Promise<Result<T, E | TimeoutError>> => {
  const controller = new AbortController();
  let timeoutId: ReturnType<typeof setTimeout> | undefined;

  const deadline = new Promise<Result<T, E | TimeoutError>>((resolve) => {
    timeoutId = setTimeout(() => {
      controller.abort();
      resolve(err(new TimeoutError(operationName, timeoutMs)));
    }, timeoutMs);
  });

  const work = operation(controller.signal).then((result) =>
    result.mapErr((error): E | TimeoutError => error)
  );

  try {
    return await Promise.race([work, deadline]);
  } finally {
    clearTimeout(timeoutId);
  }
};
