/**
 * Shares one in-flight execution of an async operation between all callers that
 * arrive while it is running. Once it settles the next call starts a new one.
 */
export interface SingleFlight<T> {
  readonly run: (operation: () => Promise<T>) => Promise<T>;
  readonly isInFlight: () => boolean;
}

/**
 * Creates a single-flight gate.
 *
 * @example
 * ```typescript
 * const refreshGate = createSingleFlight<Result<TokenSet, SessionError>>();
 * const [a, b] = await Promise.all([
 *   refreshGate.run(() => refresh()),
 *   refreshGate.run(() => refresh()),
 * ]);
 * // refresh() ran once; a and b are the same result
 * ```
 */
export const createSingleFlight = <T>(): SingleFlight<T> => {
  let inFlight: Promise<T> | undefined;

  const run = (operation: () => Promise<T>): Promise<T> => {
    if (inFlight !== undefined) {
      return inFlight;
    }

    const current = operation().finally(() => {
      if (inFlight === current) {
        inFlight = undefined;
      }
    });
    inFlight = current;
    return current;
  };

  return {
    run,
    isInFlight: () => inFlight !== undefined,
  };
};
