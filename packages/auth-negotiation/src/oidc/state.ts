/**
 * The `state` parameter and validation of the authorization callback.
 *
 * @packageDocumentation
 */

import { randomBytes } from 'node:crypto';
import { err, ok, type Result } from 'neverthrow';
import { AuthorizationFailedError } from '../errors/errors.js';
import type { AuthorizationCallback } from './types.js';

/** 32 random bytes, base64url */
const STATE_BYTES = 32;

/**
 * Generates an unguessable state value.
 */
export const generateState = (): string => randomBytes(STATE_BYTES).toString('base64url');

/**
 * Checks a callback against the state sent on the authorization request and
 * extracts the code.
 *
 * @example
 * ```typescript
 * const code = validateAuthorizationCallback({ code: 'abc', state: sent }, sent);
 * // ok('abc')
 * ```
 */
export const validateAuthorizationCallback = (
  callback: AuthorizationCallback,
  expectedState: string
): Result<string, AuthorizationFailedError> => {
  if (callback.error !== undefined) {
    const description =
      callback.errorDescription !== undefined ? `: ${callback.errorDescription}` : '';
    return err(
      new AuthorizationFailedError(
        `The identity provider refused the authorization (${callback.error})${description}`,
        { oauthError: callback.error }
      )
    );
  }

  if (callback.state !== expectedState) {
    return err(
      new AuthorizationFailedError('The authorization response state does not match the request')
    );
  }

  if (callback.code === undefined || callback.code === '') {
    return err(new AuthorizationFailedError('The authorization response carries no code'));
  }

  return ok(callback.code);
};
