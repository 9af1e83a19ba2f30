import { ok } from 'neverthrow';
import type { AnonymousStrategy, RequestExchange } from './types.js';

export const createAnonymousStrategy = (): AnonymousStrategy => ({ kind: 'anonymous' });

/**
 * Sends requests as they are and never retries.
 */
export const beginAnonymousExchange = (): RequestExchange => ({
  prepareRequest: (request) => Promise.resolve(ok(request)),
  handleResponse: () => Promise.resolve(ok({ retry: false })),
});
