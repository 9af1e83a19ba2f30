import { noopLog, type Log } from '../logging/logger.js';
import { beginAnonymousExchange } from './anonymous.js';
import { beginBasicExchange } from './basic.js';
import { beginMutualAuthExchange } from './mutual-auth.js';
import { beginOidcExchange } from './oidc.js';
import type { AuthStrategy, RequestExchange } from './types.js';

/**
 * Starts the authentication state of one logical request.
 *
 * @example
 * ```typescript
 * const exchange = beginExchange(session.strategy, log);
 * const prepared = await exchange.prepareRequest({ url, method: 'GET' });
 * ```
 */
export const beginExchange = (strategy: AuthStrategy, log: Log = noopLog): RequestExchange => {
  switch (strategy.kind) {
    case 'anonymous':
      return beginAnonymousExchange();
    case 'basic':
      return beginBasicExchange(strategy);
    case 'mutual':
      return beginMutualAuthExchange(strategy, log);
    case 'oidc':
      return beginOidcExchange(strategy, log);
    default: {
      const unsupported: never = strategy;
      return unsupported;
    }
  }
};

/**
 * Human-readable name of a strategy, for logs and CLI output.
 */
export const describeStrategy = (strategy: AuthStrategy): string => {
  switch (strategy.kind) {
    case 'anonymous':
      return 'Anonymous';
    case 'basic':
      return `Basic (${strategy.username})`;
    case 'mutual':
      return strategy.scheme;
    case 'oidc':
      return 'OIDC';
    default: {
      const unsupported: never = strategy;
      return unsupported;
    }
  }
};
