export { createSessionBuilder } from './builder.js';
export { createSession, resolveRequestUrl } from './session.js';
export type { Session, SessionOptions, SessionRequestInit } from './session.js';
export {
  applyConfiguration,
  createTransport,
  defaultUserAgent,
  resolveSessionConfiguration,
  PACKAGE_NAME,
  PACKAGE_VERSION,
} from './configuration.js';
export type { ResolvedSessionConfiguration, SessionConfiguration } from './configuration.js';
export {
  configuredSchemeName,
  resolveOidcSettings,
  selectScheme,
  SCHEME_PRECEDENCE,
} from './selection.js';
export type { NegotiatedScheme, SchemeSelection } from './selection.js';
export type {
  ConfiguredSessionBuilder,
  CredentialConfig,
  CredentialResult,
  OidcCredentialOptions,
  SessionBuilder,
  SessionBuilderOptions,
  SessionBuilderState,
} from './types.js';
