export {
  SessionError,
  ConfigurationError,
  ConnectionError,
  AuthenticationMismatchError,
  ReauthenticationRequiredError,
  TimeoutError,
  HandshakeFailedError,
  AuthorizationFailedError,
  isSessionError,
  isSessionErrorCode,
} from './errors.js';
export type { SessionErrorCode, AnySessionError } from './errors.js';
