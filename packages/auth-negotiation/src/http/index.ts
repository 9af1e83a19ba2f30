export {
  createFetchClient,
  createDispatcher,
  parseJsonBody,
  DEFAULT_TIMEOUT_MS,
} from './fetch-client.js';
export { toSessionError } from './errors.js';
export type {
  FetchLike,
  HttpClient,
  HttpClientOptions,
  HttpError,
  HttpMethod,
  HttpRequest,
  HttpResponse,
  TlsOptions,
} from './types.js';
export { mergeHeaders, setHeader } from './headers.js';
