export { HttpClient } from './client.js';
export type { HttpEffects, HttpFetchInit, HttpResponse } from './core/types.js';
export {
  HttpError,
  RateLimitError,
  ResponseValidationError,
  TimeoutError,
  type HttpClientConfig,
  type HttpRequestOptions,
  type RateLimitConfig,
} from './types.js';
