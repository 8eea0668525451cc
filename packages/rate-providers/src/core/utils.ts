import { FetchError, ParseError } from '@ratesync/core';
import { HttpClient, HttpError, ResponseValidationError, type HttpEffects, type RateLimitConfig } from '@ratesync/http';

export const DEFAULT_FETCH_TIMEOUT_MS = 30_000;

export interface SourceHttpClientConfig {
  baseUrl: string;
  effects?: Partial<HttpEffects> | undefined;
  providerName: string;
  rateLimit: RateLimitConfig;
  timeoutMs?: number | undefined;
}

/**
 * HTTP client with the defaults every provider uses
 */
export function createSourceHttpClient(config: SourceHttpClientConfig): HttpClient {
  return new HttpClient(
    {
      baseUrl: config.baseUrl,
      providerName: config.providerName,
      rateLimit: config.rateLimit,
      retries: 3,
      timeout: config.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS,
    },
    config.effects
  );
}

/**
 * Map an HTTP client failure onto the sync error taxonomy:
 * a payload with the wrong shape is a ParseError, everything else a FetchError.
 */
export function toSourceError(error: Error, provider: string, context: string): FetchError | ParseError {
  if (error instanceof ResponseValidationError) {
    return new ParseError(`${context}: ${error.message}`, provider, error.truncatedPayload);
  }
  return new FetchError(`${context}: ${error.message}`, provider, error);
}

export function isNotFoundResponse(error: Error): boolean {
  return error instanceof HttpError && error.statusCode === 404;
}
