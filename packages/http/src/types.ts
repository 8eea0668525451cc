import type { ZodType, ZodTypeDef } from 'zod';

export interface RateLimitConfig {
  /** Tokens refilled per second */
  requestsPerSecond: number;
  /** Bucket size; defaults to 1 */
  burstLimit?: number | undefined;
  /** Optional sliding one-minute cap */
  requestsPerMinute?: number | undefined;
}

export interface HttpClientConfig {
  baseUrl: string;
  defaultHeaders?: Record<string, string> | undefined;
  providerName: string;
  rateLimit: RateLimitConfig;
  retries?: number | undefined;
  timeout?: number | undefined;
}

export interface HttpRequestOptions<T> {
  headers?: Record<string, string> | undefined;
  /** Every response body is validated; the parsed value is what callers get */
  schema: ZodType<T, ZodTypeDef, unknown>;
  timeout?: number | undefined;
}

export class HttpError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly responseBody: string
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

export class RateLimitError extends Error {
  constructor(
    message: string,
    public readonly retryAfter?: number
  ) {
    super(message);
    this.name = 'RateLimitError';
  }
}

export class TimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Request timeout after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

export class ResponseValidationError extends Error {
  constructor(
    message: string,
    public readonly providerName: string,
    public readonly endpoint: string,
    public readonly validationIssues: { message: string; path: string }[],
    public readonly truncatedPayload: string
  ) {
    super(message);
    this.name = 'ResponseValidationError';
  }
}
