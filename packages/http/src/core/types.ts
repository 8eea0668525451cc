// Data structures for the functional core of the HTTP client

import type { RateLimitConfig } from '../types.js';

/**
 * Token bucket state (immutable; functions in rate-limit.ts return new copies)
 */
export interface RateLimitState {
  burstLimit: number;
  lastRefill: number;
  requestTimestamps: number[];
  requestsPerMinute: number | undefined;
  requestsPerSecond: number;
  tokens: number;
}

export interface RateLimitHeaderInfo {
  delayMs?: number | undefined;
  source: string;
}

/**
 * Minimal view of a fetch response; satisfied by both undici and the global fetch.
 */
export interface HttpResponse {
  ok: boolean;
  status: number;
  headers: {
    get(name: string): string | null;
    forEach(callback: (value: string, key: string) => void): void;
  };
  json(): Promise<unknown>;
  text(): Promise<string>;
}

export interface HttpFetchInit {
  headers: Record<string, string>;
  method: 'GET';
  signal: AbortSignal;
}

/**
 * Side effects, injectable for tests
 */
export interface HttpEffects {
  delay: (ms: number) => Promise<void>;
  fetch: (url: string, init: HttpFetchInit) => Promise<HttpResponse>;
  log: (level: 'debug' | 'info' | 'warn' | 'error', message: string, metadata?: Record<string, unknown>) => void;
  now: () => number;
}

const assertPositiveFinite = (fieldName: string, value: number): void => {
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`Invalid rate limit configuration: ${fieldName} must be a positive finite number, got ${value}`);
  }
};

export const createInitialRateLimitState = (config: RateLimitConfig): RateLimitState => {
  assertPositiveFinite('requestsPerSecond', config.requestsPerSecond);
  if (config.burstLimit !== undefined) {
    assertPositiveFinite('burstLimit', config.burstLimit);
  }
  if (config.requestsPerMinute !== undefined) {
    assertPositiveFinite('requestsPerMinute', config.requestsPerMinute);
  }

  const burstLimit = config.burstLimit ?? 1;

  return {
    burstLimit,
    lastRefill: 0, // set on first refill
    requestTimestamps: [],
    requestsPerMinute: config.requestsPerMinute,
    requestsPerSecond: config.requestsPerSecond,
    tokens: burstLimit,
  };
};
