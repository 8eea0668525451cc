// Pure HTTP helpers

import type { RateLimitHeaderInfo } from './types.js';

export const buildUrl = (baseUrl: string, endpoint: string): string => {
  const cleanBaseUrl = baseUrl.endsWith('/') ? baseUrl.slice(0, -1) : baseUrl;
  if (!endpoint || endpoint === '/') {
    return cleanBaseUrl;
  }
  // Query-only endpoints attach directly ("?json")
  if (endpoint.startsWith('?')) {
    return `${cleanBaseUrl}${endpoint}`;
  }
  const cleanEndpoint = endpoint.startsWith('/') ? endpoint : `/${endpoint}`;
  return `${cleanBaseUrl}${cleanEndpoint}`;
};

/**
 * Redact credentials from URLs before they are logged
 */
export const sanitizeUrl = (url: string): string => {
  try {
    const urlObj = new URL(url);
    for (const param of ['token', 'key', 'apikey', 'api_key', 'secret', 'password']) {
      if (urlObj.searchParams.has(param)) {
        urlObj.searchParams.set(param, '***');
      }
    }
    return urlObj.toString();
  } catch {
    return url;
  }
};

/**
 * Retry-After as delay-seconds or HTTP-date, capped at 30s
 */
export const parseRetryAfter = (value: string, currentTime: number): number | undefined => {
  if (/^\d+$/.test(value.trim())) {
    const seconds = parseInt(value, 10);
    return seconds === 0 ? 1000 : Math.min(seconds * 1000, 30_000);
  }

  const date = new Date(value);
  if (!isNaN(date.getTime())) {
    const delayMs = date.getTime() - currentTime;
    if (delayMs > 0) {
      return Math.min(delayMs, 30_000);
    }
  }

  return undefined;
};

export const parseRateLimitHeaders = (headers: Record<string, string>, currentTime: number): RateLimitHeaderInfo => {
  const retryAfter = headers['retry-after'];
  if (retryAfter) {
    const delayMs = parseRetryAfter(retryAfter, currentTime);
    if (delayMs !== undefined) {
      return { delayMs, source: 'Retry-After' };
    }
  }
  return { source: 'default' };
};

export const calculateExponentialBackoff = (attempt: number, baseDelayMs: number, maxDelayMs: number): number =>
  Math.min(baseDelayMs * Math.pow(2, attempt - 1), maxDelayMs);
