// Token bucket with an optional per-minute window.
// Pure: every function takes a state and returns a new one.

import type { RateLimitState } from './types.js';

const MINUTE_MS = 60_000;

export const refillTokens = (state: RateLimitState, currentTime: number): RateLimitState => {
  if (state.lastRefill === 0) {
    return { ...state, lastRefill: currentTime };
  }

  const secondsPassed = (currentTime - state.lastRefill) / 1000;
  if (secondsPassed <= 0) {
    return state;
  }

  return {
    ...state,
    lastRefill: currentTime,
    tokens: Math.min(state.burstLimit, state.tokens + secondsPassed * state.requestsPerSecond),
  };
};

export const pruneTimestamps = (timestamps: readonly number[], currentTime: number): number[] =>
  timestamps.filter((ts) => ts > currentTime - MINUTE_MS);

const minuteWindowFull = (state: RateLimitState, currentTime: number): boolean =>
  state.requestsPerMinute !== undefined &&
  pruneTimestamps(state.requestTimestamps, currentTime).length >= state.requestsPerMinute;

export const shouldAllowRequest = (state: RateLimitState, currentTime: number): boolean =>
  refillTokens(state, currentTime).tokens >= 1 && !minuteWindowFull(state, currentTime);

export const consumeToken = (state: RateLimitState, currentTime: number): RateLimitState => ({
  ...state,
  requestTimestamps: [...pruneTimestamps(state.requestTimestamps, currentTime), currentTime],
  tokens: state.tokens - 1,
});

/**
 * Milliseconds until the next request may go out (0 when it may go now)
 */
export const calculateWaitTime = (state: RateLimitState, currentTime: number): number => {
  const refilled = refillTokens(state, currentTime);
  let wait = 0;

  if (refilled.tokens < 1) {
    wait = Math.ceil(((1 - refilled.tokens) / state.requestsPerSecond) * 1000);
  }

  if (minuteWindowFull(state, currentTime)) {
    const oldest = pruneTimestamps(state.requestTimestamps, currentTime)[0];
    if (oldest !== undefined) {
      wait = Math.max(wait, oldest + MINUTE_MS - currentTime + 10);
    }
  }

  return wait;
};
