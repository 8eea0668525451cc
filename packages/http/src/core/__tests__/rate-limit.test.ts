import { describe, expect, it } from 'vitest';

import { calculateWaitTime, consumeToken, pruneTimestamps, refillTokens, shouldAllowRequest } from '../rate-limit.js';
import { createInitialRateLimitState } from '../types.js';

describe('refillTokens', () => {
  it('initializes lastRefill on first call', () => {
    const state = createInitialRateLimitState({ requestsPerSecond: 1 });
    const result = refillTokens(state, 1000);

    expect(result.lastRefill).toBe(1000);
    expect(result.tokens).toBe(1);
  });

  it('refills proportionally and caps at the burst limit', () => {
    const state = {
      ...createInitialRateLimitState({ burstLimit: 5, requestsPerSecond: 2 }),
      lastRefill: 1000,
      tokens: 1,
    };

    expect(refillTokens(state, 2000).tokens).toBe(3);
    expect(refillTokens(state, 5000).tokens).toBe(5);
  });
});

describe('shouldAllowRequest / consumeToken', () => {
  it('allows until the bucket is empty', () => {
    let state = refillTokens(createInitialRateLimitState({ burstLimit: 2, requestsPerSecond: 1 }), 1000);

    expect(shouldAllowRequest(state, 1000)).toBe(true);
    state = consumeToken(state, 1000);
    expect(shouldAllowRequest(state, 1000)).toBe(true);
    state = consumeToken(state, 1000);
    expect(shouldAllowRequest(state, 1000)).toBe(false);
  });

  it('enforces the per-minute window', () => {
    const state = {
      ...createInitialRateLimitState({ burstLimit: 10, requestsPerMinute: 2, requestsPerSecond: 10 }),
      lastRefill: 30_000,
      requestTimestamps: [10_000, 20_000],
    };

    expect(shouldAllowRequest(state, 30_000)).toBe(false);
    expect(shouldAllowRequest(state, 70_001)).toBe(true);
  });
});

describe('calculateWaitTime', () => {
  it('returns the time until the next token', () => {
    const state = {
      ...createInitialRateLimitState({ requestsPerSecond: 4 }),
      lastRefill: 1000,
      tokens: 0,
    };
    expect(calculateWaitTime(state, 1000)).toBe(250);
  });

  it('waits for the oldest request to leave the minute window', () => {
    const state = {
      ...createInitialRateLimitState({ burstLimit: 10, requestsPerMinute: 1, requestsPerSecond: 10 }),
      lastRefill: 30_000,
      tokens: 10,
      requestTimestamps: [20_000],
    };
    expect(calculateWaitTime(state, 30_000)).toBe(50_010);
  });

  it('is zero when a request may go now', () => {
    const state = refillTokens(createInitialRateLimitState({ requestsPerSecond: 1 }), 1000);
    expect(calculateWaitTime(state, 1000)).toBe(0);
  });
});

describe('pruneTimestamps', () => {
  it('drops entries older than one minute', () => {
    expect(pruneTimestamps([1000, 50_000, 61_000], 62_000)).toEqual([50_000, 61_000]);
  });
});
