import { describe, expect, it } from 'vitest';

import {
  FetchError,
  isRateSyncError,
  LockContentionError,
  NormalizationError,
  NotFoundError,
  StoreError,
  UnknownProviderError,
} from '../errors.js';

describe('RateSyncError subclasses', () => {
  it('carry a stable code and the class name', () => {
    const error = new FetchError('connection reset', 'ecb');

    expect(error).toBeInstanceOf(Error);
    expect(error.code).toBe('FETCH_ERROR');
    expect(error.name).toBe('FetchError');
    expect(error.provider).toBe('ecb');
  });

  it('keep the original cause', () => {
    const cause = new Error('SQLITE_BUSY');
    const error = new StoreError('Failed to upsert rates', 'upsert', cause);

    expect(error.cause).toBe(cause);
    expect(error.operation).toBe('upsert');
  });

  it('build descriptive messages for lock and provider errors', () => {
    expect(new LockContentionError('nbu').message).toBe('Sync already in progress for provider nbu');
    expect(new UnknownProviderError('boc').message).toBe('Unknown provider: boc');
  });

  it('serialize to a compact JSON shape', () => {
    const error = new NormalizationError('Base CHF not available', '2025-11-27', 'CHF');
    expect(error.toJSON()).toEqual({
      code: 'NORMALIZATION_ERROR',
      message: 'Base CHF not available',
      name: 'NormalizationError',
    });
  });

  it('are recognized by isRateSyncError', () => {
    expect(isRateSyncError(new NotFoundError('No data', '2025-11-27'))).toBe(true);
    expect(isRateSyncError(new Error('plain'))).toBe(false);
  });
});
