import {
  FetchError,
  InvalidRequestError,
  LockContentionError,
  NormalizationError,
  StoreError,
  UnknownProviderError,
} from '@ratesync/core';
import { describe, expect, it } from 'vitest';

import { ExitCodes, exitCodeForError } from '../exit-codes.js';

describe('exitCodeForError', () => {
  it('maps domain errors to semantic exit codes', () => {
    expect(exitCodeForError(new FetchError('down', 'ecb'))).toBe(ExitCodes.NETWORK_ERROR);
    expect(exitCodeForError(new InvalidRequestError('bad'))).toBe(ExitCodes.INVALID_ARGS);
    expect(exitCodeForError(new LockContentionError('ecb'))).toBe(ExitCodes.BUSY);
    expect(exitCodeForError(new NormalizationError('no base', '2024-01-01', 'JPY'))).toBe(ExitCodes.VALIDATION_ERROR);
    expect(exitCodeForError(new StoreError('disk full', 'upsert'))).toBe(ExitCodes.DATABASE_ERROR);
    expect(exitCodeForError(new UnknownProviderError('boc'))).toBe(ExitCodes.NOT_FOUND);
  });

  it('falls back to the general error code', () => {
    expect(exitCodeForError(new Error('anything'))).toBe(ExitCodes.GENERAL_ERROR);
    expect(exitCodeForError('a string')).toBe(ExitCodes.GENERAL_ERROR);
  });
});
