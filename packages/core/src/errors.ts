/**
 * Error taxonomy shared by the sync engine, the query engine and the outer layers.
 *
 * Every error carries a stable `code` so transports can map it without
 * `instanceof` checks across package boundaries.
 */

export type RateSyncErrorCode =
  | 'FETCH_ERROR'
  | 'PARSE_ERROR'
  | 'NORMALIZATION_ERROR'
  | 'NOT_FOUND'
  | 'LOCK_CONTENTION'
  | 'STORE_ERROR'
  | 'UNKNOWN_PROVIDER'
  | 'INVALID_REQUEST';

export abstract class RateSyncError extends Error {
  abstract readonly code: RateSyncErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
  }

  toJSON() {
    return {
      code: this.code,
      message: this.message,
      name: this.name,
    };
  }
}

/**
 * Network or remote failure while talking to a provider.
 */
export class FetchError extends RateSyncError {
  readonly code = 'FETCH_ERROR';

  constructor(
    message: string,
    public readonly provider: string,
    cause?: unknown
  ) {
    super(message, { cause });
  }
}

/**
 * Provider payload (live or bundled) did not have the expected shape.
 */
export class ParseError extends RateSyncError {
  readonly code = 'PARSE_ERROR';

  constructor(
    message: string,
    public readonly provider: string,
    public readonly details?: string
  ) {
    super(message);
  }
}

/**
 * A snapshot lacks the reference currency, or a stored date lacks the requested base.
 */
export class NormalizationError extends RateSyncError {
  readonly code = 'NORMALIZATION_ERROR';

  constructor(
    message: string,
    public readonly date: string,
    public readonly currency: string
  ) {
    super(message);
  }
}

export class NotFoundError extends RateSyncError {
  readonly code = 'NOT_FOUND';

  constructor(
    message: string,
    public readonly resource: string
  ) {
    super(message);
  }
}

export class LockContentionError extends RateSyncError {
  readonly code = 'LOCK_CONTENTION';

  constructor(public readonly provider: string) {
    super(`Sync already in progress for provider ${provider}`);
  }
}

export class StoreError extends RateSyncError {
  readonly code = 'STORE_ERROR';

  constructor(
    message: string,
    public readonly operation: string,
    cause?: unknown
  ) {
    super(message, { cause });
  }
}

export class UnknownProviderError extends RateSyncError {
  readonly code = 'UNKNOWN_PROVIDER';

  constructor(public readonly provider: string) {
    super(`Unknown provider: ${provider}`);
  }
}

/**
 * Caller supplied something malformed (dates, currency codes, amounts).
 */
export class InvalidRequestError extends RateSyncError {
  readonly code = 'INVALID_REQUEST';
}

export function isRateSyncError(error: unknown): error is RateSyncError {
  return error instanceof RateSyncError;
}
