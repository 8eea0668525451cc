import { isRateSyncError, type RateSyncErrorCode } from '@ratesync/core';

/**
 * Semantic exit codes for the CLI.
 */
export const ExitCodes = {
  SUCCESS: 0,

  /** General error (catch-all) */
  GENERAL_ERROR: 1,

  /** Invalid command arguments or options */
  INVALID_ARGS: 2,

  /** Resource not found (date, provider) */
  NOT_FOUND: 4,

  /** Provider unreachable or returned unusable data */
  NETWORK_ERROR: 6,

  DATABASE_ERROR: 7,

  /** Stored data cannot answer the request (e.g. base currency missing) */
  VALIDATION_ERROR: 8,

  CONFIG_ERROR: 11,

  /** Another sync of the same provider is running */
  BUSY: 12,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

const EXIT_CODE_BY_ERROR: Record<RateSyncErrorCode, ExitCode> = {
  FETCH_ERROR: ExitCodes.NETWORK_ERROR,
  INVALID_REQUEST: ExitCodes.INVALID_ARGS,
  LOCK_CONTENTION: ExitCodes.BUSY,
  NORMALIZATION_ERROR: ExitCodes.VALIDATION_ERROR,
  NOT_FOUND: ExitCodes.NOT_FOUND,
  PARSE_ERROR: ExitCodes.NETWORK_ERROR,
  STORE_ERROR: ExitCodes.DATABASE_ERROR,
  UNKNOWN_PROVIDER: ExitCodes.NOT_FOUND,
};

export function exitCodeForError(error: unknown): ExitCode {
  return isRateSyncError(error) ? EXIT_CODE_BY_ERROR[error.code] : ExitCodes.GENERAL_ERROR;
}
