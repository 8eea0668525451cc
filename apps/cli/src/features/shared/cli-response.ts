import type { ExitCode } from './exit-codes.js';

/**
 * Envelope of every `--json` output.
 */
export interface CLIResponse<T = unknown> {
  success: boolean;
  command: string;
  /** ISO 8601 */
  timestamp: string;
  /** Present on success */
  data?: T;
  /** Present on failure */
  error?:
    | {
        /** Machine-readable error code */
        code: string;
        message: string;
        /** Only when NODE_ENV=development */
        stack?: string | undefined;
      }
    | undefined;
  metadata?: CLIResponseMetadata | undefined;
}

export interface CLIResponseMetadata {
  [key: string]: unknown;
  duration_ms?: number | undefined;
  version?: string | undefined;
}

export function createSuccessResponse<T>(command: string, data: T, metadata?: CLIResponseMetadata): CLIResponse<T> {
  const response: CLIResponse<T> = {
    success: true,
    command,
    timestamp: new Date().toISOString(),
    data,
  };

  if (metadata) {
    response.metadata = metadata;
  }

  return response;
}

export function createErrorResponse(command: string, error: Error, code: string): CLIResponse<never> {
  const errorObj: NonNullable<CLIResponse['error']> = {
    code,
    message: error.message,
  };

  if (process.env['NODE_ENV'] === 'development' && error.stack) {
    errorObj.stack = error.stack;
  }

  return {
    success: false,
    command,
    timestamp: new Date().toISOString(),
    error: errorObj,
  };
}

/**
 * Map exit code to error code string.
 */
export function exitCodeToErrorCode(exitCode: ExitCode): string {
  const codes: Record<number, string> = {
    1: 'GENERAL_ERROR',
    2: 'INVALID_ARGS',
    4: 'NOT_FOUND',
    6: 'NETWORK_ERROR',
    7: 'DATABASE_ERROR',
    8: 'VALIDATION_ERROR',
    11: 'CONFIG_ERROR',
    12: 'BUSY',
  };
  return codes[exitCode] ?? 'UNKNOWN_ERROR';
}
