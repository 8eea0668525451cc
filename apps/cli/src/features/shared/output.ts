import * as p from '@clack/prompts';
import { getLogger } from '@ratesync/logger';
import pc from 'picocolors';

import { createErrorResponse, createSuccessResponse, exitCodeToErrorCode } from './cli-response.js';
import { ExitCodes, type ExitCode } from './exit-codes.js';

const logger = getLogger('OutputManager');

export type OutputFormat = 'json' | 'text';

const TIPS: Record<string, string> = {
  BUSY: 'Another sync of this provider is running. Try again once it finishes.',
  CONFIG_ERROR: 'Check the environment variables listed above.',
  INVALID_ARGS: 'Check your command arguments and try again.\nRun with --help for usage information.',
  NETWORK_ERROR: 'The provider could not be reached or returned unusable data. Try again later.',
  NOT_FOUND: 'Nothing is stored for that request. Run `ratesync sync` or `ratesync seed` first.',
};

/**
 * Formats and displays CLI output, either human-readable text or a JSON envelope.
 */
export class OutputManager {
  private readonly startTime: number = Date.now();

  constructor(private readonly format: OutputFormat = 'text') {}

  isJsonMode(): boolean {
    return this.format === 'json';
  }

  isTextMode(): boolean {
    return this.format === 'text';
  }

  /**
   * Output a success envelope (only in JSON mode).
   */
  json<T>(command: string, data: T, metadata?: Record<string, unknown>): void {
    if (this.format === 'json') {
      const response = createSuccessResponse(command, data, {
        duration_ms: Date.now() - this.startTime,
        ...metadata,
      });
      console.log(JSON.stringify(response, undefined, 2));
    }
  }

  /**
   * Output an error and exit.
   */
  error(command: string, error: Error, exitCode: ExitCode = ExitCodes.GENERAL_ERROR): never {
    const errorCode = exitCodeToErrorCode(exitCode);

    if (this.format === 'json') {
      // stdout, so callers can parse the response
      console.log(JSON.stringify(createErrorResponse(command, error, errorCode), undefined, 2));
    } else {
      p.log.error(`${pc.red('Error')}: ${error.message}`);
      const tip = TIPS[errorCode];
      if (tip) {
        p.note(tip, 'Tip');
      }
    }

    logger.debug({ command, error, exitCode }, 'Command failed');
    process.exit(exitCode);
  }

  /**
   * Spinner for long operations (only in text mode).
   */
  spinner(): ReturnType<typeof p.spinner> | undefined {
    return this.format === 'text' ? p.spinner() : undefined;
  }

  intro(message: string): void {
    if (this.format === 'text') {
      p.intro(pc.bgCyan(pc.black(` ${message} `)));
    }
  }

  outro(message: string): void {
    if (this.format === 'text') {
      p.outro(message);
    }
  }

  note(message: string, title?: string): void {
    if (this.format === 'text') {
      p.note(message, title);
    }
  }

  log(message: string): void {
    if (this.format === 'text') {
      p.log.message(message, { spacing: 0 });
    }
  }

  success(message: string): void {
    if (this.format === 'text') {
      p.log.success(message);
    }
  }

  warn(message: string): void {
    if (this.format === 'text') {
      p.log.warn(pc.yellow(message));
    } else {
      // keep stdout parseable
      logger.warn(message);
    }
  }
}
