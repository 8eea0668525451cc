import { getErrorMessage, wrapError } from '@ratesync/core';
import { getLogger } from '@ratesync/logger';
import { closeRateRuntime, createRateRuntime, type RateRuntime, type RateRuntimeOptions } from '@ratesync/rates';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

const logger = getLogger('command-runtime');

export type RuntimeFactory = (options: RateRuntimeOptions) => Promise<Result<RateRuntime, Error>>;

/**
 * Owns the rate runtime (database, sources) for one command invocation.
 *
 * - `runtime()`: lazy init; closed in dispose
 * - `run(fn)`: runtime, fn, dispose; thrown errors come back as Err
 * - `dispose()`: remove SIGINT handler, close runtime. Idempotent.
 *
 * Ctrl-C while a command runs closes the database before exiting with 130.
 */
export class CommandContext {
  private _runtime: RateRuntime | undefined;
  private _disposed = false;
  private sigintHandler: (() => void) | undefined;

  constructor(
    private readonly options: RateRuntimeOptions,
    private readonly factory: RuntimeFactory = createRateRuntime
  ) {}

  async runtime(): Promise<Result<RateRuntime, Error>> {
    if (this._disposed) {
      return err(new Error('Command context already disposed'));
    }
    if (!this._runtime) {
      const created = await this.factory(this.options);
      if (created.isErr()) {
        return err(created.error);
      }
      this._runtime = created.value;
      this.installSigintHandler();
    }
    return ok(this._runtime);
  }

  async run<T>(fn: (runtime: RateRuntime) => Promise<Result<T, Error>>): Promise<Result<T, Error>> {
    try {
      const runtime = await this.runtime();
      if (runtime.isErr()) {
        return err(runtime.error);
      }
      return await fn(runtime.value);
    } catch (error) {
      return wrapError(error, 'Command failed');
    } finally {
      const disposed = await this.dispose();
      if (disposed.isErr()) {
        logger.warn({ error: disposed.error }, 'Failed to close the rate store');
      }
    }
  }

  async dispose(): Promise<Result<void, Error>> {
    if (this._disposed) return ok(undefined);
    this._disposed = true;

    if (this.sigintHandler) {
      process.off('SIGINT', this.sigintHandler);
      this.sigintHandler = undefined;
    }

    const runtime = this._runtime;
    this._runtime = undefined;
    if (!runtime) return ok(undefined);

    try {
      return await closeRateRuntime(runtime);
    } catch (error) {
      return err(new Error(`Failed to close runtime: ${getErrorMessage(error)}`, { cause: error }));
    }
  }

  private installSigintHandler(): void {
    this.sigintHandler = () => {
      this.dispose()
        .then((result) => {
          if (result.isErr()) {
            logger.error({ error: result.error }, 'Error during abort dispose');
          }
        })
        .finally(() => {
          process.exit(130);
        });
    };
    process.once('SIGINT', this.sigintHandler);
  }
}
