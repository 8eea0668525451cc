#!/usr/bin/env node
import './env-setup.js';

import { getConfig, type AppConfig } from '@ratesync/env';
import { flushLoggers, getLogger } from '@ratesync/logger';
import { Command } from 'commander';

import { registerPeekCommand } from './features/peek/peek.js';
import { registerRatesCommand } from './features/rates/rates.js';
import { registerSeedCommand } from './features/seed/seed.js';
import { ExitCodes } from './features/shared/exit-codes.js';
import { OutputManager } from './features/shared/output.js';
import { registerStatusCommand } from './features/status/status.js';
import { registerSyncCommand } from './features/sync/sync.js';

const logger = getLogger('CLI');
const program = new Command();

/**
 * Config is validated when a command runs, so `--help` works without a valid environment.
 */
function loadConfig(): AppConfig {
  try {
    return getConfig();
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    return new OutputManager('text').error('config', cause, ExitCodes.CONFIG_ERROR);
  }
}

async function main(): Promise<void> {
  program.name('ratesync').description('Daily exchange rates from central banks').version('0.1.0');

  registerSeedCommand(program, loadConfig);
  registerSyncCommand(program, loadConfig);
  registerStatusCommand(program, loadConfig);
  registerRatesCommand(program, loadConfig);
  registerPeekCommand(program, loadConfig);

  await program.parseAsync();
  flushLoggers();
}

process.on('unhandledRejection', (reason) => {
  logger.error(`Unhandled Rejection: ${String(reason)}`);
  process.exit(1);
});

main().catch((error: unknown) => {
  logger.error(`CLI failed: ${String(error)}`);
  process.exit(1);
});
