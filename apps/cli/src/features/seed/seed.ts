import type { AppConfig } from '@ratesync/env';
import type { Command } from 'commander';

import { CommandContext } from '../shared/command-runtime.js';
import { ExitCodes, exitCodeForError } from '../shared/exit-codes.js';
import { OutputManager } from '../shared/output.js';
import { SeedCommandOptionsSchema } from '../shared/schemas.js';
import { describeSyncReport } from '../shared/sync-report.js';

import { SeedHandler } from './seed-handler.js';

export function registerSeedCommand(program: Command, loadConfig: () => AppConfig): void {
  program
    .command('seed')
    .description('Load the bundled historical rate files into an empty store')
    .option('--json', 'Output results in JSON format')
    .action(async (rawOptions: unknown) => {
      await executeSeedCommand(rawOptions, loadConfig());
    });
}

async function executeSeedCommand(rawOptions: unknown, config: AppConfig): Promise<void> {
  const validation = SeedCommandOptionsSchema.safeParse(rawOptions);
  if (!validation.success) {
    new OutputManager('text').error(
      'seed',
      new Error(validation.error.issues[0]?.message ?? 'Invalid options'),
      ExitCodes.INVALID_ARGS
    );
    return;
  }

  const output = new OutputManager(validation.data.json ? 'json' : 'text');
  output.intro('ratesync seed');

  const spinner = output.spinner();
  spinner?.start('Loading history files');
  const result = await new CommandContext(config).run((runtime) => new SeedHandler(runtime).execute());
  spinner?.stop('Done');

  if (result.isErr()) {
    output.error('seed', result.error, exitCodeForError(result.error));
    return;
  }

  const seed = result.value;
  for (const provider of seed.missingBundles) {
    output.warn(`No history file for ${provider}`);
  }

  if (!seed.seeded) {
    output.log('The store already holds rates; nothing to seed.');
  }
  for (const report of seed.reports) {
    output.log(describeSyncReport(report));
  }

  output.json('seed', seed);

  const failed = seed.reports.some((report) => !report.ok);
  output.outro(failed ? 'Seeding finished with errors' : 'Seeding finished');
  if (failed) {
    process.exitCode = ExitCodes.GENERAL_ERROR;
  }
}
