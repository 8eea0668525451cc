import type { AppConfig } from '@ratesync/env';
import type { Command } from 'commander';

import { CommandContext } from '../shared/command-runtime.js';
import { ExitCodes, exitCodeForError } from '../shared/exit-codes.js';
import { OutputManager } from '../shared/output.js';
import { StatusCommandOptionsSchema } from '../shared/schemas.js';

import { StatusHandler } from './status-handler.js';
import { formatProviderTable, formatRunTable } from './status-utils.js';

export function registerStatusCommand(program: Command, loadConfig: () => AppConfig): void {
  program
    .command('status')
    .description('Show provider health and recent sync runs')
    .option('--runs <count>', 'Number of recent runs to show', '5')
    .option('--json', 'Output results in JSON format')
    .action(async (rawOptions: unknown) => {
      await executeStatusCommand(rawOptions, loadConfig());
    });
}

async function executeStatusCommand(rawOptions: unknown, config: AppConfig): Promise<void> {
  const validation = StatusCommandOptionsSchema.safeParse(rawOptions);
  if (!validation.success) {
    new OutputManager('text').error(
      'status',
      new Error(validation.error.issues[0]?.message ?? 'Invalid options'),
      ExitCodes.INVALID_ARGS
    );
    return;
  }

  const options = validation.data;
  const output = new OutputManager(options.json ? 'json' : 'text');

  const result = await new CommandContext(config).run((runtime) =>
    new StatusHandler(runtime).execute({ runs: options.runs })
  );
  if (result.isErr()) {
    output.error('status', result.error, exitCodeForError(result.error));
    return;
  }

  const status = result.value;
  output.note(formatProviderTable(status.providers).join('\n'), 'Providers');
  if (status.recentRuns.length > 0) {
    output.note(formatRunTable(status.recentRuns).join('\n'), 'Recent runs');
  } else {
    output.log('No sync runs recorded yet.');
  }

  output.json('status', status);
}
