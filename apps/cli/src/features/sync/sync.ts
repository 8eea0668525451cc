import type { AppConfig } from '@ratesync/env';
import type { Command } from 'commander';

import { CommandContext } from '../shared/command-runtime.js';
import { ExitCodes, exitCodeForError } from '../shared/exit-codes.js';
import { OutputManager } from '../shared/output.js';
import { SyncCommandOptionsSchema } from '../shared/schemas.js';
import { describeSyncReport } from '../shared/sync-report.js';

import { SyncHandler } from './sync-handler.js';

export function registerSyncCommand(program: Command, loadConfig: () => AppConfig): void {
  program
    .command('sync')
    .description('Fetch new rates from one provider or from every enabled provider')
    .argument('[provider]', 'Provider id (ecb, nbu)')
    .option('--json', 'Output results in JSON format')
    .action(async (provider: string | undefined, rawOptions: unknown) => {
      await executeSyncCommand(provider, rawOptions, loadConfig());
    });
}

async function executeSyncCommand(provider: string | undefined, rawOptions: unknown, config: AppConfig): Promise<void> {
  const validation = SyncCommandOptionsSchema.safeParse(rawOptions);
  if (!validation.success) {
    new OutputManager('text').error(
      'sync',
      new Error(validation.error.issues[0]?.message ?? 'Invalid options'),
      ExitCodes.INVALID_ARGS
    );
    return;
  }

  const output = new OutputManager(validation.data.json ? 'json' : 'text');
  output.intro(provider ? `ratesync sync ${provider}` : 'ratesync sync');

  const spinner = output.spinner();
  spinner?.start(provider ? `Syncing ${provider}` : 'Syncing all providers');
  const result = await new CommandContext(config).run((runtime) => new SyncHandler(runtime).execute({ provider }));
  spinner?.stop('Done');

  if (result.isErr()) {
    output.error('sync', result.error, exitCodeForError(result.error));
    return;
  }

  const reports = result.value;
  for (const report of reports) {
    if (report.ok) {
      output.success(describeSyncReport(report));
    } else {
      output.warn(describeSyncReport(report));
    }
  }

  output.json('sync', { providers: reports });

  const failed = reports.filter((report) => !report.ok).length;
  output.outro(failed === 0 ? 'Sync finished' : `Sync finished, ${failed} provider(s) failed`);
  if (failed > 0) {
    process.exitCode = ExitCodes.GENERAL_ERROR;
  }
}
