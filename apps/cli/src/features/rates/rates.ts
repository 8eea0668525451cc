import type { AppConfig } from '@ratesync/env';
import type { Command } from 'commander';

import { CommandContext } from '../shared/command-runtime.js';
import { ExitCodes, exitCodeForError } from '../shared/exit-codes.js';
import { OutputManager } from '../shared/output.js';
import { RatesCommandOptionsSchema } from '../shared/schemas.js';

import { RatesHandler } from './rates-handler.js';
import { formatRatesResponse, formatTimeSeries, isTimeSeries } from './rates-utils.js';

export function registerRatesCommand(program: Command, loadConfig: () => AppConfig): void {
  program
    .command('rates')
    .description('Print stored rates for the latest date, a date or a date range')
    .argument('[date]', 'latest, YYYY-MM-DD, YYYYMMDD or START..END', 'latest')
    .option('--from <code>', 'Base currency')
    .option('--to <codes>', 'Comma separated target currencies')
    .option('--amount <number>', 'Amount of the base currency')
    .option('--json', 'Output results in JSON format')
    .action(async (date: string, rawOptions: unknown) => {
      await executeRatesCommand(date, rawOptions, loadConfig());
    });
}

async function executeRatesCommand(date: string, rawOptions: unknown, config: AppConfig): Promise<void> {
  const validation = RatesCommandOptionsSchema.safeParse(rawOptions);
  if (!validation.success) {
    new OutputManager('text').error(
      'rates',
      new Error(validation.error.issues[0]?.message ?? 'Invalid options'),
      ExitCodes.INVALID_ARGS
    );
    return;
  }

  const { amount, from, json, to } = validation.data;
  const output = new OutputManager(json ? 'json' : 'text');

  const result = await new CommandContext(config).run((runtime) =>
    new RatesHandler(runtime).execute({ amount, date, from, to })
  );
  if (result.isErr()) {
    output.error('rates', result.error, exitCodeForError(result.error));
    return;
  }

  const response = result.value;
  const view = isTimeSeries(response) ? formatTimeSeries(response) : formatRatesResponse(response);
  output.note(view.lines.join('\n'), view.title);
  output.json('rates', response);
}
