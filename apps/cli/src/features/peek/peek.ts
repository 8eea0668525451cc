import type { AppConfig } from '@ratesync/env';
import type { Command } from 'commander';

import { CommandContext } from '../shared/command-runtime.js';
import { ExitCodes, exitCodeForError } from '../shared/exit-codes.js';
import { OutputManager } from '../shared/output.js';
import { PeekCommandOptionsSchema } from '../shared/schemas.js';

import { PeekHandler } from './peek-handler.js';
import { formatSnapshot } from './peek-utils.js';

export function registerPeekCommand(program: Command, loadConfig: () => AppConfig): void {
  program
    .command('peek')
    .description("Fetch a provider's latest published rates without storing them")
    .argument('<provider>', 'Provider id (ecb, nbu)')
    .option('--json', 'Output results in JSON format')
    .action(async (provider: string, rawOptions: unknown) => {
      await executePeekCommand(provider, rawOptions, loadConfig());
    });
}

async function executePeekCommand(provider: string, rawOptions: unknown, config: AppConfig): Promise<void> {
  const validation = PeekCommandOptionsSchema.safeParse(rawOptions);
  if (!validation.success) {
    new OutputManager('text').error(
      'peek',
      new Error(validation.error.issues[0]?.message ?? 'Invalid options'),
      ExitCodes.INVALID_ARGS
    );
    return;
  }

  const output = new OutputManager(validation.data.json ? 'json' : 'text');

  const result = await new CommandContext(config).run((runtime) => new PeekHandler(runtime).execute({ provider }));
  if (result.isErr()) {
    output.error('peek', result.error, exitCodeForError(result.error));
    return;
  }

  const view = formatSnapshot(result.value);
  output.note(view.lines.join('\n'), view.title);
  output.json('peek', result.value);
}
