import type { ProviderHealth, RateRuntime, StoredSyncRun } from '@ratesync/rates';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

export interface StatusResult {
  providers: ProviderHealth[];
  recentRuns: StoredSyncRun[];
}

export class StatusHandler {
  constructor(private readonly runtime: RateRuntime) {}

  async execute(params: { runs: number }): Promise<Result<StatusResult, Error>> {
    const providers = await this.runtime.queries.providers();
    if (providers.isErr()) {
      return err(providers.error);
    }

    const recentRuns = await this.runtime.store.listRuns(undefined, params.runs);
    if (recentRuns.isErr()) {
      return err(recentRuns.error);
    }

    return ok({ providers: providers.value, recentRuns: recentRuns.value });
  }
}
