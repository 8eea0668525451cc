import type { RateRuntime } from '@ratesync/rates';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import { toSyncReport, type ProviderSyncReport } from '../shared/sync-report.js';

export interface SyncParams {
  /** Every enabled provider when absent */
  provider?: string | undefined;
}

export class SyncHandler {
  constructor(private readonly runtime: RateRuntime) {}

  /**
   * A single-provider failure is returned as Err; with all providers each
   * failure is reported and the others still run.
   */
  async execute(params: SyncParams): Promise<Result<ProviderSyncReport[], Error>> {
    const { orchestrator } = this.runtime;

    if (params.provider === undefined) {
      const results = await orchestrator.syncAll('manual');
      return ok(results.map(toSyncReport));
    }

    const provider = params.provider.toLowerCase();
    const result = await orchestrator.syncProvider(provider, 'manual');
    if (result.isErr()) {
      return err(result.error);
    }
    return ok([toSyncReport({ provider, result })]);
  }
}
