import type { RateRuntime } from '@ratesync/rates';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import { toSyncReport, type ProviderSyncReport } from '../shared/sync-report.js';

export interface SeedResult {
  /** False when the store already held rates */
  seeded: boolean;
  /** Providers whose history file was not found */
  missingBundles: string[];
  reports: ProviderSyncReport[];
}

/**
 * Loads bundled history files into an empty store.
 */
export class SeedHandler {
  constructor(private readonly runtime: RateRuntime) {}

  async execute(): Promise<Result<SeedResult, Error>> {
    const empty = await this.runtime.store.isEmpty();
    if (empty.isErr()) {
      return err(empty.error);
    }

    const missingBundles = this.runtime.bundles
      .filter((bundle) => !bundle.isAvailable())
      .map((bundle) => bundle.metadata.id);

    const results = await this.runtime.orchestrator.bootstrap(this.runtime.bundles);
    if (results.isErr()) {
      return err(results.error);
    }

    return ok({
      missingBundles,
      reports: results.value.map(toSyncReport),
      seeded: empty.value,
    });
  }
}
