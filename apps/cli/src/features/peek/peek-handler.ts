import { UnknownProviderError } from '@ratesync/core';
import type { DailySnapshot } from '@ratesync/rate-providers';
import type { RateRuntime } from '@ratesync/rates';
import type { Result } from 'neverthrow';
import { err } from 'neverthrow';

/**
 * Fetches the most recent day a provider has published, straight from its feed.
 * Nothing is written to the store.
 */
export class PeekHandler {
  constructor(private readonly runtime: RateRuntime) {}

  async execute(params: { provider: string }): Promise<Result<DailySnapshot, Error>> {
    const id = params.provider.toLowerCase();
    const source = this.runtime.sources.find((candidate) => candidate.metadata.id === id);
    if (!source) {
      return err(new UnknownProviderError(id));
    }
    return source.fetchLatest();
  }
}
