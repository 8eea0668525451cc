import { Controller, HttpCode, Inject, Param, Post } from '@nestjs/common';
import type { ProviderSyncResult, SyncOrchestrator, SyncOutcome } from '@ratesync/rates';

import { unwrapOrThrow } from '../rates/rates.controller.js';
import { SYNC_ORCHESTRATOR } from '../tokens.js';

export type ProviderSyncReport =
  | (SyncOutcome & { ok: true })
  | { ok: false; provider: string; error: string; code: string };

export interface SyncAllResponse {
  status: 'ok' | 'degraded';
  providers: ProviderSyncReport[];
}

function toReport({ provider, result }: ProviderSyncResult): ProviderSyncReport {
  return result.match(
    (outcome): ProviderSyncReport => ({ ...outcome, ok: true }),
    (error): ProviderSyncReport => ({ code: error.code, error: error.message, ok: false, provider })
  );
}

@Controller('sync')
export class SyncController {
  constructor(@Inject(SYNC_ORCHESTRATOR) private readonly orchestrator: SyncOrchestrator) {}

  /**
   * Providers run independently; one failing does not fail the request.
   */
  @Post()
  @HttpCode(200)
  async syncAll(): Promise<SyncAllResponse> {
    const providers = (await this.orchestrator.syncAll('manual')).map(toReport);
    return {
      providers,
      status: providers.every((report) => report.ok) ? 'ok' : 'degraded',
    };
  }

  @Post(':provider')
  @HttpCode(200)
  async syncProvider(@Param('provider') provider: string): Promise<SyncOutcome> {
    return unwrapOrThrow(await this.orchestrator.syncProvider(provider.toLowerCase(), 'manual'));
  }
}
