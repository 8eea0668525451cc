import { Inject, Injectable, Optional, type OnApplicationBootstrap } from '@nestjs/common';
import { SchedulerRegistry } from '@nestjs/schedule';
import { LockContentionError, getErrorMessage } from '@ratesync/core';
import { getLogger } from '@ratesync/logger';
import type { ProviderSyncResult, SyncOrchestrator } from '@ratesync/rates';
import { CronJob } from 'cron';

import { SYNC_ORCHESTRATOR, SYNC_SCHEDULE } from '../tokens.js';
import type { SyncSchedule } from '../tokens.js';

export const SCHEDULED_SYNC_JOB = 'scheduled-rate-sync';

/**
 * Registers the periodic `syncAll('scheduled')` job when a schedule is configured.
 * The job is stopped by the schedule module when the application closes.
 */
@Injectable()
export class SyncSchedulerService implements OnApplicationBootstrap {
  private readonly logger = getLogger('SyncScheduler');

  constructor(
    @Inject(SYNC_ORCHESTRATOR) private readonly orchestrator: SyncOrchestrator,
    @Inject(SchedulerRegistry) private readonly registry: SchedulerRegistry,
    @Optional() @Inject(SYNC_SCHEDULE) private readonly schedule?: SyncSchedule
  ) {}

  onApplicationBootstrap(): void {
    if (!this.schedule) {
      this.logger.debug('No sync schedule configured');
      return;
    }

    const { cron } = this.schedule;
    let job: CronJob;
    try {
      job = CronJob.from({
        cronTime: cron,
        onTick: () => {
          void this.runScheduledSync();
        },
        start: false,
        timeZone: 'UTC',
      });
    } catch (error) {
      throw new Error(`Invalid sync schedule "${cron}": ${getErrorMessage(error)}`, { cause: error });
    }

    this.registry.addCronJob(SCHEDULED_SYNC_JOB, job);
    job.start();
    this.logger.info({ cron }, 'Scheduled sync registered');
  }

  /**
   * Sync every provider. A provider still busy from another trigger is skipped.
   */
  async runScheduledSync(): Promise<ProviderSyncResult[]> {
    try {
      const results = await this.orchestrator.syncAll('scheduled');
      for (const { provider, result } of results) {
        if (result.isOk()) continue;
        if (result.error instanceof LockContentionError) {
          this.logger.info({ provider }, 'Scheduled sync skipped, provider already running');
        } else {
          this.logger.error({ error: result.error, provider }, 'Scheduled sync failed');
        }
      }
      return results;
    } catch (error) {
      this.logger.error({ error }, `Scheduled sync crashed: ${getErrorMessage(error)}`);
      return [];
    }
  }
}
