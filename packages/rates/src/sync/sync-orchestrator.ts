/**
 * Sync orchestrator - drives Rate Source -> Normalizer -> Gap Filler -> Rate Store
 * for each provider, one run at a time per provider.
 */

import {
  UnknownProviderError,
  todayUtc,
  type CalendarDate,
  type Currency,
  type RateSyncError,
} from '@ratesync/core';
import { getLogger } from '@ratesync/logger';
import type { DailySnapshot, RateSource, SourceError } from '@ratesync/rate-providers';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import { densify } from '../normalization/gap-filler.js';
import { toCanonical } from '../normalization/normalizer.js';
import type { RateStore } from '../persistence/rate-store.js';
import type { CanonicalRate, SyncStatus, SyncTrigger } from '../types.js';

import { SyncLockRegistry } from './sync-lock-registry.js';

export interface SyncOutcome {
  provider: string;
  trigger: SyncTrigger;
  status: Exclude<SyncStatus, 'failed'>;
  /** `full` for a first sync, the fetched window otherwise; absent when already current */
  window?: { start: CalendarDate; end: CalendarDate } | 'full' | undefined;
  daysWritten: number;
  rowsWritten: number;
  failedDates: CalendarDate[];
  startedAt: Date;
  finishedAt: Date;
}

export interface ProviderSyncResult {
  provider: string;
  result: Result<SyncOutcome, RateSyncError>;
}

/**
 * A local history file presented as a rate source.
 */
export interface HistoryBundle extends RateSource {
  isAvailable(): boolean;
}

export interface SyncOrchestratorOptions {
  referenceCurrency: Currency;
  clock?: (() => Date) | undefined;
}

type SnapshotFetch = () => Promise<Result<DailySnapshot[], SourceError>>;

interface SyncPlan {
  source: RateSource;
  trigger: SyncTrigger;
  fetch: SnapshotFetch;
  window: SyncOutcome['window'];
  /** Last date gap filling may reach; resolved from the snapshots when not given */
  asOf?: CalendarDate | undefined;
}

export class SyncOrchestrator {
  private readonly logger = getLogger('SyncOrchestrator');
  private readonly locks = new SyncLockRegistry();
  private readonly sources = new Map<string, RateSource>();
  private readonly reference: Currency;
  private readonly clock: () => Date;

  constructor(
    private readonly store: RateStore,
    sources: readonly RateSource[],
    options: SyncOrchestratorOptions
  ) {
    for (const source of sources) {
      this.sources.set(source.metadata.id, source);
    }
    this.reference = options.referenceCurrency;
    this.clock = options.clock ?? (() => new Date());
  }

  providerIds(): string[] {
    return [...this.sources.keys()];
  }

  isRunning(provider: string): boolean {
    return this.locks.isHeld(provider);
  }

  /**
   * Bring one provider up to today. A provider without published rows gets
   * its full history; otherwise the window starts at its last published date.
   */
  async syncProvider(provider: string, trigger: SyncTrigger): Promise<Result<SyncOutcome, RateSyncError>> {
    const source = this.sources.get(provider);
    if (!source) {
      return err(new UnknownProviderError(provider));
    }

    const lock = this.locks.tryAcquire(provider);
    if (lock.isErr()) {
      this.logger.warn({ provider, trigger }, 'Sync skipped, provider already running');
      return err(lock.error);
    }

    try {
      const startedAt = this.clock();
      const today = todayUtc(startedAt);

      const lastPublished = await this.store.getLatestDate({ provider, publishedOnly: true });
      if (lastPublished.isErr()) {
        return await this.fail(source, trigger, startedAt, lastPublished.error);
      }

      const since = lastPublished.value;
      if (since === undefined) {
        return await this.runPipeline(
          { fetch: () => source.fetchFullHistory(), source, trigger, window: 'full', asOf: today },
          startedAt
        );
      }

      if (since >= today) {
        this.logger.info({ provider, since }, 'Provider already up to date');
        return ok(await this.complete(source, trigger, startedAt, { daysWritten: 0, failedDates: [], rowsWritten: 0 }));
      }

      return await this.runPipeline(
        {
          asOf: today,
          fetch: () => source.fetchRange(since, today),
          source,
          trigger,
          window: { end: today, start: since },
        },
        startedAt
      );
    } finally {
      lock.value.release();
    }
  }

  /**
   * Sync every enabled provider concurrently. Each provider's outcome is
   * reported separately; one failure never affects another.
   */
  async syncAll(trigger: SyncTrigger): Promise<ProviderSyncResult[]> {
    return Promise.all(
      this.providerIds().map(async (provider) => ({
        provider,
        result: await this.syncProvider(provider, trigger),
      }))
    );
  }

  /**
   * Seed an empty store from bundled history files. Each bundle runs under
   * its provider's lock and id; missing files are skipped.
   */
  async bootstrap(bundles: readonly HistoryBundle[]): Promise<Result<ProviderSyncResult[], RateSyncError>> {
    const empty = await this.store.isEmpty();
    if (empty.isErr()) {
      return err(empty.error);
    }
    if (!empty.value) {
      this.logger.info('Rate store already holds data, skipping bootstrap');
      return ok([]);
    }

    const available = bundles.filter((bundle) => {
      if (bundle.isAvailable()) return true;
      this.logger.warn({ provider: bundle.metadata.id }, 'History bundle not found, skipping');
      return false;
    });

    const results = await Promise.all(
      available.map(async (bundle) => ({
        provider: bundle.metadata.id,
        result: await this.bootstrapBundle(bundle),
      }))
    );
    return ok(results);
  }

  private async bootstrapBundle(bundle: HistoryBundle): Promise<Result<SyncOutcome, RateSyncError>> {
    const provider = bundle.metadata.id;
    const lock = this.locks.tryAcquire(provider);
    if (lock.isErr()) {
      return err(lock.error);
    }

    try {
      const startedAt = this.clock();
      this.logger.info({ provider }, 'Seeding from history bundle');
      return await this.runPipeline(
        { fetch: () => bundle.fetchFullHistory(), source: bundle, trigger: 'bootstrap', window: 'full' },
        startedAt
      );
    } finally {
      lock.value.release();
    }
  }

  private async runPipeline(plan: SyncPlan, startedAt: Date): Promise<Result<SyncOutcome, RateSyncError>> {
    const { source, trigger } = plan;
    const provider = source.metadata.id;

    const fetched = await plan.fetch();
    if (fetched.isErr()) {
      return this.fail(source, trigger, startedAt, fetched.error);
    }

    const snapshots = [...fetched.value].sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
    const rows: CanonicalRate[] = [];
    const failedDates: CalendarDate[] = [];

    for (const snapshot of snapshots) {
      const canonical = toCanonical(snapshot, this.reference);
      if (canonical.isErr()) {
        this.logger.warn({ date: snapshot.date, provider }, canonical.error.message);
        failedDates.push(snapshot.date);
        continue;
      }
      rows.push(...canonical.value);
    }

    const lastSnapshot = snapshots.at(-1);
    const asOf = plan.asOf ?? lastSnapshot?.date;
    const dense = asOf === undefined ? rows : densify(rows, asOf);

    const written = await this.store.upsert(dense);
    if (written.isErr()) {
      return this.fail(source, trigger, startedAt, written.error);
    }

    const currencies = await this.store.upsertCurrencies(provider, source.metadata.currencies);
    if (currencies.isErr()) {
      return this.fail(source, trigger, startedAt, currencies.error);
    }

    const outcome = await this.complete(
      source,
      trigger,
      startedAt,
      {
        daysWritten: new Set(dense.map((row) => row.date)).size,
        failedDates,
        rowsWritten: written.value,
      },
      plan.window
    );
    return ok(outcome);
  }

  private async complete(
    source: RateSource,
    trigger: SyncTrigger,
    startedAt: Date,
    counts: Pick<SyncOutcome, 'daysWritten' | 'failedDates' | 'rowsWritten'>,
    window?: SyncOutcome['window']
  ): Promise<SyncOutcome> {
    const finishedAt = this.clock();
    const outcome: SyncOutcome = {
      ...counts,
      finishedAt,
      provider: source.metadata.id,
      startedAt,
      status: counts.failedDates.length > 0 ? 'partial' : 'success',
      trigger,
      window,
    };

    await this.store.recordRun({
      daysWritten: outcome.daysWritten,
      error:
        counts.failedDates.length > 0
          ? `${counts.failedDates.length} date(s) could not be normalized: ${counts.failedDates.slice(0, 5).join(', ')}`
          : undefined,
      failedDates: counts.failedDates.length,
      finishedAt,
      provider: outcome.provider,
      rowsWritten: outcome.rowsWritten,
      startedAt,
      status: outcome.status,
      trigger,
    });

    this.logger.audit(
      {
        daysWritten: outcome.daysWritten,
        durationMs: finishedAt.getTime() - startedAt.getTime(),
        failedDates: counts.failedDates.length,
        provider: outcome.provider,
        rowsWritten: outcome.rowsWritten,
        status: outcome.status,
        trigger,
      },
      `Sync ${outcome.status} for ${outcome.provider}`
    );
    return outcome;
  }

  private async fail<E extends RateSyncError>(
    source: RateSource,
    trigger: SyncTrigger,
    startedAt: Date,
    error: E
  ): Promise<Result<never, E>> {
    const finishedAt = this.clock();
    const provider = source.metadata.id;

    await this.store.recordRun({
      daysWritten: 0,
      error: error.message,
      failedDates: 0,
      finishedAt,
      provider,
      rowsWritten: 0,
      startedAt,
      status: 'failed',
      trigger,
    });

    this.logger.audit(
      { durationMs: finishedAt.getTime() - startedAt.getTime(), error: error.message, provider, status: 'failed', trigger },
      `Sync failed for ${provider}`
    );
    return err(error);
  }
}
