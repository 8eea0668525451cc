/**
 * Rate store - durable, idempotent storage of canonical rates and sync audit
 */

import {
  CalendarDateSchema,
  NotFoundError,
  StoreError,
  getErrorMessage,
  type CalendarDate,
  type Currency,
  type CurrencyInfo,
} from '@ratesync/core';
import { getLogger } from '@ratesync/logger';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import { rowsToRateMap } from '../normalization/normalizer.js';
import {
  SyncStatusSchema,
  SyncTriggerSchema,
  type CanonicalRate,
  type DatedRates,
  type RateMap,
  type StoredSyncRun,
  type SyncRun,
} from '../types.js';

import type { RatesDB } from './database.js';
import { sortByPriority, sortProviderIds, type ProviderPriority } from './provider-priority.js';

/** Rows per INSERT; 8 bound parameters each keeps a chunk well under SQLite's variable limit */
const DEFAULT_CHUNK_SIZE = 500;

export interface RateStoreOptions {
  referenceCurrency: Currency;
  priority?: ProviderPriority | undefined;
  clock?: (() => Date) | undefined;
  chunkSize?: number | undefined;
}

export interface LatestDateQuery {
  provider?: string | undefined;
  /** Ignore carried-forward rows */
  publishedOnly?: boolean | undefined;
}

export interface CurrencySummary {
  code: string;
  name: string;
  providers: string[];
  minDate?: CalendarDate | undefined;
  maxDate?: CalendarDate | undefined;
}

export interface ProviderStats {
  provider: string;
  lastRun?: StoredSyncRun | undefined;
  currenciesCount: number;
  rowsCount: number;
  latestDate?: CalendarDate | undefined;
}

interface StoredRateRow {
  date: string;
  base_currency: string;
  target_currency: string;
  rate: number;
  provider: string;
}

function rowKey(row: CanonicalRate): string {
  return `${row.date}|${row.base}|${row.target}|${row.provider}`;
}

/** Targets one snapshot published for a (date, base, provider) */
interface Publication {
  date: CalendarDate;
  base: Currency;
  provider: string;
  targets: Currency[];
}

function publicationKey(row: CanonicalRate): string {
  return `${row.date}|${row.base}|${row.provider}`;
}

function collectPublications(rows: readonly CanonicalRate[]): Map<string, Publication> {
  const publications = new Map<string, Publication>();
  for (const row of rows) {
    if (row.filled) continue;
    const key = publicationKey(row);
    const publication = publications.get(key);
    if (publication) {
      publication.targets.push(row.target);
    } else {
      publications.set(key, { base: row.base, date: row.date, provider: row.provider, targets: [row.target] });
    }
  }
  return publications;
}

/** Publications first reached in this chunk; each is handed out once */
function takePublications(chunk: readonly CanonicalRate[], publications: Map<string, Publication>): Publication[] {
  const taken: Publication[] = [];
  for (const row of chunk) {
    const key = publicationKey(row);
    const publication = publications.get(key);
    if (publication) {
      taken.push(publication);
      publications.delete(key);
    }
  }
  return taken;
}

function toCalendarDate(value: string): CalendarDate {
  return CalendarDateSchema.parse(value);
}

function toStoreError(error: unknown, operation: string, context: string): StoreError {
  return new StoreError(`${context}: ${getErrorMessage(error)}`, operation, error);
}

export class RateStore {
  private readonly logger = getLogger('RateStore');
  private readonly reference: Currency;
  private readonly priority: ProviderPriority;
  private readonly clock: () => Date;
  private readonly chunkSize: number;

  constructor(
    private readonly db: RatesDB,
    options: RateStoreOptions
  ) {
    this.reference = options.referenceCurrency;
    this.priority = options.priority ?? { order: [], owners: new Map() };
    this.clock = options.clock ?? (() => new Date());
    this.chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
  }

  get referenceCurrency(): Currency {
    return this.reference;
  }

  /**
   * Insert or update rows by (date, base, target, provider).
   *
   * Rows are written in ascending date order, one transaction per chunk. A
   * carried-forward row never replaces a published one, and once a
   * (date, provider) pair is published its carried-forward rows for targets
   * missing from the publication are removed. Returns the number of keys
   * inserted or updated.
   */
  async upsert(rows: readonly CanonicalRate[]): Promise<Result<number, StoreError>> {
    const unique = new Map<string, CanonicalRate>();
    for (const row of rows) {
      unique.set(rowKey(row), row);
    }
    const ordered = [...unique.values()].sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
    const publications = collectPublications(ordered);

    const timestamp = this.clock().toISOString();
    let written = 0;
    let staleRemoved = 0;

    try {
      for (let offset = 0; offset < ordered.length; offset += this.chunkSize) {
        const chunk = ordered.slice(offset, offset + this.chunkSize);
        const pending = takePublications(chunk, publications);

        await this.db.transaction().execute(async (trx) => {
          for (const publication of pending) {
            const removed = await trx
              .deleteFrom('exchange_rates')
              .where('date', '=', publication.date)
              .where('base_currency', '=', publication.base)
              .where('provider', '=', publication.provider)
              .where('filled', '=', 1)
              .where('target_currency', 'not in', publication.targets)
              .executeTakeFirst();
            staleRemoved += Number(removed.numDeletedRows);
          }

          const result = await trx
            .insertInto('exchange_rates')
            .values(
              chunk.map((row) => ({
                base_currency: row.base,
                created_at: timestamp,
                date: row.date,
                filled: row.filled,
                provider: row.provider,
                rate: row.rate,
                target_currency: row.target,
                updated_at: timestamp,
              }))
            )
            .onConflict((oc) =>
              oc
                .columns(['date', 'base_currency', 'target_currency', 'provider'])
                .doUpdateSet((eb) => ({
                  filled: eb.ref('excluded.filled'),
                  rate: eb.ref('excluded.rate'),
                  updated_at: eb.ref('excluded.updated_at'),
                }))
                .where((eb) => eb.or([eb('excluded.filled', '=', 0), eb('exchange_rates.filled', '=', 1)]))
            )
            .executeTakeFirst();

          written += Number(result.numInsertedOrUpdatedRows ?? 0n);
        });
      }

      if (staleRemoved > 0) {
        this.logger.debug({ staleRemoved }, 'Removed carried-forward rows superseded by publications');
      }
      return ok(written);
    } catch (error) {
      this.logger.error({ error, written }, 'Rate upsert failed');
      return err(toStoreError(error, 'upsert', 'Failed to upsert rates'));
    }
  }

  /**
   * Rates for the most recent stored date, merged across providers.
   */
  async latest(): Promise<Result<DatedRates, NotFoundError | StoreError>> {
    try {
      const row = await this.db
        .selectFrom('exchange_rates')
        .select((eb) => eb.fn.max('date').as('latest_date'))
        .where('base_currency', '=', this.reference)
        .executeTakeFirst();

      if (!row?.latest_date) {
        return err(new NotFoundError('No rates have been stored yet', 'rates'));
      }

      const date = toCalendarDate(row.latest_date);
      const rates = await this.loadDate(date);
      return ok({ date, rates });
    } catch (error) {
      return err(toStoreError(error, 'latest', 'Failed to load latest rates'));
    }
  }

  async atDate(date: CalendarDate): Promise<Result<RateMap, NotFoundError | StoreError>> {
    try {
      const rates = await this.loadDate(date);
      if (Object.keys(rates).length === 0) {
        return err(new NotFoundError(`No rates stored for ${date}`, 'rates'));
      }
      return ok(rates);
    } catch (error) {
      return err(toStoreError(error, 'atDate', `Failed to load rates for ${date}`));
    }
  }

  /**
   * One entry per stored date within [start, end], ascending.
   */
  async range(start: CalendarDate, end: CalendarDate): Promise<Result<DatedRates[], StoreError>> {
    try {
      const rows = await this.db
        .selectFrom('exchange_rates')
        .select(['date', 'base_currency', 'target_currency', 'rate', 'provider'])
        .where('base_currency', '=', this.reference)
        .where('date', '>=', start)
        .where('date', '<=', end)
        .orderBy('date', 'asc')
        .execute();

      const byDate = new Map<string, StoredRateRow[]>();
      for (const row of rows) {
        const dayRows = byDate.get(row.date);
        if (dayRows) {
          dayRows.push(row);
        } else {
          byDate.set(row.date, [row]);
        }
      }

      return ok([...byDate.entries()].map(([date, dayRows]) => ({ date: toCalendarDate(date), rates: this.merge(dayRows) })));
    } catch (error) {
      return err(toStoreError(error, 'range', `Failed to load rates for ${start}..${end}`));
    }
  }

  /**
   * Append a sync run to the audit log. Failures are logged, never returned.
   */
  async recordRun(run: SyncRun): Promise<void> {
    try {
      await this.db
        .insertInto('sync_runs')
        .values({
          days_written: run.daysWritten,
          error: run.error,
          failed_dates: run.failedDates,
          finished_at: run.finishedAt.toISOString(),
          provider: run.provider,
          rows_written: run.rowsWritten,
          started_at: run.startedAt.toISOString(),
          status: run.status,
          trigger: run.trigger,
        })
        .execute();
    } catch (error) {
      this.logger.error({ error, provider: run.provider, status: run.status }, 'Failed to record sync run');
    }
  }

  async getLatestDate(query: LatestDateQuery = {}): Promise<Result<CalendarDate | undefined, StoreError>> {
    try {
      let select = this.db
        .selectFrom('exchange_rates')
        .select((eb) => eb.fn.max('date').as('latest_date'))
        .where('base_currency', '=', this.reference);

      if (query.provider !== undefined) {
        select = select.where('provider', '=', query.provider);
      }
      if (query.publishedOnly) {
        select = select.where('filled', '=', 0);
      }

      const row = await select.executeTakeFirst();
      return ok(row?.latest_date ? toCalendarDate(row.latest_date) : undefined);
    } catch (error) {
      return err(toStoreError(error, 'getLatestDate', 'Failed to read latest date'));
    }
  }

  async isEmpty(): Promise<Result<boolean, StoreError>> {
    try {
      const row = await this.db.selectFrom('exchange_rates').select('id').limit(1).executeTakeFirst();
      return ok(row === undefined);
    } catch (error) {
      return err(toStoreError(error, 'isEmpty', 'Failed to inspect rate table'));
    }
  }

  async upsertCurrencies(provider: string, currencies: readonly CurrencyInfo[]): Promise<Result<number, StoreError>> {
    if (currencies.length === 0) {
      return ok(0);
    }

    try {
      const result = await this.db
        .insertInto('currencies')
        .values(currencies.map((currency) => ({ code: currency.code, name: currency.name, provider })))
        .onConflict((oc) => oc.columns(['code', 'provider']).doUpdateSet((eb) => ({ name: eb.ref('excluded.name') })))
        .executeTakeFirst();

      return ok(Number(result.numInsertedOrUpdatedRows ?? 0n));
    } catch (error) {
      return err(toStoreError(error, 'upsertCurrencies', `Failed to store currencies for ${provider}`));
    }
  }

  /**
   * Every known currency with its display name, the providers that carry it
   * and the span of stored dates. Ordered by code.
   */
  async listCurrencies(): Promise<Result<CurrencySummary[], StoreError>> {
    try {
      const declared = await this.db
        .selectFrom('currencies')
        .select(['code', 'name', 'provider'])
        .orderBy('code')
        .orderBy('provider')
        .execute();

      const spans = await this.db
        .selectFrom('exchange_rates')
        .select((eb) => [
          'target_currency',
          'provider',
          eb.fn.min('date').as('min_date'),
          eb.fn.max('date').as('max_date'),
        ])
        .where('base_currency', '=', this.reference)
        .groupBy(['target_currency', 'provider'])
        .execute();

      const summaries = new Map<string, { name?: string; providers: Set<string>; minDate?: string; maxDate?: string }>();
      const entry = (code: string) => {
        let summary = summaries.get(code);
        if (!summary) {
          summary = { providers: new Set() };
          summaries.set(code, summary);
        }
        return summary;
      };

      for (const row of declared) {
        const summary = entry(row.code);
        summary.name ??= row.name;
        summary.providers.add(row.provider);
      }

      for (const span of spans) {
        const summary = entry(span.target_currency);
        summary.providers.add(span.provider);
        if (span.min_date && (summary.minDate === undefined || span.min_date < summary.minDate)) {
          summary.minDate = span.min_date;
        }
        if (span.max_date && (summary.maxDate === undefined || span.max_date > summary.maxDate)) {
          summary.maxDate = span.max_date;
        }
      }

      const codes = [...summaries.keys()].sort();
      return ok(
        codes.map((code) => {
          const summary = entry(code);
          return {
            code,
            maxDate: summary.maxDate === undefined ? undefined : toCalendarDate(summary.maxDate),
            minDate: summary.minDate === undefined ? undefined : toCalendarDate(summary.minDate),
            name: summary.name ?? code,
            providers: sortProviderIds(summary.providers, this.priority),
          };
        })
      );
    } catch (error) {
      return err(toStoreError(error, 'listCurrencies', 'Failed to list currencies'));
    }
  }

  async providerStats(provider: string): Promise<Result<ProviderStats, StoreError>> {
    const runs = await this.listRuns(provider, 1);
    if (runs.isErr()) {
      return err(runs.error);
    }

    try {
      const counts = await this.db
        .selectFrom('exchange_rates')
        .select((eb) => [
          eb.fn.count<number>('target_currency').distinct().as('currencies_count'),
          eb.fn.countAll<number>().as('rows_count'),
          eb.fn.max('date').as('latest_date'),
        ])
        .where('provider', '=', provider)
        .where('base_currency', '=', this.reference)
        .executeTakeFirst();

      return ok({
        currenciesCount: Number(counts?.currencies_count ?? 0),
        lastRun: runs.value[0],
        latestDate: counts?.latest_date ? toCalendarDate(counts.latest_date) : undefined,
        provider,
        rowsCount: Number(counts?.rows_count ?? 0),
      });
    } catch (error) {
      return err(toStoreError(error, 'providerStats', `Failed to read stats for ${provider}`));
    }
  }

  /**
   * Most recent runs first.
   */
  async listRuns(provider?: string, limit = 20): Promise<Result<StoredSyncRun[], StoreError>> {
    try {
      let select = this.db.selectFrom('sync_runs').selectAll();
      if (provider !== undefined) {
        select = select.where('provider', '=', provider);
      }

      const rows = await select.orderBy('started_at', 'desc').orderBy('id', 'desc').limit(limit).execute();

      return ok(
        rows.map((row) => ({
          daysWritten: row.days_written,
          error: row.error ?? undefined,
          failedDates: row.failed_dates,
          finishedAt: new Date(row.finished_at),
          id: row.id,
          provider: row.provider,
          rowsWritten: row.rows_written,
          startedAt: new Date(row.started_at),
          status: SyncStatusSchema.parse(row.status),
          trigger: SyncTriggerSchema.parse(row.trigger),
        }))
      );
    } catch (error) {
      return err(toStoreError(error, 'listRuns', 'Failed to list sync runs'));
    }
  }

  private async loadDate(date: CalendarDate): Promise<RateMap> {
    const rows = await this.db
      .selectFrom('exchange_rates')
      .select(['date', 'base_currency', 'target_currency', 'rate', 'provider'])
      .where('base_currency', '=', this.reference)
      .where('date', '=', date)
      .execute();

    return this.merge(rows);
  }

  private merge(rows: readonly StoredRateRow[]): RateMap {
    const ranked = sortByPriority(
      rows.map((row) => ({ base: row.base_currency, provider: row.provider, rate: row.rate, target: row.target_currency })),
      this.priority
    );
    return rowsToRateMap(ranked);
  }
}
