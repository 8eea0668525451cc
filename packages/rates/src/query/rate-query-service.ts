/**
 * Read side: stored reference-based rates re-expressed in the requested base
 */

import {
  InvalidRequestError,
  NotFoundError,
  type CalendarDate,
  type Currency,
  type NormalizationError,
  type StoreError,
} from '@ratesync/core';
import type { SourceMetadata } from '@ratesync/rate-providers';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import { rebaseRates } from '../normalization/normalizer.js';
import type { RateStore } from '../persistence/rate-store.js';
import type { RateMap, SyncStatus } from '../types.js';

export type QueryError = InvalidRequestError | NotFoundError | NormalizationError | StoreError;

export interface RateQuery {
  base?: Currency | undefined;
  symbols?: readonly Currency[] | undefined;
  amount?: number | undefined;
}

export interface RatesResponse {
  amount: number;
  base: Currency;
  date: CalendarDate;
  rates: RateMap;
}

export interface TimeSeriesResponse {
  amount: number;
  base: Currency;
  startDate: CalendarDate;
  endDate: CalendarDate;
  rates: Record<string, RateMap>;
}

export interface CurrencyDetails {
  name: string;
  providers: string[];
  minDate?: CalendarDate | undefined;
  maxDate?: CalendarDate | undefined;
}

export interface ProviderHealth {
  name: string;
  displayName: string;
  enabled: boolean;
  lastSync: string | null;
  lastStatus: SyncStatus | null;
  currenciesCount: number;
  rowsCount: number;
  latestDate: CalendarDate | null;
}

export interface RateQueryServiceOptions {
  defaultBase: Currency;
}

interface ResolvedQuery {
  base: Currency;
  symbols: ReadonlySet<string> | undefined;
  amount: number;
}

export class RateQueryService {
  constructor(
    private readonly store: RateStore,
    private readonly sources: readonly Pick<SourceMetadata, 'displayName' | 'id'>[],
    private readonly options: RateQueryServiceOptions
  ) {}

  async latest(query: RateQuery = {}): Promise<Result<RatesResponse, QueryError>> {
    const resolved = this.resolve(query);
    if (resolved.isErr()) return err(resolved.error);

    const latest = await this.store.latest();
    if (latest.isErr()) return err(latest.error);

    return this.present(latest.value.date, latest.value.rates, resolved.value);
  }

  async atDate(date: CalendarDate, query: RateQuery = {}): Promise<Result<RatesResponse, QueryError>> {
    const resolved = this.resolve(query);
    if (resolved.isErr()) return err(resolved.error);

    const rates = await this.store.atDate(date);
    if (rates.isErr()) return err(rates.error);

    return this.present(date, rates.value, resolved.value);
  }

  /**
   * Every stored date in [start, end], each re-expressed independently.
   */
  async timeSeries(
    start: CalendarDate,
    end: CalendarDate,
    query: RateQuery = {}
  ): Promise<Result<TimeSeriesResponse, QueryError>> {
    if (start > end) {
      return err(new InvalidRequestError(`Start date ${start} is after end date ${end}`));
    }

    const resolved = this.resolve(query);
    if (resolved.isErr()) return err(resolved.error);

    const entries = await this.store.range(start, end);
    if (entries.isErr()) return err(entries.error);
    if (entries.value.length === 0) {
      return err(new NotFoundError(`No rates stored between ${start} and ${end}`, 'rates'));
    }

    const rates: Record<string, RateMap> = {};
    for (const entry of entries.value) {
      const converted = this.convert(entry.date, entry.rates, resolved.value);
      if (converted.isErr()) return err(converted.error);
      rates[entry.date] = converted.value;
    }

    return ok({
      amount: resolved.value.amount,
      base: resolved.value.base,
      endDate: end,
      rates,
      startDate: start,
    });
  }

  async currencies(): Promise<Result<Record<string, CurrencyDetails>, StoreError>> {
    const summaries = await this.store.listCurrencies();
    if (summaries.isErr()) return err(summaries.error);

    const details: Record<string, CurrencyDetails> = {};
    for (const summary of summaries.value) {
      details[summary.code] = {
        maxDate: summary.maxDate,
        minDate: summary.minDate,
        name: summary.name,
        providers: summary.providers,
      };
    }
    return ok(details);
  }

  /**
   * Health of every enabled provider, in registry order.
   */
  async providers(): Promise<Result<ProviderHealth[], StoreError>> {
    const health: ProviderHealth[] = [];
    for (const provider of this.sources) {
      const stats = await this.store.providerStats(provider.id);
      if (stats.isErr()) return err(stats.error);

      const { lastRun } = stats.value;
      health.push({
        currenciesCount: stats.value.currenciesCount,
        displayName: provider.displayName,
        enabled: true,
        lastStatus: lastRun?.status ?? null,
        lastSync: lastRun?.finishedAt.toISOString() ?? null,
        latestDate: stats.value.latestDate ?? null,
        name: provider.id,
        rowsCount: stats.value.rowsCount,
      });
    }
    return ok(health);
  }

  private resolve(query: RateQuery): Result<ResolvedQuery, InvalidRequestError> {
    const amount = query.amount ?? 1;
    if (!Number.isFinite(amount) || amount <= 0) {
      return err(new InvalidRequestError(`Amount must be a positive number, got ${amount}`));
    }

    return ok({
      amount,
      base: query.base ?? this.options.defaultBase,
      symbols: query.symbols && query.symbols.length > 0 ? new Set(query.symbols) : undefined,
    });
  }

  private present(
    date: CalendarDate,
    stored: RateMap,
    query: ResolvedQuery
  ): Result<RatesResponse, NormalizationError> {
    return this.convert(date, stored, query).map((rates) => ({
      amount: query.amount,
      base: query.base,
      date,
      rates,
    }));
  }

  private convert(date: CalendarDate, stored: RateMap, query: ResolvedQuery): Result<RateMap, NormalizationError> {
    return rebaseRates(stored, query.base, date).map((rebased) => {
      const rates: RateMap = {};
      for (const code of Object.keys(rebased).sort()) {
        if (query.symbols && !query.symbols.has(code)) continue;
        const value = rebased[code];
        if (value !== undefined) {
          rates[code] = value * query.amount;
        }
      }
      return rates;
    });
  }
}
