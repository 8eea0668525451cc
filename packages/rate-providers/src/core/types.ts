import type { CalendarDate, Currency, CurrencyInfo, FetchError, ParseError } from '@ratesync/core';
import type { HttpEffects } from '@ratesync/http';
import type { Result } from 'neverthrow';

/**
 * One day of rates as published by a provider, in the provider's native base.
 *
 * `rates[code]` is units of `code` per one unit of `base`. Snapshots are never
 * persisted as-is; the normalizer re-expresses them against the reference currency.
 */
export interface DailySnapshot {
  date: CalendarDate;
  base: Currency;
  rates: Record<string, number>;
  provider: string;
}

/**
 * Static description of a rate source
 */
export interface SourceMetadata {
  /** Registry id ('ecb', 'nbu'); also the `provider` column of stored rows */
  id: string;
  displayName: string;
  /** Currency the provider quotes against (EUR for ECB, UAH for NBU) */
  nativeBase: Currency;
  /** First date the provider has data for */
  historyStart: CalendarDate;
  /** Native base plus every currency the provider is declared to own */
  currencies: CurrencyInfo[];
}

export type SourceError = FetchError | ParseError;

/**
 * A provider of daily snapshots. Implemented by the live HTTP sources and by
 * the bundled historical-file readers, so the sync pipeline treats both alike.
 */
export interface RateSource {
  readonly metadata: SourceMetadata;

  /** Most recent published day */
  fetchLatest(): Promise<Result<DailySnapshot, SourceError>>;

  /**
   * Published days within [start, end], ascending. Days the provider did not
   * publish are simply absent.
   */
  fetchRange(start: CalendarDate, end: CalendarDate): Promise<Result<DailySnapshot[], SourceError>>;

  /** Everything from `historyStart` to today */
  fetchFullHistory(): Promise<Result<DailySnapshot[], SourceError>>;

  /** Release network resources */
  close?(): Promise<void>;
}

/**
 * Options shared by every source factory
 */
export interface RateSourceOptions {
  /** Per-request timeout */
  timeoutMs?: number | undefined;
  /** Injected HTTP side effects (tests) */
  effects?: Partial<HttpEffects> | undefined;
  /** Wall clock used to decide what "today" is */
  clock?: (() => Date) | undefined;
  /**
   * Currency rows are normalized against; sources that fetch per currency
   * request it first. Defaults to USD.
   */
  referenceCurrency?: Currency | undefined;
}
