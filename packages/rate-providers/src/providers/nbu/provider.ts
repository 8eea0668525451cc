/**
 * National Bank of Ukraine (NBU) official rate source
 *
 * Covers regional currencies the ECB does not publish. NBU quotes against UAH;
 * history is served one currency per request.
 */

import { type CalendarDate, CalendarDateSchema, type Currency, CurrencySchema } from '@ratesync/core';
import type { HttpClient, RateLimitConfig } from '@ratesync/http';
import { err, ok, type Result } from 'neverthrow';

import { BaseRateSource } from '../../core/base-source.js';
import { loadCurrencyCatalog, providerCurrencies, type CurrencyCatalog } from '../../core/currency-catalog.js';
import type { DailySnapshot, RateSourceOptions, SourceError, SourceMetadata } from '../../core/types.js';
import { createSourceHttpClient, toSourceError } from '../../core/utils.js';

import { buildNbuSeriesPath, currenciesToFetch, groupSeriesByDate, transformCurrentRates } from './nbu-utils.js';
import { NbuCurrentResponseSchema, NbuSeriesResponseSchema, type NbuSeriesRate } from './schemas.js';

export const NBU_BASE_URL = 'https://bank.gov.ua';

const NBU_CURRENT_PATH = '/NBUStatService/v1/statdirectory/exchange?json';

const NBU_RATE_LIMIT: RateLimitConfig = {
  burstLimit: 1,
  requestsPerSecond: 10,
};

export function createNbuMetadata(catalog: CurrencyCatalog): Result<SourceMetadata, Error> {
  return providerCurrencies(catalog, 'nbu').map((currencies) => ({
    currencies,
    displayName: 'National Bank of Ukraine',
    historyStart: CalendarDateSchema.parse('1999-01-04'),
    id: 'nbu',
    nativeBase: CurrencySchema.parse('UAH'),
  }));
}

/**
 * Create a fully configured NBU source
 */
export function createNbuSource(options: RateSourceOptions = {}): Result<NbuRateSource, Error> {
  const metadata = loadCurrencyCatalog().andThen(createNbuMetadata);
  if (metadata.isErr()) {
    return err(metadata.error);
  }

  const httpClient = createSourceHttpClient({
    baseUrl: NBU_BASE_URL,
    effects: options.effects,
    providerName: 'nbu',
    rateLimit: NBU_RATE_LIMIT,
    timeoutMs: options.timeoutMs,
  });

  return ok(
    new NbuRateSource(httpClient, metadata.value, options.referenceCurrency ?? CurrencySchema.parse('USD'), options.clock)
  );
}

export class NbuRateSource extends BaseRateSource {
  readonly metadata: SourceMetadata;

  constructor(
    private readonly httpClient: HttpClient,
    metadata: SourceMetadata,
    private readonly referenceCurrency: Currency,
    clock?: () => Date
  ) {
    super('NbuRateSource', clock);
    this.metadata = metadata;
  }

  /**
   * One request per currency; any failed request aborts the whole window so a
   * run never stores a date with part of its currencies silently missing.
   */
  protected async fetchRangeInternal(
    start: CalendarDate,
    end: CalendarDate
  ): Promise<Result<DailySnapshot[], SourceError>> {
    const declared = this.metadata.currencies.map((currency) => currency.code);
    const entries: NbuSeriesRate[] = [];

    for (const code of currenciesToFetch(declared, this.metadata.nativeBase, this.referenceCurrency)) {
      this.logger.debug({ code, end, start }, 'Fetching NBU series');

      const response = await this.httpClient.get(buildNbuSeriesPath(code, start, end), {
        schema: NbuSeriesResponseSchema,
      });
      if (response.isErr()) {
        return err(toSourceError(response.error, this.metadata.id, `NBU series for ${code} failed`));
      }

      entries.push(...response.value);
    }

    const snapshots = groupSeriesByDate(entries, this.metadata.nativeBase, this.metadata.id);
    if (snapshots.isOk()) {
      this.logger.info({ days: snapshots.value.length, end, start }, 'Fetched NBU official rates');
    }
    return snapshots;
  }

  protected async fetchLatestInternal(): Promise<Result<DailySnapshot, SourceError>> {
    const response = await this.httpClient.get(NBU_CURRENT_PATH, { schema: NbuCurrentResponseSchema });
    if (response.isErr()) {
      return err(toSourceError(response.error, this.metadata.id, 'NBU current rates failed'));
    }

    const supported = new Set<string>([
      this.referenceCurrency,
      ...this.metadata.currencies.map((currency) => currency.code),
    ]);
    return transformCurrentRates(response.value, supported, this.metadata.nativeBase, this.metadata.id);
  }

  async close(): Promise<void> {
    await this.httpClient.close();
  }
}
