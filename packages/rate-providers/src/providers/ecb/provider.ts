/**
 * European Central Bank (ECB) reference rate source
 *
 * Daily euro foreign exchange reference rates from the ECB Data Portal.
 * API Documentation: https://data.ecb.europa.eu/help/api/overview
 */

import { type CalendarDate, CalendarDateSchema, CurrencySchema, FetchError, addDays } from '@ratesync/core';
import type { HttpClient, RateLimitConfig } from '@ratesync/http';
import { err, ok, type Result } from 'neverthrow';

import { BaseRateSource } from '../../core/base-source.js';
import { loadCurrencyCatalog, providerCurrencies, type CurrencyCatalog } from '../../core/currency-catalog.js';
import type { DailySnapshot, RateSourceOptions, SourceError, SourceMetadata } from '../../core/types.js';
import { createSourceHttpClient, isNotFoundResponse, toSourceError } from '../../core/utils.js';

import { buildEcbRangePath, splitIntoYearlyWindows, transformEcbResponse } from './ecb-utils.js';
import { EcbDataResponseSchema } from './schemas.js';

export const ECB_BASE_URL = 'https://data-api.ecb.europa.eu/service/data/EXR';

/**
 * ECB publishes no limits; one year of data per request keeps this modest
 */
const ECB_RATE_LIMIT: RateLimitConfig = {
  burstLimit: 5,
  requestsPerSecond: 2,
};

/** How far back fetchLatest looks for the last business day */
const LATEST_LOOKBACK_DAYS = 7;

export function createEcbMetadata(catalog: CurrencyCatalog): Result<SourceMetadata, Error> {
  return providerCurrencies(catalog, 'ecb').map((currencies) => ({
    currencies,
    displayName: 'European Central Bank',
    historyStart: CalendarDateSchema.parse('1999-01-04'),
    id: 'ecb',
    nativeBase: CurrencySchema.parse('EUR'),
  }));
}

/**
 * Create a fully configured ECB source
 */
export function createEcbSource(options: RateSourceOptions = {}): Result<EcbRateSource, Error> {
  const metadata = loadCurrencyCatalog().andThen(createEcbMetadata);
  if (metadata.isErr()) {
    return err(metadata.error);
  }

  const httpClient = createSourceHttpClient({
    baseUrl: ECB_BASE_URL,
    effects: options.effects,
    providerName: 'ecb',
    rateLimit: ECB_RATE_LIMIT,
    timeoutMs: options.timeoutMs,
  });

  return ok(new EcbRateSource(httpClient, metadata.value, options.clock));
}

export class EcbRateSource extends BaseRateSource {
  readonly metadata: SourceMetadata;

  constructor(
    private readonly httpClient: HttpClient,
    metadata: SourceMetadata,
    clock?: () => Date
  ) {
    super('EcbRateSource', clock);
    this.metadata = metadata;
  }

  protected async fetchRangeInternal(
    start: CalendarDate,
    end: CalendarDate
  ): Promise<Result<DailySnapshot[], SourceError>> {
    const snapshots: DailySnapshot[] = [];

    for (const window of splitIntoYearlyWindows(start, end)) {
      const result = await this.fetchWindow(window.start, window.end);
      if (result.isErr()) {
        return err(result.error);
      }
      snapshots.push(...result.value);
    }

    this.logger.info({ days: snapshots.length, end, start }, 'Fetched ECB reference rates');
    return ok(snapshots);
  }

  protected async fetchLatestInternal(): Promise<Result<DailySnapshot, SourceError>> {
    const today = this.today();
    const result = await this.fetchWindow(addDays(today, -LATEST_LOOKBACK_DAYS), today);
    if (result.isErr()) {
      return err(result.error);
    }

    const latest = result.value.at(-1);
    if (!latest) {
      return err(new FetchError(`No ECB rates published in the last ${LATEST_LOOKBACK_DAYS} days`, this.metadata.id));
    }
    return ok(latest);
  }

  async close(): Promise<void> {
    await this.httpClient.close();
  }

  private async fetchWindow(start: CalendarDate, end: CalendarDate): Promise<Result<DailySnapshot[], SourceError>> {
    this.logger.debug({ end, start }, 'Fetching ECB window');

    const response = await this.httpClient.get(buildEcbRangePath(start, end), { schema: EcbDataResponseSchema });
    if (response.isErr()) {
      // The data API answers 404 when a window holds no observations (holidays, weekends)
      if (isNotFoundResponse(response.error)) {
        return ok([]);
      }
      return err(toSourceError(response.error, this.metadata.id, `ECB request ${start}..${end} failed`));
    }

    return transformEcbResponse(response.value, this.metadata.nativeBase, this.metadata.id);
  }
}
