import { Controller, Get, Inject, Param, Query } from '@nestjs/common';
import { parseDateSelection, parseRateQueryInput } from '@ratesync/rates';
import type { CurrencyDetails, ProviderHealth, RateQueryService, RatesResponse, TimeSeriesResponse } from '@ratesync/rates';
import type { Result } from 'neverthrow';

import { API_INFO, RATE_QUERY_SERVICE } from '../tokens.js';
import type { ApiInfo } from '../tokens.js';

export interface HealthResponse {
  status: 'ok';
  version: string;
  providers: ProviderHealth[];
}

/** Errors surface through GlobalExceptionFilter */
export function unwrapOrThrow<T, E extends Error>(result: Result<T, E>): T {
  if (result.isErr()) {
    throw result.error;
  }
  return result.value;
}

@Controller()
export class RatesController {
  constructor(
    @Inject(RATE_QUERY_SERVICE) private readonly queries: RateQueryService,
    @Inject(API_INFO) private readonly info: ApiInfo
  ) {}

  @Get()
  root() {
    return {
      description: 'Currency exchange rates API with multiple providers',
      endpoints: {
        '/currencies': 'List supported currencies',
        '/health': 'Provider health and sync status',
        '/latest': 'Get latest rates',
        '/sync': 'Trigger a sync of every provider (POST)',
        '/sync/{provider}': 'Trigger a sync of one provider (POST)',
        '/{date}': 'Get rates for a specific date (YYYY-MM-DD)',
        '/{start_date}..{end_date}': 'Get rates for a date range',
      },
      name: this.info.name,
      version: this.info.version,
    };
  }

  @Get('latest')
  async latest(@Query() params: unknown): Promise<RatesResponse> {
    const query = unwrapOrThrow(parseRateQueryInput(params));
    return unwrapOrThrow(await this.queries.latest(query));
  }

  @Get('currencies')
  async currencies(): Promise<Record<string, CurrencyDetails>> {
    return unwrapOrThrow(await this.queries.currencies());
  }

  @Get('health')
  async health(): Promise<HealthResponse> {
    const providers = unwrapOrThrow(await this.queries.providers());
    return { providers, status: 'ok', version: this.info.version };
  }

  // Registered last so the fixed paths above win
  @Get(':datePath')
  async historical(
    @Param('datePath') datePath: string,
    @Query() params: unknown
  ): Promise<RatesResponse | TimeSeriesResponse> {
    const query = unwrapOrThrow(parseRateQueryInput(params));
    const selection = unwrapOrThrow(parseDateSelection(datePath));

    if (selection.kind === 'range') {
      return unwrapOrThrow(await this.queries.timeSeries(selection.start, selection.end, query));
    }
    return unwrapOrThrow(await this.queries.atDate(selection.date, query));
  }
}
