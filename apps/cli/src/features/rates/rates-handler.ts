import {
  parseDateSelection,
  parseRateQueryInput,
  type RateRuntime,
  type RatesResponse,
  type TimeSeriesResponse,
} from '@ratesync/rates';
import type { Result } from 'neverthrow';
import { err } from 'neverthrow';

export interface RatesParams {
  /** `latest` (default), a date, or `start..end` */
  date?: string | undefined;
  from?: string | undefined;
  to?: string | undefined;
  amount?: string | undefined;
}

export class RatesHandler {
  constructor(private readonly runtime: RateRuntime) {}

  async execute(params: RatesParams): Promise<Result<RatesResponse | TimeSeriesResponse, Error>> {
    const query = parseRateQueryInput({ amount: params.amount, from: params.from, to: params.to });
    if (query.isErr()) {
      return err(query.error);
    }

    const { queries } = this.runtime;
    if (params.date === undefined || params.date === 'latest') {
      return queries.latest(query.value);
    }

    const selection = parseDateSelection(params.date);
    if (selection.isErr()) {
      return err(selection.error);
    }
    if (selection.value.kind === 'range') {
      return queries.timeSeries(selection.value.start, selection.value.end, query.value);
    }
    return queries.atDate(selection.value.date, query.value);
  }
}
