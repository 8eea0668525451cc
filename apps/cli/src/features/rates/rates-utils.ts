import type { RateMap, RatesResponse, TimeSeriesResponse } from '@ratesync/rates';

import { formatRate, formatTable } from '../shared/view-utils.js';

export function isTimeSeries(response: RatesResponse | TimeSeriesResponse): response is TimeSeriesResponse {
  return 'startDate' in response;
}

function formatRateMap(rates: RateMap): string[] {
  return formatTable(Object.entries(rates), [
    { format: ([code]) => code, header: 'CURRENCY' },
    { align: 'right', format: ([, rate]) => formatRate(rate), header: 'RATE' },
  ]);
}

/**
 * Title and table lines for a single date.
 */
export function formatRatesResponse(response: RatesResponse): { title: string; lines: string[] } {
  return {
    lines: formatRateMap(response.rates),
    title: `${response.amount} ${response.base} on ${response.date}`,
  };
}

/**
 * One row per date, one column per currency; blank where a date lacks a currency.
 */
export function formatTimeSeries(response: TimeSeriesResponse): { title: string; lines: string[] } {
  const dates = Object.keys(response.rates).sort();
  const codes = [...new Set(dates.flatMap((date) => Object.keys(response.rates[date] ?? {})))].sort();

  const lines = formatTable(dates, [
    { format: (date) => date, header: 'DATE' },
    ...codes.map((code) => ({
      align: 'right' as const,
      format: (date: string) => {
        const rate = response.rates[date]?.[code];
        return rate === undefined ? '' : formatRate(rate);
      },
      header: code,
    })),
  ]);

  return {
    lines,
    title: `${response.amount} ${response.base} from ${response.startDate} to ${response.endDate}`,
  };
}
