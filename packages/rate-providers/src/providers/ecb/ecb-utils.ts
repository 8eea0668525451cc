/**
 * Pure functions for the ECB provider
 */

import {
  type CalendarDate,
  type Currency,
  ParseError,
  addDays,
  compareCalendarDates,
  minCalendarDate,
  parseCalendarDate,
  parseCurrency,
} from '@ratesync/core';
import { err, ok, type Result } from 'neverthrow';

import type { DailySnapshot } from '../../core/types.js';

import type { EcbDataResponse } from './schemas.js';

export interface DateWindow {
  start: CalendarDate;
  end: CalendarDate;
}

/**
 * Path for all daily EUR reference rates in a window.
 * Key: D (daily) . all currencies . EUR . SP00 (spot) . A (average)
 */
export function buildEcbRangePath(start: CalendarDate, end: CalendarDate): string {
  const params = new URLSearchParams({
    startPeriod: start,
    endPeriod: end,
    format: 'jsondata',
    detail: 'dataonly',
  });
  return `/D..EUR.SP00.A?${params.toString()}`;
}

/**
 * Split [start, end] into calendar-year windows so a full-history fetch is a
 * series of moderately sized responses.
 */
export function splitIntoYearlyWindows(start: CalendarDate, end: CalendarDate): DateWindow[] {
  const windows: DateWindow[] = [];
  let cursor = start;

  while (compareCalendarDates(cursor, end) <= 0) {
    const yearEndResult = parseCalendarDate(`${cursor.slice(0, 4)}-12-31`);
    const yearEnd = yearEndResult.isOk() ? yearEndResult.value : end;
    const windowEnd = minCalendarDate(yearEnd, end);
    windows.push({ start: cursor, end: windowEnd });
    cursor = addDays(windowEnd, 1);
  }

  return windows;
}

/**
 * Turn an SDMX-JSON payload into one snapshot per published date.
 *
 * The CURRENCY dimension is located by id, not position; a series whose
 * currency code is not a valid code is skipped. Null observations (no
 * publication) are skipped.
 */
export function transformEcbResponse(
  response: EcbDataResponse,
  base: Currency,
  provider: string
): Result<DailySnapshot[], ParseError> {
  const { dimensions } = response.structure;

  const currencyPosition = dimensions.series.findIndex((dimension) => dimension.id === 'CURRENCY');
  const currencyDimension = dimensions.series[currencyPosition];
  if (!currencyDimension) {
    return err(new ParseError('ECB response has no CURRENCY series dimension', provider));
  }

  const timeDimension = dimensions.observation.find((dimension) => dimension.id === 'TIME_PERIOD') ?? dimensions.observation[0];
  if (!timeDimension) {
    return err(new ParseError('ECB response has no observation dimension', provider));
  }

  const ratesByDate = new Map<CalendarDate, Record<string, number>>();

  for (const dataSet of response.dataSets) {
    for (const [seriesKey, series] of Object.entries(dataSet.series)) {
      const currencyIndex = Number(seriesKey.split(':')[currencyPosition]);
      const currencyValue = currencyDimension.values[currencyIndex];
      if (!currencyValue) {
        return err(new ParseError(`ECB series key ${seriesKey} points outside the CURRENCY dimension`, provider));
      }

      const currency = parseCurrency(currencyValue.id);
      if (currency.isErr()) {
        continue;
      }

      for (const [observationKey, observation] of Object.entries(series.observations)) {
        const timeValue = timeDimension.values[Number(observationKey)];
        if (!timeValue) {
          return err(new ParseError(`ECB observation ${observationKey} points outside the time dimension`, provider));
        }

        const date = parseCalendarDate(timeValue.id);
        if (date.isErr()) {
          return err(new ParseError(`ECB observation has an invalid date: ${timeValue.id}`, provider));
        }

        const value = observation[0];
        if (typeof value !== 'number') {
          continue;
        }

        const rates = ratesByDate.get(date.value) ?? {};
        rates[currency.value] = value;
        ratesByDate.set(date.value, rates);
      }
    }
  }

  const snapshots = [...ratesByDate.entries()]
    .map(([date, rates]) => ({ base, date, provider, rates }))
    .sort((a, b) => compareCalendarDates(a.date, b.date));

  return ok(snapshots);
}
