/**
 * Pure functions for the NBU provider
 *
 * NBU quotes UAH per unit of foreign currency; snapshots carry the inverse
 * (units of foreign currency per one UAH) so every source shares one orientation.
 */

import {
  type CalendarDate,
  type Currency,
  ParseError,
  compareCalendarDates,
  formatCompactDate,
  parseCurrency,
  parseDottedDate,
} from '@ratesync/core';
import { err, ok, type Result } from 'neverthrow';

import type { DailySnapshot } from '../../core/types.js';

import type { NbuCurrentRate, NbuSeriesRate } from './schemas.js';

export function buildNbuSeriesPath(code: string, start: CalendarDate, end: CalendarDate): string {
  const params = new URLSearchParams({
    start: formatCompactDate(start),
    end: formatCompactDate(end),
    valcode: code.toLowerCase(),
    sort: 'exchangedate',
    order: 'asc',
  });
  return `/NBU_Exchange/exchange_site?${params.toString()}&json`;
}

/**
 * Codes to request one by one: the reference currency first (every date needs
 * it to normalize), then the declared list without the base and duplicates.
 */
export function currenciesToFetch(declared: Currency[], base: Currency, anchor: string): string[] {
  const codes: string[] = anchor === base ? [] : [anchor];
  for (const code of declared) {
    if (code !== base && !codes.includes(code)) {
      codes.push(code);
    }
  }
  return codes;
}

/**
 * Merge per-currency series into one UAH-based snapshot per date
 */
export function groupSeriesByDate(
  entries: NbuSeriesRate[],
  base: Currency,
  provider: string
): Result<DailySnapshot[], ParseError> {
  const ratesByDate = new Map<CalendarDate, Record<string, number>>();

  for (const entry of entries) {
    const date = parseDottedDate(entry.exchangedate);
    if (date.isErr()) {
      return err(new ParseError(`NBU entry has an invalid date: ${entry.exchangedate}`, provider));
    }

    const code = parseCurrency(entry.cc);
    if (code.isErr()) {
      return err(new ParseError(`NBU entry has an invalid currency code: ${entry.cc}`, provider));
    }

    if (entry.rate_per_unit <= 0) {
      continue;
    }

    const rates = ratesByDate.get(date.value) ?? {};
    rates[code.value] = 1 / entry.rate_per_unit;
    ratesByDate.set(date.value, rates);
  }

  return ok(
    [...ratesByDate.entries()]
      .map(([date, rates]) => ({ base, date, provider, rates }))
      .sort((a, b) => compareCalendarDates(a.date, b.date))
  );
}

/**
 * Current-rates payload to a snapshot, keeping only `supported` codes
 */
export function transformCurrentRates(
  entries: NbuCurrentRate[],
  supported: ReadonlySet<string>,
  base: Currency,
  provider: string
): Result<DailySnapshot, ParseError> {
  const first = entries[0];
  if (!first) {
    return err(new ParseError('No rates returned from NBU', provider));
  }

  const date = parseDottedDate(first.exchangedate);
  if (date.isErr()) {
    return err(new ParseError(`NBU entry has an invalid date: ${first.exchangedate}`, provider));
  }

  const rates: Record<string, number> = {};
  for (const entry of entries) {
    const code = entry.cc.toUpperCase();
    if (supported.has(code) && entry.rate > 0) {
      rates[code] = 1 / entry.rate;
    }
  }

  return ok({ base, date: date.value, provider, rates });
}
