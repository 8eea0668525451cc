import { CalendarDateSchema, CurrencySchema, FetchError, type CalendarDate, type Currency } from '@ratesync/core';
import type { DailySnapshot, RateSource } from '@ratesync/rate-providers';
import { err, ok } from 'neverthrow';
import { vi } from 'vitest';

import type { CanonicalRate } from '../types.js';

export const day = (value: string): CalendarDate => CalendarDateSchema.parse(value);
export const code = (value: string): Currency => CurrencySchema.parse(value);

export const USD = code('USD');
export const EUR = code('EUR');
export const UAH = code('UAH');

export function snapshot(
  date: string,
  base: string,
  rates: Record<string, number>,
  provider = 'ecb'
): DailySnapshot {
  return { base: code(base), date: day(date), provider, rates };
}

export function row(
  date: string,
  target: string,
  rate: number,
  overrides: Partial<Omit<CanonicalRate, 'date' | 'target' | 'rate'>> = {}
): CanonicalRate {
  return {
    base: USD,
    date: day(date),
    filled: false,
    provider: 'ecb',
    rate,
    target: code(target),
    ...overrides,
  };
}

export function fakeSource(
  id: string,
  nativeBase: string,
  overrides: Partial<Pick<RateSource, 'fetchFullHistory' | 'fetchLatest' | 'fetchRange'>> = {}
): RateSource {
  const base = code(nativeBase);
  return {
    fetchFullHistory: vi.fn<RateSource['fetchFullHistory']>().mockResolvedValue(ok([])),
    fetchLatest: vi.fn<RateSource['fetchLatest']>().mockResolvedValue(err(new FetchError('unused', id))),
    fetchRange: vi.fn<RateSource['fetchRange']>().mockResolvedValue(ok([])),
    metadata: {
      currencies: [
        { code: base, name: `${nativeBase} name` },
        { code: USD, name: 'US Dollar' },
      ],
      displayName: id.toUpperCase(),
      historyStart: day('1999-01-04'),
      id,
      nativeBase: base,
    },
    ...overrides,
  };
}

/** A promise whose settlement the test controls */
export function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}
