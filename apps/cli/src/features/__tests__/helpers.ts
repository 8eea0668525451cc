import { CalendarDateSchema, CurrencySchema, FetchError } from '@ratesync/core';
import type { DailySnapshot, RateSource } from '@ratesync/rate-providers';
import type { CanonicalRate, RateRuntimeOptions } from '@ratesync/rates';
import { err, ok } from 'neverthrow';
import { vi } from 'vitest';

export const NOW = new Date('2024-01-17T16:00:00Z');
export const USD = CurrencySchema.parse('USD');

export function snapshot(date: string, base: string, rates: Record<string, number>, provider = 'ecb'): DailySnapshot {
  return { base: CurrencySchema.parse(base), date: CalendarDateSchema.parse(date), provider, rates };
}

export function usdRow(date: string, target: string, rate: number): CanonicalRate {
  return {
    base: USD,
    date: CalendarDateSchema.parse(date),
    filled: false,
    provider: 'ecb',
    rate,
    target: CurrencySchema.parse(target),
  };
}

export function fakeSource(
  id: string,
  nativeBase: string,
  overrides: Partial<Pick<RateSource, 'fetchFullHistory' | 'fetchLatest' | 'fetchRange'>> = {}
): RateSource {
  const base = CurrencySchema.parse(nativeBase);
  return {
    fetchFullHistory: vi.fn<RateSource['fetchFullHistory']>().mockResolvedValue(ok([])),
    fetchLatest: vi.fn<RateSource['fetchLatest']>().mockResolvedValue(err(new FetchError('unused', id))),
    fetchRange: vi.fn<RateSource['fetchRange']>().mockResolvedValue(ok([])),
    metadata: {
      currencies: [{ code: base, name: nativeBase }],
      displayName: id.toUpperCase(),
      historyStart: CalendarDateSchema.parse('1999-01-04'),
      id,
      nativeBase: base,
    },
    ...overrides,
  };
}

export function runtimeOptions(sources: RateSource[], seedPaths: Record<string, string> = {}): RateRuntimeOptions {
  return {
    clock: () => NOW,
    databasePath: ':memory:',
    defaultApiBase: USD,
    enabledProviders: sources.map((source) => source.metadata.id),
    fetchTimeoutMs: 1000,
    referenceCurrency: USD,
    seedPaths,
    sources,
  };
}
