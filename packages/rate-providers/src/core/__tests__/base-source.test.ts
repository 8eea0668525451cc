import { type CalendarDate, CalendarDateSchema, CurrencySchema, FetchError } from '@ratesync/core';
import { err, ok, type Result } from 'neverthrow';
import { describe, expect, it, vi } from 'vitest';

import { BaseRateSource } from '../base-source.js';
import type { DailySnapshot, SourceError, SourceMetadata } from '../types.js';

const day = (value: string) => CalendarDateSchema.parse(value);
const EUR = CurrencySchema.parse('EUR');

function snapshot(date: string, rates: Record<string, number>): DailySnapshot {
  return { base: EUR, date: day(date), provider: 'test', rates };
}

/**
 * Concrete test implementation of BaseRateSource
 */
class TestRateSource extends BaseRateSource {
  readonly metadata: SourceMetadata = {
    currencies: [{ code: EUR, name: 'Euro' }],
    displayName: 'Test Source',
    historyStart: day('2024-01-01'),
    id: 'test',
    nativeBase: EUR,
  };

  readonly rangeCalls = vi.fn<(start: CalendarDate, end: CalendarDate) => void>();

  constructor(
    private readonly snapshots: Result<DailySnapshot[], SourceError>,
    private readonly latest: Result<DailySnapshot, SourceError> = err(new FetchError('not configured', 'test'))
  ) {
    super('TestRateSource', () => new Date('2024-01-10T12:00:00Z'));
  }

  protected fetchRangeInternal(start: CalendarDate, end: CalendarDate): Promise<Result<DailySnapshot[], SourceError>> {
    this.rangeCalls(start, end);
    return Promise.resolve(this.snapshots);
  }

  protected fetchLatestInternal(): Promise<Result<DailySnapshot, SourceError>> {
    return Promise.resolve(this.latest);
  }
}

describe('BaseRateSource', () => {
  it('clamps the window to the history start and today', async () => {
    const source = new TestRateSource(ok([]));

    await source.fetchRange(day('2023-06-01'), day('2024-03-01'));

    expect(source.rangeCalls).toHaveBeenCalledWith('2024-01-01', '2024-01-10');
  });

  it('returns nothing without fetching for a window after today', async () => {
    const source = new TestRateSource(ok([]));

    const result = await source.fetchRange(day('2024-01-11'), day('2024-01-20'));

    expect(result._unsafeUnwrap()).toEqual([]);
    expect(source.rangeCalls).not.toHaveBeenCalled();
  });

  it('fetchFullHistory covers history start to today', async () => {
    const source = new TestRateSource(ok([]));

    await source.fetchFullHistory();

    expect(source.rangeCalls).toHaveBeenCalledWith('2024-01-01', '2024-01-10');
  });

  it('drops days outside the window, sorts, and merges duplicates', async () => {
    const source = new TestRateSource(
      ok([
        snapshot('2024-01-05', { USD: 1.1 }),
        snapshot('2024-01-11', { USD: 1.2 }),
        snapshot('2024-01-03', { USD: 1.05 }),
        snapshot('2024-01-05', { GBP: 0.86 }),
      ])
    );

    const result = await source.fetchRange(day('2024-01-02'), day('2024-01-31'));

    expect(result._unsafeUnwrap()).toEqual([snapshot('2024-01-03', { USD: 1.05 }), snapshot('2024-01-05', { GBP: 0.86, USD: 1.1 })]);
  });

  it('drops non-positive and non-finite rates', async () => {
    const source = new TestRateSource(ok([snapshot('2024-01-05', { GBP: 0, JPY: Number.NaN, USD: 1.1, XAU: -1 })]));

    const result = await source.fetchRange(day('2024-01-01'), day('2024-01-10'));

    expect(result._unsafeUnwrap()[0]?.rates).toEqual({ USD: 1.1 });
  });

  it('passes subclass errors through', async () => {
    const failure = new FetchError('boom', 'test');
    const source = new TestRateSource(err(failure));

    const result = await source.fetchRange(day('2024-01-01'), day('2024-01-10'));

    expect(result._unsafeUnwrapErr()).toBe(failure);
  });

  it('sanitizes the latest snapshot', async () => {
    const source = new TestRateSource(ok([]), ok(snapshot('2024-01-09', { GBP: -2, USD: 1.1 })));

    const result = await source.fetchLatest();

    expect(result._unsafeUnwrap()).toEqual(snapshot('2024-01-09', { USD: 1.1 }));
  });
});
