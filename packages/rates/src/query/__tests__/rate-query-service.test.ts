import { InvalidRequestError, NormalizationError, NotFoundError } from '@ratesync/core';
import type { RateSource } from '@ratesync/rate-providers';
import { ok } from 'neverthrow';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { EUR, USD, code, day, fakeSource, row, snapshot } from '../../__tests__/fixtures.js';
import { closeRatesDatabase, openRatesDatabase, type RatesDB } from '../../persistence/database.js';
import { RateStore } from '../../persistence/rate-store.js';
import { SyncOrchestrator } from '../../sync/sync-orchestrator.js';
import { RateQueryService } from '../rate-query-service.js';

const providers = [
  { displayName: 'European Central Bank', id: 'ecb' },
  { displayName: 'National Bank of Ukraine', id: 'nbu' },
];

describe('RateQueryService', () => {
  let db: RatesDB;
  let store: RateStore;
  let service: RateQueryService;

  beforeEach(async () => {
    db = (await openRatesDatabase(':memory:'))._unsafeUnwrap();
    store = new RateStore(db, { clock: () => new Date('2024-01-17T16:00:00Z'), referenceCurrency: USD });
    service = new RateQueryService(store, providers, { defaultBase: USD });
  });

  afterEach(async () => {
    await closeRatesDatabase(db);
  });

  describe('with stored rates', () => {
    beforeEach(async () => {
      await store.upsert([
        row('2024-01-15', 'EUR', 0.8),
        row('2024-01-15', 'GBP', 0.5),
        row('2024-01-15', 'USD', 1),
        row('2024-01-16', 'EUR', 0.9),
        row('2024-01-16', 'GBP', 0.6),
        row('2024-01-16', 'USD', 1),
      ]);
    });

    it('latest uses the default base and the newest date', async () => {
      const result = await service.latest();

      expect(result._unsafeUnwrap()).toEqual({
        amount: 1,
        base: 'USD',
        date: '2024-01-16',
        rates: { EUR: 0.9, GBP: 0.6, USD: 1 },
      });
    });

    it('re-expresses rates in the requested base, filters symbols and scales by amount', async () => {
      const result = await service.atDate(day('2024-01-15'), { amount: 10, base: EUR, symbols: [code('GBP'), code('USD')] });

      const response = result._unsafeUnwrap();
      expect(response.base).toBe('EUR');
      expect(Object.keys(response.rates)).toEqual(['GBP', 'USD']);
      expect(response.rates.GBP).toBeCloseTo(6.25, 12);
      expect(response.rates.USD).toBeCloseTo(12.5, 12);
    });

    it('fails with NormalizationError when the base is not stored for the date', async () => {
      const result = await service.latest({ base: code('JPY') });

      expect(result._unsafeUnwrapErr()).toBeInstanceOf(NormalizationError);
    });

    it('rejects a non-positive amount', async () => {
      const result = await service.latest({ amount: 0 });

      expect(result._unsafeUnwrapErr()).toBeInstanceOf(InvalidRequestError);
      expect(result._unsafeUnwrapErr().message).toBe('Amount must be a positive number, got 0');
    });

    it('atDate returns NotFound for tomorrow', async () => {
      const result = await service.atDate(day('2024-01-18'));

      expect(result._unsafeUnwrapErr()).toBeInstanceOf(NotFoundError);
    });

    it('timeSeries converts each date on its own', async () => {
      const result = await service.timeSeries(day('2024-01-14'), day('2024-01-20'), { base: EUR, symbols: [code('GBP')] });

      const series = result._unsafeUnwrap();
      expect(series).toMatchObject({ amount: 1, base: 'EUR', endDate: '2024-01-20', startDate: '2024-01-14' });
      expect(Object.keys(series.rates)).toEqual(['2024-01-15', '2024-01-16']);
      expect(series.rates['2024-01-15']?.GBP).toBeCloseTo(0.625, 12);
      expect(series.rates['2024-01-16']?.GBP).toBeCloseTo(0.6 / 0.9, 12);
    });

    it('timeSeries rejects an inverted window', async () => {
      const result = await service.timeSeries(day('2024-01-16'), day('2024-01-15'));

      expect(result._unsafeUnwrapErr()).toBeInstanceOf(InvalidRequestError);
    });

    it('timeSeries returns NotFound for a window without data', async () => {
      const result = await service.timeSeries(day('2023-01-01'), day('2023-01-31'));

      expect(result._unsafeUnwrapErr().message).toBe('No rates stored between 2023-01-01 and 2023-01-31');
    });

    it('currencies lists names, providers and date spans', async () => {
      await store.upsertCurrencies('ecb', [{ code: EUR, name: 'Euro' }]);

      const currencies = (await service.currencies())._unsafeUnwrap();

      expect(Object.keys(currencies)).toEqual(['EUR', 'GBP', 'USD']);
      expect(currencies.EUR).toEqual({
        maxDate: '2024-01-16',
        minDate: '2024-01-15',
        name: 'Euro',
        providers: ['ecb'],
      });
    });
  });

  it('providers reports health for every enabled provider', async () => {
    await store.upsert([row('2024-01-16', 'EUR', 0.9), row('2024-01-16', 'USD', 1)]);
    await store.recordRun({
      daysWritten: 1,
      failedDates: 0,
      finishedAt: new Date('2024-01-17T16:00:03Z'),
      provider: 'ecb',
      rowsWritten: 2,
      startedAt: new Date('2024-01-17T16:00:00Z'),
      status: 'success',
      trigger: 'scheduled',
    });

    const health = (await service.providers())._unsafeUnwrap();

    expect(health).toEqual([
      {
        currenciesCount: 2,
        displayName: 'European Central Bank',
        enabled: true,
        lastStatus: 'success',
        lastSync: '2024-01-17T16:00:03.000Z',
        latestDate: '2024-01-16',
        name: 'ecb',
        rowsCount: 2,
      },
      {
        currenciesCount: 0,
        displayName: 'National Bank of Ukraine',
        enabled: true,
        lastStatus: null,
        lastSync: null,
        latestDate: null,
        name: 'nbu',
        rowsCount: 0,
      },
    ]);
  });

  it('reconstructs the native EUR quotes after an ECB sync', async () => {
    const ecb = fakeSource('ecb', 'EUR', {
      fetchFullHistory: vi
        .fn<RateSource['fetchFullHistory']>()
        .mockResolvedValue(ok([snapshot('2025-11-27', 'EUR', { GBP: 0.872, USD: 1.158 })])),
    });
    const orchestrator = new SyncOrchestrator(store, [ecb], {
      clock: () => new Date('2025-11-27T16:00:00Z'),
      referenceCurrency: USD,
    });

    await orchestrator.syncProvider('ecb', 'manual');

    const stored = (await store.atDate(day('2025-11-27')))._unsafeUnwrap();
    expect(stored.EUR).toBeCloseTo(0.8636, 4);
    expect(stored.GBP).toBeCloseTo(0.7530224525, 9);
    expect(stored.USD).toBe(1);

    const latest = (await service.latest({ base: EUR }))._unsafeUnwrap();
    expect(latest.date).toBe('2025-11-27');
    expect(latest.rates.GBP).toBeCloseTo(0.872, 12);
    expect(latest.rates.USD).toBeCloseTo(1.158, 12);
    expect(latest.rates.EUR).toBe(1);
  });
});
