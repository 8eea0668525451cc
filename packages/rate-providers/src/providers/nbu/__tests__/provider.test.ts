import { CalendarDateSchema, CurrencySchema, FetchError } from '@ratesync/core';
import type { HttpFetchInit, HttpResponse } from '@ratesync/http';
import { afterEach, describe, expect, it, vi } from 'vitest';

import { createFakeEffects, jsonResponse } from '../../../__tests__/test-helpers.js';
import { createNbuSource, type NbuRateSource } from '../provider.js';

const day = (value: string) => CalendarDateSchema.parse(value);
const clock = () => new Date('2024-01-17T15:00:00Z');

function valcodeOf(url: string): string | null {
  return new URL(url).searchParams.get('valcode');
}

describe('NbuRateSource', () => {
  let source: NbuRateSource | undefined;

  afterEach(async () => {
    await source?.close();
    source = undefined;
  });

  function createSource(fetch: (url: string, init: HttpFetchInit) => Promise<HttpResponse>, reference = 'USD') {
    source = createNbuSource({
      clock,
      effects: createFakeEffects(fetch),
      referenceCurrency: CurrencySchema.parse(reference),
    })._unsafeUnwrap();
    return source;
  }

  it('describes itself as the UAH based NBU provider', () => {
    const nbu = createSource(vi.fn());

    expect(nbu.metadata.id).toBe('nbu');
    expect(nbu.metadata.nativeBase).toBe('UAH');
    expect(nbu.metadata.currencies.map((currency) => currency.code)).toEqual([
      'UAH',
      'USD',
      'KZT',
      'LBP',
      'MDL',
      'SAR',
      'VND',
      'EGP',
      'GEL',
    ]);
  });

  it('requests each declared currency, reference first, and merges them by date', async () => {
    const fetch = vi.fn((url: string) => {
      const code = valcodeOf(url)?.toUpperCase() ?? '';
      const rate = code === 'USD' ? 40 : 2;
      return Promise.resolve(
        jsonResponse([
          { cc: code, exchangedate: '15.01.2024', rate_per_unit: rate },
          { cc: code, exchangedate: '16.01.2024', rate_per_unit: rate },
        ])
      );
    });
    const nbu = createSource(fetch);

    const result = await nbu.fetchRange(day('2024-01-15'), day('2024-01-16'));

    expect(fetch.mock.calls.map(([url]) => valcodeOf(url))).toEqual([
      'usd',
      'kzt',
      'lbp',
      'mdl',
      'sar',
      'vnd',
      'egp',
      'gel',
    ]);
    expect(fetch.mock.calls[0]?.[0]).toBe(
      'https://bank.gov.ua/NBU_Exchange/exchange_site?start=20240115&end=20240116&valcode=usd&sort=exchangedate&order=asc&json'
    );

    const snapshots = result._unsafeUnwrap();
    expect(snapshots).toHaveLength(2);
    expect(snapshots[0]?.base).toBe('UAH');
    expect(snapshots[0]?.rates.USD).toBe(0.025);
    expect(snapshots[0]?.rates.GEL).toBe(0.5);
    expect(Object.keys(snapshots[0]?.rates ?? {})).toHaveLength(8);
  });

  it('requests a configured reference currency that is not declared', async () => {
    const fetch = vi.fn().mockResolvedValue(jsonResponse([]));
    const nbu = createSource(fetch, 'EUR');

    await nbu.fetchRange(day('2024-01-15'), day('2024-01-16'));

    expect(valcodeOf(fetch.mock.calls[0]?.[0] ?? '')).toBe('eur');
    expect(fetch).toHaveBeenCalledTimes(9);
  });

  it('aborts the window when one currency fails', async () => {
    const fetch = vi.fn((url: string) =>
      Promise.resolve(valcodeOf(url) === 'lbp' ? jsonResponse('Bad Gateway', 502) : jsonResponse([]))
    );
    const nbu = createSource(fetch);

    const result = await nbu.fetchRange(day('2024-01-15'), day('2024-01-16'));

    const error = result._unsafeUnwrapErr();
    expect(error).toBeInstanceOf(FetchError);
    expect(error.message).toBe('NBU series for LBP failed: HTTP 502: Bad Gateway');
    expect(fetch).toHaveBeenCalledTimes(3);
  });

  it('fetchLatest reads the current rates endpoint', async () => {
    const fetch = vi.fn().mockResolvedValue(
      jsonResponse([
        { cc: 'USD', exchangedate: '17.01.2024', r030: 840, rate: 40, txt: 'Долар США' },
        { cc: 'EUR', exchangedate: '17.01.2024', r030: 978, rate: 44, txt: 'Євро' },
        { cc: 'MDL', exchangedate: '17.01.2024', r030: 498, rate: 2.5, txt: 'Молдовський лей' },
      ])
    );
    const nbu = createSource(fetch);

    const result = await nbu.fetchLatest();

    expect(fetch.mock.calls[0]?.[0]).toBe('https://bank.gov.ua/NBUStatService/v1/statdirectory/exchange?json');
    expect(result._unsafeUnwrap()).toEqual({
      base: 'UAH',
      date: '2024-01-17',
      provider: 'nbu',
      rates: { MDL: 0.4, USD: 0.025 },
    });
  });
});
