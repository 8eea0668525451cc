import { CalendarDateSchema, CurrencySchema, ParseError } from '@ratesync/core';
import { describe, expect, it } from 'vitest';

import {
  buildNbuSeriesPath,
  currenciesToFetch,
  groupSeriesByDate,
  transformCurrentRates,
} from '../nbu-utils.js';

const UAH = CurrencySchema.parse('UAH');
const codes = (...values: string[]) => values.map((value) => CurrencySchema.parse(value));

describe('buildNbuSeriesPath', () => {
  it('uses compact dates and a lowercase valcode', () => {
    expect(buildNbuSeriesPath('USD', CalendarDateSchema.parse('2024-01-01'), CalendarDateSchema.parse('2024-01-31'))).toBe(
      '/NBU_Exchange/exchange_site?start=20240101&end=20240131&valcode=usd&sort=exchangedate&order=asc&json'
    );
  });
});

describe('currenciesToFetch', () => {
  it('puts the reference currency first and leaves out the base', () => {
    expect(currenciesToFetch(codes('UAH', 'KZT', 'USD', 'GEL'), UAH, 'USD')).toEqual(['USD', 'KZT', 'GEL']);
  });

  it('does not request the base even when it is the reference', () => {
    expect(currenciesToFetch(codes('UAH', 'KZT'), UAH, 'UAH')).toEqual(['KZT']);
  });
});

describe('groupSeriesByDate', () => {
  it('merges series into UAH snapshots holding the inverse rate', () => {
    const result = groupSeriesByDate(
      [
        { cc: 'USD', exchangedate: '02.01.2024', rate_per_unit: 40 },
        { cc: 'USD', exchangedate: '03.01.2024', rate_per_unit: 50 },
        { cc: 'KZT', exchangedate: '02.01.2024', rate_per_unit: 0.08 },
      ],
      UAH,
      'nbu'
    );

    expect(result._unsafeUnwrap()).toEqual([
      { base: 'UAH', date: '2024-01-02', provider: 'nbu', rates: { KZT: 12.5, USD: 0.025 } },
      { base: 'UAH', date: '2024-01-03', provider: 'nbu', rates: { USD: 0.02 } },
    ]);
  });

  it('skips entries without a positive rate', () => {
    const result = groupSeriesByDate(
      [
        { cc: 'USD', exchangedate: '02.01.2024', rate_per_unit: 40 },
        { cc: 'LBP', exchangedate: '02.01.2024', rate_per_unit: 0 },
      ],
      UAH,
      'nbu'
    );

    expect(result._unsafeUnwrap()[0]?.rates).toEqual({ USD: 0.025 });
  });

  it('fails on a malformed date', () => {
    const result = groupSeriesByDate([{ cc: 'USD', exchangedate: '2024-01-02', rate_per_unit: 40 }], UAH, 'nbu');

    expect(result._unsafeUnwrapErr()).toBeInstanceOf(ParseError);
    expect(result._unsafeUnwrapErr().message).toBe('NBU entry has an invalid date: 2024-01-02');
  });
});

describe('transformCurrentRates', () => {
  const entries = [
    { cc: 'USD', exchangedate: '17.01.2024', r030: 840, rate: 40, txt: 'Долар США' },
    { cc: 'GEL', exchangedate: '17.01.2024', r030: 981, rate: 16, txt: 'Ларі' },
    { cc: 'XAU', exchangedate: '17.01.2024', r030: 959, rate: 80000, txt: 'Золото' },
  ];

  it('keeps only supported codes', () => {
    const result = transformCurrentRates(entries, new Set(['USD', 'GEL']), UAH, 'nbu');

    expect(result._unsafeUnwrap()).toEqual({
      base: 'UAH',
      date: '2024-01-17',
      provider: 'nbu',
      rates: { GEL: 0.0625, USD: 0.025 },
    });
  });

  it('fails on an empty payload', () => {
    expect(transformCurrentRates([], new Set(['USD']), UAH, 'nbu')._unsafeUnwrapErr().message).toBe(
      'No rates returned from NBU'
    );
  });
});
