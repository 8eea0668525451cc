import { describe, expect, it } from 'vitest';

import { parseCurrency, parseCurrencyList } from '../currency.js';

describe('parseCurrency', () => {
  it('should normalize currency codes to uppercase', () => {
    const result = parseCurrency('eur');
    expect(result.isOk()).toBe(true);
    expect(result._unsafeUnwrap()).toBe('EUR');
  });

  it('should trim whitespace', () => {
    expect(parseCurrency('  GBP  ')._unsafeUnwrap()).toBe('GBP');
  });

  it('should return Err for empty string', () => {
    expect(parseCurrency('').isErr()).toBe(true);
  });

  it('should return Err for codes that are not three letters', () => {
    expect(parseCurrency('EURO').isErr()).toBe(true);
    expect(parseCurrency('U5D').isErr()).toBe(true);
    expect(parseCurrency('US').isErr()).toBe(true);
  });
});

describe('parseCurrencyList', () => {
  it('should split, trim, uppercase and drop empty entries', () => {
    const result = parseCurrencyList('eur, gbp,,JPY ');
    expect(result._unsafeUnwrap()).toEqual(['EUR', 'GBP', 'JPY']);
  });

  it('should drop duplicates while keeping first-seen order', () => {
    expect(parseCurrencyList('GBP,eur,gbp')._unsafeUnwrap()).toEqual(['GBP', 'EUR']);
  });

  it('should fail on the first invalid entry', () => {
    const result = parseCurrencyList('EUR,DOLLAR');
    expect(result.isErr()).toBe(true);
    expect(result._unsafeUnwrapErr().message).toBe('Invalid currency code: "DOLLAR"');
  });

  it('should return an empty list for a blank string', () => {
    expect(parseCurrencyList(' , ')._unsafeUnwrap()).toEqual([]);
  });
});
