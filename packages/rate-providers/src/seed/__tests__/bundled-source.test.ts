import { fileURLToPath } from 'node:url';

import { CalendarDateSchema, FetchError, UnknownProviderError } from '@ratesync/core';
import { describe, expect, it } from 'vitest';

import { createBundledSource } from '../bundled-source.js';

const fixturePath = (name: string) => fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));
const clock = () => new Date('2024-02-01T00:00:00Z');
const day = (value: string) => CalendarDateSchema.parse(value);

describe('BundledRateSource', () => {
  it('carries the live provider metadata', () => {
    const source = createBundledSource('ecb', fixturePath('ecb-hist-sample.xml'), clock)._unsafeUnwrap();

    expect(source.metadata.id).toBe('ecb');
    expect(source.metadata.nativeBase).toBe('EUR');
    expect(source.isAvailable()).toBe(true);
  });

  it('serves the whole file as full history', async () => {
    const source = createBundledSource('ecb', fixturePath('ecb-hist-sample.xml'), clock)._unsafeUnwrap();

    const result = await source.fetchFullHistory();

    expect(result._unsafeUnwrap().map((snapshot) => snapshot.date)).toEqual(['2024-01-12', '2024-01-15', '2024-01-16']);
  });

  it('filters a range', async () => {
    const source = createBundledSource('nbu', fixturePath('nbu-hist-sample.json'), clock)._unsafeUnwrap();

    const result = await source.fetchRange(day('2024-01-13'), day('2024-01-31'));

    expect(result._unsafeUnwrap().map((snapshot) => snapshot.date)).toEqual(['2024-01-15']);
  });

  it('fetchLatest returns the last day of the file', async () => {
    const source = createBundledSource('nbu', fixturePath('nbu-hist-sample.json'), clock)._unsafeUnwrap();

    const result = await source.fetchLatest();

    expect(result._unsafeUnwrap().date).toBe('2024-01-15');
  });

  it('reports a missing file', async () => {
    const source = createBundledSource('ecb', fixturePath('missing.xml'), clock)._unsafeUnwrap();

    expect(source.isAvailable()).toBe(false);
    const result = await source.fetchFullHistory();
    expect(result._unsafeUnwrapErr()).toBeInstanceOf(FetchError);
  });

  it('rejects providers without a bundle format', () => {
    expect(createBundledSource('boc', 'whatever.json')._unsafeUnwrapErr()).toBeInstanceOf(UnknownProviderError);
  });
});
