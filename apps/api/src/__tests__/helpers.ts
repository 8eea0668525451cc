import type { INestApplication } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { CalendarDateSchema, CurrencySchema, FetchError } from '@ratesync/core';
import type { DailySnapshot, RateSource } from '@ratesync/rate-providers';
import { closeRateRuntime, createRateRuntime, type CanonicalRate, type RateRuntime } from '@ratesync/rates';
import { err, ok } from 'neverthrow';
import { vi } from 'vitest';

import { AppModule } from '../app.module.js';
import { configureApp } from '../configure-app.js';
import type { SyncSchedule } from '../tokens.js';

export const NOW = new Date('2024-01-17T16:00:00Z');
export const USD = CurrencySchema.parse('USD');

export function snapshot(date: string, base: string, rates: Record<string, number>, provider = 'ecb'): DailySnapshot {
  return { base: CurrencySchema.parse(base), date: CalendarDateSchema.parse(date), provider, rates };
}

export function usdRow(date: string, target: string, rate: number, provider = 'ecb'): CanonicalRate {
  return {
    base: USD,
    date: CalendarDateSchema.parse(date),
    filled: false,
    provider,
    rate,
    target: CurrencySchema.parse(target),
  };
}

export function fakeSource(
  id: string,
  nativeBase: string,
  overrides: Partial<Pick<RateSource, 'fetchFullHistory' | 'fetchRange'>> = {}
): RateSource {
  const base = CurrencySchema.parse(nativeBase);
  return {
    fetchFullHistory: vi.fn<RateSource['fetchFullHistory']>().mockResolvedValue(ok([])),
    fetchLatest: vi.fn<RateSource['fetchLatest']>().mockResolvedValue(err(new FetchError('unused', id))),
    fetchRange: vi.fn<RateSource['fetchRange']>().mockResolvedValue(ok([])),
    metadata: {
      currencies: [{ code: base, name: nativeBase }],
      displayName: `${id.toUpperCase()} test source`,
      historyStart: CalendarDateSchema.parse('1999-01-04'),
      id,
      nativeBase: base,
    },
    ...overrides,
  };
}

export interface TestApp {
  app: INestApplication;
  runtime: RateRuntime;
  close(): Promise<void>;
}

/**
 * Full Nest application over an in-memory database and fake sources.
 */
export async function createTestApp(sources: RateSource[], schedule?: SyncSchedule): Promise<TestApp> {
  const runtime = (
    await createRateRuntime({
      clock: () => NOW,
      databasePath: ':memory:',
      defaultApiBase: USD,
      enabledProviders: sources.map((source) => source.metadata.id),
      fetchTimeoutMs: 1000,
      referenceCurrency: USD,
      seedPaths: {},
      sources,
    })
  )._unsafeUnwrap();

  const moduleRef = await Test.createTestingModule({
    imports: [
      AppModule.forRoot({
        info: { name: 'ratesync', version: '9.9.9' },
        orchestrator: runtime.orchestrator,
        queries: runtime.queries,
        schedule,
      }),
    ],
  }).compile();

  const app = configureApp(moduleRef.createNestApplication({ logger: false }));
  await app.init();

  return {
    app,
    async close() {
      await app.close();
      await closeRateRuntime(runtime);
    },
    runtime,
  };
}
