/**
 * Wiring shared by the API server and the CLI: database, sources, store,
 * orchestrator and query service built from one configuration.
 */

import type { Currency, StoreError } from '@ratesync/core';
import { getLogger } from '@ratesync/logger';
import { createBundledSource, createRateSources, type RateSource } from '@ratesync/rate-providers';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import { closeRatesDatabase, openRatesDatabase, type RatesDB } from './persistence/database.js';
import { buildProviderPriority } from './persistence/provider-priority.js';
import { RateStore } from './persistence/rate-store.js';
import { RateQueryService } from './query/rate-query-service.js';
import { SyncOrchestrator, type HistoryBundle } from './sync/sync-orchestrator.js';

const logger = getLogger('RateRuntime');

export interface RateRuntimeOptions {
  databasePath: string;
  enabledProviders: readonly string[];
  referenceCurrency: Currency;
  defaultApiBase: Currency;
  /** History bundle per provider id */
  seedPaths: Readonly<Record<string, string>>;
  fetchTimeoutMs: number;
  clock?: (() => Date) | undefined;
  /** Use these instead of building live sources from the registry */
  sources?: RateSource[] | undefined;
}

export interface RateRuntime {
  db: RatesDB;
  store: RateStore;
  sources: RateSource[];
  bundles: HistoryBundle[];
  orchestrator: SyncOrchestrator;
  queries: RateQueryService;
}

function createBundles(sources: readonly RateSource[], options: RateRuntimeOptions): HistoryBundle[] {
  const bundles: HistoryBundle[] = [];
  for (const source of sources) {
    const id = source.metadata.id;
    const filePath = options.seedPaths[id];
    if (filePath === undefined) continue;

    const bundle = createBundledSource(id, filePath, options.clock);
    if (bundle.isErr()) {
      logger.warn(`No history bundle for ${id}: ${bundle.error.message}`);
      continue;
    }
    bundles.push(bundle.value);
  }
  return bundles;
}

export async function createRateRuntime(options: RateRuntimeOptions): Promise<Result<RateRuntime, Error>> {
  const sourcesResult: Result<RateSource[], Error> = options.sources
    ? ok(options.sources)
    : createRateSources(options.enabledProviders, {
        clock: options.clock,
        referenceCurrency: options.referenceCurrency,
        timeoutMs: options.fetchTimeoutMs,
      });
  if (sourcesResult.isErr()) {
    return err(sourcesResult.error);
  }
  const sources = sourcesResult.value;

  const db = await openRatesDatabase(options.databasePath);
  if (db.isErr()) {
    await Promise.all(sources.map((source) => source.close?.()));
    return err(db.error);
  }

  const metadata = sources.map((source) => source.metadata);
  const store = new RateStore(db.value, {
    clock: options.clock,
    priority: buildProviderPriority(metadata),
    referenceCurrency: options.referenceCurrency,
  });

  logger.info(`Enabled providers: ${metadata.map((m) => m.id).join(', ') || 'none'}`);

  return ok({
    bundles: createBundles(sources, options),
    db: db.value,
    orchestrator: new SyncOrchestrator(store, sources, {
      clock: options.clock,
      referenceCurrency: options.referenceCurrency,
    }),
    queries: new RateQueryService(store, metadata, { defaultBase: options.defaultApiBase }),
    sources,
    store,
  });
}

/**
 * Release HTTP agents and the database handle.
 */
export async function closeRateRuntime(runtime: RateRuntime): Promise<Result<void, StoreError>> {
  await Promise.all(runtime.sources.map((source) => source.close?.()));
  return closeRatesDatabase(runtime.db);
}
