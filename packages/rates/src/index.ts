export {
  SyncStatusSchema,
  SyncTriggerSchema,
  type CanonicalRate,
  type DatedRates,
  type RateMap,
  type StoredSyncRun,
  type SyncRun,
  type SyncStatus,
  type SyncTrigger,
} from './types.js';

export { convertBase, rebaseRates, rowsToRateMap, toCanonical, type RateRow } from './normalization/normalizer.js';
export { densify } from './normalization/gap-filler.js';

export {
  closeRatesDatabase,
  createRatesDatabase,
  initializeRatesDatabase,
  openRatesDatabase,
  type RatesDB,
} from './persistence/database.js';
export type { RatesDatabase } from './persistence/schema.js';
export { buildProviderPriority, type ProviderPriority } from './persistence/provider-priority.js';
export {
  RateStore,
  type CurrencySummary,
  type LatestDateQuery,
  type ProviderStats,
  type RateStoreOptions,
} from './persistence/rate-store.js';

export { SyncLockRegistry, type SyncLockHandle } from './sync/sync-lock-registry.js';
export {
  SyncOrchestrator,
  type HistoryBundle,
  type ProviderSyncResult,
  type SyncOrchestratorOptions,
  type SyncOutcome,
} from './sync/sync-orchestrator.js';

export {
  RateQueryService,
  type CurrencyDetails,
  type ProviderHealth,
  type QueryError,
  type RateQuery,
  type RateQueryServiceOptions,
  type RatesResponse,
  type TimeSeriesResponse,
} from './query/rate-query-service.js';
export {
  RateQueryInputSchema,
  parseDateSelection,
  parseRateQueryInput,
  type DateSelection,
} from './query/query-input.js';

export { closeRateRuntime, createRateRuntime, type RateRuntime, type RateRuntimeOptions } from './runtime.js';
