export { BaseRateSource } from './core/base-source.js';
export {
  currencyName,
  loadCurrencyCatalog,
  providerCurrencies,
  type CurrencyCatalog,
} from './core/currency-catalog.js';
export {
  createRateSource,
  createRateSources,
  getAvailableProviderIds,
  isProviderId,
  type ProviderId,
} from './core/factory.js';
export type { DailySnapshot, RateSource, RateSourceOptions, SourceError, SourceMetadata } from './core/types.js';
export { DEFAULT_FETCH_TIMEOUT_MS } from './core/utils.js';

export { EcbRateSource, createEcbMetadata, createEcbSource } from './providers/ecb/provider.js';
export { NbuRateSource, createNbuMetadata, createNbuSource } from './providers/nbu/provider.js';

export { BundledRateSource, createBundledSource, type HistoryFileParser } from './seed/bundled-source.js';
export { parseEcbHistoryXml } from './seed/ecb-seed-reader.js';
export { parseNbuHistoryJson } from './seed/nbu-seed-reader.js';
