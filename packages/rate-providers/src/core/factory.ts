/**
 * Registry of live rate sources
 *
 * To add a provider: implement a RateSource, write its create function and
 * add it here. The registry order is also the priority order used when two
 * providers publish the same currency on the same date.
 */

import { UnknownProviderError } from '@ratesync/core';
import { getLogger } from '@ratesync/logger';
import { err, ok, type Result } from 'neverthrow';

import { createEcbSource } from '../providers/ecb/provider.js';
import { createNbuSource } from '../providers/nbu/provider.js';

import type { RateSource, RateSourceOptions } from './types.js';

const logger = getLogger('RateSourceFactory');

const PROVIDER_FACTORIES = {
  ecb: (options: RateSourceOptions) => createEcbSource(options),
  nbu: (options: RateSourceOptions) => createNbuSource(options),
} as const satisfies Record<string, (options: RateSourceOptions) => Result<RateSource, Error>>;

export type ProviderId = keyof typeof PROVIDER_FACTORIES;

export function isProviderId(value: string): value is ProviderId {
  return Object.hasOwn(PROVIDER_FACTORIES, value);
}

/**
 * Provider ids in registry order
 */
export function getAvailableProviderIds(): ProviderId[] {
  return Object.keys(PROVIDER_FACTORIES).filter(isProviderId);
}

export function createRateSource(id: string, options: RateSourceOptions = {}): Result<RateSource, Error> {
  if (!isProviderId(id)) {
    return err(new UnknownProviderError(id));
  }
  return PROVIDER_FACTORIES[id](options);
}

/**
 * Create the sources for `ids`, in registry order regardless of the order given.
 * Fails on the first unknown id or failing factory.
 */
export function createRateSources(ids: readonly string[], options: RateSourceOptions = {}): Result<RateSource[], Error> {
  for (const id of ids) {
    if (!isProviderId(id)) {
      return err(new UnknownProviderError(id));
    }
  }

  const sources: RateSource[] = [];
  for (const id of getAvailableProviderIds()) {
    if (!ids.includes(id)) {
      logger.debug(`${id} provider not enabled`);
      continue;
    }

    const result = createRateSource(id, options);
    if (result.isErr()) {
      logger.error(`Failed to create ${id} provider: ${result.error.message}`);
      return err(result.error);
    }
    sources.push(result.value);
    logger.debug(`${id} provider registered`);
  }

  return ok(sources);
}
