/**
 * Rates database lifecycle
 */

import type { StoreError } from '@ratesync/core';
import { getLogger } from '@ratesync/logger';
import { closeSqliteDatabase, createSqliteDatabase, runMigrations, type Kysely } from '@ratesync/sqlite';
import type { Result } from 'neverthrow';
import { err } from 'neverthrow';

import { ratesMigrations } from './migrations/index.js';
import type { RatesDatabase } from './schema.js';

const logger = getLogger('RatesDatabase');

export type RatesDB = Kysely<RatesDatabase>;

export function createRatesDatabase(dbPath: string): Result<RatesDB, StoreError> {
  return createSqliteDatabase<RatesDatabase>(dbPath);
}

/**
 * Bring the schema up to date. Safe to call on every start.
 */
export async function initializeRatesDatabase(db: RatesDB): Promise<Result<void, StoreError>> {
  const result = await runMigrations(db, ratesMigrations);
  return result.map((applied) => {
    if (applied.length > 0) {
      logger.info(`Applied migrations: ${applied.join(', ')}`);
    }
  });
}

/**
 * Open and migrate in one step, closing the handle again if migration fails.
 */
export async function openRatesDatabase(dbPath: string): Promise<Result<RatesDB, StoreError>> {
  const created = createRatesDatabase(dbPath);
  if (created.isErr()) {
    return created;
  }

  const migrated = await initializeRatesDatabase(created.value);
  if (migrated.isErr()) {
    await closeSqliteDatabase(created.value);
    return err(migrated.error);
  }

  logger.info(`Rates database ready: ${dbPath}`);
  return created;
}

export function closeRatesDatabase(db: RatesDB): Promise<Result<void, StoreError>> {
  return closeSqliteDatabase(db);
}
