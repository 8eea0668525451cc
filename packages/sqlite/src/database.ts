import * as fs from 'node:fs';
import * as path from 'node:path';

import { StoreError, getErrorMessage } from '@ratesync/core';
import { getLogger } from '@ratesync/logger';
import Database from 'better-sqlite3';
import { Kysely, SqliteDialect } from 'kysely';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import { sqliteTypeAdapterPlugin } from './plugins/sqlite-type-adapter-plugin.js';

const logger = getLogger('SqliteDatabase');

const BUSY_TIMEOUT_MS = 5000;

/**
 * Open a SQLite file (or `:memory:`) behind Kysely, creating the parent directory
 * when missing.
 *
 * Concurrent syncs share one connection; WAL lets readers proceed while a
 * batch is being written.
 */
export function createSqliteDatabase<T>(dbPath: string): Result<Kysely<T>, StoreError> {
  const inMemory = dbPath === ':memory:';

  try {
    if (!inMemory) {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }

    const connection = new Database(dbPath);
    connection.pragma('foreign_keys = ON');
    if (!inMemory) {
      connection.pragma('journal_mode = WAL');
    }
    connection.pragma('synchronous = NORMAL');
    connection.pragma(`busy_timeout = ${BUSY_TIMEOUT_MS}`);

    logger.debug({ dbPath }, 'Opened SQLite database');

    return ok(new Kysely<T>({ dialect: new SqliteDialect({ database: connection }) }).withPlugin(sqliteTypeAdapterPlugin));
  } catch (error) {
    logger.error({ dbPath, error }, 'Failed to open SQLite database');
    return err(new StoreError(`Failed to open database ${dbPath}: ${getErrorMessage(error)}`, 'open', error));
  }
}
