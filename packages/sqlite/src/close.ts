import { StoreError, getErrorMessage } from '@ratesync/core';
import { getLogger } from '@ratesync/logger';
import type { Kysely } from 'kysely';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

const logger = getLogger('SqliteDatabase');

export async function closeSqliteDatabase<DB>(db: Kysely<DB>): Promise<Result<void, StoreError>> {
  try {
    await db.destroy();
    logger.debug('Database connection closed');
    return ok(undefined);
  } catch (error) {
    logger.error({ error }, 'Error closing database');
    return err(new StoreError(`Failed to close database: ${getErrorMessage(error)}`, 'close', error));
  }
}
