import { StoreError, getErrorMessage } from '@ratesync/core';
import { getLogger } from '@ratesync/logger';
import { Migrator, type Kysely, type Migration } from 'kysely';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

const logger = getLogger('SqliteMigrations');

/**
 * Run all pending migrations from a programmatic migration record keyed by
 * name (e.g. '001_initial_schema'). Names sort lexically, so keep the prefix.
 *
 * A programmatic provider is used instead of FileMigrationProvider because
 * dynamic `import()` of workspace sources does not resolve under Vitest.
 */
export async function runMigrations<DB>(
  db: Kysely<DB>,
  migrations: Record<string, Migration>
): Promise<Result<string[], StoreError>> {
  try {
    const migrator = new Migrator({
      db,
      provider: { getMigrations: () => Promise.resolve(migrations) },
    });

    const { error, results } = await migrator.migrateToLatest();
    const applied: string[] = [];

    for (const result of results ?? []) {
      if (result.status === 'Success') {
        applied.push(result.migrationName);
        logger.debug(`Migration "${result.migrationName}" executed successfully`);
      } else if (result.status === 'Error') {
        logger.error(`Migration "${result.migrationName}" failed`);
      }
    }

    if (error) {
      logger.error({ error }, 'Migration failed');
      return err(new StoreError(`Migration failed: ${getErrorMessage(error, 'Unknown migration error')}`, 'migrate', error));
    }

    if (applied.length === 0) {
      logger.debug('No pending migrations');
    }
    return ok(applied);
  } catch (error) {
    logger.error({ error }, 'Error running migrations');
    return err(new StoreError(`Failed to run migrations: ${getErrorMessage(error)}`, 'migrate', error));
  }
}
