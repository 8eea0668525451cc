import { sql, type Kysely } from '@ratesync/sqlite';

import type { RatesDatabase } from '../schema.js';

export async function up(db: Kysely<RatesDatabase>): Promise<void> {
  await db.schema
    .createTable('exchange_rates')
    .addColumn('id', 'integer', (col) => col.primaryKey().autoIncrement())
    .addColumn('date', 'text', (col) => col.notNull())
    .addColumn('base_currency', 'text', (col) => col.notNull())
    .addColumn('target_currency', 'text', (col) => col.notNull())
    .addColumn('rate', 'real', (col) => col.notNull())
    .addColumn('provider', 'text', (col) => col.notNull())
    .addColumn('filled', 'integer', (col) => col.notNull().defaultTo(0))
    .addColumn('created_at', 'text', (col) => col.notNull().defaultTo(sql`(datetime('now'))`))
    .addColumn('updated_at', 'text', (col) => col.notNull().defaultTo(sql`(datetime('now'))`))
    .addUniqueConstraint('uq_exchange_rates_key', ['date', 'base_currency', 'target_currency', 'provider'])
    .execute();

  await db.schema.createIndex('idx_exchange_rates_date').on('exchange_rates').column('date').execute();

  await db.schema
    .createIndex('idx_exchange_rates_provider_date')
    .on('exchange_rates')
    .columns(['provider', 'date'])
    .execute();

  await db.schema
    .createTable('currencies')
    .addColumn('code', 'text', (col) => col.notNull())
    .addColumn('name', 'text', (col) => col.notNull())
    .addColumn('provider', 'text', (col) => col.notNull())
    .addPrimaryKeyConstraint('pk_currencies', ['code', 'provider'])
    .execute();

  await db.schema
    .createTable('sync_runs')
    .addColumn('id', 'integer', (col) => col.primaryKey().autoIncrement())
    .addColumn('provider', 'text', (col) => col.notNull())
    .addColumn('trigger', 'text', (col) => col.notNull())
    .addColumn('status', 'text', (col) => col.notNull())
    .addColumn('days_written', 'integer', (col) => col.notNull().defaultTo(0))
    .addColumn('rows_written', 'integer', (col) => col.notNull().defaultTo(0))
    .addColumn('failed_dates', 'integer', (col) => col.notNull().defaultTo(0))
    .addColumn('started_at', 'text', (col) => col.notNull())
    .addColumn('finished_at', 'text', (col) => col.notNull())
    .addColumn('error', 'text')
    .execute();

  await db.schema
    .createIndex('idx_sync_runs_provider_started')
    .on('sync_runs')
    .columns(['provider', 'started_at'])
    .execute();
}

export async function down(db: Kysely<RatesDatabase>): Promise<void> {
  await db.schema.dropTable('sync_runs').ifExists().execute();
  await db.schema.dropTable('currencies').ifExists().execute();
  await db.schema.dropTable('exchange_rates').ifExists().execute();
}
