import type { ColumnType } from '@ratesync/sqlite';

/**
 * Canonical rates, one row per (date, base, target, provider).
 */
export interface ExchangeRatesTable {
  id: ColumnType<number, never, never>;
  date: string;
  base_currency: string;
  target_currency: string;
  rate: number;
  provider: string;
  // INTEGER 0/1; booleans are bound through the sqlite type adapter
  filled: ColumnType<number, boolean, number>;
  created_at: ColumnType<string, string, never>;
  updated_at: string;
}

/**
 * Currency display names as declared by each provider.
 */
export interface CurrenciesTable {
  code: string;
  name: string;
  provider: string;
}

/**
 * Append-only sync audit log.
 */
export interface SyncRunsTable {
  id: ColumnType<number, never, never>;
  provider: string;
  trigger: string;
  status: string;
  days_written: number;
  rows_written: number;
  failed_dates: number;
  started_at: string;
  finished_at: string;
  // undefined binds as NULL through the sqlite type adapter
  error: ColumnType<string | null, string | undefined, never>;
}

export interface RatesDatabase {
  exchange_rates: ExchangeRatesTable;
  currencies: CurrenciesTable;
  sync_runs: SyncRunsTable;
}
