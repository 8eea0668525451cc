import type { CalendarDate, Currency } from '@ratesync/core';
import { z } from 'zod';

/**
 * A persisted rate: units of `target` per one unit of `base`, where `base`
 * is always the reference currency.
 */
export interface CanonicalRate {
  date: CalendarDate;
  base: Currency;
  target: Currency;
  rate: number;
  provider: string;
  /** Carried forward from an earlier publication rather than published for `date` */
  filled: boolean;
}

/** Target code to rate, for one date and one base */
export type RateMap = Record<string, number>;

export interface DatedRates {
  date: CalendarDate;
  rates: RateMap;
}

export const SyncTriggerSchema = z.enum(['scheduled', 'manual', 'startup', 'bootstrap']);
export type SyncTrigger = z.infer<typeof SyncTriggerSchema>;

export const SyncStatusSchema = z.enum(['success', 'partial', 'failed']);
export type SyncStatus = z.infer<typeof SyncStatusSchema>;

/**
 * Audit record of one pipeline execution for one provider
 */
export interface SyncRun {
  provider: string;
  trigger: SyncTrigger;
  status: SyncStatus;
  /** Distinct dates written, filled dates included */
  daysWritten: number;
  rowsWritten: number;
  /** Dates whose snapshot could not be normalized */
  failedDates: number;
  startedAt: Date;
  finishedAt: Date;
  error?: string | undefined;
}

export interface StoredSyncRun extends SyncRun {
  id: number;
}
