/**
 * Base class for rate sources
 *
 * Clamps requested windows to what the provider can actually serve and
 * sanitizes whatever the subclass returns before it reaches the pipeline.
 */

import { type CalendarDate, compareCalendarDates, maxCalendarDate, minCalendarDate, todayUtc } from '@ratesync/core';
import { getLogger, type Logger } from '@ratesync/logger';
import { ok, type Result } from 'neverthrow';

import type { DailySnapshot, RateSource, SourceError, SourceMetadata } from './types.js';

export abstract class BaseRateSource implements RateSource {
  abstract readonly metadata: SourceMetadata;
  protected readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(loggerCategory: string, clock?: () => Date) {
    this.logger = getLogger(loggerCategory);
    this.clock = clock ?? (() => new Date());
  }

  /**
   * Window is already clamped to [historyStart, today] and non-empty here
   */
  protected abstract fetchRangeInternal(
    start: CalendarDate,
    end: CalendarDate
  ): Promise<Result<DailySnapshot[], SourceError>>;

  protected abstract fetchLatestInternal(): Promise<Result<DailySnapshot, SourceError>>;

  async fetchRange(start: CalendarDate, end: CalendarDate): Promise<Result<DailySnapshot[], SourceError>> {
    const from = maxCalendarDate(start, this.metadata.historyStart);
    const to = minCalendarDate(end, this.today());

    if (compareCalendarDates(from, to) > 0) {
      this.logger.debug({ end, start }, 'Requested window is outside the provider history');
      return ok([]);
    }

    const result = await this.fetchRangeInternal(from, to);
    return result.map((snapshots) => this.sanitize(snapshots, from, to));
  }

  fetchFullHistory(): Promise<Result<DailySnapshot[], SourceError>> {
    return this.fetchRange(this.metadata.historyStart, this.today());
  }

  async fetchLatest(): Promise<Result<DailySnapshot, SourceError>> {
    const result = await this.fetchLatestInternal();
    return result.map((snapshot) => this.sanitizeRates(snapshot));
  }

  protected today(): CalendarDate {
    return todayUtc(this.clock());
  }

  /**
   * Drop days outside the window, merge duplicate days, sort ascending
   */
  private sanitize(snapshots: DailySnapshot[], from: CalendarDate, to: CalendarDate): DailySnapshot[] {
    const byDate = new Map<CalendarDate, DailySnapshot>();

    for (const snapshot of snapshots) {
      if (compareCalendarDates(snapshot.date, from) < 0 || compareCalendarDates(snapshot.date, to) > 0) {
        continue;
      }
      const clean = this.sanitizeRates(snapshot);
      const existing = byDate.get(clean.date);
      byDate.set(clean.date, existing ? { ...existing, rates: { ...existing.rates, ...clean.rates } } : clean);
    }

    return [...byDate.values()].sort((a, b) => compareCalendarDates(a.date, b.date));
  }

  private sanitizeRates(snapshot: DailySnapshot): DailySnapshot {
    const rates: Record<string, number> = {};
    for (const [code, rate] of Object.entries(snapshot.rates)) {
      if (Number.isFinite(rate) && rate > 0) {
        rates[code] = rate;
      } else {
        this.logger.warn({ code, date: snapshot.date, rate }, 'Dropping non-positive rate');
      }
    }
    return { ...snapshot, rates };
  }
}
