import type { CalendarDate } from '@ratesync/core';
import type { ProviderSyncResult, SyncOutcome } from '@ratesync/rates';

import { formatDuration } from './view-utils.js';

/**
 * One provider's sync result, flattened for output.
 */
export interface ProviderSyncReport {
  provider: string;
  ok: boolean;
  status: SyncOutcome['status'] | 'failed';
  daysWritten: number;
  rowsWritten: number;
  failedDates: CalendarDate[];
  durationMs?: number | undefined;
  error?: string | undefined;
  errorCode?: string | undefined;
}

export function toSyncReport({ provider, result }: ProviderSyncResult): ProviderSyncReport {
  if (result.isErr()) {
    return {
      daysWritten: 0,
      error: result.error.message,
      errorCode: result.error.code,
      failedDates: [],
      ok: false,
      provider,
      rowsWritten: 0,
      status: 'failed',
    };
  }

  const outcome = result.value;
  return {
    daysWritten: outcome.daysWritten,
    durationMs: outcome.finishedAt.getTime() - outcome.startedAt.getTime(),
    failedDates: outcome.failedDates,
    ok: true,
    provider,
    rowsWritten: outcome.rowsWritten,
    status: outcome.status,
  };
}

export function describeSyncReport(report: ProviderSyncReport): string {
  if (!report.ok) {
    return `${report.provider}: failed (${report.error ?? 'unknown error'})`;
  }

  const duration = report.durationMs === undefined ? '' : ` in ${formatDuration(report.durationMs)}`;
  const summary = `${report.provider}: ${report.status}, ${report.daysWritten} day(s), ${report.rowsWritten} row(s)${duration}`;
  if (report.failedDates.length === 0) {
    return summary;
  }
  return `${summary}; could not normalize ${report.failedDates.join(', ')}`;
}
