import type { ProviderHealth, StoredSyncRun } from '@ratesync/rates';

import { formatDuration, formatTable } from '../shared/view-utils.js';

export function formatProviderTable(providers: readonly ProviderHealth[]): string[] {
  return formatTable(providers, [
    { format: (p) => p.name, header: 'PROVIDER' },
    { format: (p) => p.lastStatus ?? 'never', header: 'LAST RUN' },
    { format: (p) => p.lastSync ?? '-', header: 'FINISHED AT' },
    { format: (p) => p.latestDate ?? '-', header: 'LATEST DATE' },
    { align: 'right', format: (p) => String(p.currenciesCount), header: 'CURRENCIES' },
    { align: 'right', format: (p) => String(p.rowsCount), header: 'ROWS' },
  ]);
}

export function formatRunTable(runs: readonly StoredSyncRun[]): string[] {
  return formatTable(runs, [
    { format: (r) => r.startedAt.toISOString(), header: 'STARTED AT' },
    { format: (r) => r.provider, header: 'PROVIDER' },
    { format: (r) => r.trigger, header: 'TRIGGER' },
    { format: (r) => r.status, header: 'STATUS' },
    { align: 'right', format: (r) => String(r.rowsWritten), header: 'ROWS' },
    { align: 'right', format: (r) => formatDuration(r.finishedAt.getTime() - r.startedAt.getTime()), header: 'TOOK' },
    { format: (r) => r.error ?? '', header: 'ERROR' },
  ]);
}
