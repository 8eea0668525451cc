import type { DailySnapshot } from '@ratesync/rate-providers';

import { formatRate, formatTable } from '../shared/view-utils.js';

export function formatSnapshot(snapshot: DailySnapshot): { title: string; lines: string[] } {
  const entries = Object.entries(snapshot.rates).sort(([a], [b]) => a.localeCompare(b));
  return {
    lines: formatTable(entries, [
      { format: ([code]) => code, header: 'CURRENCY' },
      { align: 'right', format: ([, rate]) => formatRate(rate), header: 'RATE' },
    ]),
    title: `${snapshot.provider}: 1 ${snapshot.base} on ${snapshot.date} (not stored)`,
  };
}
