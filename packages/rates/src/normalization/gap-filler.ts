import { addDays, minCalendarDate, type CalendarDate } from '@ratesync/core';

import type { CanonicalRate } from '../types.js';

function compareRows(a: CanonicalRate, b: CanonicalRate): number {
  if (a.date !== b.date) return a.date < b.date ? -1 : 1;
  if (a.provider !== b.provider) return a.provider < b.provider ? -1 : 1;
  if (a.target !== b.target) return a.target < b.target ? -1 : 1;
  return 0;
}

function groupByProviderAndDate(rows: readonly CanonicalRate[]): Map<string, Map<CalendarDate, CanonicalRate[]>> {
  const groups = new Map<string, Map<CalendarDate, CanonicalRate[]>>();
  for (const row of rows) {
    let byDate = groups.get(row.provider);
    if (!byDate) {
      byDate = new Map();
      groups.set(row.provider, byDate);
    }
    const dayRows = byDate.get(row.date);
    if (dayRows) {
      dayRows.push(row);
    } else {
      byDate.set(row.date, [row]);
    }
  }
  return groups;
}

function carryForward(rows: readonly CanonicalRate[], from: CalendarDate, through: CalendarDate): CanonicalRate[] {
  const copies: CanonicalRate[] = [];
  for (let day = from; day <= through; day = addDays(day, 1)) {
    for (const row of rows) {
      copies.push({ ...row, date: day, filled: true });
    }
  }
  return copies;
}

/**
 * Make every provider's series dense up to `asOf`.
 *
 * Each calendar day after a provider's first date that has no rows receives a
 * copy of the most recent earlier day's rows, marked `filled`. Nothing is
 * filled before the first date or after `asOf`; rows dated after `asOf` pass
 * through untouched. Output is ordered by date, provider, target.
 */
export function densify(rows: readonly CanonicalRate[], asOf: CalendarDate): CanonicalRate[] {
  const output: CanonicalRate[] = [];

  for (const byDate of groupByProviderAndDate(rows).values()) {
    const dates = [...byDate.keys()].sort();

    dates.forEach((date, index) => {
      const dayRows = byDate.get(date) ?? [];
      output.push(...dayRows);

      if (date >= asOf) return;
      const next = dates[index + 1];
      const fillThrough = next === undefined ? asOf : minCalendarDate(addDays(next, -1), asOf);
      output.push(...carryForward(dayRows, addDays(date, 1), fillThrough));
    });
  }

  return output.sort(compareRows);
}
