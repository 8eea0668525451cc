import { CurrencySchema, NormalizationError, type CalendarDate, type Currency } from '@ratesync/core';
import type { DailySnapshot } from '@ratesync/rate-providers';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import type { CanonicalRate, RateMap } from '../types.js';

function isUsableRate(value: number | undefined): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value > 0;
}

function byTarget(a: CanonicalRate, b: CanonicalRate): number {
  if (a.target === b.target) return 0;
  return a.target < b.target ? -1 : 1;
}

/**
 * Re-express a provider snapshot against the reference currency R.
 *
 * For a snapshot in base X: rate(R, Y) = rate(X, Y) / rate(X, R). The snapshot
 * must carry its own entry for R; other targets that are not positive finite
 * numbers are skipped. The result always holds R itself (1) and X (1 / rate(X, R)).
 */
export function toCanonical(
  snapshot: DailySnapshot,
  reference: Currency
): Result<CanonicalRate[], NormalizationError> {
  const { date, provider } = snapshot;
  const rows = new Map<string, CanonicalRate>();
  const push = (target: Currency, rate: number) => {
    rows.set(target, { base: reference, date, filled: false, provider, rate, target });
  };

  let divisor = 1;
  if (snapshot.base !== reference) {
    const referenceRate = snapshot.rates[reference];
    if (!isUsableRate(referenceRate)) {
      return err(
        new NormalizationError(
          `Snapshot from ${provider} for ${date} has no usable ${reference} rate`,
          date,
          reference
        )
      );
    }
    divisor = referenceRate;
    push(snapshot.base, 1 / divisor);
  }

  for (const [code, value] of Object.entries(snapshot.rates)) {
    if (code === reference || code === snapshot.base || !isUsableRate(value)) continue;
    const target = CurrencySchema.safeParse(code);
    if (!target.success) continue;
    push(target.data, value / divisor);
  }

  push(reference, 1);

  return ok([...rows.values()].sort(byTarget));
}

/** Minimal row shape shared by canonical rows and stored rows */
export interface RateRow {
  base: string;
  target: string;
  rate: number;
}

/**
 * Collapse one date's rows into a target -> rate map. The first row for a
 * target wins, so callers pass rows already ordered by provider priority.
 */
export function rowsToRateMap(rows: readonly RateRow[]): RateMap {
  const map: RateMap = {};
  for (const row of rows) {
    if (!(row.target in map)) {
      map[row.target] = row.rate;
    }
  }
  const base = rows[0]?.base;
  if (base) {
    map[base] = 1;
  }
  return map;
}

/**
 * Re-express a reference-based map in `base`:
 * rate(Q, Y) = rate(R, Y) / rate(R, Q) for every stored Y, R included.
 */
export function rebaseRates(
  rates: RateMap,
  base: Currency,
  date: CalendarDate
): Result<RateMap, NormalizationError> {
  const divisor = rates[base];
  if (!isUsableRate(divisor)) {
    return err(new NormalizationError(`No ${base} rate stored for ${date}`, date, base));
  }

  const rebased: RateMap = {};
  for (const [code, value] of Object.entries(rates)) {
    rebased[code] = value / divisor;
  }
  rebased[base] = 1;
  return ok(rebased);
}

/**
 * Inverse of the ingest-time triangulation for one date's canonical rows.
 */
export function convertBase(
  rows: readonly CanonicalRate[],
  base: Currency
): Result<RateMap, NormalizationError> {
  const first = rows[0];
  if (!first) {
    return err(new NormalizationError(`No rows to convert to ${base}`, '', base));
  }
  return rebaseRates(rowsToRateMap(rows), base, first.date);
}
