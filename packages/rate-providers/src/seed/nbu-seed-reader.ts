/**
 * Reader for the bundled NBU history file: the exchange_site responses of
 * each currency collected under its code.
 */

import { type Currency, ParseError, getErrorMessage } from '@ratesync/core';
import { err, type Result } from 'neverthrow';

import type { DailySnapshot } from '../core/types.js';
import { groupSeriesByDate } from '../providers/nbu/nbu-utils.js';
import { NbuHistoryFileSchema } from '../providers/nbu/schemas.js';

export function parseNbuHistoryJson(text: string, base: Currency, provider: string): Result<DailySnapshot[], ParseError> {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    return err(new ParseError(`Malformed NBU history file: ${getErrorMessage(error)}`, provider));
  }

  const parsed = NbuHistoryFileSchema.safeParse(raw);
  if (!parsed.success) {
    const firstIssue = parsed.error.issues[0];
    return err(
      new ParseError(
        `Invalid NBU history file: ${firstIssue ? `${firstIssue.path.join('.')}: ${firstIssue.message}` : 'unknown shape'}`,
        provider
      )
    );
  }

  return groupSeriesByDate(Object.values(parsed.data).flat(), base, provider);
}
