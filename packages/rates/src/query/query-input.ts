/**
 * Parsing of user-supplied query input, shared by the HTTP API and the CLI.
 */

import {
  CurrencySchema,
  InvalidRequestError,
  parseCalendarDate,
  parseCurrencyList,
  type CalendarDate,
} from '@ratesync/core';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import { z } from 'zod';

import type { RateQuery } from './rate-query-service.js';

/**
 * `{ from: 'eur', to: 'usd, gbp', amount: '100' }`
 */
export const RateQueryInputSchema = z.object({
  amount: z.coerce.number().finite().positive({ message: 'Amount must be a positive number' }).optional(),
  from: CurrencySchema.optional(),
  to: z
    .string()
    .optional()
    .transform((raw, ctx) => {
      if (raw === undefined) return undefined;
      const parsed = parseCurrencyList(raw);
      if (parsed.isErr()) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: parsed.error.message });
        return z.NEVER;
      }
      return parsed.value;
    }),
});

export function parseRateQueryInput(raw: unknown): Result<RateQuery, InvalidRequestError> {
  const result = RateQueryInputSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    return err(new InvalidRequestError(`Invalid query parameters: ${issues}`));
  }

  return ok({
    amount: result.data.amount,
    base: result.data.from,
    symbols: result.data.to,
  });
}

export type DateSelection =
  | { kind: 'single'; date: CalendarDate }
  | { kind: 'range'; start: CalendarDate; end: CalendarDate };

/**
 * `2024-01-15`, `20240115` or `2024-01-01..2024-01-31`
 */
export function parseDateSelection(value: string): Result<DateSelection, InvalidRequestError> {
  if (!value.includes('..')) {
    return parseDay(value).map((date): DateSelection => ({ date, kind: 'single' }));
  }

  const parts = value.split('..');
  const [start, end] = parts;
  if (parts.length !== 2 || start === undefined || end === undefined) {
    return err(new InvalidRequestError('Invalid date range format. Use YYYY-MM-DD..YYYY-MM-DD'));
  }

  return parseDay(start).andThen((startDate) =>
    parseDay(end).map((endDate): DateSelection => ({ end: endDate, kind: 'range', start: startDate }))
  );
}

function parseDay(value: string): Result<CalendarDate, InvalidRequestError> {
  return parseCalendarDate(value).mapErr((error) => new InvalidRequestError(error.message));
}
