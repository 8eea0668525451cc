import { err, ok } from 'neverthrow';
import type { Result } from 'neverthrow';
import { z } from 'zod';

const MS_PER_DAY = 86_400_000;

function isRealDate(value: string): boolean {
  const parsed = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
}

/**
 * A UTC calendar day in `YYYY-MM-DD` form.
 * Lexicographic order equals chronological order.
 */
export const CalendarDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, { message: 'Date must be YYYY-MM-DD' })
  .refine(isRealDate, { message: 'Date does not exist' })
  .brand<'CalendarDate'>();

export type CalendarDate = z.infer<typeof CalendarDateSchema>;

/**
 * Parse `YYYY-MM-DD` or compact `YYYYMMDD`.
 */
export function parseCalendarDate(value: string): Result<CalendarDate, Error> {
  const trimmed = value.trim();
  const expanded = /^\d{8}$/.test(trimmed)
    ? `${trimmed.slice(0, 4)}-${trimmed.slice(4, 6)}-${trimmed.slice(6, 8)}`
    : trimmed;

  const result = CalendarDateSchema.safeParse(expanded);
  if (!result.success) {
    return err(new Error(`Invalid date format: ${value}. Use YYYY-MM-DD`));
  }
  return ok(result.data);
}

/**
 * Calendar day of a JS Date, in UTC.
 */
export function calendarDateFromDate(date: Date): CalendarDate {
  return CalendarDateSchema.parse(date.toISOString().slice(0, 10));
}

export function todayUtc(now: Date = new Date()): CalendarDate {
  return calendarDateFromDate(now);
}

export function toUtcDate(date: CalendarDate): Date {
  return new Date(`${date}T00:00:00Z`);
}

export function addDays(date: CalendarDate, days: number): CalendarDate {
  return calendarDateFromDate(new Date(toUtcDate(date).getTime() + days * MS_PER_DAY));
}

export function compareCalendarDates(a: CalendarDate, b: CalendarDate): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export function minCalendarDate(a: CalendarDate, b: CalendarDate): CalendarDate {
  return a <= b ? a : b;
}

export function maxCalendarDate(a: CalendarDate, b: CalendarDate): CalendarDate {
  return a >= b ? a : b;
}

/**
 * `YYYYMMDD`, as some central bank APIs expect.
 */
export function formatCompactDate(date: CalendarDate): string {
  return date.replaceAll('-', '');
}

/**
 * Parse `DD.MM.YYYY`.
 */
export function parseDottedDate(value: string): Result<CalendarDate, Error> {
  const match = /^(\d{2})\.(\d{2})\.(\d{4})$/.exec(value.trim());
  if (!match) {
    return err(new Error(`Invalid date format: ${value}. Expected DD.MM.YYYY`));
  }
  const [, day, month, year] = match;
  return parseCalendarDate(`${year}-${month}-${day}`);
}
