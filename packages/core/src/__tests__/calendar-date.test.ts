import { describe, expect, it } from 'vitest';

import {
  addDays,
  CalendarDateSchema,
  calendarDateFromDate,
  compareCalendarDates,
  formatCompactDate,
  parseCalendarDate,
  parseDottedDate,
  todayUtc,
} from '../calendar-date.js';

const d = (value: string) => CalendarDateSchema.parse(value);

describe('parseCalendarDate', () => {
  it('accepts ISO dates', () => {
    expect(parseCalendarDate('2025-11-27')._unsafeUnwrap()).toBe('2025-11-27');
  });

  it('accepts compact dates', () => {
    expect(parseCalendarDate('20251127')._unsafeUnwrap()).toBe('2025-11-27');
  });

  it('rejects impossible calendar days', () => {
    expect(parseCalendarDate('2025-02-30').isErr()).toBe(true);
    expect(parseCalendarDate('2025-13-01').isErr()).toBe(true);
  });

  it('rejects other formats with a readable message', () => {
    const result = parseCalendarDate('27/11/2025');
    expect(result._unsafeUnwrapErr().message).toBe('Invalid date format: 27/11/2025. Use YYYY-MM-DD');
  });
});

describe('parseDottedDate', () => {
  it('parses DD.MM.YYYY', () => {
    expect(parseDottedDate('27.11.2025')._unsafeUnwrap()).toBe('2025-11-27');
  });

  it('rejects malformed input', () => {
    expect(parseDottedDate('2025-11-27').isErr()).toBe(true);
    expect(parseDottedDate('31.02.2024').isErr()).toBe(true);
  });
});

describe('date arithmetic', () => {
  it('adds days across month and year boundaries', () => {
    expect(addDays(d('2024-02-28'), 1)).toBe('2024-02-29');
    expect(addDays(d('2024-02-29'), 1)).toBe('2024-03-01');
    expect(addDays(d('2024-12-31'), 1)).toBe('2025-01-01');
    expect(addDays(d('2025-01-01'), -1)).toBe('2024-12-31');
  });

  it('compares chronologically', () => {
    expect(compareCalendarDates(d('2025-01-02'), d('2025-01-10'))).toBe(-1);
    expect(compareCalendarDates(d('2025-01-10'), d('2025-01-02'))).toBe(1);
    expect(compareCalendarDates(d('2025-01-02'), d('2025-01-02'))).toBe(0);
  });

  it('formats compact dates', () => {
    expect(formatCompactDate(d('1999-01-04'))).toBe('19990104');
  });

  it('derives the UTC calendar day of an instant', () => {
    expect(calendarDateFromDate(new Date('2025-11-27T23:59:59-02:00'))).toBe('2025-11-28');
    expect(todayUtc(new Date('2025-11-27T00:00:00Z'))).toBe('2025-11-27');
  });
});
