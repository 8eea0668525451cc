import { err, ok } from 'neverthrow';
import type { Result } from 'neverthrow';
import { z } from 'zod';

/**
 * ISO 4217-style currency code, normalized to uppercase.
 */
export const CurrencySchema = z
  .string()
  .trim()
  .toUpperCase()
  .regex(/^[A-Z]{3}$/, { message: 'Currency code must be three letters' })
  .brand<'Currency'>();

export type Currency = z.infer<typeof CurrencySchema>;

/**
 * Parse a raw string into a Currency.
 * Returns Err for anything that is not a three-letter code once trimmed.
 */
export function parseCurrency(code: string): Result<Currency, Error> {
  const result = CurrencySchema.safeParse(code);
  if (!result.success) {
    return err(new Error(`Invalid currency code: ${JSON.stringify(code)}`));
  }
  return ok(result.data);
}

/**
 * Parse a comma separated list of codes ("eur, gbp,,JPY").
 * Empty entries are dropped; the first invalid entry fails the whole list.
 */
export function parseCurrencyList(raw: string): Result<Currency[], Error> {
  const codes: Currency[] = [];
  for (const part of raw.split(',')) {
    if (part.trim().length === 0) continue;
    const parsed = parseCurrency(part);
    if (parsed.isErr()) {
      return err(parsed.error);
    }
    if (!codes.includes(parsed.value)) {
      codes.push(parsed.value);
    }
  }
  return ok(codes);
}

/** Currency metadata as carried by providers and the currencies table */
export interface CurrencyInfo {
  code: Currency;
  name: string;
}
