/**
 * Currency display names and the per-provider declared currency lists,
 * read from data/currencies.json.
 */

import * as fs from 'node:fs';
import { fileURLToPath } from 'node:url';

import { CurrencySchema, getErrorMessage, type Currency, type CurrencyInfo } from '@ratesync/core';
import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

const CATALOG_PATH = fileURLToPath(new URL('../../data/currencies.json', import.meta.url));

const CurrencyCatalogSchema = z.object({
  names: z.record(z.string().min(1)),
  providers: z.record(z.array(CurrencySchema)),
});

export type CurrencyCatalog = z.infer<typeof CurrencyCatalogSchema>;

let cachedCatalog: CurrencyCatalog | undefined;

export function loadCurrencyCatalog(catalogPath: string = CATALOG_PATH): Result<CurrencyCatalog, Error> {
  if (cachedCatalog && catalogPath === CATALOG_PATH) {
    return ok(cachedCatalog);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(catalogPath, 'utf8'));
  } catch (error) {
    return err(new Error(`Failed to read currency catalog ${catalogPath}: ${getErrorMessage(error)}`));
  }

  const parsed = CurrencyCatalogSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    return err(new Error(`Invalid currency catalog ${catalogPath}: ${issues}`));
  }

  if (catalogPath === CATALOG_PATH) {
    cachedCatalog = parsed.data;
  }
  return ok(parsed.data);
}

/**
 * Display name for a code; the code itself when the catalog has none
 */
export function currencyName(catalog: CurrencyCatalog, code: string): string {
  return catalog.names[code] ?? code;
}

/**
 * Declared currencies of a provider, with display names
 */
export function providerCurrencies(catalog: CurrencyCatalog, providerId: string): Result<CurrencyInfo[], Error> {
  const codes: Currency[] | undefined = catalog.providers[providerId];
  if (!codes) {
    return err(new Error(`Currency catalog has no entry for provider ${providerId}`));
  }
  return ok(codes.map((code) => ({ code, name: currencyName(catalog, code) })));
}
