/**
 * Zod schemas for National Bank of Ukraine API responses
 *
 * API Documentation: https://bank.gov.ua/ua/open-data/api-dev
 */

import { z } from 'zod';

/**
 * Historical series entry from NBU_Exchange/exchange_site
 *
 * Example:
 * https://bank.gov.ua/NBU_Exchange/exchange_site?start=20240101&end=20240131&valcode=usd&sort=exchangedate&order=asc&json
 *
 * `rate_per_unit` is UAH per one unit of `cc`; `rate` is per `units` units.
 * Names are null for some historical dates.
 */
export const NbuSeriesRateSchema = z.object({
  exchangedate: z.string(), // DD.MM.YYYY
  r030: z.number().optional(),
  cc: z.string(),
  txt: z.string().nullable().optional(),
  enname: z.string().nullable().optional(),
  rate: z.number().optional(),
  units: z.number().optional(),
  rate_per_unit: z.number(),
  calcdate: z.string().nullable().optional(),
  group: z.string().nullable().optional(),
});

export const NbuSeriesResponseSchema = z.array(NbuSeriesRateSchema);

/**
 * Current rates from NBUStatService/v1/statdirectory/exchange
 * `rate` is UAH per one unit of `cc`.
 */
export const NbuCurrentRateSchema = z.object({
  r030: z.number(),
  txt: z.string(),
  rate: z.number(),
  cc: z.string(),
  exchangedate: z.string(), // DD.MM.YYYY
});

export const NbuCurrentResponseSchema = z.array(NbuCurrentRateSchema);

/**
 * Bundled history file: the series responses of each currency, keyed by code
 */
export const NbuHistoryFileSchema = z.record(z.array(NbuSeriesRateSchema));

export type NbuSeriesRate = z.infer<typeof NbuSeriesRateSchema>;
export type NbuCurrentRate = z.infer<typeof NbuCurrentRateSchema>;
