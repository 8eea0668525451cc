/**
 * Zod schemas for the ECB Data Portal SDMX-JSON responses
 *
 * API Documentation: https://data.ecb.europa.eu/help/api/data
 */

import { z } from 'zod';

/**
 * One value of a dimension, e.g. `{ id: 'USD', name: 'US dollar' }` for
 * CURRENCY or `{ id: '2024-01-15' }` for TIME_PERIOD
 */
export const EcbDimensionValueSchema = z.object({
  id: z.string(),
  name: z.string().optional(),
});

export const EcbDimensionSchema = z.object({
  id: z.string(),
  values: z.array(EcbDimensionValueSchema),
});

/**
 * Series are keyed by colon separated dimension indexes ("0:12:0:0:0");
 * observations by the index into the TIME_PERIOD dimension ("0", "1", ...).
 * The first element of an observation is the rate; the rest are attributes.
 */
export const EcbSeriesSchema = z.object({
  observations: z.record(z.array(z.unknown())),
});

export const EcbDataResponseSchema = z.object({
  dataSets: z.array(
    z.object({
      series: z.record(EcbSeriesSchema),
    })
  ),
  structure: z.object({
    dimensions: z.object({
      series: z.array(EcbDimensionSchema),
      observation: z.array(EcbDimensionSchema),
    }),
  }),
});

export type EcbDataResponse = z.infer<typeof EcbDataResponseSchema>;
