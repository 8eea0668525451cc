import { z } from 'zod';

export const JsonFlagSchema = z.object({
  json: z.boolean().optional(),
});

export const SeedCommandOptionsSchema = JsonFlagSchema;

export const SyncCommandOptionsSchema = JsonFlagSchema;

export const PeekCommandOptionsSchema = JsonFlagSchema;

export const StatusCommandOptionsSchema = JsonFlagSchema.extend({
  runs: z.coerce.number().int().positive().max(500).default(5),
});

/**
 * from/to/amount are passed through as strings; the rates package validates them
 * the same way the HTTP API does.
 */
export const RatesCommandOptionsSchema = JsonFlagSchema.extend({
  amount: z.string().optional(),
  from: z.string().optional(),
  to: z.string().optional(),
});

export type StatusCommandOptions = z.infer<typeof StatusCommandOptionsSchema>;
export type RatesCommandOptions = z.infer<typeof RatesCommandOptionsSchema>;
