import path from 'node:path';

import { CurrencySchema } from '@ratesync/core';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import { z } from 'zod';

const booleanFlag = (defaultValue: boolean) =>
  z
    .enum(['true', 'false', '1', '0'])
    .optional()
    .transform((val) => (val === undefined ? defaultValue : val === 'true' || val === '1'));

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  RATESYNC_DATA_DIR: z.string().min(1).optional(),
  DATABASE_PATH: z.string().min(1).optional(),
  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(1).max(65_535).default(8080),
  REFERENCE_CURRENCY: CurrencySchema.default('USD'),
  DEFAULT_API_BASE: CurrencySchema.default('USD'),
  ENABLED_PROVIDERS: z
    .string()
    .default('ecb,nbu')
    .transform((val) =>
      val
        .split(',')
        .map((id) => id.trim().toLowerCase())
        .filter((id) => id.length > 0)
    ),
  SEED_ON_STARTUP: booleanFlag(true),
  ECB_SEED_PATH: z.string().min(1).default('seed_data/ecb-full-hist.xml'),
  NBU_SEED_PATH: z.string().min(1).default('seed_data/nbu-full-hist.json'),
  SYNC_ON_STARTUP: booleanFlag(true),
  // seconds field optional; evaluated in UTC
  SYNC_CRON: z
    .string()
    .trim()
    .refine((val) => [5, 6].includes(val.split(/\s+/).length), {
      message: 'SYNC_CRON must be a cron expression with 5 or 6 fields',
    })
    .default('0 0 16 * * *'),
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
});

type ValidatedEnv = z.infer<typeof envSchema>;

export interface AppConfig {
  nodeEnv: ValidatedEnv['NODE_ENV'];
  dataDirectory: string;
  databasePath: string;
  host: string;
  port: number;
  referenceCurrency: ValidatedEnv['REFERENCE_CURRENCY'];
  defaultApiBase: ValidatedEnv['DEFAULT_API_BASE'];
  enabledProviders: string[];
  seedOnStartup: boolean;
  seedPaths: { ecb: string; nbu: string };
  syncOnStartup: boolean;
  syncCron: string;
  fetchTimeoutMs: number;
}

/**
 * Validate the process environment into an AppConfig.
 * Every issue is listed in the returned error, one per line.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): Result<AppConfig, Error> {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const errors = result.error.issues.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
    return err(new Error(`Environment validation failed:\n${errors}`));
  }

  const parsed = result.data;
  const dataDirectory = path.resolve(cwd, parsed.RATESYNC_DATA_DIR ?? 'data');

  return ok({
    nodeEnv: parsed.NODE_ENV,
    dataDirectory,
    databasePath:
      parsed.DATABASE_PATH === ':memory:'
        ? ':memory:'
        : path.resolve(cwd, parsed.DATABASE_PATH ?? path.join(dataDirectory, 'rates.db')),
    host: parsed.HOST,
    port: parsed.PORT,
    referenceCurrency: parsed.REFERENCE_CURRENCY,
    defaultApiBase: parsed.DEFAULT_API_BASE,
    enabledProviders: parsed.ENABLED_PROVIDERS,
    seedOnStartup: parsed.SEED_ON_STARTUP,
    seedPaths: {
      ecb: path.resolve(cwd, parsed.ECB_SEED_PATH),
      nbu: path.resolve(cwd, parsed.NBU_SEED_PATH),
    },
    syncOnStartup: parsed.SYNC_ON_STARTUP,
    syncCron: parsed.SYNC_CRON,
    fetchTimeoutMs: parsed.FETCH_TIMEOUT_MS,
  });
}

let cachedConfig: AppConfig | undefined;

/**
 * Validates the environment on first access and caches the result.
 * @throws Error if validation fails
 */
export function getConfig(): AppConfig {
  if (!cachedConfig) {
    const result = loadConfig();
    if (result.isErr()) {
      throw result.error;
    }
    cachedConfig = result.value;
  }
  return cachedConfig;
}
