import 'reflect-metadata';

import { NestFactory } from '@nestjs/core';
import { getErrorMessage } from '@ratesync/core';
import { loadConfig, type AppConfig } from '@ratesync/env';
import { flushLoggers, getLogger } from '@ratesync/logger';
import { closeRateRuntime, createRateRuntime, type ProviderSyncResult, type RateRuntime } from '@ratesync/rates';

import { AppModule } from './app.module.js';
import { configureApp } from './configure-app.js';
import { DEFAULT_API_INFO } from './tokens.js';

const logger = getLogger('Bootstrap');

function logSyncResults(label: string, results: readonly ProviderSyncResult[]): void {
  for (const { provider, result } of results) {
    if (result.isOk()) {
      logger.info(
        { provider, rowsWritten: result.value.rowsWritten, status: result.value.status },
        `${label} sync finished for ${provider}`
      );
    } else {
      logger.warn({ error: result.error, provider }, `${label} sync failed for ${provider}: ${result.error.message}`);
    }
  }
}

async function seedIfEmpty(runtime: RateRuntime): Promise<void> {
  const seeded = await runtime.orchestrator.bootstrap(runtime.bundles);
  if (seeded.isErr()) {
    logger.error({ error: seeded.error }, `Bootstrap from history files failed: ${seeded.error.message}`);
    return;
  }
  logSyncResults('Bootstrap', seeded.value);
}

async function runStartupSync(runtime: RateRuntime): Promise<void> {
  try {
    logSyncResults('Startup', await runtime.orchestrator.syncAll('startup'));
  } catch (error) {
    logger.error({ error }, `Startup sync crashed: ${getErrorMessage(error)}`);
  }
}

async function bootstrap(config: AppConfig): Promise<void> {
  const runtimeResult = await createRateRuntime(config);
  if (runtimeResult.isErr()) {
    throw runtimeResult.error;
  }
  const runtime = runtimeResult.value;

  if (config.seedOnStartup) {
    await seedIfEmpty(runtime);
  }

  const app = configureApp(
    await NestFactory.create(
      AppModule.forRoot({
        info: DEFAULT_API_INFO,
        orchestrator: runtime.orchestrator,
        queries: runtime.queries,
        schedule: { cron: config.syncCron },
      }),
      { logger: false }
    )
  );
  await app.listen(config.port, config.host);
  logger.info(`Application is running on: http://${config.host}:${config.port}`);

  if (config.syncOnStartup) {
    void runStartupSync(runtime);
  }

  let shuttingDown = false;
  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`${signal} received, shutting down`);

    // stops the scheduled sync job too
    await app.close();
    const closed = await closeRateRuntime(runtime);
    if (closed.isErr()) {
      logger.error({ error: closed.error }, closed.error.message);
      process.exitCode = 1;
    }
    flushLoggers();
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      void shutdown(signal);
    });
  }
}

const config = loadConfig();
if (config.isErr()) {
  logger.error(config.error.message);
  flushLoggers();
  process.exitCode = 1;
} else {
  bootstrap(config.value).catch((error: unknown) => {
    logger.error({ error }, `Startup failed: ${getErrorMessage(error)}`);
    flushLoggers();
    process.exit(1);
  });
}
