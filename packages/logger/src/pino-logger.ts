import fs from 'node:fs';
import os from 'node:os';
import { Writable } from 'node:stream';

import pino from 'pino';

import { logLevelsSchema, validateLoggerEnv } from './env.schema.js';

// Validate environment variables (reads NODE_ENV directly from process.env)
const env = validateLoggerEnv(process.env);

/**
 * Formats a log label string to be a fixed length. When the label string
 * is longer than the specified size, it is truncated and prefixed by a
 * horizontal ellipsis (…).
 */
export function formatLabel(label: string, size: number): string {
  const str = label.padStart(size);
  return str.length <= size ? str : `…${str.slice(-size + 1)}`;
}

/**
 * Pino logger with the extra `audit` level used for sync run records.
 */
export type Logger = pino.Logger<'audit'>;

const loggerCache = new Map<string, Logger>();

let rootLogger: Logger | undefined;

interface TransportTarget {
  level: string;
  options: Record<string, unknown>;
  target: string;
}

function ensureLogDirExists(dirPath: string): void {
  if (!fs.existsSync(dirPath)) {
    fs.mkdirSync(dirPath, { recursive: true });
  }
}

function isTestEnvironment(): boolean {
  // vitest may set these after this module was first evaluated
  return env.NODE_ENV === 'test' || process.env['NODE_ENV'] === 'test' || process.env['VITEST'] === 'true';
}

function buildTransportTargets(): TransportTarget[] {
  const targets: TransportTarget[] = [];

  if (env.LOGGER_CONSOLE_ENABLED) {
    if (env.NODE_ENV === 'development') {
      targets.push({
        level: 'trace',
        options: {
          ignore: 'pid,hostname,category,service,environment',
          messageFormat: '[{categoryLabel}] {msg}',
        },
        target: 'pino-pretty',
      });
    } else {
      // JSON lines on stdout for log collectors
      targets.push({
        level: 'trace',
        options: { destination: 1 },
        target: 'pino/file',
      });
    }
  }

  if (env.LOGGER_FILE_LOG_ENABLED) {
    targets.push({
      level: 'trace',
      options: {
        destination: `./${env.LOGGER_AUDIT_LOG_DIRNAME}/${env.LOGGER_FILE_LOG_FILENAME}`,
        mkdir: true,
      },
      target: 'pino/file',
    });
  }

  if (env.LOGGER_AUDIT_LOG_ENABLED) {
    ensureLogDirExists(env.LOGGER_AUDIT_LOG_DIRNAME);
    targets.push({
      level: 'audit',
      options: {
        file: `./${env.LOGGER_AUDIT_LOG_DIRNAME}/${env.LOGGER_AUDIT_LOG_FILENAME}_${os.hostname()}.log`,
        frequency: 'daily',
        limit: { count: env.LOGGER_AUDIT_LOG_RETENTION_DAYS },
        mkdir: true,
        size: '10m',
      },
      target: 'pino-roll',
    });
  }

  return targets;
}

function createRootLogger(): Logger {
  const pinoConfig: pino.LoggerOptions<'audit'> = {
    base: {
      environment: env.NODE_ENV,
      hostname: os.hostname(),
      pid: process.pid,
      service: env.LOGGER_SERVICE_NAME,
    },
    customLevels: logLevelsSchema,
    level: env.LOGGER_LOG_LEVEL,
    timestamp: pino.stdTimeFunctions.isoTime,
    useOnlyCustomLevels: true,
  };

  // Tests get a noop stream so no transport worker threads are spawned
  if (isTestEnvironment()) {
    const noopStream = new Writable({
      write(_chunk, _encoding, callback) {
        callback();
      },
    });
    return pino.pino<'audit'>(pinoConfig, noopStream);
  }

  const transportTargets = buildTransportTargets();
  if (transportTargets.length > 0) {
    pinoConfig.transport = { targets: transportTargets };
  }
  return pino.pino<'audit'>(pinoConfig);
}

/**
 * Returns the cached child logger for a category, creating the root logger on first use.
 *
 * Transport settings are read from the environment when this module loads, so
 * entry points that change `LOGGER_*` variables must do so before importing it.
 */
export function getLogger(category: string): Logger {
  const cached = loggerCache.get(category);
  if (cached) return cached;

  if (!rootLogger) {
    rootLogger = createRootLogger();
  }

  const categoryLogger = rootLogger.child({
    category,
    categoryLabel: formatLabel(category, 25),
  });

  loggerCache.set(category, categoryLogger);
  return categoryLogger;
}

/**
 * Flush buffered output; used by entry points before exiting.
 */
export function flushLoggers(): void {
  rootLogger?.flush();
}
