import { describe, expect, it } from 'vitest';

import { validateLoggerEnv } from '../env.schema.js';
import { formatLabel, getLogger } from '../pino-logger.js';

describe('getLogger', () => {
  it('returns the same instance for a category', () => {
    expect(getLogger('RateStore')).toBe(getLogger('RateStore'));
  });

  it('returns distinct loggers for distinct categories', () => {
    expect(getLogger('RateStore')).not.toBe(getLogger('SyncOrchestrator'));
  });

  it('binds the category to every record', () => {
    const logger = getLogger('QueryService');
    expect(logger.bindings()).toMatchObject({ category: 'QueryService' });
  });

  it('exposes the audit level', () => {
    const logger = getLogger('audit-test');
    expect(typeof logger.audit).toBe('function');
    expect(() => logger.audit({ provider: 'ecb' }, 'sync finished')).not.toThrow();
  });
});

describe('formatLabel', () => {
  it('pads short labels to the requested width', () => {
    expect(formatLabel('ecb', 6)).toBe('   ecb');
  });

  it('truncates long labels with a leading ellipsis', () => {
    expect(formatLabel('SyncOrchestrator', 8)).toBe('…strator');
  });
});

describe('validateLoggerEnv', () => {
  it('applies defaults', () => {
    const env = validateLoggerEnv({ NODE_ENV: 'production' });
    expect(env.LOGGER_LOG_LEVEL).toBe('info');
    expect(env.LOGGER_SERVICE_NAME).toBe('ratesync');
    expect(env.LOGGER_AUDIT_LOG_RETENTION_DAYS).toBe(30);
    expect(env.LOGGER_FILE_LOG_ENABLED).toBe(false);
  });

  it('parses boolean flags and numbers', () => {
    const env = validateLoggerEnv({
      LOGGER_AUDIT_LOG_RETENTION_DAYS: '7',
      LOGGER_CONSOLE_ENABLED: 'false',
      LOGGER_FILE_LOG_ENABLED: 'true',
    });
    expect(env.LOGGER_AUDIT_LOG_RETENTION_DAYS).toBe(7);
    expect(env.LOGGER_CONSOLE_ENABLED).toBe(false);
    expect(env.LOGGER_FILE_LOG_ENABLED).toBe(true);
  });

  it('rejects unknown log levels', () => {
    expect(() => validateLoggerEnv({ LOGGER_LOG_LEVEL: 'verbose' })).toThrow('Invalid log level');
  });
});
