export { flushLoggers, formatLabel, getLogger, type Logger } from './pino-logger.js';
export { loggerEnvSchema, logLevelsSchema, validateLoggerEnv, type LoggerEnvConfig, type LogLevelName } from './env.schema.js';
