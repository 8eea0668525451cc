import { z } from 'zod';

export const logLevelsSchema = {
  // passes the default info level
  audit: 35,
  debug: 20,
  error: 50,
  info: 30,
  trace: 10,
  warn: 40,
} as const;

export type LogLevelName = keyof typeof logLevelsSchema;

const booleanFlag = (defaultValue: 'true' | 'false') =>
  z
    .string()
    .default(defaultValue)
    .transform((val: string) => val === 'true');

export const loggerEnvSchema = z.object({
  LOGGER_AUDIT_LOG_DIRNAME: z.string().trim().min(1, { message: 'Invalid audit log directory name' }).default('logs'),
  // Off under tests so no worker threads are spawned
  LOGGER_AUDIT_LOG_ENABLED: booleanFlag(process.env['NODE_ENV'] === 'test' ? 'false' : 'true'),
  LOGGER_AUDIT_LOG_FILENAME: z.string().trim().min(1, { message: 'Invalid audit log file name' }).default('audit'),
  LOGGER_AUDIT_LOG_RETENTION_DAYS: z.coerce.number().int().positive().default(30),
  LOGGER_CONSOLE_ENABLED: booleanFlag('true'),
  LOGGER_FILE_LOG_ENABLED: booleanFlag('false'),
  LOGGER_FILE_LOG_FILENAME: z.string().trim().min(1, { message: 'Invalid file log name' }).default('application.log'),
  LOGGER_LOG_LEVEL: z
    .enum(['audit', 'trace', 'debug', 'info', 'warn', 'error'], {
      errorMap: () => ({ message: 'Invalid log level' }),
    })
    .default('info'),
  LOGGER_SERVICE_NAME: z.string().default('ratesync'),
  NODE_ENV: z.enum(['production', 'development', 'test']).default('development'),
});

export type LoggerEnvConfig = z.infer<typeof loggerEnvSchema>;

export function validateLoggerEnv(env: NodeJS.ProcessEnv = process.env): LoggerEnvConfig {
  return loggerEnvSchema.parse(env);
}
