/**
 * Environment setup for the CLI - must be imported before any other module,
 * because the logger reads its transport settings when it loads.
 *
 * Logs go to a file by default so stdout stays reserved for command output
 * (the JSON envelope in particular). CLI_FILE_LOG_ENABLED and
 * CLI_CONSOLE_LOG_ENABLED override the defaults.
 */

process.env['LOGGER_FILE_LOG_ENABLED'] = process.env['CLI_FILE_LOG_ENABLED'] ?? 'true';
process.env['LOGGER_CONSOLE_ENABLED'] = process.env['CLI_CONSOLE_LOG_ENABLED'] ?? 'false';
process.env['LOGGER_SERVICE_NAME'] ??= 'ratesync-cli';
