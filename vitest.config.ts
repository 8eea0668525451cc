import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/src/**/*.test.ts', 'apps/*/src/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    globals: true,
    env: {
      LOGGER_CONSOLE_ENABLED: 'false',
      LOGGER_FILE_LOG_ENABLED: 'false',
    },
  },
});
