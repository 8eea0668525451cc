import type { Migration } from '@ratesync/sqlite';

import * as initialSchema from './001_initial_schema.js';

export const ratesMigrations: Record<string, Migration> = {
  '001_initial_schema': initialSchema,
};
