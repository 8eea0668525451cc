export { createSqliteDatabase } from './database.js';
export { runMigrations } from './migrations.js';
export { closeSqliteDatabase } from './close.js';

// Kysely surface used by schemas and migrations
export { Kysely, sql, type ColumnType, type Migration } from 'kysely';
