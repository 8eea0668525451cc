import { sql } from 'kysely';
import { describe, expect, it } from 'vitest';

import { closeSqliteDatabase } from '../close.js';
import { createSqliteDatabase } from '../database.js';

interface FlagsTable {
  name: string;
  enabled: number;
  note: string | null;
}

interface TestDatabase {
  flags: FlagsTable;
}

describe('createSqliteDatabase', () => {
  it('opens an in-memory database', async () => {
    const db = createSqliteDatabase<Record<string, never>>(':memory:')._unsafeUnwrap();

    const row = await sql<{ value: number }>`select 1 as value`.execute(db);
    expect(row.rows[0]?.value).toBe(1);

    expect((await closeSqliteDatabase(db)).isOk()).toBe(true);
  });

  it('binds booleans as integers and undefined as null', async () => {
    const db = createSqliteDatabase<TestDatabase>(':memory:')._unsafeUnwrap();
    await db.schema
      .createTable('flags')
      .addColumn('name', 'text', (c) => c.primaryKey())
      .addColumn('enabled', 'integer', (c) => c.notNull())
      .addColumn('note', 'text')
      .execute();

    const enabled: boolean = true;
    const note: string | undefined = undefined;
    await sql`insert into flags (name, enabled, note) values (${'ecb'}, ${enabled}, ${note})`.execute(db);

    const rows = await db.selectFrom('flags').selectAll().execute();
    expect(rows).toEqual([{ enabled: 1, name: 'ecb', note: null }]);

    await closeSqliteDatabase(db);
  });

  it('reports a StoreError when the file cannot be opened', () => {
    const result = createSqliteDatabase('/proc/ratesync-missing/rates.db');
    expect(result.isErr()).toBe(true);
    expect(result._unsafeUnwrapErr().operation).toBe('open');
  });
});
