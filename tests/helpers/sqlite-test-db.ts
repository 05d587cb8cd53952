import BetterSqlite3 from 'better-sqlite3';
import { afterAll, beforeAll, beforeEach } from 'vitest';

import { runMigrations } from '../../src/server/migrations.js';
import {
  closeSqliteDatabase,
  configureSqliteDatabase,
  inMemoryDatabasePath,
  type SqliteDatabase,
} from '../../src/server/sqlite.js';

interface SqliteTestDb {
  database: SqliteDatabase;
}

export function useSqliteTestDb(): SqliteTestDb {
  const database = new BetterSqlite3(inMemoryDatabasePath);
  configureSqliteDatabase(database);

  beforeAll(async () => {
    await runMigrations(database);
  });

  beforeEach(() => {
    database.exec('DELETE FROM tasks;');
  });

  afterAll(async () => {
    closeSqliteDatabase(database);
  });

  return {
    database,
  };
}
