import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

import BetterSqlite3 from 'better-sqlite3';

export type SqliteDatabase = InstanceType<typeof BetterSqlite3>;

export const inMemoryDatabasePath = ':memory:';

export function openSqliteDatabase(databasePath: string): SqliteDatabase {
  if (databasePath !== inMemoryDatabasePath) {
    mkdirSync(dirname(databasePath), {
      recursive: true,
      mode: 0o700,
    });
  }

  const database = new BetterSqlite3(databasePath);
  configureSqliteDatabase(database);

  return database;
}

export function configureSqliteDatabase(database: SqliteDatabase): void {
  database.pragma('journal_mode = WAL');
  database.pragma('synchronous = NORMAL');
  database.pragma('busy_timeout = 5000');
}

// Folds the WAL back into the main file so a stopped queue leaves a single database file behind.
export function closeSqliteDatabase(database: SqliteDatabase): void {
  if (!database.open) {
    return;
  }

  if (database.name !== inMemoryDatabasePath) {
    database.pragma('wal_checkpoint(TRUNCATE)');
  }

  database.close();
}
