import { existsSync } from 'node:fs';
import { readdir, readFile } from 'node:fs/promises';
import { dirname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { toErrorMessage } from '../shared/errors.js';
import type { SqliteDatabase } from './sqlite.js';

const migrationTableSql = `
CREATE TABLE IF NOT EXISTS schema_migrations (
  name TEXT PRIMARY KEY,
  applied_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
);
`;

const defaultMigrationsDir = resolveMigrationsDir(dirname(fileURLToPath(import.meta.url)));

interface MigrationFile {
  name: string;
  path: string;
}

interface LoadedMigration {
  name: string;
  sql: string;
}

/** Finds `migrations/` from `src/server` (sources) or `dist/src/server` (build output). */
export function resolveMigrationsDir(moduleDir: string): string {
  const sourceLayout = resolve(moduleDir, '../../migrations');
  const buildLayout = resolve(moduleDir, '../../../migrations');

  if (!existsSync(sourceLayout) && existsSync(buildLayout)) {
    return buildLayout;
  }

  return sourceLayout;
}

/** Applies pending migrations and returns the names applied by this call. */
export async function runMigrations(
  database: SqliteDatabase,
  migrationsDir: string = defaultMigrationsDir,
): Promise<string[]> {
  database.exec(migrationTableSql);

  const migrationFiles = await loadMigrationFiles(migrationsDir);
  if (migrationFiles.length === 0) {
    throw new Error(`no migration files found in ${migrationsDir}`);
  }

  const migrations = await loadMigrationSources(migrationFiles);
  return applyPendingMigrations(database, migrations);
}

async function loadMigrationFiles(migrationsDir: string): Promise<MigrationFile[]> {
  const entries = await readdir(migrationsDir, {
    withFileTypes: true,
  });

  return entries
    .filter((entry) => entry.isFile() && entry.name.endsWith('.sql'))
    .map((entry) => ({
      name: entry.name,
      path: join(migrationsDir, entry.name),
    }))
    .sort((left, right) => left.name.localeCompare(right.name));
}

async function loadMigrationSources(files: MigrationFile[]): Promise<LoadedMigration[]> {
  return Promise.all(
    files.map(async (file) => ({
      name: file.name,
      sql: await readFile(file.path, 'utf8'),
    })),
  );
}

function applyPendingMigrations(database: SqliteDatabase, migrations: LoadedMigration[]): string[] {
  let currentMigrationName: string | undefined;
  const appliedNow: string[] = [];

  const apply = database.transaction((pendingMigrations: LoadedMigration[]) => {
    const applied = getAppliedMigrations(database);

    for (const migration of pendingMigrations) {
      if (applied.has(migration.name)) {
        continue;
      }

      currentMigrationName = migration.name;
      database.exec(migration.sql);
      database.prepare('INSERT INTO schema_migrations (name) VALUES (?)').run(migration.name);
      applied.add(migration.name);
      appliedNow.push(migration.name);
    }
  });

  try {
    apply.immediate(migrations);
  } catch (error) {
    if (currentMigrationName) {
      throw new Error(`failed to apply migration ${currentMigrationName}: ${toErrorMessage(error)}`);
    }

    throw new Error(`failed to run migrations: ${toErrorMessage(error)}`);
  }

  return appliedNow;
}

function getAppliedMigrations(database: SqliteDatabase): Set<string> {
  const rows = database.prepare<unknown[], { name: string }>('SELECT name FROM schema_migrations').all();
  return new Set(rows.map((row) => row.name));
}
