/**
 * Database Migration Runner
 *
 * Applies the drizzle-kit migrations in ./drizzle with Drizzle's
 * better-sqlite3 migrator. Applied migrations are tracked in
 * `__drizzle_migrations`, so running this more than once only applies new
 * ones.
 *
 * Usage:
 *   npm run db:generate   # after changing src/storage/schema.ts
 *   npm run db:migrate
 */

import type Database from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import { migrate } from 'drizzle-orm/better-sqlite3/migrator';
import { readMigrationFiles } from 'drizzle-orm/migrator';
import { fileURLToPath } from 'node:url';

/** Migrations generated by drizzle-kit (see drizzle.config.ts). */
export const MIGRATIONS_FOLDER = fileURLToPath(new URL('../../drizzle', import.meta.url));

const MIGRATIONS_TABLE = '__drizzle_migrations';

export interface MigrationOptions {
  migrationsFolder?: string;
  verbose?: boolean;
}

export interface MigrationResult {
  /** Migrations applied by this run. */
  applied: number;
  /** Migrations in the folder. */
  total: number;
}

/**
 * Applies every migration not yet recorded in `__drizzle_migrations`.
 *
 * @throws If the folder has no `meta/_journal.json` (run `npm run
 *   db:generate`), or the underlying SQLite error if a migration fails
 */
export function runMigrations(
  sqlite: Database.Database,
  options: MigrationOptions = {}
): MigrationResult {
  const migrationsFolder = options.migrationsFolder ?? MIGRATIONS_FOLDER;
  const log = options.verbose ? (message: string) => console.log(`[migrate] ${message}`) : () => undefined;

  log(`Migrations folder: ${migrationsFolder}`);
  const total = readMigrationFiles({ migrationsFolder }).length;
  const before = countApplied(sqlite);

  migrate(drizzle(sqlite), { migrationsFolder });

  const applied = countApplied(sqlite) - before;
  log(`${applied} applied, ${total - applied} already up to date`);
  return { applied, total };
}

/**
 * Lists application tables (excluding SQLite internals and the migrations table).
 */
export function listTables(sqlite: Database.Database): string[] {
  return sqlite
    .prepare<[], { name: string }>(
      `SELECT name FROM sqlite_master
       WHERE type = 'table' AND name NOT LIKE 'sqlite_%' AND name != '${MIGRATIONS_TABLE}'
       ORDER BY name`
    )
    .all()
    .map((row) => row.name);
}

function countApplied(sqlite: Database.Database): number {
  const table = sqlite
    .prepare<[string], { name: string }>(
      "SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?"
    )
    .get(MIGRATIONS_TABLE);
  if (!table) {
    return 0;
  }

  const row = sqlite
    .prepare<[], { count: number }>(`SELECT count(*) AS count FROM ${MIGRATIONS_TABLE}`)
    .get();
  return row?.count ?? 0;
}
