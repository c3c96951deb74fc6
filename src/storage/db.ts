/**
 * Database Connection Factory
 *
 * Opens a better-sqlite3 connection, enables foreign keys, applies pending
 * migrations and wraps it with Drizzle ORM.
 *
 * Usage:
 *   import { createDatabase } from '@/storage/db';
 *
 *   const { db, sqlite } = createDatabase(config.database.path);
 *   const testDb = createDatabase(':memory:'); // in-memory for tests
 */

import Database from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import * as schema from './schema';
import { runMigrations } from './migrate';

export interface DatabaseOptions {
  /** Apply pending migrations on open. Defaults to true. */
  migrate?: boolean;
  /** Log each applied migration. Defaults to false. */
  verbose?: boolean;
}

/**
 * Opens (or creates) the SQLite database at `dbPath`.
 *
 * Foreign keys are disabled by default in SQLite; they are switched on here
 * so deleting a learner cascades to their cards, quizzes and attempts.
 *
 * @param dbPath - File path, or ':memory:' for an in-memory database
 */
export function createDatabase(dbPath: string, options: DatabaseOptions = {}) {
  if (dbPath !== ':memory:') {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  const sqlite = new Database(dbPath);
  sqlite.pragma('foreign_keys = ON');

  if (dbPath !== ':memory:') {
    sqlite.pragma('journal_mode = WAL');
  }

  if (options.migrate ?? true) {
    runMigrations(sqlite, { verbose: options.verbose ?? false });
  }

  const db = drizzle(sqlite, { schema });
  return { db, sqlite };
}

/**
 * Type alias for the Drizzle database instance.
 *
 * @example
 * function countLearners(database: AppDatabase) {
 *   return database.select().from(learners).all().length;
 * }
 */
export type AppDatabase = ReturnType<typeof createDatabase>['db'];

/** Raw better-sqlite3 connection. */
export type SqliteConnection = Database.Database;
