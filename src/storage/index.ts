/**
 * Storage Module - Barrel Export
 *
 * Usage:
 *   import { createDatabase, createRepositories } from '@/storage';
 *
 *   const { db } = createDatabase(config.database.path);
 *   const repos = createRepositories(db);
 */

export { createDatabase } from './db';
export type { AppDatabase, SqliteConnection, DatabaseOptions } from './db';
export { runMigrations, listTables, MIGRATIONS_FOLDER } from './migrate';
export type { MigrationResult } from './migrate';

export {
  learners,
  topicProficiencies,
  flashcards,
  quizzes,
  quizAttempts,
} from './schema';

export * from './repositories';
