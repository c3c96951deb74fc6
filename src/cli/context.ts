/**
 * Shared state handed to every CLI command.
 *
 * Commands write through `write` and read time through `now`, so tests can
 * run them against an in-memory database and capture their output.
 */

import type { Config } from '../config';
import { createDatabase, type DatabaseOptions } from '../storage/db';
import { createRepositories, type Repositories } from '../storage/repositories';

export type DatabaseHandle = ReturnType<typeof createDatabase>;

export interface CliContext {
  /** Opens the database once; later calls return the same handle. */
  openDatabase(options?: DatabaseOptions): DatabaseHandle;
  repositories(): Repositories;
  write(line?: string): void;
  now(): Date;
  /** Closes the database if it was opened. */
  close(): void;
}

/**
 * Context backed by the configured database file and stdout.
 */
export function createCliContext(config: Config): CliContext {
  let handle: DatabaseHandle | null = null;
  let repos: Repositories | null = null;

  const openDatabase = (options?: DatabaseOptions): DatabaseHandle => {
    if (!handle) {
      handle = createDatabase(config.database.path, options);
    }
    return handle;
  };

  return {
    openDatabase,
    repositories() {
      if (!repos) {
        repos = createRepositories(openDatabase().db);
      }
      return repos;
    },
    write: (line = '') => console.log(line),
    now: () => new Date(),
    close() {
      handle?.sqlite.close();
      handle = null;
      repos = null;
    },
  };
}
