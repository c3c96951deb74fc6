/**
 * `mastery migrate` - applies pending drizzle-kit migrations to the configured
 * database and lists the resulting tables.
 */

import type { Command } from 'commander';
import { listTables, runMigrations } from '../../storage/migrate';
import type { CliContext } from '../context';
import { bold, dim, green } from '../utils/terminal';

export function registerMigrateCommand(program: Command, ctx: CliContext): void {
  program
    .command('migrate')
    .description('Apply pending database migrations')
    .action(() => {
      const { sqlite } = ctx.openDatabase({ migrate: false });
      const result = runMigrations(sqlite);

      if (result.applied === 0) {
        ctx.write(dim('Database is up to date.'));
      } else {
        ctx.write(`${green('applied')} ${result.applied} of ${result.total} migrations`);
      }
      ctx.write(`${bold('Tables:')} ${listTables(sqlite).join(', ')}`);
    });
}
