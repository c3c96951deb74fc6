/**
 * `mastery learner ...` - register and list learners.
 *
 * ```bash
 * mastery learner create "Ada Lovelace" ada@example.com
 * mastery learner list
 * ```
 */

import type { Command } from 'commander';
import { generateId } from '../../core/learning';
import type { CliContext } from '../context';
import { bold, dim, formatDate, formatSeparator, yellow } from '../utils/terminal';

export function registerLearnerCommands(program: Command, ctx: CliContext): void {
  const learner = program.command('learner').description('Manage learners');

  learner
    .command('create <name> <email>')
    .description('Register a new learner')
    .action(async (name: string, email: string) => {
      const created = await ctx.repositories().learners.create({
        id: generateId('lr'),
        name: name.trim(),
        email: email.trim(),
        createdAt: ctx.now(),
      });

      ctx.write(`Created learner ${bold(created.name)} <${created.email}>`);
      ctx.write(`  id: ${created.id}`);
    });

  learner
    .command('list')
    .description('List all learners')
    .action(async () => {
      const learners = await ctx.repositories().learners.findAll();

      if (learners.length === 0) {
        ctx.write(yellow('No learners found.'));
        ctx.write(dim('Create one with: mastery learner create <name> <email>'));
        return;
      }

      ctx.write(bold('Learners:'));
      ctx.write(formatSeparator(60));
      for (const entry of learners) {
        ctx.write(`  ${bold(entry.name)} <${entry.email}>`);
        ctx.write(`    ${dim(`${entry.id} · joined ${formatDate(entry.createdAt)}`)}`);
      }
    });
}
