/**
 * `mastery proficiency <learnerId>` - per-topic proficiency table.
 */

import type { Command } from 'commander';
import { NotFoundError } from '../../core/errors';
import type { CliContext } from '../context';
import { bold, dim, formatProficiency, formatSeparator, yellow } from '../utils/terminal';

export function registerProficiencyCommand(program: Command, ctx: CliContext): void {
  program
    .command('proficiency <learnerId>')
    .description('Show topic proficiency for a learner')
    .action(async (learnerId: string) => {
      const repos = ctx.repositories();
      const learner = await repos.learners.findById(learnerId);
      if (!learner) {
        throw new NotFoundError('Learner', learnerId);
      }

      const rows = await repos.topicProficiencies.findByLearner(learnerId);
      ctx.write(bold(`Topic proficiency for ${learner.name}`));
      ctx.write(formatSeparator(60));

      if (rows.length === 0) {
        ctx.write(yellow('  No quiz attempts yet.'));
        return;
      }

      const width = Math.max(...rows.map((row) => row.topic.length));
      for (const row of rows) {
        const attempts = `${row.attemptCount} attempt${row.attemptCount === 1 ? '' : 's'}`;
        ctx.write(`  ${row.topic.padEnd(width)}  ${formatProficiency(row.proficiency)}  ${dim(attempts)}`);
      }
    });
}
