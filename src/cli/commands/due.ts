/**
 * `mastery due <learnerId>` - flashcards due for review now, most overdue
 * first.
 */

import type { Command } from 'commander';
import { daysUntilDue } from '../../core/sm2';
import { NotFoundError } from '../../core/errors';
import type { CliContext } from '../context';
import { bold, dim, formatDate, green, red, truncate } from '../utils/terminal';

interface DueOptions {
  topic?: string;
}

export function registerDueCommand(program: Command, ctx: CliContext): void {
  program
    .command('due <learnerId>')
    .description('List flashcards due for review')
    .option('-t, --topic <topic>', 'Only cards in this topic')
    .action(async (learnerId: string, options: DueOptions) => {
      const repos = ctx.repositories();
      if (!(await repos.learners.findById(learnerId))) {
        throw new NotFoundError('Learner', learnerId);
      }

      const now = ctx.now();
      const cards = await repos.flashcards.findByLearner(learnerId, {
        topic: options.topic,
        dueBy: now,
      });

      if (cards.length === 0) {
        ctx.write(green('Nothing due. Come back later!'));
        return;
      }

      ctx.write(bold(`${cards.length} card(s) due:`));
      for (const card of cards) {
        const overdue = -daysUntilDue(card.reviewState, now);
        const when =
          overdue > 0 ? red(`${overdue}d overdue`) : dim(`due ${formatDate(card.reviewState.nextReviewAt)}`);
        ctx.write(`  ${card.id}  [${card.topic}] ${truncate(card.front, 50)}  ${when}`);
      }
    });
}
