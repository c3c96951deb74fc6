/**
 * Builds the `mastery` commander program.
 *
 * Commands:
 * - `migrate`                                   Apply pending migrations
 * - `learner create <name> <email>`             Register a learner
 * - `learner list`                              List learners
 * - `due <learnerId> [--topic <topic>]`         Flashcards due now
 * - `review <learnerId> <cardId> <confidence>`  Record a review
 * - `proficiency <learnerId>`                   Topic proficiency table
 */

import { Command } from 'commander';
import type { CliContext } from './context';
import { registerMigrateCommand } from './commands/migrate';
import { registerLearnerCommands } from './commands/learner';
import { registerDueCommand } from './commands/due';
import { registerReviewCommand } from './commands/review';
import { registerProficiencyCommand } from './commands/proficiency';

export function createProgram(ctx: CliContext): Command {
  const program = new Command('mastery')
    .description('Spaced-repetition flashcards and quiz proficiency tracking')
    .version('0.1.0');

  registerMigrateCommand(program, ctx);
  registerLearnerCommands(program, ctx);
  registerDueCommand(program, ctx);
  registerReviewCommand(program, ctx);
  registerProficiencyCommand(program, ctx);

  return program;
}
