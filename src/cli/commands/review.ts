/**
 * `mastery review <learnerId> <flashcardId> <confidence>` - records a
 * review and prints the rescheduled state.
 */

import type { Command } from 'commander';
import { FlashcardService } from '../../core/learning';
import { CONFIDENCE_LABELS, isConfidenceRating, isSuccessfulRecall } from '../../core/sm2';
import { InvalidInputError } from '../../core/errors';
import { UnconfiguredContentGenerator } from '../../llm';
import type { CliContext } from '../context';
import { bold, formatDate, green, yellow } from '../utils/terminal';

export function registerReviewCommand(program: Command, ctx: CliContext): void {
  program
    .command('review <learnerId> <flashcardId> <confidence>')
    .description('Record a review (confidence 1-5)')
    .action(async (learnerId: string, flashcardId: string, confidenceArg: string) => {
      const confidence = Number(confidenceArg);
      if (!isConfidenceRating(confidence)) {
        throw new InvalidInputError(
          `Confidence must be an integer from 1 to 5, received '${confidenceArg}'`,
          'confidence'
        );
      }

      const service = new FlashcardService({
        flashcardRepo: ctx.repositories().flashcards,
        contentGenerator: new UnconfiguredContentGenerator(),
      });
      const card = await service.submitReview(learnerId, flashcardId, confidence, ctx.now());
      const state = card.reviewState;

      const label = CONFIDENCE_LABELS[confidence];
      const outcome = isSuccessfulRecall(confidence) ? green(label) : yellow(label);
      ctx.write(`${bold('Reviewed:')} ${card.front}`);
      ctx.write(`  Confidence:   ${confidence} (${outcome})`);
      ctx.write(
        `  Next review:  ${formatDate(state.nextReviewAt)} (in ${state.intervalDays} day${state.intervalDays === 1 ? '' : 's'})`
      );
      ctx.write(`  Ease factor:  ${state.easeFactor.toFixed(2)}`);
      ctx.write(`  Repetitions:  ${state.repetitions}`);
    });
}
