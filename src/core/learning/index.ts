/**
 * Learning Services - Barrel Export
 *
 * The calling layer around the SM-2 scheduler and proficiency tracker:
 * persistence, ownership checks and per-key serialization.
 */

export { KeyedLock } from './key-lock';
export { generateId, type IdPrefix } from './ids';

export {
  FlashcardService,
  type FlashcardServiceDependencies,
  type NewFlashcard,
  type FlashcardListOptions,
} from './flashcard-service';

export {
  QuizService,
  type QuizServiceDependencies,
  type NewQuiz,
  type NewQuizQuestion,
  type QuizSubmission,
  type QuizSubmissionOutcome,
} from './quiz-service';
