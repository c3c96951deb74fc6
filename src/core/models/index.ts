/**
 * Core Domain Models - Barrel Export
 *
 * These types form the contract between the core, storage, API and CLI
 * layers and have no runtime dependencies.
 *
 * @example
 * ```typescript
 * import type { Flashcard, ReviewState, Quiz } from '@/core/models';
 * ```
 */

// SM-2 scheduling state
export type { ConfidenceRating, ReviewState } from './review-state';

// Flashcards owned by a learner
export type { FlashcardDifficulty, Flashcard } from './flashcard';

// Quizzes and their submissions
export type {
  QuestionExplanation,
  QuizQuestion,
  Quiz,
  QuizSummary,
  QuizAttempt,
} from './quiz';

// Learners and per-topic mastery
export type { Learner, TopicProficiency, LearnerProfile } from './learner';
