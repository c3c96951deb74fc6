/**
 * Repository Layer - Barrel Export
 *
 * @example
 * ```typescript
 * import { FlashcardRepository, LearnerRepository } from '@/storage/repositories';
 *
 * const learnerRepo = new LearnerRepository(db);
 * const flashcardRepo = new FlashcardRepository(db);
 * ```
 */

// Base repository interface
export type { Repository, PageOptions } from './base';
export { DEFAULT_PAGE_LIMIT } from './base';

export {
  LearnerRepository,
  type CreateLearnerInput,
  type UpdateLearnerInput,
} from './learner.repository';

export {
  TopicProficiencyRepository,
  type SaveTopicProficiencyInput,
} from './topic-proficiency.repository';

export {
  FlashcardRepository,
  type CreateFlashcardInput,
  type UpdateFlashcardInput,
  type FlashcardFilters,
  type TopicCount,
} from './flashcard.repository';

export {
  QuizRepository,
  type CreateQuizInput,
  type UpdateQuizInput,
} from './quiz.repository';

export {
  QuizAttemptRepository,
  type CreateQuizAttemptInput,
  type AttemptProficiencyUpdate,
} from './quiz-attempt.repository';

import type { AppDatabase } from '../db';
import { LearnerRepository } from './learner.repository';
import { TopicProficiencyRepository } from './topic-proficiency.repository';
import { FlashcardRepository } from './flashcard.repository';
import { QuizRepository } from './quiz.repository';
import { QuizAttemptRepository } from './quiz-attempt.repository';

/** Every repository, bound to one database. */
export interface Repositories {
  learners: LearnerRepository;
  topicProficiencies: TopicProficiencyRepository;
  flashcards: FlashcardRepository;
  quizzes: QuizRepository;
  quizAttempts: QuizAttemptRepository;
}

export function createRepositories(db: AppDatabase): Repositories {
  return {
    learners: new LearnerRepository(db),
    topicProficiencies: new TopicProficiencyRepository(db),
    flashcards: new FlashcardRepository(db),
    quizzes: new QuizRepository(db),
    quizAttempts: new QuizAttemptRepository(db),
  };
}
