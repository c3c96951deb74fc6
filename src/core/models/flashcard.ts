/**
 * Flashcard Domain Types
 *
 * A flashcard is a front/back prompt owned by one learner, grouped by topic,
 * and scheduled with SM-2 through its embedded ReviewState.
 */

import type { ReviewState } from './review-state';

/** Declared difficulty of a generated or hand-written card. */
export type FlashcardDifficulty = 'easy' | 'medium' | 'hard';

/**
 * @example
 * ```typescript
 * const card: Flashcard = {
 *   id: 'fc_1f0c...',
 *   learnerId: 'lr_9a2b...',
 *   topic: 'Photosynthesis',
 *   front: 'Where do the light-dependent reactions happen?',
 *   back: 'In the thylakoid membranes of the chloroplast',
 *   difficulty: 'medium',
 *   explanation: null,
 *   reviewState: {
 *     easeFactor: 2.5,
 *     intervalDays: 0,
 *     repetitions: 0,
 *     nextReviewAt: new Date('2024-01-15T10:00:00Z'),
 *     lastReviewedAt: null,
 *     lastConfidence: null,
 *   },
 *   version: 0,
 *   createdAt: new Date('2024-01-15T10:00:00Z'),
 *   updatedAt: new Date('2024-01-15T10:00:00Z'),
 * };
 * ```
 */
export interface Flashcard {
  id: string;
  learnerId: string;
  topic: string;
  front: string;
  back: string;
  difficulty: FlashcardDifficulty;
  /** Optional extra context shown after the answer is revealed. */
  explanation: string | null;
  reviewState: ReviewState;
  /**
   * Incremented on every review write. Used to detect a concurrent review
   * from another process.
   */
  version: number;
  createdAt: Date;
  updatedAt: Date;
}
