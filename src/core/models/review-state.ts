/**
 * ReviewState Domain Types
 *
 * The SM-2 scheduling state carried by every flashcard. It is created with
 * defaults when the card is created and replaced (never mutated) each time
 * the learner submits a review.
 */

/**
 * Learner self-rating for a review, 1 (total failure) to 5 (perfect recall).
 */
export type ConfidenceRating = 1 | 2 | 3 | 4 | 5;

export interface ReviewState {
  /**
   * SM-2 ease factor. Starts at 2.5 and never drops below 1.3.
   * Higher values stretch intervals faster after successful reviews.
   */
  easeFactor: number;

  /** Days until the next scheduled review. 0 for a card never reviewed. */
  intervalDays: number;

  /** Consecutive successful reviews since creation or the last failure. */
  repetitions: number;

  /** Instant the card becomes eligible for review again. */
  nextReviewAt: Date;

  /** Instant of the most recent review, or null if never reviewed. */
  lastReviewedAt: Date | null;

  /** Rating given at the most recent review, or null if never reviewed. */
  lastConfidence: ConfidenceRating | null;
}
