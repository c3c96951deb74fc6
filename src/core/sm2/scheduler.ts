/**
 * SM-2 Review Scheduler
 *
 * Pure functions that turn a learner's confidence rating plus a flashcard's
 * current ReviewState into the next ReviewState. Nothing here reads the
 * clock: every function takes `now` explicitly.
 *
 * Update rules:
 * - confidence 1-3 (quality < 3): repetitions reset to 0, interval 1 day,
 *   ease factor unchanged
 * - confidence 4-5 (quality >= 3): repetitions + 1, ease factor adjusted by
 *   `0.1 - (5 - q) * (0.08 + (5 - q) * 0.02)` and floored at 1.3; interval
 *   1 day, then 6 days, then `round(previousInterval * easeFactor)` with
 *   ties to even
 *
 * @example
 * ```typescript
 * const now = new Date();
 * const state = createInitialReviewState(now);
 * const next = scheduleNextReview(4, state, now);
 * next.intervalDays; // 1
 * ```
 */

import type { ConfidenceRating, ReviewState } from '../models';
import { InvalidInputError } from '../errors';
import {
  INITIAL_EASE_FACTOR,
  MIN_EASE_FACTOR,
  SUCCESS_QUALITY_THRESHOLD,
  FAILURE_INTERVAL_DAYS,
  FIRST_SUCCESS_INTERVAL_DAYS,
  SECOND_SUCCESS_INTERVAL_DAYS,
  MS_PER_DAY,
  isConfidenceRating,
  toQuality,
} from './types';
import { roundHalfEven } from './rounding';

/**
 * State for a card that has never been reviewed: due immediately.
 */
export function createInitialReviewState(now: Date): ReviewState {
  assertValidDate(now, 'now');
  return {
    easeFactor: INITIAL_EASE_FACTOR,
    intervalDays: 0,
    repetitions: 0,
    nextReviewAt: new Date(now.getTime()),
    lastReviewedAt: null,
    lastConfidence: null,
  };
}

/**
 * Computes the state that follows a review.
 *
 * The input state is left untouched; a new object is returned.
 *
 * @throws {InvalidInputError} If `confidence` is not an integer in 1-5, `now`
 *   is not a valid date, or the state has a negative or fractional interval
 *   or repetition count
 */
export function scheduleNextReview(
  confidence: number,
  state: ReviewState,
  now: Date
): ReviewState {
  if (!isConfidenceRating(confidence)) {
    throw new InvalidInputError(
      `Confidence must be an integer between 1 and 5, received ${String(confidence)}`,
      'confidence'
    );
  }
  assertValidDate(now, 'now');
  assertValidState(state);

  const rating: ConfidenceRating = confidence;
  const quality = toQuality(rating);
  const currentEase = Math.max(MIN_EASE_FACTOR, state.easeFactor);

  let easeFactor: number;
  let repetitions: number;
  let intervalDays: number;

  if (quality < SUCCESS_QUALITY_THRESHOLD) {
    repetitions = 0;
    intervalDays = FAILURE_INTERVAL_DAYS;
    easeFactor = currentEase;
  } else {
    repetitions = state.repetitions + 1;
    easeFactor = adjustEaseFactor(currentEase, quality);

    if (repetitions === 1) {
      intervalDays = FIRST_SUCCESS_INTERVAL_DAYS;
    } else if (repetitions === 2) {
      intervalDays = SECOND_SUCCESS_INTERVAL_DAYS;
    } else {
      intervalDays = roundHalfEven(state.intervalDays * easeFactor);
    }
  }

  return {
    easeFactor,
    intervalDays,
    repetitions,
    nextReviewAt: new Date(now.getTime() + intervalDays * MS_PER_DAY),
    lastReviewedAt: new Date(now.getTime()),
    lastConfidence: rating,
  };
}

/**
 * SM-2 ease adjustment for a successful review, floored at 1.3.
 */
export function adjustEaseFactor(easeFactor: number, quality: number): number {
  const distance = 5 - quality;
  const adjusted = easeFactor + (0.1 - distance * (0.08 + distance * 0.02));
  return Math.max(MIN_EASE_FACTOR, adjusted);
}

/**
 * Whether the card is eligible for review at `now`.
 */
export function isDue(state: ReviewState, now: Date): boolean {
  return state.nextReviewAt.getTime() <= now.getTime();
}

/**
 * Whole days until the card is due; negative when overdue.
 */
export function daysUntilDue(state: ReviewState, now: Date): number {
  return Math.floor((state.nextReviewAt.getTime() - now.getTime()) / MS_PER_DAY);
}

function assertValidDate(value: Date, field: string): void {
  if (!(value instanceof Date) || Number.isNaN(value.getTime())) {
    throw new InvalidInputError(`${field} must be a valid date`, field);
  }
}

function assertValidState(state: ReviewState): void {
  if (!Number.isFinite(state.easeFactor)) {
    throw new InvalidInputError('easeFactor must be a finite number', 'easeFactor');
  }
  if (!Number.isInteger(state.intervalDays) || state.intervalDays < 0) {
    throw new InvalidInputError('intervalDays must be a non-negative integer', 'intervalDays');
  }
  if (!Number.isInteger(state.repetitions) || state.repetitions < 0) {
    throw new InvalidInputError('repetitions must be a non-negative integer', 'repetitions');
  }
}
