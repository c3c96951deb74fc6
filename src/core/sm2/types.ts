/**
 * SM-2 Constants and Rating Conversions
 *
 * The learner rates each review on a 1-5 confidence scale. SM-2 works on an
 * internal 0-4 "quality" score (`confidence - 1`); a review counts as a
 * successful recall only when quality is 3 or more, i.e. confidence 4 or 5.
 */

import type { ConfidenceRating } from '../models';

/** Ease factor assigned to a newly created card. */
export const INITIAL_EASE_FACTOR = 2.5;

/** Ease factor floor. There is no ceiling. */
export const MIN_EASE_FACTOR = 1.3;

/** Lowest quality score that counts as a successful recall. */
export const SUCCESS_QUALITY_THRESHOLD = 3;

/** Interval after a failed review. */
export const FAILURE_INTERVAL_DAYS = 1;

/** Fixed intervals for the first and second consecutive successes. */
export const FIRST_SUCCESS_INTERVAL_DAYS = 1;
export const SECOND_SUCCESS_INTERVAL_DAYS = 6;

export const MS_PER_DAY = 24 * 60 * 60 * 1000;

/** Human-readable labels for the CLI and API documentation. */
export const CONFIDENCE_LABELS: Record<ConfidenceRating, string> = {
  1: 'Forgot completely',
  2: 'Barely remembered',
  3: 'Remembered with effort',
  4: 'Remembered well',
  5: 'Perfect recall',
};

/**
 * Type guard for a valid confidence rating (integer 1-5).
 */
export function isConfidenceRating(value: unknown): value is ConfidenceRating {
  return typeof value === 'number' && Number.isInteger(value) && value >= 1 && value <= 5;
}

/**
 * Maps a confidence rating onto the SM-2 quality scale (0-4).
 */
export function toQuality(confidence: ConfidenceRating): number {
  return confidence - 1;
}

/**
 * Whether a confidence rating counts as a successful recall.
 */
export function isSuccessfulRecall(confidence: ConfidenceRating): boolean {
  return toQuality(confidence) >= SUCCESS_QUALITY_THRESHOLD;
}
