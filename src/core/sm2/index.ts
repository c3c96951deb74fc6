/**
 * SM-2 Module - Barrel Export
 *
 * @example
 * ```typescript
 * import { scheduleNextReview, isDue } from '@/core/sm2';
 *
 * const next = scheduleNextReview(5, card.reviewState, new Date());
 * ```
 */

export {
  createInitialReviewState,
  scheduleNextReview,
  adjustEaseFactor,
  isDue,
  daysUntilDue,
} from './scheduler';

export { roundHalfEven } from './rounding';

export {
  INITIAL_EASE_FACTOR,
  MIN_EASE_FACTOR,
  SUCCESS_QUALITY_THRESHOLD,
  MS_PER_DAY,
  CONFIDENCE_LABELS,
  isConfidenceRating,
  isSuccessfulRecall,
  toQuality,
} from './types';
