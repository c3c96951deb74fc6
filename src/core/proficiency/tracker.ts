/**
 * Proficiency Tracker
 *
 * Scores a quiz submission with per-question difficulty weights and blends
 * the weighted result into a learner's running proficiency for the topic.
 * Both operations are pure; persistence belongs to the caller.
 */

import { InvalidInputError, InvariantViolationError } from '../errors';
import { roundHalfEven } from '../sm2/rounding';

/**
 * Minimal question shape the tracker needs. Stored quiz questions carry more
 * (prompt text, options, explanations) and are structurally compatible.
 */
export interface ScorableQuestion {
  id: string;
  correctAnswerIndex: number;
  /** Free text; matched case-insensitively. Missing means medium. */
  difficulty?: string;
  /** Number of answer options, when known. Bounds `correctAnswerIndex`. */
  optionCount?: number;
}

/** Learner answers keyed by question id. */
export type SubmittedAnswers = Readonly<Record<string, number>>;

export interface DifficultyWeights {
  easy: number;
  medium: number;
  hard: number;
}

export const DIFFICULTY_WEIGHTS: Readonly<DifficultyWeights> = Object.freeze({
  easy: 0.5,
  medium: 1.0,
  hard: 1.5,
});

/** Weight for any difficulty not listed in the weight table. */
export const DEFAULT_DIFFICULTY_WEIGHT = 1.0;

/** Minimum percent score that passes a quiz. */
export const PASS_THRESHOLD_PERCENT = 70;

/** Share of the blended value carried over from the existing proficiency. */
export const HISTORY_WEIGHT = 0.7;
export const ATTEMPT_WEIGHT = 0.3;

export interface QuestionOutcome {
  questionId: string;
  /** Answer the learner gave, or null when the question was skipped. */
  submittedAnswer: number | null;
  correctAnswerIndex: number;
  isCorrect: boolean;
  weight: number;
}

export interface QuizSubmissionResult {
  questions: QuestionOutcome[];
  correctCount: number;
  /** Answered but wrong. */
  wrongCount: number;
  unansweredCount: number;
  totalQuestions: number;
  /** Unweighted share of correct answers, 0-100. */
  percentScore: number;
  /** Difficulty-weighted share of correct answers, 0-1. */
  attemptProficiency: number;
  passed: boolean;
}

/**
 * Weight for a difficulty label. Unknown labels score as medium.
 */
export function difficultyWeight(
  difficulty: string | undefined,
  weights: DifficultyWeights = DIFFICULTY_WEIGHTS
): number {
  switch ((difficulty ?? 'medium').toLowerCase()) {
    case 'easy':
      return weights.easy;
    case 'medium':
      return weights.medium;
    case 'hard':
      return weights.hard;
    default:
      return DEFAULT_DIFFICULTY_WEIGHT;
  }
}

/**
 * Scores a submission.
 *
 * A question with no submitted answer counts as incorrect; that is not an
 * error. Every question is validated before anything is scored.
 *
 * @throws {InvalidInputError} For an empty question id, or a correct-answer
 *   index that is not a non-negative integer or is past the last option
 */
export function scoreSubmission(
  questions: readonly ScorableQuestion[],
  answers: SubmittedAnswers,
  weights: DifficultyWeights = DIFFICULTY_WEIGHTS
): QuizSubmissionResult {
  questions.forEach(assertScorable);

  const outcomes: QuestionOutcome[] = questions.map((question) => {
    const submitted = Object.prototype.hasOwnProperty.call(answers, question.id)
      ? answers[question.id]
      : undefined;
    const submittedAnswer = typeof submitted === 'number' ? submitted : null;
    return {
      questionId: question.id,
      submittedAnswer,
      correctAnswerIndex: question.correctAnswerIndex,
      isCorrect: submittedAnswer === question.correctAnswerIndex,
      weight: difficultyWeight(question.difficulty, weights),
    };
  });

  let correctCount = 0;
  let unansweredCount = 0;
  let earnedWeight = 0;
  let totalWeight = 0;

  for (const outcome of outcomes) {
    totalWeight += outcome.weight;
    if (outcome.isCorrect) {
      correctCount += 1;
      earnedWeight += outcome.weight;
    } else if (outcome.submittedAnswer === null) {
      unansweredCount += 1;
    }
  }

  const totalQuestions = outcomes.length;
  const percentScore = totalQuestions === 0 ? 0 : (100 * correctCount) / totalQuestions;
  const attemptProficiency = totalWeight === 0 ? 0 : earnedWeight / totalWeight;

  return {
    questions: outcomes,
    correctCount,
    wrongCount: totalQuestions - correctCount - unansweredCount,
    unansweredCount,
    totalQuestions,
    percentScore,
    attemptProficiency,
    passed: percentScore >= PASS_THRESHOLD_PERCENT,
  };
}

/**
 * Blends an attempt into the existing topic proficiency.
 *
 * With no existing value the attempt becomes the baseline; otherwise the
 * result is `existing * 0.7 + attempt * 0.3`. Rounded to 4 decimal places.
 *
 * @param topic - Only used in error messages
 * @throws {InvalidInputError} If either input is outside [0, 1]
 * @throws {InvariantViolationError} If the blended value leaves [0, 1]
 */
export function updateTopicProficiency(
  existing: number | null | undefined,
  attemptProficiency: number,
  topic?: string
): number {
  const where = topic ? ` for topic '${topic}'` : '';
  assertUnitInterval(attemptProficiency, `attemptProficiency${where}`);
  if (existing !== null && existing !== undefined) {
    assertUnitInterval(existing, `existing proficiency${where}`);
  }

  const blended =
    existing === null || existing === undefined
      ? attemptProficiency
      : existing * HISTORY_WEIGHT + attemptProficiency * ATTEMPT_WEIGHT;
  const rounded = roundHalfEven(blended, 4);

  if (!(rounded >= 0 && rounded <= 1)) {
    throw new InvariantViolationError(`Blended proficiency${where} left [0, 1]: ${rounded}`);
  }
  return rounded;
}

function assertUnitInterval(value: number, field: string): void {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new InvalidInputError(`${field} must be between 0 and 1, received ${value}`, field);
  }
}

function assertScorable(question: ScorableQuestion, position: number): void {
  if (typeof question.id !== 'string' || question.id.length === 0) {
    throw new InvalidInputError(`Question at position ${position} has no id`, 'id');
  }
  const index = question.correctAnswerIndex;
  if (!Number.isInteger(index) || index < 0) {
    throw new InvalidInputError(
      `Question '${question.id}' has an invalid correct answer index: ${String(index)}`,
      'correctAnswerIndex'
    );
  }
  if (question.optionCount !== undefined && index >= question.optionCount) {
    throw new InvalidInputError(
      `Question '${question.id}' correct answer index ${index} is out of range for ${question.optionCount} options`,
      'correctAnswerIndex'
    );
  }
}
