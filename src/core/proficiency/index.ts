/**
 * Proficiency Module - Barrel Export
 */

export {
  scoreSubmission,
  updateTopicProficiency,
  difficultyWeight,
  DIFFICULTY_WEIGHTS,
  DEFAULT_DIFFICULTY_WEIGHT,
  PASS_THRESHOLD_PERCENT,
  HISTORY_WEIGHT,
  ATTEMPT_WEIGHT,
  type ScorableQuestion,
  type SubmittedAnswers,
  type DifficultyWeights,
  type QuestionOutcome,
  type QuizSubmissionResult,
} from './tracker';
