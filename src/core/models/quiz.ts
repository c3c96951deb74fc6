/**
 * Quiz Domain Types
 *
 * Quizzes are multiple-choice question sets on a topic. Each submission is
 * scored by the proficiency tracker and stored as a QuizAttempt audit record.
 */

/**
 * Explanations shown after the learner answers a question. `incorrect` is
 * keyed by option index ("0", "1", ...).
 */
export interface QuestionExplanation {
  correct: string;
  incorrect: Record<string, string>;
}

/**
 * A stored multiple-choice question. `difficulty` is free text: anything
 * other than easy/medium/hard is scored as medium.
 */
export interface QuizQuestion {
  id: string;
  question: string;
  options: string[];
  correctAnswerIndex: number;
  difficulty: string;
  explanation: QuestionExplanation | null;
}

export interface Quiz {
  id: string;
  learnerId: string;
  topic: string;
  topicDescription: string;
  /** Lesson the quiz was generated for, if any. */
  lessonId: string | null;
  questions: QuizQuestion[];
  createdAt: Date;
}

/** Compact form used by quiz listings. */
export interface QuizSummary {
  id: string;
  topic: string;
  topicDescription: string;
  lessonId: string | null;
  questionCount: number;
  createdAt: Date;
}

/**
 * Persisted record of one quiz submission, including the topic proficiency
 * before and after the attempt was blended in.
 */
export interface QuizAttempt {
  id: string;
  quizId: string;
  learnerId: string;
  topic: string;
  /** Submitted answers keyed by question id. */
  answers: Record<string, number>;
  percentScore: number;
  attemptProficiency: number;
  correctCount: number;
  wrongCount: number;
  totalQuestions: number;
  timeTakenSeconds: number;
  passed: boolean;
  topicProficiencyBefore: number | null;
  topicProficiencyAfter: number;
  completedAt: Date;
}
