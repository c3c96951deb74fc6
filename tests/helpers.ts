/**
 * Test Helpers Module
 *
 * Fixed dates, data factories and response readers shared by the suite.
 */

import { z } from 'zod';
import type { Repositories } from '../src/storage/repositories';
import { generateId } from '../src/core/learning';
import { createInitialReviewState } from '../src/core/sm2';
import type {
  Flashcard,
  FlashcardDifficulty,
  Learner,
  Quiz,
  QuizQuestion,
  ReviewState,
} from '../src/core/models';

// ============================================================================
// Date Utilities
// ============================================================================

/** Fixed "now" for tests that depend on time. */
export const BASE_TIME = new Date('2024-01-15T10:00:00.000Z');

const MS_PER_DAY = 24 * 60 * 60 * 1000;

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * MS_PER_DAY);
}

export function daysFromBase(days: number): Date {
  return addDays(BASE_TIME, days);
}

// ============================================================================
// Test Data Factories
// ============================================================================

export interface CreateLearnerOptions {
  id?: string;
  name?: string;
  email?: string;
}

export async function createTestLearner(
  repos: Repositories,
  options: CreateLearnerOptions = {}
): Promise<Learner> {
  const id = options.id ?? generateId('lr');
  return repos.learners.create({
    id,
    name: options.name ?? 'Test Learner',
    email: options.email ?? `${id}@example.com`,
    createdAt: BASE_TIME,
  });
}

export interface CreateFlashcardOptions {
  id?: string;
  topic?: string;
  front?: string;
  back?: string;
  difficulty?: FlashcardDifficulty;
  reviewState?: Partial<ReviewState>;
  createdAt?: Date;
}

export async function createTestFlashcard(
  repos: Repositories,
  learnerId: string,
  options: CreateFlashcardOptions = {}
): Promise<Flashcard> {
  return repos.flashcards.create({
    id: options.id ?? generateId('fc'),
    learnerId,
    topic: options.topic ?? 'Biology',
    front: options.front ?? 'What molecule stores energy in cells?',
    back: options.back ?? 'ATP',
    difficulty: options.difficulty ?? 'medium',
    reviewState: { ...createInitialReviewState(BASE_TIME), ...options.reviewState },
    createdAt: options.createdAt ?? BASE_TIME,
  });
}

/**
 * Four questions weighted easy, medium, hard, medium (0.5 + 1 + 1.5 + 1).
 * The correct answer of q1..q4 is option 0, 1, 2, 3 respectively.
 */
export function sampleQuestions(): QuizQuestion[] {
  const difficulties = ['easy', 'medium', 'hard', 'medium'];
  return difficulties.map((difficulty, index) => ({
    id: `q${index + 1}`,
    question: `Sample question ${index + 1}?`,
    options: ['Option A', 'Option B', 'Option C', 'Option D'],
    correctAnswerIndex: index,
    difficulty,
    explanation: null,
  }));
}

export interface CreateQuizOptions {
  topic?: string;
  questions?: QuizQuestion[];
  createdAt?: Date;
}

export async function createTestQuiz(
  repos: Repositories,
  learnerId: string,
  options: CreateQuizOptions = {}
): Promise<Quiz> {
  return repos.quizzes.create({
    id: generateId('qz'),
    learnerId,
    topic: options.topic ?? 'Biology',
    topicDescription: 'Cell energy',
    questions: options.questions ?? sampleQuestions(),
    createdAt: options.createdAt ?? BASE_TIME,
  });
}

// ============================================================================
// Response Readers
// ============================================================================

const envelopeSchema = z.discriminatedUnion('success', [
  z.object({ success: z.literal(true), data: z.unknown() }),
  z.object({
    success: z.literal(false),
    error: z.object({
      code: z.string(),
      message: z.string(),
      details: z.unknown().optional(),
    }),
  }),
]);

export type ErrorBody = { code: string; message: string; details?: unknown };

/**
 * Parses a success envelope and validates `data` with `schema`.
 * Fails the test with the error code if the response is an error.
 */
export async function readData<T extends z.ZodTypeAny>(
  response: Response,
  schema: T
): Promise<z.infer<T>> {
  const body = envelopeSchema.parse(await response.json());
  if (!body.success) {
    throw new Error(`Expected success, got ${body.error.code}: ${body.error.message}`);
  }
  return schema.parse(body.data);
}

/**
 * Parses an error envelope and returns its `error` object.
 */
export async function readError(response: Response): Promise<ErrorBody> {
  const body = envelopeSchema.parse(await response.json());
  if (body.success) {
    throw new Error('Expected an error response, got success');
  }
  return body.error;
}

export function jsonRequest(method: string, body: unknown, learnerId?: string): RequestInit {
  const headers: Record<string, string> = { 'Content-Type': 'application/json' };
  if (learnerId) {
    headers['X-Learner-Id'] = learnerId;
  }
  return { method, headers, body: JSON.stringify(body) };
}

export function asLearner(learnerId: string): RequestInit {
  return { headers: { 'X-Learner-Id': learnerId } };
}

// Shapes of API payloads, with dates as ISO strings

export const reviewStateJson = z.object({
  easeFactor: z.number(),
  intervalDays: z.number(),
  repetitions: z.number(),
  nextReviewAt: z.string(),
  lastReviewedAt: z.string().nullable(),
  lastConfidence: z.number().nullable(),
});

export const flashcardJson = z.object({
  id: z.string(),
  learnerId: z.string(),
  topic: z.string(),
  front: z.string(),
  back: z.string(),
  difficulty: z.string(),
  explanation: z.string().nullable(),
  reviewState: reviewStateJson,
  version: z.number(),
});

export const learnerJson = z.object({
  id: z.string(),
  name: z.string(),
  email: z.string(),
  createdAt: z.string(),
});

export const questionJson = z.object({
  id: z.string(),
  question: z.string(),
  options: z.array(z.string()),
  correctAnswerIndex: z.number(),
  difficulty: z.string(),
  explanation: z
    .object({ correct: z.string(), incorrect: z.record(z.string()) })
    .nullable(),
});

export const quizJson = z.object({
  id: z.string(),
  learnerId: z.string(),
  topic: z.string(),
  topicDescription: z.string(),
  lessonId: z.string().nullable(),
  questions: z.array(questionJson),
  createdAt: z.string(),
});

export const submissionJson = z.object({
  questions: z.array(
    z.object({
      questionId: z.string(),
      submittedAnswer: z.number().nullable(),
      correctAnswerIndex: z.number(),
      isCorrect: z.boolean(),
      weight: z.number(),
    })
  ),
  correctCount: z.number(),
  wrongCount: z.number(),
  unansweredCount: z.number(),
  totalQuestions: z.number(),
  percentScore: z.number(),
  attemptProficiency: z.number(),
  passed: z.boolean(),
  quizId: z.string(),
  attemptId: z.string(),
  topic: z.string(),
  timeTakenSeconds: z.number(),
  previousProficiency: z.number().nullable(),
  topicProficiency: z.number(),
  completedAt: z.string(),
});
