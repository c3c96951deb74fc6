/**
 * API Request and Response Types
 *
 * Every endpoint answers with either ApiResponse<T> or ApiErrorResponse.
 * Request bodies and query strings are validated with the zod schemas
 * below before a route handler runs.
 *
 * @example
 * ```typescript
 * const response: ApiResponse<Flashcard[]> = { success: true, data: cards };
 *
 * const error: ApiErrorResponse = {
 *   success: false,
 *   error: { code: 'NOT_FOUND', message: "Flashcard with id 'fc_1' not found" },
 * };
 * ```
 */

import { z } from 'zod';

// ============================================================================
// Response Envelope
// ============================================================================

export interface ApiResponse<T> {
  success: true;
  data: T;
}

export interface ApiError {
  /** Machine-readable code, e.g. 'VALIDATION_ERROR' */
  code: string;
  message: string;
  details?: unknown;
}

export interface ApiErrorResponse {
  success: false;
  error: ApiError;
}

export type ApiResult<T> = ApiResponse<T> | ApiErrorResponse;

/**
 * One zod issue, flattened. `path` uses dot notation ('questions.0.options').
 */
export interface ValidationErrorDetail {
  path: string;
  message: string;
}

// ============================================================================
// Shared Schemas
// ============================================================================

const difficultySchema = z.enum(['easy', 'medium', 'hard']);

/**
 * skip/limit from the query string. Strings are coerced; limit is capped.
 */
export const pageQuerySchema = z.object({
  skip: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

export type PageQuery = z.infer<typeof pageQuerySchema>;

// ============================================================================
// Learners
// ============================================================================

export const createLearnerSchema = z.object({
  name: z
    .string()
    .trim()
    .min(1, 'Name is required')
    .max(100, 'Name must be 100 characters or less'),
  email: z.string().trim().email('Email must be a valid address'),
});

export type CreateLearnerBody = z.infer<typeof createLearnerSchema>;

// ============================================================================
// Flashcards
// ============================================================================

export const createFlashcardSchema = z.object({
  topic: z.string().trim().min(1, 'Topic is required').max(200),
  front: z.string().trim().min(1, 'Front is required').max(2000),
  back: z.string().trim().min(1, 'Back is required').max(2000),
  difficulty: difficultySchema.default('medium'),
  explanation: z.string().max(2000).nullable().optional(),
});

export type CreateFlashcardBody = z.infer<typeof createFlashcardSchema>;

export const generateFlashcardsSchema = z.object({
  topic: z.string().trim().min(1, 'Topic is required').max(200),
  count: z.number().int().min(1).max(50).default(10),
});

export type GenerateFlashcardsBody = z.infer<typeof generateFlashcardsSchema>;

/**
 * Partial content update. At least one field must be present.
 */
export const updateFlashcardSchema = z
  .object({
    topic: z.string().trim().min(1).max(200).optional(),
    front: z.string().trim().min(1).max(2000).optional(),
    back: z.string().trim().min(1).max(2000).optional(),
    difficulty: difficultySchema.optional(),
    explanation: z.string().max(2000).nullable().optional(),
  })
  .refine((body) => Object.values(body).some((value) => value !== undefined), {
    message: 'At least one field must be provided',
  });

export type UpdateFlashcardBody = z.infer<typeof updateFlashcardSchema>;

/**
 * Only the shape is checked here; the 1-5 range is enforced by the
 * scheduler and reported as INVALID_INPUT.
 */
export const reviewFlashcardSchema = z.object({
  confidence: z.number({ invalid_type_error: 'confidence must be a number' }),
});

export type ReviewFlashcardBody = z.infer<typeof reviewFlashcardSchema>;

export const listFlashcardsQuerySchema = z.object({
  topic: z.string().min(1).optional(),
  difficulty: difficultySchema.optional(),
  dueOnly: z
    .enum(['true', 'false'])
    .optional()
    .transform((value) => value === 'true'),
});

export type ListFlashcardsQuery = z.infer<typeof listFlashcardsQuerySchema>;

// ============================================================================
// Quizzes
// ============================================================================

const questionSchema = z.object({
  id: z.string().trim().min(1).optional(),
  question: z.string().trim().min(1, 'Question text is required'),
  options: z.array(z.string()).min(2, 'At least 2 options are required'),
  correctAnswerIndex: z.number().int().min(0),
  difficulty: z.string().optional(),
  explanation: z
    .object({
      correct: z.string(),
      incorrect: z.record(z.string()),
    })
    .nullable()
    .optional(),
});

export const createQuizSchema = z.object({
  topic: z.string().trim().min(1, 'Topic is required').max(200),
  topicDescription: z.string().max(2000).default(''),
  lessonId: z.string().min(1).nullable().optional(),
  questions: z.array(questionSchema).min(1, 'At least one question is required'),
});

export type CreateQuizBody = z.infer<typeof createQuizSchema>;

export const generateQuizSchema = z.object({
  topic: z.string().trim().min(1, 'Topic is required').max(200),
  topicDescription: z.string().trim().min(1, 'Topic description is required').max(2000),
  lessonId: z.string().min(1).nullable().optional(),
});

export type GenerateQuizBody = z.infer<typeof generateQuizSchema>;

/**
 * Answers keyed by question id. Index ranges are not checked: an
 * out-of-range answer simply scores as wrong.
 */
export const submitQuizSchema = z.object({
  answers: z.record(z.number().int()),
  timeTakenSeconds: z.number().int().min(0),
});

export type SubmitQuizBody = z.infer<typeof submitQuizSchema>;
