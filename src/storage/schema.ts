/**
 * Database Schema Definitions
 *
 * Drizzle ORM table definitions for SQLite. Run `npm run db:generate` after
 * changing them to write a new migration into ./drizzle.
 *
 * - Learners: people studying, identified by the X-Learner-Id header
 * - Topic Proficiencies: blended mastery per (learner, topic)
 * - Flashcards: SM-2 scheduled cards, one review state per card
 * - Quizzes: multiple-choice question sets stored as JSON
 * - Quiz Attempts: audit record of every scored submission
 *
 * All timestamps are stored as milliseconds since epoch (integer).
 */

import {
  sqliteTable,
  text,
  integer,
  real,
  index,
  primaryKey,
} from 'drizzle-orm/sqlite-core';
import type { QuizQuestion } from '../core/models';

/**
 * Learners Table
 */
export const learners = sqliteTable('learners', {
  // Unique identifier (prefixed UUID, e.g. 'lr_...')
  id: text('id').primaryKey(),

  // Display name
  name: text('name').notNull(),

  // Contact email, unique across learners
  email: text('email').notNull().unique(),

  // Timestamp when the learner was created (milliseconds since epoch)
  createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
});

/**
 * Topic Proficiencies Table
 *
 * One row per (learner, topic). Created lazily by the first quiz submission
 * for the topic and overwritten by each later submission.
 */
export const topicProficiencies = sqliteTable(
  'topic_proficiencies',
  {
    // Owning learner; rows go away with the learner
    learnerId: text('learner_id')
      .notNull()
      .references(() => learners.id, { onDelete: 'cascade' }),

    // Topic name exactly as stored on the quiz
    topic: text('topic').notNull(),

    // Blended proficiency in [0, 1], 4 decimal places
    proficiency: real('proficiency').notNull(),

    // Number of quiz attempts blended into the value
    attemptCount: integer('attempt_count').notNull().default(0),

    updatedAt: integer('updated_at', { mode: 'timestamp_ms' }).notNull(),
  },
  (table) => [primaryKey({ columns: [table.learnerId, table.topic] })]
);

/**
 * Flashcards Table
 *
 * The review state columns hold the SM-2 state; they are only written by
 * review submissions, which bump `version`.
 */
export const flashcards = sqliteTable(
  'flashcards',
  {
    id: text('id').primaryKey(),

    learnerId: text('learner_id')
      .notNull()
      .references(() => learners.id, { onDelete: 'cascade' }),

    topic: text('topic').notNull(),

    // Prompt side of the card
    front: text('front').notNull(),

    // Answer side of the card
    back: text('back').notNull(),

    difficulty: text('difficulty', { enum: ['easy', 'medium', 'hard'] })
      .notNull()
      .default('medium'),

    explanation: text('explanation'),

    // SM-2 ease factor (>= 1.3)
    easeFactor: real('ease_factor').notNull().default(2.5),

    // Days between the last review and the next one
    intervalDays: integer('interval_days').notNull().default(0),

    // Consecutive successful reviews
    repetitions: integer('repetitions').notNull().default(0),

    nextReviewAt: integer('next_review_at', { mode: 'timestamp_ms' }).notNull(),

    lastReviewedAt: integer('last_reviewed_at', { mode: 'timestamp_ms' }),

    // Confidence (1-5) given at the last review
    lastConfidence: integer('last_confidence'),

    // Optimistic concurrency counter
    version: integer('version').notNull().default(0),

    createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),

    updatedAt: integer('updated_at', { mode: 'timestamp_ms' }).notNull(),
  },
  (table) => [
    index('flashcards_learner_id_idx').on(table.learnerId),
    index('flashcards_next_review_at_idx').on(table.learnerId, table.nextReviewAt),
  ]
);

/**
 * Quizzes Table
 */
export const quizzes = sqliteTable(
  'quizzes',
  {
    id: text('id').primaryKey(),

    learnerId: text('learner_id')
      .notNull()
      .references(() => learners.id, { onDelete: 'cascade' }),

    topic: text('topic').notNull(),

    topicDescription: text('topic_description').notNull(),

    // Lesson the quiz was generated for, if any
    lessonId: text('lesson_id'),

    // Ordered question list
    questions: text('questions', { mode: 'json' }).$type<QuizQuestion[]>().notNull(),

    createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
  },
  (table) => [index('quizzes_learner_id_idx').on(table.learnerId)]
);

/**
 * Quiz Attempts Table
 *
 * Append-only. Records the scored result and the topic proficiency before
 * and after the attempt.
 */
export const quizAttempts = sqliteTable(
  'quiz_attempts',
  {
    id: text('id').primaryKey(),

    quizId: text('quiz_id')
      .notNull()
      .references(() => quizzes.id, { onDelete: 'cascade' }),

    learnerId: text('learner_id')
      .notNull()
      .references(() => learners.id, { onDelete: 'cascade' }),

    topic: text('topic').notNull(),

    // Submitted answers keyed by question id
    answers: text('answers', { mode: 'json' }).$type<Record<string, number>>().notNull(),

    percentScore: real('percent_score').notNull(),

    attemptProficiency: real('attempt_proficiency').notNull(),

    correctCount: integer('correct_count').notNull(),

    wrongCount: integer('wrong_count').notNull(),

    totalQuestions: integer('total_questions').notNull(),

    timeTakenSeconds: integer('time_taken_seconds').notNull(),

    passed: integer('passed', { mode: 'boolean' }).notNull(),

    topicProficiencyBefore: real('topic_proficiency_before'),

    topicProficiencyAfter: real('topic_proficiency_after').notNull(),

    completedAt: integer('completed_at', { mode: 'timestamp_ms' }).notNull(),
  },
  (table) => [index('quiz_attempts_learner_id_idx').on(table.learnerId, table.completedAt)]
);

// Inferred row types for repositories
export type LearnerRow = typeof learners.$inferSelect;
export type NewLearnerRow = typeof learners.$inferInsert;

export type TopicProficiencyRow = typeof topicProficiencies.$inferSelect;
export type NewTopicProficiencyRow = typeof topicProficiencies.$inferInsert;

export type FlashcardRow = typeof flashcards.$inferSelect;
export type NewFlashcardRow = typeof flashcards.$inferInsert;

export type QuizRow = typeof quizzes.$inferSelect;
export type NewQuizRow = typeof quizzes.$inferInsert;

export type QuizAttemptRow = typeof quizAttempts.$inferSelect;
export type NewQuizAttemptRow = typeof quizAttempts.$inferInsert;
