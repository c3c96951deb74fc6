/**
 * QuizAttempt Repository Implementation
 *
 * Append-only audit log of scored quiz submissions.
 */

import { desc, eq, sql } from 'drizzle-orm';
import type { AppDatabase } from '../db';
import { quizAttempts, topicProficiencies } from '../schema';
import type { QuizAttempt } from '@/core/models';
import { DEFAULT_PAGE_LIMIT, type PageOptions } from './base';

export type CreateQuizAttemptInput = QuizAttempt;

/** The blended topic proficiency written together with an attempt. */
export interface AttemptProficiencyUpdate {
  proficiency: number;
  updatedAt: Date;
}

function mapToDomain(row: typeof quizAttempts.$inferSelect): QuizAttempt {
  return {
    id: row.id,
    quizId: row.quizId,
    learnerId: row.learnerId,
    topic: row.topic,
    answers: row.answers,
    percentScore: row.percentScore,
    attemptProficiency: row.attemptProficiency,
    correctCount: row.correctCount,
    wrongCount: row.wrongCount,
    totalQuestions: row.totalQuestions,
    timeTakenSeconds: row.timeTakenSeconds,
    passed: row.passed,
    topicProficiencyBefore: row.topicProficiencyBefore,
    topicProficiencyAfter: row.topicProficiencyAfter,
    completedAt: row.completedAt,
  };
}

export class QuizAttemptRepository {
  constructor(private readonly db: AppDatabase) {}

  async findById(id: string): Promise<QuizAttempt | null> {
    const result = await this.db
      .select()
      .from(quizAttempts)
      .where(eq(quizAttempts.id, id))
      .limit(1);

    return result.length === 0 ? null : mapToDomain(result[0]);
  }

  /**
   * Learner's attempts across all quizzes, most recent first.
   */
  async findByLearner(
    learnerId: string,
    { skip = 0, limit = DEFAULT_PAGE_LIMIT }: PageOptions = {}
  ): Promise<QuizAttempt[]> {
    const results = await this.db
      .select()
      .from(quizAttempts)
      .where(eq(quizAttempts.learnerId, learnerId))
      .orderBy(desc(quizAttempts.completedAt))
      .limit(limit)
      .offset(skip);

    return results.map(mapToDomain);
  }

  async findByQuiz(quizId: string): Promise<QuizAttempt[]> {
    const results = await this.db
      .select()
      .from(quizAttempts)
      .where(eq(quizAttempts.quizId, quizId))
      .orderBy(desc(quizAttempts.completedAt));

    return results.map(mapToDomain);
  }

  async create(input: CreateQuizAttemptInput): Promise<QuizAttempt> {
    const result = await this.db.insert(quizAttempts).values(input).returning();
    return mapToDomain(result[0]);
  }

  /**
   * Stores the attempt and upserts the learner's proficiency for its topic
   * in one transaction: if either write fails, neither is kept.
   */
  async recordWithProficiency(
    input: CreateQuizAttemptInput,
    update: AttemptProficiencyUpdate
  ): Promise<QuizAttempt> {
    // better-sqlite3 transactions are synchronous; the callback must not await
    const rows = this.db.transaction((tx) => {
      tx.insert(topicProficiencies)
        .values({
          learnerId: input.learnerId,
          topic: input.topic,
          proficiency: update.proficiency,
          attemptCount: 1,
          updatedAt: update.updatedAt,
        })
        .onConflictDoUpdate({
          target: [topicProficiencies.learnerId, topicProficiencies.topic],
          set: {
            proficiency: update.proficiency,
            attemptCount: sql`${topicProficiencies.attemptCount} + 1`,
            updatedAt: update.updatedAt,
          },
        })
        .run();

      return tx.insert(quizAttempts).values(input).returning().all();
    });

    return mapToDomain(rows[0]);
  }
}
