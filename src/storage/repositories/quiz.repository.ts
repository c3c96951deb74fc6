/**
 * Quiz Repository Implementation
 *
 * Quizzes store their questions as a JSON column. Listing returns summaries
 * (question count instead of the full question list), newest first.
 */

import { desc, eq } from 'drizzle-orm';
import type { AppDatabase } from '../db';
import { quizzes } from '../schema';
import type { Quiz, QuizQuestion, QuizSummary } from '@/core/models';
import { NotFoundError } from '@/core/errors';
import { DEFAULT_PAGE_LIMIT, type PageOptions, type Repository } from './base';

export interface CreateQuizInput {
  /** Unique identifier - typically a prefixed UUID (e.g., 'qz_abc123') */
  id: string;
  learnerId: string;
  topic: string;
  topicDescription: string;
  lessonId?: string | null;
  questions: QuizQuestion[];
  createdAt?: Date;
}

export interface UpdateQuizInput {
  topic?: string;
  topicDescription?: string;
}

function mapToDomain(row: typeof quizzes.$inferSelect): Quiz {
  return {
    id: row.id,
    learnerId: row.learnerId,
    topic: row.topic,
    topicDescription: row.topicDescription,
    lessonId: row.lessonId,
    questions: row.questions,
    createdAt: row.createdAt,
  };
}

function toSummary(quiz: Quiz): QuizSummary {
  return {
    id: quiz.id,
    topic: quiz.topic,
    topicDescription: quiz.topicDescription,
    lessonId: quiz.lessonId,
    questionCount: quiz.questions.length,
    createdAt: quiz.createdAt,
  };
}

export class QuizRepository implements Repository<Quiz, CreateQuizInput, UpdateQuizInput> {
  constructor(private readonly db: AppDatabase) {}

  async findById(id: string): Promise<Quiz | null> {
    const result = await this.db.select().from(quizzes).where(eq(quizzes.id, id)).limit(1);
    return result.length === 0 ? null : mapToDomain(result[0]);
  }

  async findAll(): Promise<Quiz[]> {
    const results = await this.db.select().from(quizzes).orderBy(desc(quizzes.createdAt));
    return results.map(mapToDomain);
  }

  /**
   * Learner's quizzes as summaries, newest first.
   */
  async findSummariesByLearner(
    learnerId: string,
    { skip = 0, limit = DEFAULT_PAGE_LIMIT }: PageOptions = {}
  ): Promise<QuizSummary[]> {
    const results = await this.db
      .select()
      .from(quizzes)
      .where(eq(quizzes.learnerId, learnerId))
      .orderBy(desc(quizzes.createdAt))
      .limit(limit)
      .offset(skip);

    return results.map((row) => toSummary(mapToDomain(row)));
  }

  async create(input: CreateQuizInput): Promise<Quiz> {
    const result = await this.db
      .insert(quizzes)
      .values({
        id: input.id,
        learnerId: input.learnerId,
        topic: input.topic,
        topicDescription: input.topicDescription,
        lessonId: input.lessonId ?? null,
        questions: input.questions,
        createdAt: input.createdAt ?? new Date(),
      })
      .returning();

    return mapToDomain(result[0]);
  }

  async update(id: string, input: UpdateQuizInput): Promise<Quiz> {
    if (input.topic === undefined && input.topicDescription === undefined) {
      const existing = await this.findById(id);
      if (!existing) {
        throw new NotFoundError('Quiz', id);
      }
      return existing;
    }

    const result = await this.db
      .update(quizzes)
      .set(input)
      .where(eq(quizzes.id, id))
      .returning();

    if (result.length === 0) {
      throw new NotFoundError('Quiz', id);
    }

    return mapToDomain(result[0]);
  }

  /**
   * Deletes the quiz and, by cascade, its attempts.
   */
  async delete(id: string): Promise<void> {
    const result = await this.db
      .delete(quizzes)
      .where(eq(quizzes.id, id))
      .returning({ id: quizzes.id });

    if (result.length === 0) {
      throw new NotFoundError('Quiz', id);
    }
  }
}
