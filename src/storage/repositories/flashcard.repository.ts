/**
 * Flashcard Repository Implementation
 *
 * Data access for flashcards. Maps between the flat review-state columns and
 * the nested ReviewState of the domain model.
 *
 * Review writes go through `updateReviewState`, which is guarded by the
 * row's `version`: the write only lands if nobody else reviewed the card
 * since it was read. Content edits (`update`) do not touch the version.
 */

import { and, asc, count, desc, eq, lte, type SQL } from 'drizzle-orm';
import type { AppDatabase } from '../db';
import { flashcards } from '../schema';
import type { Flashcard, FlashcardDifficulty, ReviewState } from '@/core/models';
import { isConfidenceRating } from '@/core/sm2';
import { ConflictError, NotFoundError } from '@/core/errors';
import type { Repository } from './base';

export interface CreateFlashcardInput {
  /** Unique identifier - typically a prefixed UUID (e.g., 'fc_abc123') */
  id: string;
  learnerId: string;
  topic: string;
  front: string;
  back: string;
  difficulty: FlashcardDifficulty;
  explanation?: string | null;
  /** Initial SM-2 state, normally from createInitialReviewState */
  reviewState: ReviewState;
  createdAt?: Date;
}

/**
 * Content fields only. Review state changes use updateReviewState.
 */
export interface UpdateFlashcardInput {
  topic?: string;
  front?: string;
  back?: string;
  difficulty?: FlashcardDifficulty;
  explanation?: string | null;
}

export interface FlashcardFilters {
  topic?: string;
  difficulty?: FlashcardDifficulty;
  /** Only cards with nextReviewAt at or before this instant. */
  dueBy?: Date;
}

export interface TopicCount {
  topic: string;
  count: number;
}

function mapToDomain(row: typeof flashcards.$inferSelect): Flashcard {
  return {
    id: row.id,
    learnerId: row.learnerId,
    topic: row.topic,
    front: row.front,
    back: row.back,
    difficulty: row.difficulty,
    explanation: row.explanation,
    // Flat columns -> nested ReviewState
    reviewState: {
      easeFactor: row.easeFactor,
      intervalDays: row.intervalDays,
      repetitions: row.repetitions,
      nextReviewAt: row.nextReviewAt,
      lastReviewedAt: row.lastReviewedAt,
      lastConfidence: isConfidenceRating(row.lastConfidence) ? row.lastConfidence : null,
    },
    version: row.version,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

function reviewColumns(state: ReviewState) {
  return {
    easeFactor: state.easeFactor,
    intervalDays: state.intervalDays,
    repetitions: state.repetitions,
    nextReviewAt: state.nextReviewAt,
    lastReviewedAt: state.lastReviewedAt,
    lastConfidence: state.lastConfidence,
  };
}

/**
 * @example
 * ```typescript
 * const repo = new FlashcardRepository(db);
 *
 * const due = await repo.findByLearner('lr_abc123', { dueBy: new Date() });
 * const next = scheduleNextReview(4, due[0].reviewState, new Date());
 * await repo.updateReviewState(due[0].id, next, due[0].version);
 * ```
 */
export class FlashcardRepository
  implements Repository<Flashcard, CreateFlashcardInput, UpdateFlashcardInput>
{
  constructor(private readonly db: AppDatabase) {}

  async findById(id: string): Promise<Flashcard | null> {
    const result = await this.db
      .select()
      .from(flashcards)
      .where(eq(flashcards.id, id))
      .limit(1);

    return result.length === 0 ? null : mapToDomain(result[0]);
  }

  async findAll(): Promise<Flashcard[]> {
    const results = await this.db.select().from(flashcards);
    return results.map(mapToDomain);
  }

  /**
   * Learner's cards, optionally filtered.
   *
   * With `dueBy` the cards come back most overdue first; otherwise newest
   * first.
   */
  async findByLearner(learnerId: string, filters: FlashcardFilters = {}): Promise<Flashcard[]> {
    const conditions: SQL[] = [eq(flashcards.learnerId, learnerId)];

    if (filters.topic !== undefined) {
      conditions.push(eq(flashcards.topic, filters.topic));
    }
    if (filters.difficulty !== undefined) {
      conditions.push(eq(flashcards.difficulty, filters.difficulty));
    }
    if (filters.dueBy !== undefined) {
      conditions.push(lte(flashcards.nextReviewAt, filters.dueBy));
    }

    const ordering = filters.dueBy
      ? [asc(flashcards.nextReviewAt), asc(flashcards.createdAt)]
      : [desc(flashcards.createdAt), asc(flashcards.id)];

    const results = await this.db
      .select()
      .from(flashcards)
      .where(and(...conditions))
      .orderBy(...ordering);

    return results.map(mapToDomain);
  }

  /**
   * Number of cards per topic, most cards first, ties by topic name.
   */
  async countByTopic(learnerId: string): Promise<TopicCount[]> {
    const cardCount = count(flashcards.id);
    const results = await this.db
      .select({ topic: flashcards.topic, count: cardCount })
      .from(flashcards)
      .where(eq(flashcards.learnerId, learnerId))
      .groupBy(flashcards.topic)
      .orderBy(desc(cardCount), asc(flashcards.topic));

    return results.map((row) => ({ topic: row.topic, count: Number(row.count) }));
  }

  async create(input: CreateFlashcardInput): Promise<Flashcard> {
    const [created] = await this.createMany([input]);
    return created;
  }

  /**
   * Inserts several cards in one statement.
   */
  async createMany(inputs: CreateFlashcardInput[]): Promise<Flashcard[]> {
    if (inputs.length === 0) {
      return [];
    }

    const now = new Date();
    const results = await this.db
      .insert(flashcards)
      .values(
        inputs.map((input) => ({
          id: input.id,
          learnerId: input.learnerId,
          topic: input.topic,
          front: input.front,
          back: input.back,
          difficulty: input.difficulty,
          explanation: input.explanation ?? null,
          ...reviewColumns(input.reviewState),
          version: 0,
          createdAt: input.createdAt ?? now,
          updatedAt: input.createdAt ?? now,
        }))
      )
      .returning();

    return results.map(mapToDomain);
  }

  /**
   * Updates content fields.
   *
   * @throws NotFoundError if the card does not exist
   */
  async update(id: string, input: UpdateFlashcardInput): Promise<Flashcard> {
    const result = await this.db
      .update(flashcards)
      .set({
        ...input,
        updatedAt: new Date(),
      })
      .where(eq(flashcards.id, id))
      .returning();

    if (result.length === 0) {
      throw new NotFoundError('Flashcard', id);
    }

    return mapToDomain(result[0]);
  }

  /**
   * Persists a new review state if the stored version still equals
   * `expectedVersion`, and bumps the version.
   *
   * @throws NotFoundError if the card does not exist
   * @throws ConflictError if the card was reviewed since it was read
   */
  async updateReviewState(
    id: string,
    state: ReviewState,
    expectedVersion: number
  ): Promise<Flashcard> {
    const result = await this.db
      .update(flashcards)
      .set({
        ...reviewColumns(state),
        version: expectedVersion + 1,
        updatedAt: new Date(),
      })
      .where(and(eq(flashcards.id, id), eq(flashcards.version, expectedVersion)))
      .returning();

    if (result.length === 0) {
      const current = await this.findById(id);
      if (!current) {
        throw new NotFoundError('Flashcard', id);
      }
      throw new ConflictError(
        `Flashcard '${id}' was reviewed concurrently (expected version ${expectedVersion}, found ${current.version})`
      );
    }

    return mapToDomain(result[0]);
  }

  async delete(id: string): Promise<void> {
    const result = await this.db
      .delete(flashcards)
      .where(eq(flashcards.id, id))
      .returning({ id: flashcards.id });

    if (result.length === 0) {
      throw new NotFoundError('Flashcard', id);
    }
  }
}
