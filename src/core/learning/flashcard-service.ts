/**
 * Flashcard Service
 *
 * Learner-scoped flashcard operations on top of FlashcardRepository, and
 * the calling layer for the SM-2 scheduler.
 *
 * Concurrency contract for reviews: `submitReview` is a read-modify-write of
 * the card's ReviewState. Within one process, reviews of the same
 * (learner, card) pair are serialized through a KeyedLock. Across processes
 * the write is guarded by the card's version column, so a review computed
 * from a stale read fails with ConflictError instead of overwriting.
 */

import type { Flashcard, FlashcardDifficulty } from '../models';
import { createInitialReviewState, scheduleNextReview } from '../sm2';
import { InvalidInputError, NotFoundError } from '../errors';
import type {
  FlashcardRepository,
  TopicCount,
  UpdateFlashcardInput,
} from '../../storage/repositories';
import type { ContentGenerator } from '../../llm/content-generator';
import { KeyedLock } from './key-lock';
import { generateId } from './ids';

export interface FlashcardServiceDependencies {
  flashcardRepo: FlashcardRepository;
  contentGenerator: ContentGenerator;
  /** Shared lock; pass the same instance to every service in a process. */
  lock?: KeyedLock;
}

export interface NewFlashcard {
  topic: string;
  front: string;
  back: string;
  difficulty?: FlashcardDifficulty;
  explanation?: string | null;
}

export interface FlashcardListOptions {
  topic?: string;
  difficulty?: FlashcardDifficulty;
  /** Only cards due at `now`, most overdue first. */
  dueOnly?: boolean;
}

export class FlashcardService {
  private readonly repo: FlashcardRepository;
  private readonly generator: ContentGenerator;
  private readonly lock: KeyedLock;

  constructor(deps: FlashcardServiceDependencies) {
    this.repo = deps.flashcardRepo;
    this.generator = deps.contentGenerator;
    this.lock = deps.lock ?? new KeyedLock();
  }

  /**
   * Stores cards for a learner, each with a fresh review state due at `now`.
   *
   * @throws {InvalidInputError} If any card has a blank topic, front or back
   */
  async createFlashcards(
    learnerId: string,
    cards: NewFlashcard[],
    now: Date = new Date()
  ): Promise<Flashcard[]> {
    const inputs = cards.map((card, index) => {
      const topic = requireText(card.topic, 'topic', index);
      const front = requireText(card.front, 'front', index);
      const back = requireText(card.back, 'back', index);
      return {
        id: generateId('fc'),
        learnerId,
        topic,
        front,
        back,
        difficulty: card.difficulty ?? 'medium',
        explanation: card.explanation?.trim() || null,
        reviewState: createInitialReviewState(now),
        createdAt: now,
      };
    });

    return this.repo.createMany(inputs);
  }

  /**
   * Generates cards for a topic with the content generator and stores them.
   */
  async generateFlashcards(
    learnerId: string,
    topic: string,
    count: number,
    now: Date = new Date()
  ): Promise<Flashcard[]> {
    const generated = await this.generator.generateFlashcards(topic, count);
    return this.createFlashcards(
      learnerId,
      generated.map((card) => ({ ...card, topic })),
      now
    );
  }

  /**
   * @throws {NotFoundError} If the card does not exist or belongs to another learner
   */
  async getFlashcard(learnerId: string, flashcardId: string): Promise<Flashcard> {
    const card = await this.repo.findById(flashcardId);
    if (!card || card.learnerId !== learnerId) {
      throw new NotFoundError('Flashcard', flashcardId);
    }
    return card;
  }

  async listFlashcards(
    learnerId: string,
    options: FlashcardListOptions = {},
    now: Date = new Date()
  ): Promise<Flashcard[]> {
    return this.repo.findByLearner(learnerId, {
      topic: options.topic,
      difficulty: options.difficulty,
      dueBy: options.dueOnly ? now : undefined,
    });
  }

  async listTopics(learnerId: string): Promise<TopicCount[]> {
    return this.repo.countByTopic(learnerId);
  }

  /**
   * Edits card content. Review state is not touched.
   *
   * @throws {InvalidInputError} If no field is given
   */
  async updateFlashcard(
    learnerId: string,
    flashcardId: string,
    input: UpdateFlashcardInput
  ): Promise<Flashcard> {
    if (Object.values(input).every((value) => value === undefined)) {
      throw new InvalidInputError('No fields provided for update');
    }
    await this.getFlashcard(learnerId, flashcardId);
    return this.repo.update(flashcardId, input);
  }

  async deleteFlashcard(learnerId: string, flashcardId: string): Promise<void> {
    await this.getFlashcard(learnerId, flashcardId);
    await this.repo.delete(flashcardId);
  }

  /**
   * Applies a review with the given confidence and persists the new state.
   *
   * @throws {InvalidInputError} If confidence is not an integer in 1-5
   * @throws {NotFoundError} If the card is not the learner's
   * @throws {ConflictError} If another process reviewed the card in between
   */
  async submitReview(
    learnerId: string,
    flashcardId: string,
    confidence: number,
    now: Date = new Date()
  ): Promise<Flashcard> {
    return this.lock.run(`review:${learnerId}:${flashcardId}`, async () => {
      const card = await this.getFlashcard(learnerId, flashcardId);
      const next = scheduleNextReview(confidence, card.reviewState, now);
      return this.repo.updateReviewState(card.id, next, card.version);
    });
  }
}

function requireText(value: string, field: string, index: number): string {
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    throw new InvalidInputError(`Flashcard ${index + 1}: ${field} must not be blank`, field);
  }
  return trimmed;
}
