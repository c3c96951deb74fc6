/**
 * Learner Repository Implementation
 *
 * Data access for learners. Email addresses are unique; creating a second
 * learner with the same email raises ConflictError.
 */

import { eq, sql } from 'drizzle-orm';
import type { AppDatabase } from '../db';
import { learners } from '../schema';
import type { Learner } from '@/core/models';
import { ConflictError, NotFoundError } from '@/core/errors';
import type { Repository } from './base';

export interface CreateLearnerInput {
  /** Unique identifier - typically a prefixed UUID (e.g., 'lr_abc123') */
  id: string;
  name: string;
  email: string;
  createdAt?: Date;
}

export interface UpdateLearnerInput {
  name?: string;
  email?: string;
}

function mapToDomain(row: typeof learners.$inferSelect): Learner {
  return {
    id: row.id,
    name: row.name,
    email: row.email,
    createdAt: row.createdAt,
  };
}

export class LearnerRepository
  implements Repository<Learner, CreateLearnerInput, UpdateLearnerInput>
{
  constructor(private readonly db: AppDatabase) {}

  async findById(id: string): Promise<Learner | null> {
    const result = await this.db
      .select()
      .from(learners)
      .where(eq(learners.id, id))
      .limit(1);

    return result.length === 0 ? null : mapToDomain(result[0]);
  }

  async findAll(): Promise<Learner[]> {
    const results = await this.db.select().from(learners).orderBy(learners.createdAt);
    return results.map(mapToDomain);
  }

  /**
   * Case-insensitive lookup by email.
   */
  async findByEmail(email: string): Promise<Learner | null> {
    const result = await this.db
      .select()
      .from(learners)
      .where(sql`LOWER(${learners.email}) = LOWER(${email})`)
      .limit(1);

    return result.length === 0 ? null : mapToDomain(result[0]);
  }

  /**
   * @throws ConflictError if the email is already registered
   */
  async create(input: CreateLearnerInput): Promise<Learner> {
    const existing = await this.findByEmail(input.email);
    if (existing) {
      throw new ConflictError(`A learner with email '${input.email}' already exists`);
    }

    const result = await this.db
      .insert(learners)
      .values({
        id: input.id,
        name: input.name,
        email: input.email,
        createdAt: input.createdAt ?? new Date(),
      })
      .returning();

    return mapToDomain(result[0]);
  }

  async update(id: string, input: UpdateLearnerInput): Promise<Learner> {
    if (input.email !== undefined) {
      const owner = await this.findByEmail(input.email);
      if (owner && owner.id !== id) {
        throw new ConflictError(`A learner with email '${input.email}' already exists`);
      }
    }

    if (input.name === undefined && input.email === undefined) {
      const existing = await this.findById(id);
      if (!existing) {
        throw new NotFoundError('Learner', id);
      }
      return existing;
    }

    const result = await this.db
      .update(learners)
      .set(input)
      .where(eq(learners.id, id))
      .returning();

    if (result.length === 0) {
      throw new NotFoundError('Learner', id);
    }

    return mapToDomain(result[0]);
  }

  /**
   * Deletes the learner. Flashcards, quizzes, attempts and proficiencies
   * cascade with it.
   */
  async delete(id: string): Promise<void> {
    const result = await this.db
      .delete(learners)
      .where(eq(learners.id, id))
      .returning({ id: learners.id });

    if (result.length === 0) {
      throw new NotFoundError('Learner', id);
    }
  }
}
