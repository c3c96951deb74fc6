/**
 * TopicProficiency Repository Implementation
 *
 * Stores the blended proficiency per (learner, topic). Rows are created by
 * the first quiz submission for a topic and replaced by later ones; they are
 * never deleted on their own.
 */

import { and, asc, eq, sql } from 'drizzle-orm';
import type { AppDatabase } from '../db';
import { topicProficiencies } from '../schema';
import type { TopicProficiency } from '@/core/models';

export interface SaveTopicProficiencyInput {
  learnerId: string;
  topic: string;
  proficiency: number;
  updatedAt: Date;
}

function mapToDomain(row: typeof topicProficiencies.$inferSelect): TopicProficiency {
  return {
    learnerId: row.learnerId,
    topic: row.topic,
    proficiency: row.proficiency,
    attemptCount: row.attemptCount,
    updatedAt: row.updatedAt,
  };
}

export class TopicProficiencyRepository {
  constructor(private readonly db: AppDatabase) {}

  async find(learnerId: string, topic: string): Promise<TopicProficiency | null> {
    const result = await this.db
      .select()
      .from(topicProficiencies)
      .where(
        and(
          eq(topicProficiencies.learnerId, learnerId),
          eq(topicProficiencies.topic, topic)
        )
      )
      .limit(1);

    return result.length === 0 ? null : mapToDomain(result[0]);
  }

  /**
   * All topics for a learner, sorted by topic name.
   */
  async findByLearner(learnerId: string): Promise<TopicProficiency[]> {
    const results = await this.db
      .select()
      .from(topicProficiencies)
      .where(eq(topicProficiencies.learnerId, learnerId))
      .orderBy(asc(topicProficiencies.topic));

    return results.map(mapToDomain);
  }

  /**
   * The learner's proficiencies as a topic → value map.
   */
  async getProficiencyMap(learnerId: string): Promise<Record<string, number>> {
    const rows = await this.findByLearner(learnerId);
    return Object.fromEntries(rows.map((row) => [row.topic, row.proficiency]));
  }

  /**
   * Inserts or overwrites the proficiency and counts one more attempt.
   *
   * This is a plain write of an already-blended value: two processes that
   * blend from the same stale read both succeed and the later write wins.
   */
  async save(input: SaveTopicProficiencyInput): Promise<TopicProficiency> {
    const result = await this.db
      .insert(topicProficiencies)
      .values({
        learnerId: input.learnerId,
        topic: input.topic,
        proficiency: input.proficiency,
        attemptCount: 1,
        updatedAt: input.updatedAt,
      })
      .onConflictDoUpdate({
        target: [topicProficiencies.learnerId, topicProficiencies.topic],
        set: {
          proficiency: input.proficiency,
          attemptCount: sql`${topicProficiencies.attemptCount} + 1`,
          updatedAt: input.updatedAt,
        },
      })
      .returning();

    return mapToDomain(result[0]);
  }
}
