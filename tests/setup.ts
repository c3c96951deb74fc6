/**
 * Test Setup Module
 *
 * Isolated test environments: an in-memory SQLite database with migrations
 * applied, repositories bound to it, a scripted content generator and an
 * app built around all three.
 */

import type { Hono } from 'hono';
import { createDatabase, type AppDatabase, type SqliteConnection } from '../src/storage/db';
import { createRepositories, type Repositories } from '../src/storage/repositories';
import { loadConfig, type Config, type Environment } from '../src/config';
import { createApp } from '../src/api';
import type { ContentGenerator } from '../src/llm/content-generator';
import type { GeneratedFlashcard } from '../src/llm/prompts/flashcard-generator';
import type { QuizQuestion } from '../src/core/models';
import { BASE_TIME } from './helpers';

// ============================================================================
// Type Definitions
// ============================================================================

export interface TestContext {
  db: AppDatabase;
  sqlite: SqliteConnection;
  repos: Repositories;
}

export interface TestAppOptions {
  contentGenerator?: ContentGenerator;
  /** Defaults to a clock fixed at BASE_TIME */
  clock?: () => Date;
  /** Extra environment variables for loadConfig */
  env?: Environment;
}

// ============================================================================
// Database Setup Functions
// ============================================================================

/**
 * Fresh in-memory database with migrations applied and repositories bound.
 *
 * @example
 * ```typescript
 * const ctx = createTestContext();
 * // ...
 * cleanupTestDatabase(ctx);
 * ```
 */
export function createTestContext(): TestContext {
  const { db, sqlite } = createDatabase(':memory:');
  return { db, sqlite, repos: createRepositories(db) };
}

export function cleanupTestDatabase(context: TestContext): void {
  context.sqlite.close();
}

export function createTestConfig(env: Environment = {}): Config {
  return loadConfig({ NODE_ENV: 'test', DATABASE_PATH: ':memory:', ...env });
}

// ============================================================================
// Content Generator Stand-in
// ============================================================================

/**
 * Returns scripted content and records every call. Set `failure` to make
 * the next calls reject with it.
 */
export class FakeContentGenerator implements ContentGenerator {
  flashcards: GeneratedFlashcard[] = [];
  questions: QuizQuestion[] = [];
  failure: Error | null = null;
  readonly flashcardCalls: { topic: string; count: number }[] = [];
  readonly quizCalls: { topic: string; topicDescription: string }[] = [];

  async generateFlashcards(topic: string, count: number): Promise<GeneratedFlashcard[]> {
    this.flashcardCalls.push({ topic, count });
    if (this.failure) {
      throw this.failure;
    }
    return this.flashcards.slice(0, count);
  }

  async generateQuizQuestions(topic: string, topicDescription: string): Promise<QuizQuestion[]> {
    this.quizCalls.push({ topic, topicDescription });
    if (this.failure) {
      throw this.failure;
    }
    return this.questions;
  }
}

// ============================================================================
// Test App Creation
// ============================================================================

/**
 * The real application wired to the test database.
 */
export function createTestApp(context: TestContext, options: TestAppOptions = {}): Hono {
  return createApp({
    config: createTestConfig(options.env),
    repos: context.repos,
    contentGenerator: options.contentGenerator ?? new FakeContentGenerator(),
    clock: options.clock ?? (() => new Date(BASE_TIME.getTime())),
  });
}
