/**
 * Learners API Endpoint Tests
 *
 * Endpoints tested:
 * - POST /api/learners - Register a learner
 * - GET /api/learners/:id - Learner profile with topic proficiency
 * - GET /api/learners/:id/proficiency - Per-topic rows
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { z } from 'zod';
import type { Hono } from 'hono';
import {
  createTestContext,
  cleanupTestDatabase,
  createTestApp,
  type TestContext,
} from '../setup';
import {
  BASE_TIME,
  createTestLearner,
  jsonRequest,
  learnerJson,
  readData,
  readError,
} from '../helpers';

describe('Learners API', () => {
  let ctx: TestContext;
  let app: Hono;

  beforeEach(() => {
    ctx = createTestContext();
    app = createTestApp(ctx);
  });

  afterEach(() => {
    cleanupTestDatabase(ctx);
  });

  // ==========================================================================
  // POST /api/learners
  // ==========================================================================
  describe('POST /api/learners', () => {
    it('should register a learner with a generated id', async () => {
      // Act
      const response = await app.request(
        '/api/learners',
        jsonRequest('POST', { name: '  Ada Lovelace ', email: 'ada@example.com' })
      );
      const learner = await readData(response, learnerJson);

      // Assert
      expect(response.status).toBe(201);
      expect(learner.id.startsWith('lr_')).toBe(true);
      expect(learner.name).toBe('Ada Lovelace');
      expect(learner.email).toBe('ada@example.com');
    });

    it('should return 409 when the email is taken in any case', async () => {
      await createTestLearner(ctx.repos, { email: 'ada@example.com' });

      const response = await app.request(
        '/api/learners',
        jsonRequest('POST', { name: 'Ada', email: 'ADA@example.com' })
      );
      const error = await readError(response);

      expect(response.status).toBe(409);
      expect(error.code).toBe('CONFLICT');
      expect(error.message).toBe("A learner with email 'ADA@example.com' already exists");
    });

    it('should report each invalid field', async () => {
      const response = await app.request(
        '/api/learners',
        jsonRequest('POST', { name: '', email: 'not-an-email' })
      );
      const error = await readError(response);

      expect(response.status).toBe(400);
      expect(error.code).toBe('VALIDATION_ERROR');
      expect(error.details).toEqual([
        { path: 'name', message: 'Name is required' },
        { path: 'email', message: 'Email must be a valid address' },
      ]);
    });
  });

  // ==========================================================================
  // GET /api/learners/:id
  // ==========================================================================
  describe('GET /api/learners/:id', () => {
    it('should include the topic proficiency map', async () => {
      // Arrange
      const learner = await createTestLearner(ctx.repos, { id: 'lr_ada' });
      await ctx.repos.topicProficiencies.save({
        learnerId: learner.id,
        topic: 'Algebra',
        proficiency: 0.65,
        updatedAt: BASE_TIME,
      });
      await ctx.repos.topicProficiencies.save({
        learnerId: learner.id,
        topic: 'Biology',
        proficiency: 0.3,
        updatedAt: BASE_TIME,
      });

      // Act
      const response = await app.request('/api/learners/lr_ada');
      const profile = await readData(
        response,
        learnerJson.extend({ topicProficiency: z.record(z.number()) })
      );

      // Assert
      expect(profile.id).toBe('lr_ada');
      expect(profile.createdAt).toBe('2024-01-15T10:00:00.000Z');
      expect(profile.topicProficiency).toEqual({ Algebra: 0.65, Biology: 0.3 });
    });

    it('should return 404 for an unknown learner', async () => {
      const response = await app.request('/api/learners/lr_missing');
      const error = await readError(response);

      expect(response.status).toBe(404);
      expect(error.message).toBe("Learner with id 'lr_missing' not found");
    });
  });

  // ==========================================================================
  // GET /api/learners/:id/proficiency
  // ==========================================================================
  describe('GET /api/learners/:id/proficiency', () => {
    it('should list topics in name order with attempt counts', async () => {
      const learner = await createTestLearner(ctx.repos, { id: 'lr_ada' });
      for (const proficiency of [0.5, 0.65]) {
        await ctx.repos.topicProficiencies.save({
          learnerId: learner.id,
          topic: 'Zoology',
          proficiency,
          updatedAt: BASE_TIME,
        });
      }
      await ctx.repos.topicProficiencies.save({
        learnerId: learner.id,
        topic: 'Algebra',
        proficiency: 1,
        updatedAt: BASE_TIME,
      });

      const response = await app.request('/api/learners/lr_ada/proficiency');
      const rows = await readData(
        response,
        z.array(z.object({ topic: z.string(), proficiency: z.number(), attemptCount: z.number() }))
      );

      expect(rows).toEqual([
        { topic: 'Algebra', proficiency: 1, attemptCount: 1 },
        { topic: 'Zoology', proficiency: 0.65, attemptCount: 2 },
      ]);
    });
  });
});
