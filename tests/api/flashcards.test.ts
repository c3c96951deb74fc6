/**
 * Flashcards API Endpoint Tests
 *
 * Endpoints tested:
 * - GET /api/flashcards - List cards, with topic/difficulty/due filters
 * - GET /api/flashcards/topics - Topic counts
 * - POST /api/flashcards - Create a card
 * - POST /api/flashcards/generate - Generate cards for a topic
 * - GET /api/flashcards/:id - Card details
 * - PUT /api/flashcards/:id/review - Record a review
 * - PATCH /api/flashcards/:id - Edit content
 * - DELETE /api/flashcards/:id - Delete a card
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { z } from 'zod';
import type { Hono } from 'hono';
import {
  createTestContext,
  cleanupTestDatabase,
  createTestApp,
  FakeContentGenerator,
  type TestContext,
} from '../setup';
import {
  asLearner,
  createTestFlashcard,
  createTestLearner,
  daysFromBase,
  flashcardJson,
  jsonRequest,
  readData,
  readError,
} from '../helpers';
import { LLMError } from '../../src/llm/types';
import type { Learner } from '../../src/core/models';

describe('Flashcards API', () => {
  let ctx: TestContext;
  let app: Hono;
  let generator: FakeContentGenerator;
  let learner: Learner;

  beforeEach(async () => {
    ctx = createTestContext();
    generator = new FakeContentGenerator();
    app = createTestApp(ctx, { contentGenerator: generator });
    learner = await createTestLearner(ctx.repos, { id: 'lr_test', email: 'ada@example.com' });
  });

  afterEach(() => {
    cleanupTestDatabase(ctx);
  });

  // ==========================================================================
  // Learner header
  // ==========================================================================
  describe('learner header', () => {
    it('should return 401 when X-Learner-Id is missing', async () => {
      const response = await app.request('/api/flashcards');
      const error = await readError(response);

      expect(response.status).toBe(401);
      expect(error.code).toBe('UNAUTHORIZED');
      expect(error.message).toBe('Missing X-Learner-Id header');
    });

    it('should return 401 for an unknown learner', async () => {
      const response = await app.request('/api/flashcards', asLearner('lr_nobody'));
      const error = await readError(response);

      expect(response.status).toBe(401);
      expect(error.message).toBe("Unknown learner 'lr_nobody'");
    });
  });

  // ==========================================================================
  // POST /api/flashcards
  // ==========================================================================
  describe('POST /api/flashcards', () => {
    it('should create a card that is due immediately', async () => {
      // Act
      const response = await app.request(
        '/api/flashcards',
        jsonRequest('POST', { topic: '  Biology ', front: 'Powerhouse?', back: 'Mitochondria' }, learner.id)
      );
      const card = await readData(response, flashcardJson);

      // Assert
      expect(response.status).toBe(201);
      expect(card.id.startsWith('fc_')).toBe(true);
      expect(card.learnerId).toBe(learner.id);
      expect(card.topic).toBe('Biology');
      expect(card.difficulty).toBe('medium');
      expect(card.explanation).toBeNull();
      expect(card.version).toBe(0);
      expect(card.reviewState).toEqual({
        easeFactor: 2.5,
        intervalDays: 0,
        repetitions: 0,
        nextReviewAt: '2024-01-15T10:00:00.000Z',
        lastReviewedAt: null,
        lastConfidence: null,
      });
    });

    it('should reject a blank front with VALIDATION_ERROR', async () => {
      const response = await app.request(
        '/api/flashcards',
        jsonRequest('POST', { topic: 'Biology', front: '   ', back: 'ATP' }, learner.id)
      );
      const error = await readError(response);

      expect(response.status).toBe(400);
      expect(error.code).toBe('VALIDATION_ERROR');
      expect(error.details).toEqual([{ path: 'front', message: 'Front is required' }]);
    });

    it('should reject malformed JSON', async () => {
      const response = await app.request('/api/flashcards', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', 'X-Learner-Id': learner.id },
        body: '{"topic": ',
      });
      const error = await readError(response);

      expect(response.status).toBe(400);
      expect(error.code).toBe('INVALID_JSON');
    });
  });

  // ==========================================================================
  // GET /api/flashcards
  // ==========================================================================
  describe('GET /api/flashcards', () => {
    it('should list only the requesting learner cards', async () => {
      // Arrange
      const other = await createTestLearner(ctx.repos, { id: 'lr_other' });
      const mine = await createTestFlashcard(ctx.repos, learner.id);
      await createTestFlashcard(ctx.repos, other.id);

      // Act
      const response = await app.request('/api/flashcards', asLearner(learner.id));
      const cards = await readData(response, z.array(flashcardJson));

      // Assert
      expect(response.status).toBe(200);
      expect(cards.map((card) => card.id)).toEqual([mine.id]);
    });

    it('should return due cards most overdue first with dueOnly=true', async () => {
      // Arrange: clock is fixed at BASE_TIME
      const later = await createTestFlashcard(ctx.repos, learner.id, {
        id: 'fc_later',
        reviewState: { nextReviewAt: daysFromBase(-1) },
      });
      const earliest = await createTestFlashcard(ctx.repos, learner.id, {
        id: 'fc_earliest',
        reviewState: { nextReviewAt: daysFromBase(-3) },
      });
      await createTestFlashcard(ctx.repos, learner.id, {
        id: 'fc_future',
        reviewState: { nextReviewAt: daysFromBase(2) },
      });

      // Act
      const response = await app.request('/api/flashcards?dueOnly=true', asLearner(learner.id));
      const cards = await readData(response, z.array(flashcardJson));

      // Assert
      expect(cards.map((card) => card.id)).toEqual([earliest.id, later.id]);
    });

    it('should filter by topic', async () => {
      await createTestFlashcard(ctx.repos, learner.id, { id: 'fc_bio', topic: 'Biology' });
      await createTestFlashcard(ctx.repos, learner.id, { id: 'fc_chem', topic: 'Chemistry' });

      const response = await app.request('/api/flashcards?topic=Chemistry', asLearner(learner.id));
      const cards = await readData(response, z.array(flashcardJson));

      expect(cards.map((card) => card.id)).toEqual(['fc_chem']);
    });

    it('should reject an unknown difficulty filter', async () => {
      const response = await app.request('/api/flashcards?difficulty=brutal', asLearner(learner.id));
      const error = await readError(response);

      expect(response.status).toBe(400);
      expect(error.code).toBe('VALIDATION_ERROR');
      expect(error.message).toBe('Invalid query parameters');
    });
  });

  // ==========================================================================
  // GET /api/flashcards/topics
  // ==========================================================================
  describe('GET /api/flashcards/topics', () => {
    it('should count cards per topic, largest first', async () => {
      await createTestFlashcard(ctx.repos, learner.id, { topic: 'Chemistry' });
      await createTestFlashcard(ctx.repos, learner.id, { topic: 'Biology' });
      await createTestFlashcard(ctx.repos, learner.id, { topic: 'Biology' });

      const response = await app.request('/api/flashcards/topics', asLearner(learner.id));
      const topics = await readData(
        response,
        z.array(z.object({ topic: z.string(), count: z.number() }))
      );

      expect(topics).toEqual([
        { topic: 'Biology', count: 2 },
        { topic: 'Chemistry', count: 1 },
      ]);
    });
  });

  // ==========================================================================
  // GET /api/flashcards/:id
  // ==========================================================================
  describe('GET /api/flashcards/:id', () => {
    it('should return 404 for another learner card', async () => {
      const other = await createTestLearner(ctx.repos, { id: 'lr_other' });
      const card = await createTestFlashcard(ctx.repos, other.id, { id: 'fc_theirs' });

      const response = await app.request(`/api/flashcards/${card.id}`, asLearner(learner.id));
      const error = await readError(response);

      expect(response.status).toBe(404);
      expect(error.code).toBe('NOT_FOUND');
      expect(error.message).toBe("Flashcard with id 'fc_theirs' not found");
      expect(error.details).toEqual({ resource: 'Flashcard', id: 'fc_theirs' });
    });
  });

  // ==========================================================================
  // PUT /api/flashcards/:id/review
  // ==========================================================================
  describe('PUT /api/flashcards/:id/review', () => {
    it('should schedule the first successful review one day out', async () => {
      // Arrange
      const card = await createTestFlashcard(ctx.repos, learner.id);

      // Act
      const response = await app.request(
        `/api/flashcards/${card.id}/review`,
        jsonRequest('PUT', { confidence: 5 }, learner.id)
      );
      const reviewed = await readData(response, flashcardJson);

      // Assert
      expect(response.status).toBe(200);
      expect(reviewed.version).toBe(1);
      expect(reviewed.reviewState).toEqual({
        easeFactor: 2.5,
        intervalDays: 1,
        repetitions: 1,
        nextReviewAt: '2024-01-16T10:00:00.000Z',
        lastReviewedAt: '2024-01-15T10:00:00.000Z',
        lastConfidence: 5,
      });
    });

    it('should reset repetitions on a low-confidence review', async () => {
      const card = await createTestFlashcard(ctx.repos, learner.id, {
        reviewState: { easeFactor: 2.5, intervalDays: 6, repetitions: 2 },
      });

      const response = await app.request(
        `/api/flashcards/${card.id}/review`,
        jsonRequest('PUT', { confidence: 2 }, learner.id)
      );
      const reviewed = await readData(response, flashcardJson);

      expect(reviewed.reviewState.repetitions).toBe(0);
      expect(reviewed.reviewState.intervalDays).toBe(1);
      expect(reviewed.reviewState.easeFactor).toBe(2.5);
      expect(reviewed.reviewState.nextReviewAt).toBe('2024-01-16T10:00:00.000Z');
    });

    it('should reject a confidence outside 1-5 with INVALID_INPUT', async () => {
      const card = await createTestFlashcard(ctx.repos, learner.id);

      const response = await app.request(
        `/api/flashcards/${card.id}/review`,
        jsonRequest('PUT', { confidence: 6 }, learner.id)
      );
      const error = await readError(response);

      expect(response.status).toBe(400);
      expect(error.code).toBe('INVALID_INPUT');
      expect(error.message).toBe('Confidence must be an integer between 1 and 5, received 6');
      expect(error.details).toEqual({ field: 'confidence' });
    });

    it('should leave the card untouched after a rejected review', async () => {
      const card = await createTestFlashcard(ctx.repos, learner.id);

      await app.request(
        `/api/flashcards/${card.id}/review`,
        jsonRequest('PUT', { confidence: 0 }, learner.id)
      );
      const stored = await ctx.repos.flashcards.findById(card.id);

      expect(stored?.version).toBe(0);
      expect(stored?.reviewState.repetitions).toBe(0);
    });

    it('should apply concurrent reviews of one card one after the other', async () => {
      const card = await createTestFlashcard(ctx.repos, learner.id);

      const responses = await Promise.all([
        app.request(`/api/flashcards/${card.id}/review`, jsonRequest('PUT', { confidence: 5 }, learner.id)),
        app.request(`/api/flashcards/${card.id}/review`, jsonRequest('PUT', { confidence: 5 }, learner.id)),
      ]);
      const stored = await ctx.repos.flashcards.findById(card.id);

      expect(responses.map((response) => response.status)).toEqual([200, 200]);
      expect(stored?.version).toBe(2);
      expect(stored?.reviewState.repetitions).toBe(2);
      expect(stored?.reviewState.intervalDays).toBe(6);
    });
  });

  // ==========================================================================
  // PATCH /api/flashcards/:id
  // ==========================================================================
  describe('PATCH /api/flashcards/:id', () => {
    it('should update content without touching the review state', async () => {
      const card = await createTestFlashcard(ctx.repos, learner.id, {
        reviewState: { repetitions: 3, intervalDays: 15 },
      });

      const response = await app.request(
        `/api/flashcards/${card.id}`,
        jsonRequest('PATCH', { back: 'Adenosine triphosphate', difficulty: 'hard' }, learner.id)
      );
      const updated = await readData(response, flashcardJson);

      expect(updated.back).toBe('Adenosine triphosphate');
      expect(updated.difficulty).toBe('hard');
      expect(updated.reviewState.repetitions).toBe(3);
      expect(updated.reviewState.intervalDays).toBe(15);
    });

    it('should reject an empty update', async () => {
      const card = await createTestFlashcard(ctx.repos, learner.id);

      const response = await app.request(
        `/api/flashcards/${card.id}`,
        jsonRequest('PATCH', {}, learner.id)
      );
      const error = await readError(response);

      expect(response.status).toBe(400);
      expect(error.details).toEqual([{ path: '', message: 'At least one field must be provided' }]);
    });
  });

  // ==========================================================================
  // DELETE /api/flashcards/:id
  // ==========================================================================
  describe('DELETE /api/flashcards/:id', () => {
    it('should delete the card', async () => {
      const card = await createTestFlashcard(ctx.repos, learner.id);

      const response = await app.request(`/api/flashcards/${card.id}`, {
        method: 'DELETE',
        headers: { 'X-Learner-Id': learner.id },
      });
      const body = await readData(response, z.object({ id: z.string(), deleted: z.boolean() }));

      expect(body).toEqual({ id: card.id, deleted: true });
      expect(await ctx.repos.flashcards.findById(card.id)).toBeNull();
    });
  });

  // ==========================================================================
  // POST /api/flashcards/generate
  // ==========================================================================
  describe('POST /api/flashcards/generate', () => {
    it('should store generated cards under the requested topic', async () => {
      // Arrange
      generator.flashcards = [
        { front: 'What is ATP?', back: 'Energy carrier', difficulty: 'easy', explanation: 'Cells spend it.' },
        { front: 'Where is ATP made?', back: 'Mitochondria', difficulty: 'medium', explanation: '' },
      ];

      // Act
      const response = await app.request(
        '/api/flashcards/generate',
        jsonRequest('POST', { topic: 'Cell energy', count: 2 }, learner.id)
      );
      const cards = await readData(response, z.array(flashcardJson));

      // Assert
      expect(response.status).toBe(201);
      expect(generator.flashcardCalls).toEqual([{ topic: 'Cell energy', count: 2 }]);
      expect(cards.map((card) => [card.topic, card.front, card.explanation])).toEqual([
        ['Cell energy', 'What is ATP?', 'Cells spend it.'],
        ['Cell energy', 'Where is ATP made?', null],
      ]);
    });

    it('should map generator failures to 502 LLM_ERROR', async () => {
      generator.failure = new LLMError('Upstream overloaded', 'server_error');

      const response = await app.request(
        '/api/flashcards/generate',
        jsonRequest('POST', { topic: 'Cell energy' }, learner.id)
      );
      const error = await readError(response);

      expect(response.status).toBe(502);
      expect(error.code).toBe('LLM_ERROR');
      expect(error.details).toEqual({ type: 'server_error' });
    });
  });
});
