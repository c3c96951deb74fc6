/**
 * Flashcard API Routes
 *
 * All endpoints act on the learner named by the X-Learner-Id header.
 *
 * Endpoints:
 * - GET    /              - List cards (?topic, ?difficulty, ?dueOnly=true)
 * - GET    /topics        - Topics with card counts
 * - POST   /              - Create a card
 * - POST   /generate      - Generate cards for a topic
 * - GET    /:id           - One card
 * - PUT    /:id/review    - Record a review with confidence 1-5
 * - PATCH  /:id           - Edit card content
 * - DELETE /:id           - Delete a card
 */

import { Hono } from 'hono';
import type { FlashcardService } from '@/core/learning';
import type { LearnerRepository } from '@/storage/repositories';
import { getLearner, learnerContext } from '../middleware/learner-context';
import { validate, validateQuery } from '../middleware/validate';
import {
  createFlashcardSchema,
  generateFlashcardsSchema,
  listFlashcardsQuerySchema,
  reviewFlashcardSchema,
  updateFlashcardSchema,
} from '../types';
import { success } from '../utils/response';

export interface FlashcardRouteDependencies {
  flashcardService: FlashcardService;
  /** Current time; fixed in tests */
  clock: () => Date;
  learnerRepo: LearnerRepository;
}

export function flashcardsRoutes({ flashcardService, clock, learnerRepo }: FlashcardRouteDependencies): Hono {
  const router = new Hono();

  router.use('*', learnerContext(learnerRepo));

  /**
   * GET /
   *
   * With dueOnly=true only cards due now are returned, most overdue first;
   * otherwise newest first.
   */
  router.get('/', validateQuery(listFlashcardsQuerySchema), async (c) => {
    const learner = getLearner(c);
    const query = c.get('validatedQuery');
    const cards = await flashcardService.listFlashcards(learner.id, query, clock());
    return success(c, cards);
  });

  router.get('/topics', async (c) => {
    const learner = getLearner(c);
    return success(c, await flashcardService.listTopics(learner.id));
  });

  router.post('/', validate(createFlashcardSchema), async (c) => {
    const learner = getLearner(c);
    const [card] = await flashcardService.createFlashcards(
      learner.id,
      [c.get('validatedBody')],
      clock()
    );
    return success(c, card, 201);
  });

  /**
   * POST /generate
   *
   * Response: 201 with the stored cards; 502 LLM_ERROR if generation fails.
   */
  router.post('/generate', validate(generateFlashcardsSchema), async (c) => {
    const learner = getLearner(c);
    const { topic, count } = c.get('validatedBody');
    const cards = await flashcardService.generateFlashcards(learner.id, topic, count, clock());
    return success(c, cards, 201);
  });

  router.get('/:id', async (c) => {
    const learner = getLearner(c);
    return success(c, await flashcardService.getFlashcard(learner.id, c.req.param('id')));
  });

  /**
   * PUT /:id/review
   *
   * Response: 200 with the card and its new review state;
   * 400 INVALID_INPUT for a confidence outside 1-5;
   * 409 CONFLICT if the card was reviewed concurrently elsewhere.
   */
  router.put('/:id/review', validate(reviewFlashcardSchema), async (c) => {
    const learner = getLearner(c);
    const { confidence } = c.get('validatedBody');
    const card = await flashcardService.submitReview(
      learner.id,
      c.req.param('id'),
      confidence,
      clock()
    );
    return success(c, card);
  });

  router.patch('/:id', validate(updateFlashcardSchema), async (c) => {
    const learner = getLearner(c);
    const card = await flashcardService.updateFlashcard(
      learner.id,
      c.req.param('id'),
      c.get('validatedBody')
    );
    return success(c, card);
  });

  router.delete('/:id', async (c) => {
    const learner = getLearner(c);
    const id = c.req.param('id');
    await flashcardService.deleteFlashcard(learner.id, id);
    return success(c, { id, deleted: true });
  });

  return router;
}
