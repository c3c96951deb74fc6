/**
 * Quiz API Routes
 *
 * All endpoints act on the learner named by the X-Learner-Id header.
 *
 * Endpoints:
 * - GET  /             - Quiz summaries, newest first (?skip, ?limit)
 * - POST /             - Create a quiz from explicit questions
 * - POST /generate     - Generate a quiz for a topic
 * - GET  /attempts     - The learner's attempts, newest first (?skip, ?limit)
 * - GET  /:id          - One quiz with its questions
 * - POST /:id/submit   - Score answers and update topic proficiency
 */

import { Hono } from 'hono';
import type { QuizService } from '@/core/learning';
import type { LearnerRepository } from '@/storage/repositories';
import { getLearner, learnerContext } from '../middleware/learner-context';
import { validate, validateQuery } from '../middleware/validate';
import {
  createQuizSchema,
  generateQuizSchema,
  pageQuerySchema,
  submitQuizSchema,
} from '../types';
import { success } from '../utils/response';

export interface QuizRouteDependencies {
  quizService: QuizService;
  clock: () => Date;
  learnerRepo: LearnerRepository;
}

export function quizzesRoutes({ quizService, clock, learnerRepo }: QuizRouteDependencies): Hono {
  const router = new Hono();

  router.use('*', learnerContext(learnerRepo));

  router.get('/', validateQuery(pageQuerySchema), async (c) => {
    const learner = getLearner(c);
    return success(c, await quizService.listQuizzes(learner.id, c.get('validatedQuery')));
  });

  router.post('/', validate(createQuizSchema), async (c) => {
    const learner = getLearner(c);
    const quiz = await quizService.createQuiz(learner.id, c.get('validatedBody'), clock());
    return success(c, quiz, 201);
  });

  /**
   * POST /generate
   *
   * Response: 201 with the stored quiz; 502 LLM_ERROR if generation fails.
   */
  router.post('/generate', validate(generateQuizSchema), async (c) => {
    const learner = getLearner(c);
    const quiz = await quizService.generateQuiz(learner.id, c.get('validatedBody'), clock());
    return success(c, quiz, 201);
  });

  router.get('/attempts', validateQuery(pageQuerySchema), async (c) => {
    const learner = getLearner(c);
    return success(c, await quizService.listAttempts(learner.id, c.get('validatedQuery')));
  });

  router.get('/:id', async (c) => {
    const learner = getLearner(c);
    return success(c, await quizService.getQuiz(learner.id, c.req.param('id')));
  });

  /**
   * POST /:id/submit
   *
   * Response: 200 with per-question outcomes, score, pass flag, the
   * attempt id and the topic proficiency before and after.
   */
  router.post('/:id/submit', validate(submitQuizSchema), async (c) => {
    const learner = getLearner(c);
    const outcome = await quizService.submitAttempt(
      learner.id,
      c.req.param('id'),
      c.get('validatedBody'),
      clock()
    );
    return success(c, outcome);
  });

  return router;
}
