/**
 * API Routes Aggregator
 *
 * Route Structure:
 * - /health          - Health check (mounted at root, not under /api)
 * - /api             - API root with version info
 * - /api/learners    - Learner registration and proficiency
 * - /api/flashcards  - Learner-scoped flashcards and reviews
 * - /api/quizzes     - Learner-scoped quizzes and submissions
 *
 * @example
 * ```typescript
 * const app = new Hono();
 * app.route('/health', healthRoutes(config.server.nodeEnv));
 * app.route('/api', createApiRouter(deps));
 * ```
 */

import { Hono } from 'hono';
import type { FlashcardService, QuizService } from '@/core/learning';
import type { Repositories } from '@/storage/repositories';
import { success } from '../utils/response';
import { APP_VERSION } from './health';
import { learnersRoutes } from './learners';
import { flashcardsRoutes } from './flashcards';
import { quizzesRoutes } from './quizzes';

export { healthRoutes, APP_VERSION } from './health';
export { learnersRoutes } from './learners';
export { flashcardsRoutes } from './flashcards';
export { quizzesRoutes } from './quizzes';

export interface ApiInfo {
  name: string;
  version: string;
  endpoints: {
    path: string;
    description: string;
  }[];
}

export interface ApiRouterDependencies {
  repos: Repositories;
  flashcardService: FlashcardService;
  quizService: QuizService;
  clock: () => Date;
}

export function createApiRouter(deps: ApiRouterDependencies): Hono {
  const router = new Hono();
  const { repos, clock } = deps;

  router.get('/', (c) => {
    const apiInfo: ApiInfo = {
      name: 'Mastery Track API',
      version: APP_VERSION,
      endpoints: [
        { path: '/api/learners', description: 'Learner registration and topic proficiency' },
        { path: '/api/flashcards', description: 'Flashcards and SM-2 reviews (X-Learner-Id)' },
        { path: '/api/quizzes', description: 'Quizzes and scored submissions (X-Learner-Id)' },
        { path: '/health', description: 'Health check endpoint' },
      ],
    };

    return success(c, apiInfo);
  });

  router.route(
    '/learners',
    learnersRoutes({
      learnerRepo: repos.learners,
      topicProficiencyRepo: repos.topicProficiencies,
    })
  );

  router.route(
    '/flashcards',
    flashcardsRoutes({
      flashcardService: deps.flashcardService,
      learnerRepo: repos.learners,
      clock,
    })
  );

  router.route(
    '/quizzes',
    quizzesRoutes({
      quizService: deps.quizService,
      learnerRepo: repos.learners,
      clock,
    })
  );

  return router;
}
