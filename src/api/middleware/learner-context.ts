/**
 * Learner Context Middleware
 *
 * Resolves the learner making the request from the `X-Learner-Id` header
 * and stores it on the context. Requests without the header, or naming a
 * learner that does not exist, are rejected with 401.
 *
 * There is no authentication: the header is trusted as given.
 *
 * @example
 * ```typescript
 * app.use('/api/flashcards/*', learnerContext(repos.learners));
 *
 * app.get('/api/flashcards', async (c) => {
 *   const learner = getLearner(c);
 *   return success(c, await flashcardService.listFlashcards(learner.id));
 * });
 * ```
 */

import type { Context, MiddlewareHandler } from 'hono';
import type { Learner } from '@/core/models';
import type { LearnerRepository } from '@/storage/repositories';
import { AppError, ErrorCodes } from './error-handler';

export const LEARNER_HEADER = 'X-Learner-Id';

declare module 'hono' {
  interface ContextVariableMap {
    learner: Learner;
  }
}

export function learnerContext(learnerRepo: LearnerRepository): MiddlewareHandler {
  return async (c, next) => {
    const learnerId = c.req.header(LEARNER_HEADER)?.trim();
    if (!learnerId) {
      throw new AppError(
        ErrorCodes.UNAUTHORIZED,
        `Missing ${LEARNER_HEADER} header`,
        401
      );
    }

    const learner = await learnerRepo.findById(learnerId);
    if (!learner) {
      throw new AppError(ErrorCodes.UNAUTHORIZED, `Unknown learner '${learnerId}'`, 401);
    }

    c.set('learner', learner);
    await next();
  };
}

/**
 * The learner resolved by learnerContext().
 *
 * @throws Error if the middleware was not applied to this route
 */
export function getLearner(c: Context): Learner {
  const learner = c.get('learner');
  if (!learner) {
    throw new Error(
      'Learner context not initialized. Ensure learnerContext() is applied to this route.'
    );
  }
  return learner;
}
