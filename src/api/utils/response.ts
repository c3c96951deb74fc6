/**
 * API Response Utilities
 *
 * Wraps route results in the ApiResponse envelope. Errors are thrown and
 * formatted by the error handler rather than built here.
 *
 * @example
 * ```typescript
 * app.post('/api/learners', validate(createLearnerSchema), async (c) => {
 *   const learner = await learnerRepo.create(c.get('validatedBody'));
 *   return success(c, learner, 201);
 * });
 * ```
 */

import type { Context } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type { ApiResponse } from '../types';

export function success<T>(
  c: Context,
  data: T,
  statusCode: ContentfulStatusCode = 200
): Response {
  const response: ApiResponse<T> = {
    success: true,
    data,
  };

  return c.json(response, statusCode);
}
