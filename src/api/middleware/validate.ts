/**
 * Zod Validation Middleware
 *
 * Validates the JSON body (or the query string) against a zod schema before
 * the route handler runs. On success the parsed value is stored on the
 * context and typed through the middleware's Env, so handlers read it with
 * `c.get('validatedBody')` without a cast.
 *
 * @example
 * ```typescript
 * app.post('/api/learners', validate(createLearnerSchema), async (c) => {
 *   const body = c.get('validatedBody'); // { name: string; email: string }
 *   return success(c, await learnerRepo.create(body), 201);
 * });
 * ```
 *
 * Error responses:
 * - malformed JSON → 400 INVALID_JSON
 * - schema failure → 400 VALIDATION_ERROR with one detail per issue:
 *
 * ```json
 * {
 *   "success": false,
 *   "error": {
 *     "code": "VALIDATION_ERROR",
 *     "message": "Invalid request body",
 *     "details": [{ "path": "email", "message": "Email must be a valid address" }]
 *   }
 * }
 * ```
 */

import type { MiddlewareHandler } from 'hono';
import { z } from 'zod';
import type { ApiErrorResponse, ValidationErrorDetail } from '../types';

function toDetails(error: z.ZodError): ValidationErrorDetail[] {
  return error.errors.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

function validationFailure(message: string, error: z.ZodError): ApiErrorResponse {
  return {
    success: false,
    error: {
      code: 'VALIDATION_ERROR',
      message,
      details: toDetails(error),
    },
  };
}

/**
 * Creates a middleware that validates the JSON request body.
 */
export function validate<T extends z.ZodTypeAny>(
  schema: T
): MiddlewareHandler<{ Variables: { validatedBody: z.infer<T> } }> {
  return async (c, next) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch (err) {
      if (err instanceof SyntaxError) {
        const response: ApiErrorResponse = {
          success: false,
          error: {
            code: 'INVALID_JSON',
            message: 'Request body must be valid JSON',
          },
        };
        return c.json(response, 400);
      }
      throw err;
    }

    const result = schema.safeParse(body);
    if (!result.success) {
      return c.json(validationFailure('Invalid request body', result.error), 400);
    }

    c.set('validatedBody', result.data);
    await next();
  };
}

/**
 * Creates a middleware that validates URL query parameters.
 *
 * @example
 * ```typescript
 * app.get('/api/quizzes', validateQuery(pageQuerySchema), async (c) => {
 *   const { skip, limit } = c.get('validatedQuery');
 *   return success(c, await quizService.listQuizzes(learnerId, { skip, limit }));
 * });
 * ```
 */
export function validateQuery<T extends z.ZodTypeAny>(
  schema: T
): MiddlewareHandler<{ Variables: { validatedQuery: z.infer<T> } }> {
  return async (c, next) => {
    const result = schema.safeParse(c.req.query());
    if (!result.success) {
      return c.json(validationFailure('Invalid query parameters', result.error), 400);
    }

    c.set('validatedQuery', result.data);
    await next();
  };
}
