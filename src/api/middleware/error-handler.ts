/**
 * Global Error Handler
 *
 * Turns anything thrown by a route into the standard error envelope:
 *
 * ```json
 * {
 *   "success": false,
 *   "error": {
 *     "code": "ERROR_CODE",
 *     "message": "Human-readable error message",
 *     "details": { ... } // Optional additional context
 *   }
 * }
 * ```
 *
 * Domain errors from `core/` and `llm/` map onto fixed status codes; routes
 * can also throw AppError directly for anything HTTP-specific.
 *
 * Hono catches errors at the handler that threw them, so this is registered
 * with `app.onError` rather than wrapped around `next()`.
 *
 * @example
 * ```typescript
 * const app = new Hono();
 * app.onError(createErrorHandler({ exposeDetails: !isProduction(config) }));
 *
 * app.get('/protected', () => {
 *   throw new AppError('UNAUTHORIZED', 'Authentication required', 401);
 * });
 * ```
 */

import type { Context, ErrorHandler } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import {
  ConflictError,
  InvalidInputError,
  InvariantViolationError,
  NotFoundError,
} from '@/core/errors';
import { LLMError } from '@/llm/types';
import type { ApiErrorResponse } from '../types';

/**
 * Standard error codes used throughout the API.
 */
export const ErrorCodes = {
  // Client errors (4xx)
  BAD_REQUEST: 'BAD_REQUEST',
  INVALID_INPUT: 'INVALID_INPUT',
  INVALID_JSON: 'INVALID_JSON',
  UNAUTHORIZED: 'UNAUTHORIZED',
  NOT_FOUND: 'NOT_FOUND',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  RATE_LIMITED: 'RATE_LIMITED',
  CONFLICT: 'CONFLICT',

  // Server errors (5xx)
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  INVARIANT_VIOLATION: 'INVARIANT_VIOLATION',
  LLM_ERROR: 'LLM_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Error with an explicit HTTP status, for conditions that only exist at the
 * API layer (missing learner header, rate limits).
 *
 * @example
 * ```typescript
 * throw new AppError('VALIDATION_ERROR', 'Invalid request parameters', 400, {
 *   field: 'email',
 * });
 * ```
 */
export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly statusCode: ContentfulStatusCode;
  public readonly details?: unknown;

  constructor(
    code: ErrorCode,
    message: string,
    statusCode: ContentfulStatusCode = 500,
    details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;

    // Maintains proper stack trace for where error was thrown (V8 engines)
    Error.captureStackTrace?.(this, AppError);
  }
}

export interface ErrorHandlerOptions {
  /** Include raw messages and stack traces for unexpected errors. */
  exposeDetails?: boolean;
}

interface FormattedError {
  response: ApiErrorResponse;
  statusCode: ContentfulStatusCode;
}

function envelope(
  code: ErrorCode,
  message: string,
  statusCode: ContentfulStatusCode,
  details?: unknown
): FormattedError {
  return {
    response: {
      success: false,
      error: {
        code,
        message,
        ...(details !== undefined && { details }),
      },
    },
    statusCode,
  };
}

/**
 * Maps an error onto its envelope and HTTP status.
 */
export function formatErrorResponse(
  error: unknown,
  { exposeDetails = false }: ErrorHandlerOptions = {}
): FormattedError {
  if (error instanceof AppError) {
    return envelope(error.code, error.message, error.statusCode, error.details);
  }

  if (error instanceof InvalidInputError) {
    return envelope(
      ErrorCodes.INVALID_INPUT,
      error.message,
      400,
      error.field !== undefined ? { field: error.field } : undefined
    );
  }

  if (error instanceof NotFoundError) {
    return envelope(ErrorCodes.NOT_FOUND, error.message, 404, {
      resource: error.resource,
      id: error.id,
    });
  }

  if (error instanceof ConflictError) {
    return envelope(ErrorCodes.CONFLICT, error.message, 409);
  }

  if (error instanceof LLMError) {
    return envelope(ErrorCodes.LLM_ERROR, error.message, 502, { type: error.type });
  }

  if (error instanceof InvariantViolationError) {
    return envelope(
      ErrorCodes.INVARIANT_VIOLATION,
      exposeDetails ? error.message : 'An internal consistency check failed',
      500
    );
  }

  if (error instanceof Error) {
    return envelope(
      ErrorCodes.INTERNAL_ERROR,
      exposeDetails ? error.message : 'An unexpected error occurred. Please try again.',
      500,
      exposeDetails ? { stack: error.stack } : undefined
    );
  }

  // Non-Error throws (rare but possible)
  return envelope(
    ErrorCodes.INTERNAL_ERROR,
    'An unexpected error occurred',
    500,
    exposeDetails ? { rawError: String(error) } : undefined
  );
}

/**
 * Creates the handler passed to `app.onError`.
 *
 * Expected client errors (4xx) are not logged; everything else goes to
 * stderr with the `[Error Handler]` prefix.
 */
export function createErrorHandler(options: ErrorHandlerOptions = {}): ErrorHandler {
  return (error: Error, c: Context) => {
    const { response, statusCode } = formatErrorResponse(error, options);

    if (statusCode >= 500) {
      console.error('[Error Handler]', error);
    }

    return c.json(response, statusCode);
  };
}
