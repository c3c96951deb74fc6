/**
 * API Middleware - Barrel Export
 *
 * Order used by createApp():
 *
 * 1. Logger - Logs request information
 * 2. CORS - Handles cross-origin requests
 * 3. Rate Limiter - Protects against abuse
 * 4. Learner Context - Resolves X-Learner-Id on learner-scoped routes
 *
 * Errors are formatted by createErrorHandler(), registered with app.onError.
 */

export { corsMiddleware, DEFAULT_CORS_CONFIG, type CorsConfig } from './cors';

export {
  createErrorHandler,
  formatErrorResponse,
  AppError,
  ErrorCodes,
  type ErrorCode,
  type ErrorHandlerOptions,
} from './error-handler';

export {
  loggerMiddleware,
  formatResponseTime,
  DEFAULT_LOGGER_CONFIG,
  type LoggerConfig,
} from './logger';

export { rateLimiter, RATE_LIMITS, type RateLimitConfig } from './rate-limit';

export { learnerContext, getLearner, LEARNER_HEADER } from './learner-context';

export { validate, validateQuery } from './validate';
