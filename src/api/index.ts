/**
 * API Module - Barrel Export
 *
 * @example
 * ```typescript
 * import { createApp } from '@/api';
 *
 * const app = createApp({ config, repos, contentGenerator });
 * const res = await app.request('/api');
 * ```
 */

export { createApp, createContentGenerator, startServer, type AppDependencies } from './server';

export {
  corsMiddleware,
  createErrorHandler,
  formatErrorResponse,
  AppError,
  ErrorCodes,
  loggerMiddleware,
  rateLimiter,
  RATE_LIMITS,
  learnerContext,
  getLearner,
  LEARNER_HEADER,
  validate,
  validateQuery,
  type ErrorCode,
  type LoggerConfig,
  type RateLimitConfig,
  type CorsConfig,
} from './middleware';

export { createApiRouter, healthRoutes, APP_VERSION } from './routes';

export type { ApiResponse, ApiError, ApiErrorResponse, ApiResult, ValidationErrorDetail } from './types';

export { success } from './utils/response';
