/**
 * CORS Middleware Configuration
 *
 * Wraps Hono's cors() with the project's defaults. Outside production the
 * usual local dev-server origins are allowed; production must list its
 * origins explicitly (ALLOWED_ORIGINS, enforced by validateConfig).
 *
 * @example
 * ```typescript
 * app.use('*', corsMiddleware({ allowedOrigins: config.cors.allowedOrigins }));
 * ```
 */

import { cors } from 'hono/cors';
import type { MiddlewareHandler } from 'hono';
import { LEARNER_HEADER } from './learner-context';

export interface CorsConfig {
  allowedOrigins: string[];
  allowedMethods: string[];
  allowedHeaders: string[];
  credentials: boolean;
  /** How long preflight responses can be cached (seconds) */
  maxAge: number;
}

export const DEFAULT_CORS_CONFIG: CorsConfig = {
  allowedOrigins: [
    'http://localhost:5173',
    'http://127.0.0.1:5173',
    'http://localhost:3000',
  ],
  allowedMethods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
  allowedHeaders: ['Content-Type', 'Authorization', 'X-Request-ID', LEARNER_HEADER],
  credentials: true,
  maxAge: 86400, // 24 hours
};

/**
 * Creates the CORS middleware. An empty `allowedOrigins` override keeps the
 * development defaults.
 */
export function corsMiddleware(config: Partial<CorsConfig> = {}): MiddlewareHandler {
  const finalConfig: CorsConfig = {
    ...DEFAULT_CORS_CONFIG,
    ...config,
    allowedOrigins:
      config.allowedOrigins && config.allowedOrigins.length > 0
        ? config.allowedOrigins
        : DEFAULT_CORS_CONFIG.allowedOrigins,
  };

  return cors({
    origin: finalConfig.allowedOrigins,
    allowMethods: finalConfig.allowedMethods,
    allowHeaders: finalConfig.allowedHeaders,
    credentials: finalConfig.credentials,
    maxAge: finalConfig.maxAge,
  });
}
