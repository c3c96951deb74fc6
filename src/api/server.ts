/**
 * Mastery Track API Server
 *
 * Builds the Hono application from injected dependencies and serves it on
 * Node through @hono/node-server.
 *
 * Features:
 * - CORS configuration from ALLOWED_ORIGINS
 * - Request logging with response times
 * - Rate limiting (general limit plus a stricter one on content generation)
 * - Consistent JSON error responses
 * - Health check endpoint
 *
 * @example
 * ```typescript
 * const config = loadConfig();
 * const { db } = createDatabase(config.database.path);
 * const app = createApp({
 *   config,
 *   repos: createRepositories(db),
 *   contentGenerator: new UnconfiguredContentGenerator(),
 * });
 * const res = await app.request('/health');
 * ```
 */

import { Hono } from 'hono';
import { serve } from '@hono/node-server';
import { isProduction, type Config } from '@/config';
import { FlashcardService, KeyedLock, QuizService } from '@/core/learning';
import { createDatabase } from '@/storage/db';
import { createRepositories, type Repositories } from '@/storage/repositories';
import {
  AnthropicClient,
  LLMContentGenerator,
  UnconfiguredContentGenerator,
  type ContentGenerator,
} from '@/llm';
import {
  corsMiddleware,
  createErrorHandler,
  loggerMiddleware,
  rateLimiter,
} from './middleware';
import { createApiRouter, healthRoutes } from './routes';

export interface AppDependencies {
  config: Config;
  repos: Repositories;
  contentGenerator: ContentGenerator;
  /** Current time for scheduling; defaults to the wall clock */
  clock?: () => Date;
}

/**
 * Creates the Hono application.
 *
 * Middleware order:
 * 1. Logger - Logs all requests with timing (not in the test environment)
 * 2. CORS - Handles cross-origin requests
 * 3. Rate Limiters - General on /api/*, stricter on the generate endpoints
 *
 * Errors from any layer are formatted by the onError handler.
 */
export function createApp(deps: AppDependencies): Hono {
  const { config, repos, contentGenerator } = deps;
  const clock = deps.clock ?? (() => new Date());
  const app = new Hono();

  // One lock shared by both services, so review and proficiency keys
  // serialize across every request in this process
  const lock = new KeyedLock();
  const flashcardService = new FlashcardService({
    flashcardRepo: repos.flashcards,
    contentGenerator,
    lock,
  });
  const quizService = new QuizService({
    quizRepo: repos.quizzes,
    attemptRepo: repos.quizAttempts,
    topicProficiencyRepo: repos.topicProficiencies,
    contentGenerator,
    lock,
  });

  app.onError(createErrorHandler({ exposeDetails: !isProduction(config) }));

  if (config.server.nodeEnv !== 'test') {
    app.use('*', loggerMiddleware({ colorize: !isProduction(config) }));
  }

  app.use('*', corsMiddleware({ allowedOrigins: [...config.cors.allowedOrigins] }));

  app.route('/health', healthRoutes(config.server.nodeEnv));

  app.use(
    '/api/*',
    rateLimiter({
      windowMs: config.rateLimit.windowMs,
      maxRequests: config.rateLimit.maxRequests,
    })
  );

  // Content generation calls the LLM; limit it separately
  const llmLimiter = rateLimiter({
    windowMs: config.rateLimit.windowMs,
    maxRequests: config.rateLimit.llmMaxRequests,
    message: 'Too many generation requests. Please try again later.',
  });
  app.use('/api/flashcards/generate', llmLimiter);
  app.use('/api/quizzes/generate', llmLimiter);

  app.route('/api', createApiRouter({ repos, flashcardService, quizService, clock }));

  app.notFound((c) => {
    return c.json(
      {
        success: false,
        error: {
          code: 'NOT_FOUND',
          message: `Route ${c.req.method} ${c.req.path} not found`,
        },
      },
      404
    );
  });

  return app;
}

/**
 * Picks the content generator for a config: Anthropic when an API key is
 * set, otherwise a stand-in whose calls fail with LLM_ERROR.
 */
export function createContentGenerator(config: Config): ContentGenerator {
  if (!config.anthropic.apiKey) {
    console.warn('[Server] ANTHROPIC_API_KEY is not set; content generation is disabled');
    return new UnconfiguredContentGenerator();
  }

  return new LLMContentGenerator(
    new AnthropicClient({
      apiKey: config.anthropic.apiKey,
      model: config.anthropic.model,
      maxTokens: config.anthropic.maxTokens,
    })
  );
}

/**
 * Opens the database, builds the app and starts listening.
 * Installs SIGINT/SIGTERM handlers that close the server and database.
 */
export function startServer(config: Config): void {
  const { db, sqlite } = createDatabase(config.database.path);
  const app = createApp({
    config,
    repos: createRepositories(db),
    contentGenerator: createContentGenerator(config),
  });

  const { port, host } = config.server;
  const server = serve({ fetch: app.fetch, port, hostname: host }, (info) => {
    console.log('');
    console.log('[Server] Mastery Track API');
    console.log(`[Server] Listening on http://${host}:${info.port}`);
    console.log(`[Server] Environment: ${config.server.nodeEnv}`);
    console.log(`[Server] Database: ${config.database.path}`);
    console.log(
      `[Server] Rate limits: ${config.rateLimit.maxRequests} general, ` +
        `${config.rateLimit.llmMaxRequests} generation per ${config.rateLimit.windowMs / 1000}s`
    );
    console.log('');
  });

  const shutdown = (signal: string) => {
    console.log(`\n[Server] Received ${signal}, shutting down...`);
    server.close(() => {
      sqlite.close();
      process.exit(0);
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}
