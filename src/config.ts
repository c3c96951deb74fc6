/**
 * Centralized Configuration Module
 *
 * Loads configuration from environment variables, validates it with zod and
 * returns an immutable object. The config is passed explicitly into the
 * calling layers (`createApp`, the CLI); the scheduling and proficiency
 * functions in `core/` never read it.
 *
 * Usage:
 *   import { loadConfig, validateConfig } from './config';
 *
 *   const config = loadConfig(process.env);
 *   validateConfig(config);
 *   console.log(config.server.port);
 *
 * @module config
 */

import { z } from 'zod';

// =============================================================================
// Configuration Schema
// =============================================================================

/**
 * Zod schema for validating environment configuration.
 * This provides runtime validation and TypeScript type inference.
 */
const configSchema = z.object({
  // Server configuration
  server: z.object({
    port: z.number().int().positive().default(3000),
    host: z.string().default('0.0.0.0'),
    nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  }),

  // SQLite database file (":memory:" for an ephemeral database)
  database: z.object({
    path: z.string().min(1).default('./data/mastery-track.db'),
  }),

  // Anthropic API configuration (content generation)
  anthropic: z.object({
    apiKey: z.string().optional(),
    model: z.string().default('claude-sonnet-4-5-20250929'),
    maxTokens: z.number().int().positive().default(8192),
  }),

  // Rate limiting configuration
  rateLimit: z.object({
    windowMs: z.number().int().positive().default(60000),
    maxRequests: z.number().int().positive().default(100),
    llmMaxRequests: z.number().int().positive().default(10),
  }),

  // CORS configuration
  cors: z.object({
    allowedOrigins: z.array(z.string()).default([]),
  }),
});

// TypeScript type inferred from the Zod schema
export type Config = Readonly<z.infer<typeof configSchema>>;

/** Environment variable bag, normally `process.env`. */
export type Environment = Record<string, string | undefined>;

// =============================================================================
// Environment Variable Loading
// =============================================================================

/**
 * Parse a comma-separated string into an array of trimmed strings.
 * Returns an empty array if the input is undefined or empty.
 */
function parseCommaSeparated(value: string | undefined): string[] {
  if (!value || value.trim() === '') {
    return [];
  }
  return value.split(',').map((s) => s.trim()).filter((s) => s.length > 0);
}

/**
 * Parse an integer from an environment variable string.
 * Returns undefined if the value is not a valid integer.
 */
function parseIntOrUndefined(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? undefined : parsed;
}

/**
 * Builds the raw (unvalidated) config object from environment variables.
 * Values are left as strings where the schema narrows them.
 */
function loadFromEnvironment(env: Environment) {
  return {
    server: {
      port: parseIntOrUndefined(env.PORT),
      host: env.HOST,
      nodeEnv: env.NODE_ENV,
    },
    database: {
      path: env.DATABASE_PATH,
    },
    anthropic: {
      apiKey: env.ANTHROPIC_API_KEY,
      model: env.ANTHROPIC_MODEL,
      maxTokens: parseIntOrUndefined(env.ANTHROPIC_MAX_TOKENS),
    },
    rateLimit: {
      windowMs: parseIntOrUndefined(env.RATE_LIMIT_WINDOW_MS),
      maxRequests: parseIntOrUndefined(env.RATE_LIMIT_MAX_REQUESTS),
      llmMaxRequests: parseIntOrUndefined(env.RATE_LIMIT_LLM_MAX_REQUESTS),
    },
    cors: {
      allowedOrigins: parseCommaSeparated(env.ALLOWED_ORIGINS),
    },
  };
}

// =============================================================================
// Configuration Validation
// =============================================================================

/**
 * Configuration validation error with detailed information about missing/invalid values.
 */
export class ConfigValidationError extends Error {
  public readonly missingVars: string[];
  public readonly invalidVars: { name: string; reason: string }[];

  constructor(
    message: string,
    missingVars: string[] = [],
    invalidVars: { name: string; reason: string }[] = []
  ) {
    super(message);
    this.name = 'ConfigValidationError';
    this.missingVars = missingVars;
    this.invalidVars = invalidVars;
  }
}

/**
 * Parses and freezes configuration from an environment bag.
 *
 * @throws {ConfigValidationError} When a variable fails schema validation
 *
 * @example
 * ```typescript
 * const config = loadConfig({ PORT: '4000', NODE_ENV: 'test' });
 * config.server.port; // 4000
 * ```
 */
export function loadConfig(env: Environment = process.env): Config {
  const parseResult = configSchema.safeParse(loadFromEnvironment(env));

  if (!parseResult.success) {
    const invalidVars = parseResult.error.errors.map((issue) => ({
      name: issue.path.join('.'),
      reason: issue.message,
    }));
    throw new ConfigValidationError(
      `Invalid configuration: ${invalidVars.map((v) => `${v.name}: ${v.reason}`).join('; ')}`,
      [],
      invalidVars
    );
  }

  const data = parseResult.data;
  return Object.freeze({
    server: Object.freeze(data.server),
    database: Object.freeze(data.database),
    anthropic: Object.freeze(data.anthropic),
    rateLimit: Object.freeze(data.rateLimit),
    cors: Object.freeze({ allowedOrigins: [...data.cors.allowedOrigins] }),
  });
}

/**
 * Validates production requirements on a loaded config.
 *
 * In production mode the following are REQUIRED:
 * - ANTHROPIC_API_KEY: used for flashcard and quiz generation
 * - ALLOWED_ORIGINS: at least one CORS origin
 *
 * @throws {ConfigValidationError} If required configuration is missing in production
 */
export function validateConfig(config: Config): void {
  if (config.server.nodeEnv !== 'production') {
    return;
  }

  const missingVars: string[] = [];
  const invalidVars: { name: string; reason: string }[] = [];

  if (!config.anthropic.apiKey) {
    missingVars.push('ANTHROPIC_API_KEY');
  }

  if (config.cors.allowedOrigins.length === 0) {
    missingVars.push('ALLOWED_ORIGINS');
  }

  if (config.database.path === ':memory:') {
    invalidVars.push({
      name: 'DATABASE_PATH',
      reason: 'An in-memory database loses all data on restart',
    });
  }

  if (missingVars.length > 0 || invalidVars.length > 0) {
    const errorParts: string[] = [];

    if (missingVars.length > 0) {
      errorParts.push(`Missing required environment variables: ${missingVars.join(', ')}`);
    }

    if (invalidVars.length > 0) {
      const invalidDescriptions = invalidVars
        .map((v) => `${v.name}: ${v.reason}`)
        .join('; ');
      errorParts.push(`Invalid configuration: ${invalidDescriptions}`);
    }

    throw new ConfigValidationError(errorParts.join('\n'), missingVars, invalidVars);
  }
}

/**
 * Helper function to check if a config targets production.
 */
export function isProduction(config: Config): boolean {
  return config.server.nodeEnv === 'production';
}
