/**
 * Request Logger Middleware
 *
 * Logs one line per request with method, path, status and response time:
 *
 * ```
 * [API] GET /api/flashcards 200 - 15ms
 * [API] PUT /api/flashcards/fc_1/review 200 - 4ms
 * [API] POST /api/quizzes/generate 502 - 2.31s
 * ```
 */

import type { MiddlewareHandler } from 'hono';

export interface LoggerConfig {
  /** Prefix for log messages */
  prefix: string;
  includeTimestamp: boolean;
  /** Path prefixes to skip (e.g., health checks) */
  skipPaths: string[];
  /** ANSI colors for terminal output */
  colorize: boolean;
  /** Output sink, console.log unless overridden */
  write: (line: string) => void;
}

export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  prefix: '[API]',
  includeTimestamp: false,
  skipPaths: ['/health'],
  colorize: true,
  write: (line) => console.log(line),
};

const colors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
  cyan: '\x1b[36m',
  magenta: '\x1b[35m',
};

function getStatusColor(status: number): string {
  if (status >= 500) return colors.red;
  if (status >= 400) return colors.yellow;
  if (status >= 300) return colors.cyan;
  if (status >= 200) return colors.green;
  return colors.dim;
}

function getMethodColor(method: string): string {
  switch (method.toUpperCase()) {
    case 'GET':
      return colors.cyan;
    case 'POST':
      return colors.green;
    case 'PUT':
    case 'PATCH':
      return colors.yellow;
    case 'DELETE':
      return colors.red;
    default:
      return colors.magenta;
  }
}

/**
 * Milliseconds under one second, seconds with two decimals above.
 */
export function formatResponseTime(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  return `${(ms / 1000).toFixed(2)}s`;
}

/**
 * Creates the request logger.
 *
 * @example
 * ```typescript
 * app.use('*', loggerMiddleware({ colorize: !isProduction(config) }));
 * ```
 */
export function loggerMiddleware(config: Partial<LoggerConfig> = {}): MiddlewareHandler {
  const finalConfig: LoggerConfig = {
    ...DEFAULT_LOGGER_CONFIG,
    ...config,
  };

  return async (c, next) => {
    const path = c.req.path;
    if (finalConfig.skipPaths.some((skip) => path.startsWith(skip))) {
      return next();
    }

    const startTime = performance.now();
    await next();
    const responseTime = Math.round(performance.now() - startTime);

    const method = c.req.method;
    const status = c.res.status;

    let logMessage: string;
    if (finalConfig.colorize) {
      logMessage = [
        finalConfig.prefix,
        `${getMethodColor(method)}${method.padEnd(7)}${colors.reset}`,
        path,
        `${getStatusColor(status)}${status}${colors.reset}`,
        '-',
        `${colors.dim}${formatResponseTime(responseTime)}${colors.reset}`,
      ].join(' ');
    } else {
      logMessage = `${finalConfig.prefix} ${method} ${path} ${status} - ${formatResponseTime(responseTime)}`;
    }

    if (finalConfig.includeTimestamp) {
      logMessage = `[${new Date().toISOString()}] ${logMessage}`;
    }

    finalConfig.write(logMessage);
  };
}
