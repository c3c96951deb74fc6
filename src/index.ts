/**
 * Mastery Track - Server Entry Point
 *
 * Loads and validates configuration from the environment, then starts the
 * HTTP API. For command-line use, see src/cli/index.ts.
 */

import { loadConfig, validateConfig, ConfigValidationError } from './config';
import { startServer } from './api/server';

try {
  const config = loadConfig(process.env);
  validateConfig(config);
  startServer(config);
} catch (error) {
  if (error instanceof ConfigValidationError) {
    console.error(`[Config] ${error.message}`);
  } else {
    console.error('[Server] Failed to start:', error);
  }
  process.exit(1);
}
