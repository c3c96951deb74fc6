/**
 * Configuration Tests
 */

import { describe, it, expect } from 'vitest';
import {
  ConfigValidationError,
  isProduction,
  loadConfig,
  validateConfig,
} from '../../src/config';
import { RATE_LIMITS } from '../../src/api/middleware';

describe('loadConfig', () => {
  it('should apply defaults to an empty environment', () => {
    const config = loadConfig({});

    expect(config.server).toEqual({ port: 3000, host: '0.0.0.0', nodeEnv: 'development' });
    expect(config.database.path).toBe('./data/mastery-track.db');
    expect(config.rateLimit).toEqual({
      windowMs: RATE_LIMITS.GENERAL.windowMs,
      maxRequests: RATE_LIMITS.GENERAL.maxRequests,
      llmMaxRequests: RATE_LIMITS.LLM.maxRequests,
    });
    expect(config.cors.allowedOrigins).toEqual([]);
  });

  it('should read and parse environment variables', () => {
    const config = loadConfig({
      PORT: '4000',
      NODE_ENV: 'production',
      DATABASE_PATH: '/var/lib/mastery/app.db',
      ALLOWED_ORIGINS: 'https://a.example.com, https://b.example.com,,',
      RATE_LIMIT_LLM_MAX_REQUESTS: '3',
    });

    expect(config.server.port).toBe(4000);
    expect(isProduction(config)).toBe(true);
    expect(config.database.path).toBe('/var/lib/mastery/app.db');
    expect(config.cors.allowedOrigins).toEqual(['https://a.example.com', 'https://b.example.com']);
    expect(config.rateLimit.llmMaxRequests).toBe(3);
  });

  it('should reject an unknown NODE_ENV', () => {
    expect(() => loadConfig({ NODE_ENV: 'staging' })).toThrow(ConfigValidationError);
  });

  it('should return a frozen object', () => {
    const config = loadConfig({});

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.server)).toBe(true);
  });
});

describe('validateConfig', () => {
  it('should accept any development config', () => {
    expect(() => validateConfig(loadConfig({}))).not.toThrow();
  });

  it('should list what production is missing', () => {
    const config = loadConfig({ NODE_ENV: 'production', DATABASE_PATH: ':memory:' });

    try {
      validateConfig(config);
      expect.fail('validateConfig should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigValidationError);
      if (error instanceof ConfigValidationError) {
        expect(error.missingVars).toEqual(['ANTHROPIC_API_KEY', 'ALLOWED_ORIGINS']);
        expect(error.invalidVars.map((v) => v.name)).toEqual(['DATABASE_PATH']);
      }
    }
  });

  it('should pass a complete production config', () => {
    const config = loadConfig({
      NODE_ENV: 'production',
      ANTHROPIC_API_KEY: 'test-secret',
      ALLOWED_ORIGINS: 'https://learn.example.com',
    });

    expect(() => validateConfig(config)).not.toThrow();
  });
});
