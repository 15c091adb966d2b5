/**
 * Unit tests for configuration module
 */

import { describe, expect, it } from 'vitest';

import { parseEnv, createConfig } from '@/infra/config/index.js';

describe('Configuration', () => {
  describe('parseEnv', () => {
    it('returns default values when env is empty', () => {
      const env = parseEnv({});

      expect(env.NODE_ENV).toBe('development');
      expect(env.LOG_LEVEL).toBe('info');
      expect(env.EXECUTOR_STRATEGY).toBe('sequential');
      expect(env.EXECUTOR_CONCURRENCY).toBe(4);
      expect(env.STATEMENT_TIMEOUT_MS).toBeUndefined();
    });

    it('accepts valid NODE_ENV values', () => {
      expect(parseEnv({ NODE_ENV: 'development' }).NODE_ENV).toBe('development');
      expect(parseEnv({ NODE_ENV: 'production' }).NODE_ENV).toBe('production');
      expect(parseEnv({ NODE_ENV: 'test' }).NODE_ENV).toBe('test');
    });

    it('accepts valid LOG_LEVEL values', () => {
      const levels = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

      for (const level of levels) {
        const env = parseEnv({ LOG_LEVEL: level });
        expect(env.LOG_LEVEL).toBe(level);
      }
    });

    it('accepts optional DATABASE_URL', () => {
      const envWithDb = parseEnv({ DATABASE_URL: 'postgres://localhost/features' });
      expect(envWithDb.DATABASE_URL).toBe('postgres://localhost/features');

      const envWithoutDb = parseEnv({});
      expect(envWithoutDb.DATABASE_URL).toBeUndefined();
    });

    it('parses executor settings as numbers', () => {
      const env = parseEnv({ EXECUTOR_STRATEGY: 'parallel', EXECUTOR_CONCURRENCY: '12' });

      expect(env.EXECUTOR_STRATEGY).toBe('parallel');
      expect(env.EXECUTOR_CONCURRENCY).toBe(12);
    });

    it('parses STATEMENT_TIMEOUT_MS', () => {
      expect(parseEnv({ STATEMENT_TIMEOUT_MS: '60000' }).STATEMENT_TIMEOUT_MS).toBe(60_000);
    });

    it('throws on unknown executor strategy', () => {
      expect(() => parseEnv({ EXECUTOR_STRATEGY: 'threads' })).toThrow(
        'Invalid environment configuration'
      );
    });

    it('throws on out-of-range concurrency', () => {
      expect(() => parseEnv({ EXECUTOR_CONCURRENCY: '0' })).toThrow(
        'Invalid environment configuration'
      );
      expect(() => parseEnv({ EXECUTOR_CONCURRENCY: '65' })).toThrow(
        'Invalid environment configuration'
      );
    });

    it('throws on non-numeric concurrency', () => {
      expect(() => parseEnv({ EXECUTOR_CONCURRENCY: 'many' })).toThrow(
        'Invalid environment configuration'
      );
    });

    it('throws on a statement timeout below one second', () => {
      expect(() => parseEnv({ STATEMENT_TIMEOUT_MS: '500' })).toThrow(
        'Invalid environment configuration'
      );
    });
  });

  describe('createConfig', () => {
    it('creates config with correct flags', () => {
      const prodConfig = createConfig(parseEnv({ NODE_ENV: 'production' }));
      expect(prodConfig.isProduction).toBe(true);
      expect(prodConfig.isTest).toBe(false);

      const testConfig = createConfig(parseEnv({ NODE_ENV: 'test' }));
      expect(testConfig.isProduction).toBe(false);
      expect(testConfig.isTest).toBe(true);
    });

    it('sets pretty logging for development only', () => {
      expect(createConfig(parseEnv({ NODE_ENV: 'development' })).logger.pretty).toBe(true);
      expect(createConfig(parseEnv({ NODE_ENV: 'production' })).logger.pretty).toBe(false);
      expect(createConfig(parseEnv({ NODE_ENV: 'test' })).logger.pretty).toBe(false);
    });

    it('groups database and executor settings', () => {
      const config = createConfig(
        parseEnv({
          DATABASE_URL: 'postgres://localhost/features',
          STATEMENT_TIMEOUT_MS: '30000',
          EXECUTOR_STRATEGY: 'parallel',
          EXECUTOR_CONCURRENCY: '8',
        })
      );

      expect(config.database).toEqual({
        url: 'postgres://localhost/features',
        statementTimeoutMs: 30_000,
      });
      expect(config.executor).toEqual({ strategy: 'parallel', concurrency: 8 });
    });
  });
});
