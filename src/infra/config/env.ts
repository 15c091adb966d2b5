/**
 * Environment configuration with validation
 * Uses TypeBox for runtime type checking
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

/**
 * Environment variable schema
 */
export const EnvSchema = Type.Object({
  NODE_ENV: Type.Union(
    [Type.Literal('development'), Type.Literal('production'), Type.Literal('test')],
    { default: 'development' }
  ),

  // Logging
  LOG_LEVEL: Type.Union(
    [
      Type.Literal('fatal'),
      Type.Literal('error'),
      Type.Literal('warn'),
      Type.Literal('info'),
      Type.Literal('debug'),
      Type.Literal('trace'),
      Type.Literal('silent'),
    ],
    { default: 'info' }
  ),

  // Database
  DATABASE_URL: Type.Optional(Type.String()),
  STATEMENT_TIMEOUT_MS: Type.Optional(Type.Integer({ minimum: 1_000, maximum: 86_400_000 })),

  // Plan execution
  EXECUTOR_STRATEGY: Type.Union([Type.Literal('sequential'), Type.Literal('parallel')], {
    default: 'sequential',
  }),
  EXECUTOR_CONCURRENCY: Type.Integer({ default: 4, minimum: 1, maximum: 64 }),
});

export type Env = Static<typeof EnvSchema>;

const parseOptionalInt = (value: string | undefined): number | undefined =>
  value != null && value !== '' ? Number.parseInt(value, 10) : undefined;

/**
 * Parse and validate environment variables
 */
export const parseEnv = (env: NodeJS.ProcessEnv): Env => {
  const rawEnv = {
    NODE_ENV: env['NODE_ENV'] ?? 'development',
    LOG_LEVEL: env['LOG_LEVEL'] ?? 'info',
    DATABASE_URL: env['DATABASE_URL'],
    STATEMENT_TIMEOUT_MS: parseOptionalInt(env['STATEMENT_TIMEOUT_MS']),
    EXECUTOR_STRATEGY: env['EXECUTOR_STRATEGY'] ?? 'sequential',
    EXECUTOR_CONCURRENCY: parseOptionalInt(env['EXECUTOR_CONCURRENCY']) ?? 4,
  };

  // Validate against schema
  if (!Value.Check(EnvSchema, rawEnv)) {
    const errors = [...Value.Errors(EnvSchema, rawEnv)];
    const errorMessages = errors.map((e) => `${e.path}: ${e.message}`).join(', ');
    throw new Error(`Invalid environment configuration: ${errorMessages}`);
  }

  return rawEnv;
};

/**
 * Create a typed configuration object from environment
 */
export const createConfig = (env: Env) => ({
  isProduction: env.NODE_ENV === 'production',
  isTest: env.NODE_ENV === 'test',
  logger: {
    level: env.LOG_LEVEL,
    pretty: env.NODE_ENV === 'development',
  },
  database: {
    url: env.DATABASE_URL,
    /** Applied with SET LOCAL inside every plan transaction */
    statementTimeoutMs: env.STATEMENT_TIMEOUT_MS,
  },
  executor: {
    strategy: env.EXECUTOR_STRATEGY,
    concurrency: env.EXECUTOR_CONCURRENCY,
  },
});

export type AppConfig = ReturnType<typeof createConfig>;
