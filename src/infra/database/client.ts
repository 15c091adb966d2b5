import { Kysely, PostgresDialect } from 'kysely';
import pg from 'pg';

import type { AppConfig } from '../config/env.js';

const { Pool: PG_POOL } = pg;

/**
 * Feature tables are created from raw SQL only, so the client carries no table typing.
 */
export type CollateDbClient = Kysely<Record<string, never>>;

/**
 * Create a Kysely instance for a database URL.
 * The pool is sized so every parallel worker can hold its own connection.
 */
export const createDatabaseClient = (config: AppConfig): CollateDbClient => {
  const { url } = config.database;

  if (url === undefined || url === '') {
    throw new Error('Missing configuration for the feature database (DATABASE_URL)');
  }

  return new Kysely<Record<string, never>>({
    dialect: new PostgresDialect({
      pool: new PG_POOL({
        connectionString: url,
        max: config.executor.concurrency + 1,
      }),
    }),
  });
};
