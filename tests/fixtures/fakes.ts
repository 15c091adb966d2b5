/**
 * Test fakes and mocks
 */

import {
  Kysely,
  PostgresAdapter,
  PostgresIntrospector,
  PostgresQueryCompiler,
  type CompiledQuery,
  type DatabaseConnection,
  type Driver,
  type QueryResult,
  type RawBuilder,
} from 'kysely';
import { err, ok, type Result } from 'neverthrow';
import pinoLib from 'pino';

import {
  createExecutionError,
  type AggregationError,
  type ExecutionError,
} from '@/modules/aggregation/core/errors.js';
import { compileStatement, type Statement } from '@/infra/database/query-builders/index.js';

import type { SqlRunner, SqlSession } from '@/modules/aggregation/core/ports.js';
import type { CollateDbClient } from '@/infra/database/client.js';
import type { Logger } from 'pino';

/**
 * Silent logger for tests.
 */
export const makeTestLogger = (): Logger => pinoLib({ level: 'silent' });

// ─────────────────────────────────────────────────────────────────────────────
// Fake SqlRunner
// ─────────────────────────────────────────────────────────────────────────────

export interface FakeSqlRunnerOptions {
  /** Statements whose SQL matches fail with an ExecutionError */
  failOn?: (sql: string) => boolean;
  /** Rows answered for a query */
  rows?: (sql: string) => readonly object[];
  /** Time each transaction holds its slot, in milliseconds */
  delayMs?: number;
}

export interface FakeSqlRunner extends SqlRunner {
  /** Statements of committed transactions, in commit order */
  readonly committed: string[][];
  /** Statements of rolled-back transactions */
  readonly rolledBack: string[][];
  /** Every query text, in order */
  readonly queries: string[];
  /** Highest number of transactions open at once */
  readonly maxActive: number;
}

export const makeFakeSqlRunner = (options: FakeSqlRunnerOptions = {}): FakeSqlRunner => {
  const committed: string[][] = [];
  const rolledBack: string[][] = [];
  const queries: string[] = [];
  let active = 0;
  let maxActive = 0;

  const answer = <R extends object>(statement: RawBuilder<R>): Result<readonly R[], ExecutionError> => {
    const text = compileStatement(statement);
    queries.push(text);
    return ok((options.rows?.(text) ?? []) as readonly R[]);
  };

  const makeSession = (log: string[]): SqlSession => ({
    execute(statement: Statement): Promise<Result<void, ExecutionError>> {
      const text = compileStatement(statement);
      log.push(text);
      if (options.failOn?.(text) === true) {
        return Promise.resolve(err(createExecutionError(text, new Error('relation does not exist'))));
      }
      return Promise.resolve(ok(undefined));
    },
    query<R extends object>(statement: RawBuilder<R>): Promise<Result<readonly R[], ExecutionError>> {
      return Promise.resolve(answer(statement));
    },
  });

  return {
    committed,
    rolledBack,
    queries,
    get maxActive() {
      return maxActive;
    },

    async transaction<T>(
      work: (session: SqlSession) => Promise<Result<T, AggregationError>>
    ): Promise<Result<T, AggregationError>> {
      active += 1;
      maxActive = Math.max(maxActive, active);
      try {
        await new Promise<void>((resolve) => setTimeout(resolve, options.delayMs ?? 0));
        const log: string[] = [];
        const result = await work(makeSession(log));
        (result.isOk() ? committed : rolledBack).push(log);
        return result;
      } finally {
        active -= 1;
      }
    },

    query<R extends object>(statement: RawBuilder<R>): Promise<Result<readonly R[], ExecutionError>> {
      return Promise.resolve(answer(statement));
    },
  };
};

// ─────────────────────────────────────────────────────────────────────────────
// Recording Kysely dialect
// ─────────────────────────────────────────────────────────────────────────────

export interface RecordingDb {
  db: CollateDbClient;
  /** SQL text of every statement plus BEGIN / COMMIT / ROLLBACK markers */
  readonly log: string[];
  readonly destroyed: () => boolean;
}

/**
 * Kysely client whose driver records statements and answers scripted rows.
 * A responder that throws makes the statement fail.
 */
export const makeRecordingDb = (
  respond: (sql: string) => readonly object[] = () => []
): RecordingDb => {
  const log: string[] = [];
  let destroyed = false;

  const connection: DatabaseConnection = {
    executeQuery<R>(compiledQuery: CompiledQuery): Promise<QueryResult<R>> {
      log.push(compiledQuery.sql);
      try {
        return Promise.resolve({ rows: respond(compiledQuery.sql) as R[] });
      } catch (error) {
        return Promise.reject(error);
      }
    },
    async *streamQuery<R>(): AsyncIterableIterator<QueryResult<R>> {
      throw new Error('Streaming is not supported by the recording driver');
    },
  };

  const driver: Driver = {
    init: () => Promise.resolve(),
    acquireConnection: () => Promise.resolve(connection),
    beginTransaction: () => {
      log.push('BEGIN');
      return Promise.resolve();
    },
    commitTransaction: () => {
      log.push('COMMIT');
      return Promise.resolve();
    },
    rollbackTransaction: () => {
      log.push('ROLLBACK');
      return Promise.resolve();
    },
    releaseConnection: () => Promise.resolve(),
    destroy: () => {
      destroyed = true;
      return Promise.resolve();
    },
  };

  const db = new Kysely<Record<string, never>>({
    dialect: {
      createAdapter: () => new PostgresAdapter(),
      createDriver: () => driver,
      createIntrospector: (kysely) => new PostgresIntrospector(kysely),
      createQueryCompiler: () => new PostgresQueryCompiler(),
    },
  });

  return { db, log, destroyed: () => destroyed };
};
