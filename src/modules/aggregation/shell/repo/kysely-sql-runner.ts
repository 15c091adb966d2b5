/**
 * Kysely SQL Runner
 *
 * Runs planned statements through a Kysely client. Each transaction uses one pooled
 * connection; work returning an err result is rolled back.
 */

import { ok, err, type Result } from 'neverthrow';

import { setStatementTimeout, type Statement } from '@/infra/database/query-builders/index.js';

import { createExecutionError, type AggregationError, type ExecutionError } from '../../core/errors.js';

import type { SqlRunner, SqlSession } from '../../core/ports.js';
import type { CollateDbClient } from '@/infra/database/client.js';
import type { RawBuilder } from 'kysely';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface KyselySqlRunnerOptions {
  db: CollateDbClient;
  logger: Logger;
  /** Applied with SET LOCAL at the start of every transaction */
  statementTimeoutMs?: number | undefined;
}

/**
 * Thrown inside a Kysely transaction to roll it back on an err result.
 */
class RollbackSignal extends Error {
  constructor(readonly error: AggregationError) {
    super(error.message);
    this.name = 'RollbackSignal';
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Runner Implementation
// ─────────────────────────────────────────────────────────────────────────────

class KyselySqlRunner implements SqlRunner {
  private readonly db: CollateDbClient;
  private readonly log: Logger;
  private readonly statementTimeoutMs: number | undefined;

  constructor(options: KyselySqlRunnerOptions) {
    this.db = options.db;
    this.log = options.logger.child({ component: 'KyselySqlRunner' });
    this.statementTimeoutMs = options.statementTimeoutMs;
  }

  async transaction<T>(
    work: (session: SqlSession) => Promise<Result<T, AggregationError>>
  ): Promise<Result<T, AggregationError>> {
    try {
      const value = await this.db.transaction().execute(async (trx) => {
        if (this.statementTimeoutMs !== undefined) {
          await setStatementTimeout(trx, this.statementTimeoutMs);
        }

        const result = await work(this.createSession(trx));
        if (result.isErr()) {
          throw new RollbackSignal(result.error);
        }
        return result.value;
      });

      this.log.info('Transaction committed');
      return ok(value);
    } catch (error) {
      if (error instanceof RollbackSignal) {
        this.log.error({ error: error.error }, 'Transaction rolled back');
        return err(error.error);
      }
      this.log.error({ err: error }, 'Transaction failed');
      return err(createExecutionError('BEGIN', error));
    }
  }

  query<R extends object>(statement: RawBuilder<R>): Promise<Result<readonly R[], ExecutionError>> {
    return this.createSession(this.db).query(statement);
  }

  private createSession(db: CollateDbClient): SqlSession {
    const log = this.log;

    return {
      async execute(statement: Statement): Promise<Result<void, ExecutionError>> {
        const text = statement.compile(db).sql;
        log.debug({ sql: text }, 'Executing statement');

        try {
          await statement.execute(db);
          return ok(undefined);
        } catch (error) {
          log.error({ err: error, sql: text }, 'Statement failed');
          return err(createExecutionError(text, error));
        }
      },

      async query<R extends object>(
        statement: RawBuilder<R>
      ): Promise<Result<readonly R[], ExecutionError>> {
        const text = statement.compile(db).sql;
        log.debug({ sql: text }, 'Running query');

        try {
          const result = await statement.execute(db);
          return ok(result.rows);
        } catch (error) {
          log.error({ err: error, sql: text }, 'Query failed');
          return err(createExecutionError(text, error));
        }
      },
    };
  }
}

/**
 * Factory function to create a SqlRunner over a Kysely client.
 */
export const makeKyselySqlRunner = (options: KyselySqlRunnerOptions): SqlRunner => {
  return new KyselySqlRunner(options);
};
