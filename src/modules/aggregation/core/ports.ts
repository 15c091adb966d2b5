import type { AggregationError, ExecutionError } from './errors.js';
import type { AggregationPlan } from './plan.js';
import type { Statement } from '@/infra/database/query-builders/index.js';
import type { RawBuilder } from 'kysely';
import type { Result } from 'neverthrow';

/**
 * Statement execution inside one transaction.
 */
export interface SqlSession {
  execute(statement: Statement): Promise<Result<void, ExecutionError>>;

  /**
   * Runs a read query and returns its rows.
   */
  query<R extends object>(statement: RawBuilder<R>): Promise<Result<readonly R[], ExecutionError>>;
}

/**
 * Access to the database the aggregation tables live in.
 *
 * Each `transaction` call runs its work on one connection and commits only when the
 * work returns ok; an err result or a failed statement rolls the transaction back.
 */
export interface SqlRunner {
  transaction<T>(
    work: (session: SqlSession) => Promise<Result<T, AggregationError>>
  ): Promise<Result<T, AggregationError>>;

  query<R extends object>(statement: RawBuilder<R>): Promise<Result<readonly R[], ExecutionError>>;
}

/**
 * Strategy running an aggregation plan.
 */
export interface PlanExecutor {
  execute(plan: AggregationPlan): Promise<Result<void, AggregationError>>;
}
