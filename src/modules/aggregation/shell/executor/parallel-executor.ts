/**
 * Parallel executor.
 *
 * Ordering per group: drop and create in one transaction, then every insert in its
 * own transaction, then the index. Inserts of all groups share one bounded pool.
 * The final table is rebuilt only after every group has been indexed.
 */

import { err, ok, type Result } from 'neverthrow';

import { createLimiter, type Limiter } from './limiter.js';
import { runStatements } from '../../core/run-statements.js';

import type { AggregationError } from '../../core/errors.js';
import type { AggregationPlan, GroupPlan } from '../../core/plan.js';
import type { PlanExecutor, SqlRunner } from '../../core/ports.js';
import type { Statement } from '@/infra/database/query-builders/index.js';
import type { Logger } from 'pino';

export interface ParallelExecutorDeps {
  runner: SqlRunner;
  logger: Logger;
}

export interface ParallelExecutorOptions {
  /** Maximum number of transactions in flight */
  concurrency: number;
}

const firstError = (
  results: readonly Result<void, AggregationError>[]
): Result<void, AggregationError> => {
  for (const result of results) {
    if (result.isErr()) {
      return result;
    }
  }
  return ok(undefined);
};

export const makeParallelExecutor = (
  deps: ParallelExecutorDeps,
  options: ParallelExecutorOptions
): PlanExecutor => {
  const log = deps.logger.child({ component: 'ParallelExecutor' });

  const inTransaction = (statements: readonly Statement[]) =>
    deps.runner.transaction((session) => runStatements(session, statements));

  const runGroup = async (
    group: GroupPlan,
    limit: Limiter
  ): Promise<Result<void, AggregationError>> => {
    const created = await limit(() => inTransaction([group.drop, group.create]));
    if (created.isErr()) {
      return created;
    }

    const inserted = firstError(
      await Promise.all(group.inserts.map((insert) => limit(() => inTransaction([insert]))))
    );
    if (inserted.isErr()) {
      return inserted;
    }

    const indexed = await limit(() => inTransaction([group.index]));
    if (indexed.isOk()) {
      log.info({ group: group.group, inserts: group.inserts.length }, 'Group table ready');
    }
    return indexed;
  };

  return {
    async execute(plan: AggregationPlan) {
      log.info(
        { groups: plan.groups.length, concurrency: options.concurrency },
        'Executing aggregation plan in parallel'
      );

      if (plan.createSchema !== undefined) {
        const schema = await inTransaction([plan.createSchema]);
        if (schema.isErr()) {
          return schema;
        }
      }

      const limit = createLimiter(options.concurrency);
      const groups = firstError(await Promise.all(plan.groups.map((group) => runGroup(group, limit))));
      if (groups.isErr()) {
        log.error({ error: groups.error }, 'Group tables failed; final table left unchanged');
        return err(groups.error);
      }

      const final = await inTransaction([plan.drop, plan.create]);
      if (final.isErr()) {
        log.error({ error: final.error }, 'Final table failed');
        return final;
      }

      log.info('Aggregation plan completed');
      return ok(undefined);
    },
  };
};
