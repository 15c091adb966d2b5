/**
 * Sequential executor: the whole plan in one transaction, so a failure anywhere
 * leaves the previous tables untouched.
 */

import { planStatements, type AggregationPlan } from '../../core/plan.js';
import { runStatements } from '../../core/run-statements.js';

import type { PlanExecutor, SqlRunner } from '../../core/ports.js';
import type { Logger } from 'pino';

export interface SequentialExecutorDeps {
  runner: SqlRunner;
  logger: Logger;
}

export const makeSequentialExecutor = (deps: SequentialExecutorDeps): PlanExecutor => {
  const log = deps.logger.child({ component: 'SequentialExecutor' });

  return {
    async execute(plan: AggregationPlan) {
      const statements = planStatements(plan);
      log.info(
        { groups: plan.groups.length, statements: statements.length },
        'Executing aggregation plan in one transaction'
      );

      const result = await deps.runner.transaction((session) => runStatements(session, statements));

      if (result.isErr()) {
        log.error({ error: result.error }, 'Aggregation plan failed');
      } else {
        log.info('Aggregation plan committed');
      }
      return result;
    },
  };
};
