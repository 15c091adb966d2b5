import { err, ok, type Result } from 'neverthrow';

import { countStatements } from '../plan.js';

import type { Aggregation } from '../aggregation.js';
import type { AggregationError } from '../errors.js';
import type { PlanExecutor, SqlRunner } from '../ports.js';
import type { Logger } from 'pino';

// -----------------------------------------
// Dependencies
// -----------------------------------------

export interface ExecuteAggregationDeps {
  runner: SqlRunner;
  executor: PlanExecutor;
  logger: Logger;
}

export interface ExecuteAggregationInput {
  aggregation: Aggregation;
  /** FROM clause replacing the generated join table of the final table */
  joinTable?: string;
}

export interface ExecuteAggregationOutput {
  finalTable: string;
  groupTables: readonly string[];
}

// -----------------------------------------
// Use Case Implementation
// -----------------------------------------

/**
 * Rebuilds every table of an aggregation.
 *
 * Validation runs first, in its own read-only transaction; no table is dropped when
 * it fails. The plan is then handed to the configured executor strategy, which
 * decides how statements are grouped into transactions.
 */
export async function executeAggregation(
  deps: ExecuteAggregationDeps,
  input: ExecuteAggregationInput
): Promise<Result<ExecuteAggregationOutput, AggregationError>> {
  const { aggregation } = input;
  const log = deps.logger.child({ usecase: 'executeAggregation', prefix: aggregation.prefix });

  const validated = await deps.runner.transaction((session) => aggregation.validate(session));
  if (validated.isErr()) {
    log.error({ error: validated.error }, 'Aggregation validation failed');
    return err(validated.error);
  }

  const plan = aggregation.getPlan(input.joinTable);
  log.debug(
    { groups: plan.groups.length, statements: countStatements(plan) },
    'Executing aggregation plan'
  );
  const executed = await deps.executor.execute(plan);
  if (executed.isErr()) {
    return err(executed.error);
  }

  const output: ExecuteAggregationOutput = {
    finalTable: aggregation.getTableName(),
    groupTables: plan.groups.map((group) => aggregation.getTableName(group.group)),
  };
  log.info(output, 'Aggregation tables rebuilt');
  return ok(output);
}
