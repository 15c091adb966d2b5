import { err, ok, type Result } from 'neverthrow';

import { createMissingNullCountError } from '../errors.js';
import { runStatements } from '../run-statements.js';

import type { AggregationError, ColumnClassificationError } from '../errors.js';
import type { SqlRunner } from '../ports.js';
import type { NullCountRow, SpacetimeAggregation } from '../spacetime-aggregation.js';
import type { Logger } from 'pino';

// -----------------------------------------
// Dependencies
// -----------------------------------------

export interface ImputeAggregationDeps {
  runner: SqlRunner;
  logger: Logger;
}

export interface ImputeAggregationOutput {
  table: string;
  /** Columns that contained NULLs and were rewritten */
  imputed: readonly string[];
  /** Columns copied unchanged */
  passedThrough: readonly string[];
}

export interface ColumnClassification {
  impute: string[];
  nonimpute: string[];
}

// -----------------------------------------
// Helpers
// -----------------------------------------

/**
 * Splits columns by their NULL count. A NULL count, or no row at all, comes from an
 * empty state table and means none were found; a column absent from the row fails.
 */
export const classifyNullCounts = (
  columns: Iterable<string>,
  counts: NullCountRow | undefined
): Result<ColumnClassification, ColumnClassificationError> => {
  const classification: ColumnClassification = { impute: [], nonimpute: [] };
  const missing: string[] = [];

  for (const column of columns) {
    if (counts !== undefined && !Object.hasOwn(counts, column)) {
      missing.push(column);
      continue;
    }
    const count = Number(counts?.[column] ?? 0);
    if (count > 0) {
      classification.impute.push(column);
    } else {
      classification.nonimpute.push(column);
    }
  }

  if (missing.length > 0) {
    return err(createMissingNullCountError(missing));
  }
  return ok(classification);
};

// -----------------------------------------
// Use Case Implementation
// -----------------------------------------

/**
 * Rebuilds the imputed copy of a spacetime aggregation's final table.
 *
 * NULLs are counted over the state table first; only columns that contain them are
 * rewritten, so `error` rules fail exactly when a column actually has gaps.
 */
export async function imputeAggregation(
  deps: ImputeAggregationDeps,
  aggregation: SpacetimeAggregation
): Promise<Result<ImputeAggregationOutput, AggregationError>> {
  const log = deps.logger.child({ usecase: 'imputeAggregation', prefix: aggregation.prefix });

  const nulls = await deps.runner.query(aggregation.findNulls());
  if (nulls.isErr()) {
    return err(nulls.error);
  }

  const classified = classifyNullCounts(aggregation.getImputationRules().keys(), nulls.value[0]);
  if (classified.isErr()) {
    log.error({ error: classified.error }, 'NULL counts incomplete');
    return err(classified.error);
  }
  const { impute, nonimpute } = classified.value;
  log.debug({ impute, nonimpute }, 'Classified columns by NULL count');

  const create = aggregation.getImputeCreate(impute, nonimpute);
  if (create.isErr()) {
    log.error({ error: create.error }, 'Imputation planning failed');
    return err(create.error);
  }

  const executed = await deps.runner.transaction((session) =>
    runStatements(session, [aggregation.getImputeDrop(), create.value])
  );
  if (executed.isErr()) {
    return err(executed.error);
  }

  const table = aggregation.getTableName(undefined, { imputed: true });
  log.info({ table, imputed: impute.length }, 'Imputed table rebuilt');
  return ok({ table, imputed: impute, passedThrough: nonimpute });
}
