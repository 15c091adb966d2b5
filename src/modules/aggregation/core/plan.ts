/**
 * Aggregation plans: the ordered statements that rebuild an aggregation's tables.
 */

import type { Statement } from '@/infra/database/query-builders/index.js';

/**
 * Lifecycle of one per-group table: drop, create empty, insert per date, index.
 */
export interface GroupPlan {
  readonly group: string;
  readonly drop: Statement;
  readonly create: Statement;
  readonly inserts: readonly Statement[];
  readonly index: Statement;
}

export interface AggregationPlan {
  /** Present only when the aggregation writes into a schema */
  readonly createSchema?: Statement;
  readonly groups: readonly GroupPlan[];
  /** Drop of the final joined table */
  readonly drop: Statement;
  /** Creation of the final joined table; runs after every group is indexed */
  readonly create: Statement;
}

/**
 * Flattens a plan into its sequential execution order.
 */
export const planStatements = (plan: AggregationPlan): Statement[] => [
  ...(plan.createSchema !== undefined ? [plan.createSchema] : []),
  ...plan.groups.flatMap((group) => [group.drop, group.create, ...group.inserts, group.index]),
  plan.drop,
  plan.create,
];

export const countStatements = (plan: AggregationPlan): number => planStatements(plan).length;
