/**
 * Aggregation Module - Public API
 *
 * Plans and runs time-windowed aggregate feature tables.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Core Types
// ─────────────────────────────────────────────────────────────────────────────

export type {
  AggregateColumn,
  ColumnOptions,
  ColumnSource,
  ColumnType,
  DatePlaceholder,
  ImputationRule,
  ImputationRuleSpec,
  ImputationRules,
  ImputationType,
  TemplatePlaceholder,
  TemplateValues,
} from './core/types.js';

export {
  COLUMN_TYPES,
  IMPUTATION_TYPES,
  TEMPLATE_PLACEHOLDERS,
  isCategoricalType,
  isImputationType,
} from './core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Errors
// ─────────────────────────────────────────────────────────────────────────────

export type {
  AggregationError,
  ColumnClassificationError,
  ExecutionError,
  ImputationError,
  TemporalValidationError,
} from './core/errors.js';

export {
  AggregationConfigError,
  createColumnClassificationError,
  createExecutionError,
  createInvalidImputationError,
  createMissingImputationValueError,
  createMissingNullCountError,
  createNullsFoundError,
  createTemporalValidationError,
} from './core/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Column Sources
// ─────────────────────────────────────────────────────────────────────────────

export { makeList, makeTuple, maybequote, splitDistinct } from './core/quantity.js';
export type { ChoiceValue, QuantityArgs } from './core/quantity.js';

export { Aggregate } from './core/aggregate.js';
export type { AggregateOptions, QuantityEntry, QuantityInput } from './core/aggregate.js';

export {
  AggregateExpression,
  OPERATORS,
  add,
  and,
  div,
  eq,
  ge,
  gt,
  le,
  lt,
  mul,
  ne,
  or,
  sub,
} from './core/aggregate-expression.js';
export type { AggregateExpressionOptions, BinaryOperator } from './core/aggregate-expression.js';

export { Categorical, Compare, truncateNames } from './core/compare.js';
export type { CategoricalChoices, CategoricalOptions, Choices, CompareOptions } from './core/compare.js';

// ─────────────────────────────────────────────────────────────────────────────
// Aggregations
// ─────────────────────────────────────────────────────────────────────────────

export { Aggregation } from './core/aggregation.js';
export type { AggregationOptions, GroupsInput, TableNameOptions } from './core/aggregation.js';

export { SpacetimeAggregation, ALL_INTERVAL } from './core/spacetime-aggregation.js';
export type {
  IntervalsInput,
  NullCountRow,
  SpacetimeAggregationOptions,
} from './core/spacetime-aggregation.js';

export { imputeSql, isNullIndicator } from './core/imputation.js';

export { planStatements } from './core/plan.js';
export type { AggregationPlan, GroupPlan } from './core/plan.js';

// ─────────────────────────────────────────────────────────────────────────────
// Definitions
// ─────────────────────────────────────────────────────────────────────────────

export {
  buildAggregate,
  createSpacetimeAggregation,
  parseAggregationDefinition,
} from './core/definition.js';
export { AggregationDefinitionSchema } from './core/schemas/definition.js';
export type { AggregateEntry, AggregationDefinition } from './core/schemas/definition.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Ports
// ─────────────────────────────────────────────────────────────────────────────

export type { PlanExecutor, SqlRunner, SqlSession } from './core/ports.js';

// ─────────────────────────────────────────────────────────────────────────────
// Use Cases
// ─────────────────────────────────────────────────────────────────────────────

export {
  executeAggregation,
  type ExecuteAggregationDeps,
  type ExecuteAggregationInput,
  type ExecuteAggregationOutput,
} from './core/usecases/execute-aggregation.js';

export {
  imputeAggregation,
  classifyNullCounts,
  type ImputeAggregationDeps,
  type ImputeAggregationOutput,
} from './core/usecases/impute-aggregation.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell - Executors and Repositories
// ─────────────────────────────────────────────────────────────────────────────

export { makeSequentialExecutor } from './shell/executor/sequential-executor.js';
export { makeParallelExecutor } from './shell/executor/parallel-executor.js';
export type { ParallelExecutorOptions } from './shell/executor/parallel-executor.js';
export { makeKyselySqlRunner } from './shell/repo/kysely-sql-runner.js';
export type { KyselySqlRunnerOptions } from './shell/repo/kysely-sql-runner.js';
export { readAggregationDefinition } from './shell/repo/definition-file.js';
export type { DefinitionFileError } from './shell/repo/definition-file.js';
