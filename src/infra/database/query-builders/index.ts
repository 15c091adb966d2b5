/**
 * Query Builders
 *
 * SQL construction utilities that encapsulate sql.raw() usage.
 * The aggregation module imports from here instead of using sql.raw() directly.
 *
 * @example
 * ```typescript
 * import {
 *   createTableAs,
 *   renderSelect,
 *   withLimit,
 *   compileStatement,
 * } from '@/infra/database/query-builders/index.js';
 *
 * const create = createTableAs('"features"."events_entity_id"', renderSelect(withLimit(select, 0)));
 * compileStatement(create);
 * ```
 */

// ============================================================================
// Identifiers and literals
// ============================================================================

export { toSqlName, quoteIdentifier, qualifiedTableName } from './identifiers.js';

export { stringLiteral, dateLiteral, intervalLiteral } from './literals.js';

// ============================================================================
// Select queries
// ============================================================================

export { labelColumn, withLimit, selectText, renderSelect, type SelectQuery } from './select.js';

// ============================================================================
// Statements
// ============================================================================

export {
  createTableAs,
  insertFromSelect,
  dropTableIfExists,
  createIndex,
  createSchemaIfNotExists,
  rawStatement,
  type Statement,
} from './statements.js';

export { compileStatement } from './compile.js';

// ============================================================================
// Timeout
// ============================================================================

export {
  setStatementTimeout,
  MIN_STATEMENT_TIMEOUT_MS,
  MAX_STATEMENT_TIMEOUT_MS,
} from './timeout.js';
