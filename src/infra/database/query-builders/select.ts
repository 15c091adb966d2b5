/**
 * Select Queries
 *
 * A small immutable description of a grouped SELECT, rendered to a Kysely RawBuilder.
 * Callers can adjust a query (e.g. add a LIMIT) before statements are derived from it.
 *
 * SECURITY: Every fragment is trusted SQL text supplied by the aggregation definition,
 * never end-user input.
 */

import { sql, type RawBuilder } from 'kysely';

import { quoteIdentifier } from './identifiers.js';

// ============================================================================
// Types
// ============================================================================

export interface SelectQuery {
  /** Rendered select-list entries, e.g. `sum(amount) AS "amount_sum"` */
  readonly columns: readonly string[];
  /** FROM clause body: a table name or a parenthesised subquery with alias */
  readonly from: string;
  readonly where?: string;
  readonly groupBy: readonly string[];
  readonly limit?: number;
}

// ============================================================================
// Builders
// ============================================================================

/**
 * Renders `expression AS "name"`.
 */
export function labelColumn(expression: string, name: string): string {
  return `${expression} AS ${quoteIdentifier(name)}`;
}

/**
 * Returns a copy of the query with a LIMIT applied.
 *
 * @example
 * ```typescript
 * const shape = withLimit(select, 0); // zero-row copy used for CREATE TABLE AS
 * ```
 */
export function withLimit(query: SelectQuery, limit: number): SelectQuery {
  if (!Number.isInteger(limit) || limit < 0) {
    throw new Error(`LIMIT must be a non-negative integer, got: ${String(limit)}`);
  }
  return { ...query, limit };
}

/**
 * Renders the query as SQL text.
 *
 * @example
 * ```typescript
 * selectText({ columns: ['entity_id', 'count(*) AS "n"'], from: 'events', groupBy: ['entity_id'] })
 * // SELECT entity_id, count(*) AS "n" FROM events GROUP BY entity_id
 * ```
 */
export function selectText(query: SelectQuery): string {
  const parts = [`SELECT ${query.columns.join(', ')}`, `FROM ${query.from}`];

  if (query.where !== undefined && query.where !== '') {
    parts.push(`WHERE ${query.where}`);
  }
  if (query.groupBy.length > 0) {
    parts.push(`GROUP BY ${query.groupBy.join(', ')}`);
  }
  if (query.limit !== undefined) {
    parts.push(`LIMIT ${String(query.limit)}`);
  }

  return parts.join(' ');
}

/**
 * Renders the query as a RawBuilder that can be embedded in larger statements.
 */
export function renderSelect(query: SelectQuery): RawBuilder<unknown> {
  return sql.raw(selectText(query));
}
