/**
 * SQL Literals
 *
 * Inline literal text for generated DDL. `CREATE TABLE ... AS` and `INSERT ... SELECT`
 * run as utility statements in PostgreSQL, which cannot take bind parameters, so
 * dates and intervals are rendered as quoted literals instead.
 */

/**
 * Single-quotes a value, doubling embedded quotes.
 */
export function stringLiteral(value: string): string {
  return `'${value.replaceAll("'", "''")}'`;
}

/**
 * Renders a date literal: `'2016-01-01'::date`.
 */
export function dateLiteral(date: string): string {
  return `${stringLiteral(date)}::date`;
}

/**
 * Renders an interval literal: `interval '1 year'`.
 */
export function intervalLiteral(interval: string): string {
  return `interval ${stringLiteral(interval)}`;
}
