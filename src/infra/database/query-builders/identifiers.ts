/**
 * SQL Identifiers
 *
 * Naming helpers for generated tables and columns. Generated names may contain
 * spaces or upper-case letters (interval text, `_NULL` categories), so columns
 * are always emitted as quoted identifiers.
 */

/**
 * Strips the identifier quoting character from a generated name.
 *
 * @example
 * ```typescript
 * toSqlName('"events"_amount') // 'events_amount'
 * ```
 */
export function toSqlName(name: string): string {
  return name.replaceAll('"', '');
}

/**
 * Quotes a generated name as a PostgreSQL identifier.
 *
 * @example
 * ```typescript
 * quoteIdentifier('events_entity_id_1 year_amount_sum')
 * // '"events_entity_id_1 year_amount_sum"'
 * ```
 */
export function quoteIdentifier(name: string): string {
  return `"${toSqlName(name)}"`;
}

/**
 * Builds a schema-qualified, quoted table name.
 *
 * @example
 * ```typescript
 * qualifiedTableName('events_entity_id', 'features') // '"features"."events_entity_id"'
 * qualifiedTableName('events_entity_id')             // '"events_entity_id"'
 * ```
 */
export function qualifiedTableName(name: string, schema?: string): string {
  const table = quoteIdentifier(name);
  return schema !== undefined ? `${quoteIdentifier(schema)}.${table}` : table;
}
