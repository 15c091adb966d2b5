/**
 * DDL / DML Statements
 *
 * Statement shapes Kysely's query builder does not provide for raw selects:
 * `CREATE TABLE ... AS`, `INSERT INTO ... (SELECT ...)`, unnamed indexes.
 * Every builder returns a RawBuilder so statements compose and execute like any
 * other Kysely query.
 */

import { sql, type RawBuilder } from 'kysely';

import { quoteIdentifier } from './identifiers.js';

/**
 * A planned SQL statement.
 */
export type Statement = RawBuilder<unknown>;

/**
 * `CREATE TABLE <name> AS <query>`
 *
 * @param table - Qualified, quoted table name
 * @param query - Select to materialise
 */
export function createTableAs(table: string, query: RawBuilder<unknown>): Statement {
  return sql`CREATE TABLE ${sql.raw(table)} AS ${query}`;
}

/**
 * `INSERT INTO <name> (<query>)`
 */
export function insertFromSelect(table: string, query: RawBuilder<unknown>): Statement {
  return sql`INSERT INTO ${sql.raw(table)} (${query})`;
}

/**
 * `DROP TABLE IF EXISTS <name>`
 */
export function dropTableIfExists(table: string): Statement {
  return sql`DROP TABLE IF EXISTS ${sql.raw(table)}`;
}

/**
 * `CREATE INDEX ON <name> (<keys>)`
 */
export function createIndex(table: string, keys: readonly string[]): Statement {
  if (keys.length === 0) {
    throw new Error(`Index on ${table} needs at least one key`);
  }
  return sql`CREATE INDEX ON ${sql.raw(table)} (${sql.raw(keys.join(', '))})`;
}

/**
 * `CREATE SCHEMA IF NOT EXISTS "<schema>"`
 */
export function createSchemaIfNotExists(schema: string): Statement {
  return sql`CREATE SCHEMA IF NOT EXISTS ${sql.raw(quoteIdentifier(schema))}`;
}

/**
 * Wraps trusted SQL text as a statement.
 */
export function rawStatement<R = unknown>(text: string): RawBuilder<R> {
  return sql.raw<R>(text);
}
