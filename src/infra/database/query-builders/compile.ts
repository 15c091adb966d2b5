/**
 * Statement Compilation
 *
 * Renders planned statements to SQL text without a database connection, using a
 * "cold" Kysely instance (PostgreSQL compiler, dummy driver).
 */

import {
  DummyDriver,
  Kysely,
  PostgresAdapter,
  PostgresIntrospector,
  PostgresQueryCompiler,
  type RawBuilder,
} from 'kysely';

const compiler = new Kysely<Record<string, never>>({
  dialect: {
    createAdapter: () => new PostgresAdapter(),
    createDriver: () => new DummyDriver(),
    createIntrospector: (db) => new PostgresIntrospector(db),
    createQueryCompiler: () => new PostgresQueryCompiler(),
  },
});

/**
 * Compiles a statement to SQL text.
 *
 * @example
 * ```typescript
 * compileStatement(dropTableIfExists('"events_aggregation"'))
 * // 'DROP TABLE IF EXISTS "events_aggregation"'
 * ```
 */
export function compileStatement(statement: RawBuilder<unknown>): string {
  return statement.compile(compiler).sql;
}
