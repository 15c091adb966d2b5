/**
 * Aggregation
 *
 * Combines column sources across named group-by keys. Every group gets its own
 * table (one row per group value); the final table left-joins all of them onto a
 * join table enumerating the group values present in the source.
 */

import { ok, type Result } from 'neverthrow';

import {
  createIndex,
  createSchemaIfNotExists,
  createTableAs,
  dropTableIfExists,
  insertFromSelect,
  qualifiedTableName,
  rawStatement,
  renderSelect,
  selectText,
  toSqlName,
  withLimit,
  labelColumn,
  type SelectQuery,
  type Statement,
} from '@/infra/database/query-builders/index.js';

import { AggregationConfigError, type AggregationError } from './errors.js';
import type { AggregationPlan, GroupPlan } from './plan.js';
import type { SqlSession } from './ports.js';
import type { AggregateColumn, ColumnOptions, ColumnSource } from './types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/** A list of group-by expressions (each its own alias) or a record alias → expression */
export type GroupsInput = readonly string[] | Readonly<Record<string, string>>;

export interface AggregationOptions {
  readonly aggregates: readonly ColumnSource[];
  readonly groups: GroupsInput;
  /** FROM clause: a table name or a parenthesised subquery with alias */
  readonly from: string;
  /** Prefix of table and column names; defaults to `from` */
  readonly prefix?: string;
  /** Suffix of the final table name; defaults to `aggregation` */
  readonly suffix?: string;
  readonly schema?: string;
}

export interface TableNameOptions {
  readonly imputed?: boolean;
}

export const DEFAULT_SUFFIX = 'aggregation';

const isGroupList = (groups: GroupsInput): groups is readonly string[] => Array.isArray(groups);

const normalizeGroups = (groups: GroupsInput): Map<string, string> => {
  const entries: [string, string][] = isGroupList(groups)
    ? groups.map((expression): [string, string] => [expression, expression])
    : Object.entries(groups);

  const normalized = new Map(entries);
  if (normalized.size === 0) {
    throw new AggregationConfigError('Aggregation needs at least one group', 'groups');
  }
  if (normalized.size !== entries.length) {
    throw new AggregationConfigError(
      `Aggregation group aliases must be unique: ${entries.map(([alias]) => alias).join(', ')}`,
      'groups'
    );
  }
  return normalized;
};

// ─────────────────────────────────────────────────────────────────────────────
// Aggregation
// ─────────────────────────────────────────────────────────────────────────────

export class Aggregation {
  readonly aggregates: readonly ColumnSource[];
  /** alias → group-by expression */
  readonly groups: ReadonlyMap<string, string>;
  readonly from: string;
  readonly prefix: string;
  readonly suffix: string;
  readonly schema: string | undefined;

  constructor(options: AggregationOptions) {
    if (options.aggregates.length === 0) {
      throw new AggregationConfigError('Aggregation needs at least one aggregate', 'aggregates');
    }
    this.aggregates = options.aggregates;
    this.groups = normalizeGroups(options.groups);
    this.from = options.from;
    this.prefix = options.prefix ?? options.from;
    this.suffix = options.suffix ?? DEFAULT_SUFFIX;
    this.schema = options.schema;

    if (!this.acceptsDatePlaceholders()) {
      const placeholders = new Set(this.aggregates.flatMap((a) => [...a.placeholders]));
      if (placeholders.size > 0) {
        throw new AggregationConfigError(
          `Aggregates reference ${[...placeholders].map((p) => `{${p}}`).join(', ')} but the aggregation has no dates`,
          'aggregates'
        );
      }
    }
  }

  /**
   * Whether aggregates may use `{collate_date}` / `{collate_interval}`.
   */
  protected acceptsDatePlaceholders(): boolean {
    return false;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Naming
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Qualified, quoted name of a group's table, or of the final table when no group
   * is given.
   */
  getTableName(group?: string, options: TableNameOptions = {}): string {
    if (group !== undefined) {
      return qualifiedTableName(toSqlName(`${this.prefix}_${group}`), this.schema);
    }
    const imputed = options.imputed === true ? '_imputed' : '';
    return qualifiedTableName(`${this.prefix}_${this.suffix}${imputed}`, this.schema);
  }

  /**
   * Select-list entry of a group key; the alias labels it when it differs.
   */
  protected groupColumn(alias: string, expression: string): string {
    return alias === expression ? expression : `${expression} AS ${alias}`;
  }

  /**
   * Columns identifying a row of a group table.
   */
  protected groupKeys(alias: string): string[] {
    return [alias];
  }

  protected groupExpression(group: string): string {
    const expression = this.groups.get(group);
    if (expression === undefined) {
      throw new AggregationConfigError(`Unknown group ${group}`, 'groups');
    }
    return expression;
  }

  protected *aggregateColumns(options: ColumnOptions): Generator<AggregateColumn> {
    for (const aggregate of this.aggregates) {
      yield* aggregate.getColumns(options);
    }
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Per-group statements
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * One select per group: the group key plus every aggregate column.
   */
  getSelects(): ReadonlyMap<string, readonly SelectQuery[]> {
    const selects = new Map<string, readonly SelectQuery[]>();

    for (const [group, expression] of this.groups) {
      const columns = [...this.aggregateColumns({ prefix: `${this.prefix}_${group}_` })];
      selects.set(group, [
        {
          columns: [
            this.groupColumn(group, expression),
            ...columns.map((column) => labelColumn(column.sql, column.name)),
          ],
          from: this.from,
          groupBy: [expression],
        },
      ]);
    }

    return selects;
  }

  /**
   * `CREATE TABLE` per group from a zero-row copy of its first select.
   *
   * @param selects - Customised selects; defaults to getSelects()
   */
  getCreates(selects = this.getSelects()): ReadonlyMap<string, Statement> {
    const creates = new Map<string, Statement>();
    for (const [group, queries] of selects) {
      const [first] = queries;
      if (first === undefined) {
        throw new AggregationConfigError(`Group ${group} has no select`, 'groups');
      }
      creates.set(group, createTableAs(this.getTableName(group), renderSelect(withLimit(first, 0))));
    }
    return creates;
  }

  /**
   * `INSERT INTO ... (SELECT ...)` per group and select.
   */
  getInserts(selects = this.getSelects()): ReadonlyMap<string, readonly Statement[]> {
    const inserts = new Map<string, readonly Statement[]>();
    for (const [group, queries] of selects) {
      const table = this.getTableName(group);
      inserts.set(
        group,
        queries.map((query) => insertFromSelect(table, renderSelect(query)))
      );
    }
    return inserts;
  }

  getDrops(): ReadonlyMap<string, Statement> {
    return new Map(
      [...this.groups.keys()].map((group) => [group, dropTableIfExists(this.getTableName(group))])
    );
  }

  getIndexes(): ReadonlyMap<string, Statement> {
    return new Map(
      [...this.groups.keys()].map((group) => [
        group,
        createIndex(this.getTableName(group), this.groupKeys(group)),
      ])
    );
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Final table
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Query enumerating the group key combinations present in the source.
   */
  getJoinTable(): string {
    return selectText({
      columns: [...this.groups].map(([alias, expression]) => this.groupColumn(alias, expression)),
      from: this.from,
      groupBy: [...this.groups.values()],
    });
  }

  /**
   * Creates the final table by left-joining every group table onto the join table.
   *
   * @param joinTable - FROM clause replacing the generated join table, e.g. `cohort t1`
   */
  getCreate(joinTable?: string): Statement {
    const from = joinTable ?? `(${this.getJoinTable()}) t1`;
    const joins = [...this.groups.keys()].map(
      (group) => ` LEFT JOIN ${this.getTableName(group)} USING (${this.groupKeys(group).join(', ')})`
    );
    return createTableAs(this.getTableName(), rawStatement(`(SELECT * FROM ${from}${joins.join('')})`));
  }

  getDrop(): Statement {
    return dropTableIfExists(this.getTableName());
  }

  /**
   * `CREATE SCHEMA IF NOT EXISTS`, only when a schema is configured.
   */
  getCreateSchema(): Statement | undefined {
    return this.schema !== undefined ? createSchemaIfNotExists(this.schema) : undefined;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Plan
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Every statement rebuilding the aggregation, in dependency order.
   */
  getPlan(joinTable?: string): AggregationPlan {
    const selects = this.getSelects();
    const drops = this.getDrops();
    const creates = this.getCreates(selects);
    const inserts = this.getInserts(selects);
    const indexes = this.getIndexes();

    const groups = [...this.groups.keys()].map((group): GroupPlan => {
      const drop = drops.get(group);
      const create = creates.get(group);
      const index = indexes.get(group);
      if (drop === undefined || create === undefined || index === undefined) {
        throw new AggregationConfigError(`Incomplete statements for group ${group}`, 'groups');
      }
      return { group, drop, create, inserts: inserts.get(group) ?? [], index };
    });

    const createSchema = this.getCreateSchema();
    return {
      ...(createSchema !== undefined && { createSchema }),
      groups,
      drop: this.getDrop(),
      create: this.getCreate(joinTable),
    };
  }

  /**
   * Checks run against the database before any table is touched.
   */
  validate(_session: SqlSession): Promise<Result<void, AggregationError>> {
    return Promise.resolve(ok(undefined));
  }
}
