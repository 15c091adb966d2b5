/**
 * SpacetimeAggregation
 *
 * Aggregation over trailing time windows. For every group, as-of date and interval
 * the aggregates are computed over the rows strictly before the date and, unless
 * the interval is `all`, no older than `date - interval`. Group tables are keyed
 * by (group, output date); the final table can be rewritten with imputed values
 * against an externally maintained state table.
 */

import { err, ok, type Result } from 'neverthrow';

import {
  createTableAs,
  dateLiteral,
  dropTableIfExists,
  intervalLiteral,
  labelColumn,
  quoteIdentifier,
  rawStatement,
  selectText,
  stringLiteral,
  type SelectQuery,
  type Statement,
} from '@/infra/database/query-builders/index.js';

import { Aggregation, type AggregationOptions } from './aggregation.js';
import {
  AggregationConfigError,
  createColumnClassificationError,
  createTemporalValidationError,
  type AggregationError,
  type ColumnClassificationError,
  type ImputationError,
} from './errors.js';
import { imputeSql, imputedFlagSql } from './imputation.js';
import { isCategoricalType, type ImputationRule } from './types.js';

import type { SqlSession } from './ports.js';
import type { RawBuilder } from 'kysely';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export const ALL_INTERVAL = 'all';

/** Intervals shared by every group, or a record group alias → intervals */
export type IntervalsInput = readonly string[] | Readonly<Record<string, readonly string[]>>;

export interface SpacetimeAggregationOptions extends AggregationOptions {
  readonly intervals: IntervalsInput;
  /** As-of dates, e.g. `2016-01-01` */
  readonly dates: readonly string[];
  /** Table with one row per valid (state group, date) pair */
  readonly stateTable: string;
  /** Group key column of the state table; defaults to `entity_id` */
  readonly stateGroup?: string;
  /** Date column of the source rows; defaults to `date` */
  readonly dateColumn?: string;
  /** Date column of the output tables; defaults to `date` */
  readonly outputDateColumn?: string;
  /** Rows older than this date are never aggregated */
  readonly inputMinDate?: string;
}

/** One row of the findNulls query: output column → number of NULLs */
export type NullCountRow = Record<string, string | number | null>;

interface BeforeMinRow {
  readonly before_min: boolean;
}

const isIntervalList = (intervals: IntervalsInput): intervals is readonly string[] =>
  Array.isArray(intervals);

const unique = (values: Iterable<string>): string[] => [...new Set(values)];

// ─────────────────────────────────────────────────────────────────────────────
// SpacetimeAggregation
// ─────────────────────────────────────────────────────────────────────────────

export class SpacetimeAggregation extends Aggregation {
  /** group alias → intervals */
  readonly intervals: ReadonlyMap<string, readonly string[]>;
  readonly dates: readonly string[];
  readonly stateTable: string;
  readonly stateGroup: string;
  readonly dateColumn: string;
  readonly outputDateColumn: string;
  readonly inputMinDate: string | undefined;

  constructor(options: SpacetimeAggregationOptions) {
    super(options);

    const { intervals } = options;
    this.intervals = new Map(
      [...this.groups.keys()].map((group): [string, readonly string[]] => [
        group,
        isIntervalList(intervals) ? intervals : (intervals[group] ?? []),
      ])
    );

    if (!isIntervalList(intervals)) {
      const unknown = Object.keys(intervals).filter((group) => !this.groups.has(group));
      if (unknown.length > 0) {
        throw new AggregationConfigError(
          `Intervals given for unknown groups: ${unknown.join(', ')}`,
          'intervals'
        );
      }
    }
    for (const [group, groupIntervals] of this.intervals) {
      if (groupIntervals.length === 0) {
        throw new AggregationConfigError(`Group ${group} has no intervals`, 'intervals');
      }
      if (unique(groupIntervals).length !== groupIntervals.length) {
        throw new AggregationConfigError(
          `Group ${group} repeats intervals: ${groupIntervals.join(', ')}`,
          'intervals'
        );
      }
    }

    if (options.dates.length === 0) {
      throw new AggregationConfigError('SpacetimeAggregation needs at least one date', 'dates');
    }
    if (unique(options.dates).length !== options.dates.length) {
      throw new AggregationConfigError(
        `SpacetimeAggregation repeats dates: ${options.dates.join(', ')}`,
        'dates'
      );
    }
    this.dates = options.dates;
    this.stateTable = options.stateTable;
    this.stateGroup = options.stateGroup ?? 'entity_id';
    this.dateColumn = options.dateColumn ?? 'date';
    this.outputDateColumn = options.outputDateColumn ?? 'date';
    this.inputMinDate = options.inputMinDate;
  }

  protected override acceptsDatePlaceholders(): boolean {
    return true;
  }

  protected override groupKeys(alias: string): string[] {
    return [alias, this.outputDateColumn];
  }

  private groupIntervals(group: string): readonly string[] {
    return this.intervals.get(group) ?? [];
  }

  /** Intervals of every group, first occurrence order */
  private allIntervals(): string[] {
    return unique([...this.intervals.values()].flat());
  }

  private outputDate(date: string): string {
    return `${dateLiteral(date)} AS ${this.outputDateColumn}`;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Windows
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Row filter of one trailing window, or undefined for `all`.
   */
  windowPredicate(date: string, interval: string): string | undefined {
    if (interval === ALL_INTERVAL) {
      return undefined;
    }
    return `${this.dateColumn} >= ${dateLiteral(date)} - ${intervalLiteral(interval)}`;
  }

  /**
   * WHERE clause bounding the rows any of the intervals can see at a date.
   *
   * @example
   * ```typescript
   * agg.where('2016-01-01', ['1 month', '1 year'])
   * // "date < '2016-01-01' AND date >= '2016-01-01'::date - greatest(interval '1 month',interval '1 year')"
   * ```
   */
  where(date: string, intervals: readonly string[]): string {
    const clauses = [`${this.dateColumn} < ${stringLiteral(date)}`];

    if (!intervals.includes(ALL_INTERVAL)) {
      const greatest = `greatest(${intervals.map(intervalLiteral).join(',')})`;
      clauses.push(`${this.dateColumn} >= ${dateLiteral(date)} - ${greatest}`);
    }
    if (this.inputMinDate !== undefined) {
      clauses.push(`${this.dateColumn} >= ${dateLiteral(this.inputMinDate)}`);
    }

    return clauses.join(' AND ');
  }

  private columnPrefix(group: string, interval: string): string {
    return `${this.prefix}_${group}_${interval}_`;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Statements
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * One select per group and date, with every interval's columns side by side.
   */
  override getSelects(): ReadonlyMap<string, readonly SelectQuery[]> {
    const selects = new Map<string, readonly SelectQuery[]>();

    for (const [group, expression] of this.groups) {
      const intervals = this.groupIntervals(group);

      selects.set(
        group,
        this.dates.map((date): SelectQuery => {
          const columns = intervals.flatMap((interval) =>
            [
              ...this.aggregateColumns({
                when: this.windowPredicate(date, interval),
                prefix: this.columnPrefix(group, interval),
                format: { collate_date: date, collate_interval: interval },
              }),
            ].map((column) => labelColumn(column.sql, column.name))
          );

          return {
            columns: [this.groupColumn(group, expression), this.outputDate(date), ...columns],
            from: this.from,
            where: this.where(date, intervals),
            groupBy: [expression],
          };
        })
      );
    }

    return selects;
  }

  /**
   * Every (group values, date) pair present in the source, one UNION ALL branch per date.
   */
  override getJoinTable(): string {
    const intervals = this.allIntervals();
    const columns = [...this.groups].map(([alias, expression]) => this.groupColumn(alias, expression));

    return this.dates
      .map((date) =>
        selectText({
          columns: [...columns, this.outputDate(date)],
          from: this.from,
          where: this.where(date, intervals),
          groupBy: [...this.groups.values()],
        })
      )
      .join(' UNION ALL ');
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Validation
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Fails when a date and interval reach back before `inputMinDate`, since such a
   * window would silently miss history.
   */
  override async validate(session: SqlSession): Promise<Result<void, AggregationError>> {
    const inputMinDate = this.inputMinDate;
    if (inputMinDate === undefined) {
      return ok(undefined);
    }

    const intervals = this.allIntervals().filter((interval) => interval !== ALL_INTERVAL);
    for (const date of this.dates) {
      for (const interval of intervals) {
        const check = rawStatement<BeforeMinRow>(
          `SELECT (${dateLiteral(date)} - ${stringLiteral(interval)}::interval) < ${dateLiteral(inputMinDate)} AS before_min`
        );
        const result = await session.query(check);
        if (result.isErr()) {
          return err(result.error);
        }
        if (result.value[0]?.before_min === true) {
          return err(createTemporalValidationError(date, interval, inputMinDate));
        }
      }
    }

    return ok(undefined);
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Imputation
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Imputation rule of every output column, keyed by column name.
   */
  getImputationRules(): ReadonlyMap<string, ImputationRule> {
    const rules = new Map<string, ImputationRule>();
    const [firstDate = ''] = this.dates;

    for (const group of this.groups.keys()) {
      for (const interval of this.groupIntervals(group)) {
        const columns = this.aggregateColumns({
          prefix: this.columnPrefix(group, interval),
          format: { collate_date: firstDate, collate_interval: interval },
        });
        for (const column of columns) {
          rules.set(column.name, column.imputation);
        }
      }
    }

    return rules;
  }

  private stateJoin(): string {
    return (
      `FROM ${this.stateTable} t1 LEFT JOIN ${this.getTableName()} t2 ` +
      `USING (${this.stateGroup}, ${this.outputDateColumn})`
    );
  }

  /**
   * Counts the NULLs of every output column over the state table's rows.
   */
  findNulls(): RawBuilder<NullCountRow> {
    const counts = [...this.getImputationRules().keys()].map(
      (column) =>
        `SUM(CASE WHEN ${quoteIdentifier(column)} IS NULL THEN 1 ELSE 0 END) AS ${quoteIdentifier(column)}`
    );
    return rawStatement<NullCountRow>(`SELECT ${counts.join(', ')} ${this.stateJoin()}`);
  }

  /**
   * Creates the imputed table from the state table and the final table.
   *
   * @param imputeCols - Columns with NULLs, rewritten with their imputation rule
   * @param nonimputeCols - Columns without NULLs, passed through
   */
  getImputeCreate(
    imputeCols: readonly string[],
    nonimputeCols: readonly string[]
  ): Result<Statement, ColumnClassificationError | ImputationError> {
    const rules = this.getImputationRules();

    const impute = new Set(imputeCols);
    const nonimpute = new Set(nonimputeCols);
    const missing = [...rules.keys()].filter((c) => !impute.has(c) && !nonimpute.has(c));
    const duplicated = [...impute].filter((c) => nonimpute.has(c));
    const unknown = unique([...imputeCols, ...nonimputeCols]).filter((c) => !rules.has(c));
    if (missing.length > 0 || duplicated.length > 0 || unknown.length > 0) {
      return err(createColumnClassificationError(missing, duplicated, unknown));
    }

    const columns = [
      ...this.groups.keys(),
      this.outputDateColumn,
      ...nonimputeCols.map(quoteIdentifier),
    ];

    for (const column of imputeCols) {
      const rule = rules.get(column);
      if (rule === undefined) {
        continue;
      }
      const imputed = imputeSql(column, rule, this.outputDateColumn);
      if (imputed.isErr()) {
        return err(imputed.error);
      }
      columns.push(imputed.value);
      // categorical columns carry their own _NULL indicator
      if (!isCategoricalType(rule.coltype)) {
        columns.push(imputedFlagSql(column));
      }
    }

    return ok(
      createTableAs(
        this.getTableName(undefined, { imputed: true }),
        rawStatement(`(SELECT ${columns.join(', ')} ${this.stateJoin()})`)
      )
    );
  }

  getImputeDrop(): Statement {
    return dropTableIfExists(this.getTableName(undefined, { imputed: true }));
  }
}
