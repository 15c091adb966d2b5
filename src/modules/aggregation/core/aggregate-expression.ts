/**
 * Aggregate Expressions
 *
 * Binary arithmetic and comparison nodes over column sources. A node is itself a
 * column source, so trees of expressions still expand into flat column lists:
 *
 * ```typescript
 * const spend = new Aggregate({ quantity: 'amount', function: 'sum' });
 * const visits = new Aggregate({ quantity: '*', function: 'count' });
 * div(spend, visits).alias('spend_per_visit');
 * ```
 */

import { toSqlName } from '@/infra/database/query-builders/index.js';

import { checkTemplate, fillTemplate } from './template.js';
import {
  TEMPLATE_PLACEHOLDERS,
  type AggregateColumn,
  type ColumnOptions,
  type ColumnSource,
  type DatePlaceholder,
  type ImputationRuleSpec,
} from './types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Operators
// ─────────────────────────────────────────────────────────────────────────────

export interface OperatorDefinition {
  /** Display symbol used in column names */
  readonly symbol: string;
  readonly sql: string;
  /** Suffix applied to the left operand */
  readonly cast: string;
}

export const OPERATORS = {
  add: { symbol: '+', sql: '+', cast: '' },
  sub: { symbol: '-', sql: '-', cast: '' },
  mul: { symbol: '*', sql: '*', cast: '' },
  // force non-integer division
  div: { symbol: '/', sql: '/', cast: '*1.0' },
  lt: { symbol: '<', sql: '<', cast: '' },
  le: { symbol: '<=', sql: '<=', cast: '' },
  eq: { symbol: '==', sql: '=', cast: '' },
  ne: { symbol: '!=', sql: '!=', cast: '' },
  gt: { symbol: '>', sql: '>', cast: '' },
  ge: { symbol: '>=', sql: '>=', cast: '' },
  or: { symbol: '|', sql: 'or', cast: '' },
  and: { symbol: '&', sql: 'and', cast: '' },
} as const satisfies Record<string, OperatorDefinition>;

export type BinaryOperator = keyof typeof OPERATORS;

export const DEFAULT_EXPRESSION_TEMPLATE = '{name1}{operator}{name2}';

export interface AggregateExpressionOptions {
  /** Overrides the operator's cast suffix, e.g. `::decimal` */
  readonly cast?: string;
  /** Naming template over `name1`, `operator`, `name2` and the date placeholders */
  readonly template?: string;
  /** Rule for the derived columns; defaults to the left column's rule */
  readonly imputation?: ImputationRuleSpec;
}

// ─────────────────────────────────────────────────────────────────────────────
// AggregateExpression
// ─────────────────────────────────────────────────────────────────────────────

export class AggregateExpression implements ColumnSource {
  readonly operator: BinaryOperator;
  readonly left: ColumnSource;
  readonly right: ColumnSource;
  private readonly cast: string;
  private readonly imputation: ImputationRuleSpec | undefined;
  private template: string;
  private templatePlaceholders: ReadonlySet<DatePlaceholder>;

  constructor(
    left: ColumnSource,
    operator: BinaryOperator,
    right: ColumnSource,
    options: AggregateExpressionOptions = {}
  ) {
    this.left = left;
    this.operator = operator;
    this.right = right;
    this.cast = options.cast ?? OPERATORS[operator].cast;
    this.imputation = options.imputation;
    this.template = DEFAULT_EXPRESSION_TEMPLATE;
    this.templatePlaceholders = new Set();
    this.alias(options.template ?? DEFAULT_EXPRESSION_TEMPLATE);
  }

  get placeholders(): ReadonlySet<DatePlaceholder> {
    return new Set([
      ...this.left.placeholders,
      ...this.right.placeholders,
      ...this.templatePlaceholders,
    ]);
  }

  /**
   * Sets the naming template of the derived columns.
   *
   * @returns this, for chaining
   */
  alias(template: string): this {
    this.templatePlaceholders = checkTemplate(template, TEMPLATE_PLACEHOLDERS, 'expression');
    this.template = template;
    return this;
  }

  getColumns(options: ColumnOptions = {}): Iterable<AggregateColumn> {
    return { [Symbol.iterator]: () => this.generateColumns(options) };
  }

  private *generateColumns(options: ColumnOptions): Generator<AggregateColumn> {
    const { when, format = {}, prefix = '' } = options;
    const { sql: operatorSql, symbol } = OPERATORS[this.operator];

    for (const c1 of this.left.getColumns({ when, format })) {
      for (const c2 of this.right.getColumns({ when, format })) {
        const name = fillTemplate(this.template, {
          ...format,
          name1: c1.name,
          operator: symbol,
          name2: c2.name,
        });

        yield {
          sql: `(${c1.sql}${this.cast} ${operatorSql} ${c2.sql})`,
          name: toSqlName(`${prefix}${name}`),
          imputation:
            this.imputation !== undefined
              ? { ...this.imputation, coltype: c1.imputation.coltype }
              : c1.imputation,
        };
      }
    }
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Constructors
// ─────────────────────────────────────────────────────────────────────────────

const binary =
  (operator: BinaryOperator) =>
  (left: ColumnSource, right: ColumnSource, options?: AggregateExpressionOptions) =>
    new AggregateExpression(left, operator, right, options);

export const add = binary('add');
export const sub = binary('sub');
export const mul = binary('mul');
export const div = binary('div');
export const lt = binary('lt');
export const le = binary('le');
export const eq = binary('eq');
export const ne = binary('ne');
export const gt = binary('gt');
export const ge = binary('ge');
export const or = binary('or');
export const and = binary('and');
