/**
 * Aggregate
 *
 * Expands a compact declaration (quantities × functions × orders) into named SQL
 * aggregate columns.
 */

import { toSqlName } from '@/infra/database/query-builders/index.js';

import { AggregationConfigError } from './errors.js';
import { makeList, makeTuple, splitDistinct, type QuantityArgs } from './quantity.js';
import { checkTemplate, fillTemplate } from './template.js';
import {
  DATE_PLACEHOLDERS,
  type AggregateColumn,
  type ColumnOptions,
  type ColumnSource,
  type ColumnType,
  type DatePlaceholder,
  type ImputationRule,
  type ImputationRuleSpec,
  type ImputationRules,
} from './types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/** One SQL expression, or the argument list of a multi-argument function */
export type QuantityEntry = string | readonly string[];

/**
 * A single expression, a list of expressions, or a record of name → expression.
 * A multi-argument quantity is written as a nested list: `[['x', 'y']]`.
 */
export type QuantityInput =
  | string
  | readonly QuantityEntry[]
  | Readonly<Record<string, QuantityEntry>>;

export interface AggregateOptions {
  readonly quantity: QuantityInput;
  /** SQL aggregate function name(s), e.g. `sum`, `percentile_cont(0.5)` */
  readonly function: string | readonly string[];
  /** Ordering for ordered-set aggregates; `null` means no WITHIN GROUP clause */
  readonly order?: string | null | readonly (string | null)[];
  /** Explicit quantity names, one per quantity */
  readonly names?: readonly string[];
  readonly imputation?: ImputationRules;
  readonly coltype?: ColumnType;
}

const DEFAULT_IMPUTATION: ImputationRuleSpec = { type: 'error' };

const ALLOWED_QUANTITY_PLACEHOLDERS = [...DATE_PLACEHOLDERS];

const isEntryList = (quantity: QuantityInput): quantity is readonly QuantityEntry[] =>
  Array.isArray(quantity);

const normalizeQuantities = (quantity: QuantityInput): [string, QuantityArgs][] => {
  if (typeof quantity === 'string' || isEntryList(quantity)) {
    return makeList<QuantityEntry>(quantity).map((entry): [string, QuantityArgs] => {
      const args = makeTuple(entry);
      return [toSqlName(args.join('_')), args];
    });
  }
  return Object.entries(quantity).map(([name, entry]): [string, QuantityArgs] => [
    name,
    makeTuple(entry),
  ]);
};

const findDuplicates = (values: readonly string[]): string[] =>
  values.filter((value, index) => values.indexOf(value) !== index);

// ─────────────────────────────────────────────────────────────────────────────
// Aggregate
// ─────────────────────────────────────────────────────────────────────────────

export class Aggregate implements ColumnSource {
  readonly quantities: ReadonlyMap<string, QuantityArgs>;
  readonly functions: readonly string[];
  readonly orders: readonly (string | null)[];
  readonly coltype: ColumnType;
  readonly placeholders: ReadonlySet<DatePlaceholder>;
  private readonly imputation: ImputationRules;

  constructor(options: AggregateOptions) {
    const { names } = options;
    let entries = normalizeQuantities(options.quantity);

    if (names !== undefined) {
      if (names.length !== entries.length) {
        throw new AggregationConfigError(
          `Aggregate has ${String(entries.length)} quantities but ${String(names.length)} names`,
          'names',
          { names }
        );
      }
      entries = entries.map(
        ([name, args], index): [string, QuantityArgs] => [names[index] ?? name, args]
      );
    }

    this.quantities = new Map(entries);
    if (this.quantities.size !== entries.length) {
      throw new AggregationConfigError(
        `Aggregate quantity names must be unique: ${entries.map(([name]) => name).join(', ')}`,
        'quantity'
      );
    }
    if (this.quantities.size === 0) {
      throw new AggregationConfigError('Aggregate needs at least one quantity', 'quantity');
    }

    this.functions = makeList(options.function);
    if (this.functions.length === 0) {
      throw new AggregationConfigError('Aggregate needs at least one function', 'function');
    }

    const duplicateFunctions = findDuplicates(this.functions);
    if (duplicateFunctions.length > 0) {
      throw new AggregationConfigError(
        `Aggregate functions must be unique: ${duplicateFunctions.join(', ')}`,
        'function'
      );
    }

    this.orders = options.order === undefined ? [null] : makeList(options.order);
    if (this.orders.length === 0) {
      throw new AggregationConfigError('Aggregate order list must not be empty', 'order');
    }
    // orders are named by their SQL name, and no order at all by the empty string
    const duplicateOrders = findDuplicates(
      this.orders.map((order) => (order === null ? '' : toSqlName(order)))
    );
    if (duplicateOrders.length > 0) {
      throw new AggregationConfigError(
        `Aggregate orders must have unique names: ${duplicateOrders.join(', ')}`,
        'order'
      );
    }

    const placeholders = new Set<DatePlaceholder>();
    const templates = [
      ...[...this.quantities.values()].flat(),
      ...this.orders.filter((order): order is string => order !== null),
    ];
    for (const template of templates) {
      for (const name of checkTemplate(template, ALLOWED_QUANTITY_PLACEHOLDERS, 'quantity')) {
        placeholders.add(name);
      }
    }
    this.placeholders = placeholders;

    this.imputation = options.imputation ?? {};
    this.coltype = options.coltype ?? 'aggregate';
  }

  /**
   * Imputation rule of the columns produced by an aggregate function.
   */
  imputationFor(fn: string): ImputationRule {
    const spec = this.imputation[fn] ?? this.imputation['all'] ?? DEFAULT_IMPUTATION;
    return {
      type: spec.type,
      coltype: this.coltype,
      ...(spec.value !== undefined && { value: spec.value }),
    };
  }

  getColumns(options: ColumnOptions = {}): Iterable<AggregateColumn> {
    return { [Symbol.iterator]: () => this.generateColumns(options) };
  }

  private *generateColumns(options: ColumnOptions): Generator<AggregateColumn> {
    const prefix = options.prefix ?? '';
    const format = options.format ?? {};
    const filter =
      options.when !== undefined && options.when !== '' ? ` FILTER (WHERE ${options.when})` : '';

    for (const fn of this.functions) {
      for (const [quantityName, quantity] of this.quantities) {
        for (const order of this.orders) {
          const { distinct, args } = splitDistinct(quantity);
          const argsSql = args.map((arg) => fillTemplate(arg, format)).join(', ');

          let name = quantityName;
          let orderClause = '';
          if (order !== null) {
            orderClause = ` WITHIN GROUP (ORDER BY ${fillTemplate(order, format)})`;
            name = name.length > 0 ? `${name}_${toSqlName(order)}` : toSqlName(order);
          }

          yield {
            sql: `${fn}(${distinct}${argsSql})${orderClause}${filter}`,
            name: toSqlName(`${prefix}${name}_${fn}`),
            imputation: this.imputationFor(fn),
          };
        }
      }
    }
  }
}
