/**
 * Compare / Categorical
 *
 * Shorthands that compare one source column against many values, producing one
 * 0/1 quantity per value: `({column} {operator} {value})::INT`. With `sum` these
 * count matching rows, with `avg` they give the matching fraction.
 */

import { Aggregate, type AggregateOptions } from './aggregate.js';
import { AggregationConfigError } from './errors.js';
import { maybequote, type ChoiceValue } from './quantity.js';
import { escapeTemplate } from './template.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/** A list of values (each its own nickname) or a record of nickname → value */
export type Choices = readonly ChoiceValue[] | Readonly<Record<string, ChoiceValue>>;

/** Categorical choices may contain `null` to request the null-indicator column */
export type CategoricalChoices =
  | readonly (ChoiceValue | null)[]
  | Readonly<Record<string, ChoiceValue | null>>;

type SharedOptions = Pick<AggregateOptions, 'function' | 'order' | 'imputation' | 'coltype'>;

export interface CompareOptions extends SharedOptions {
  /** Column name or SQL expression */
  readonly column: string;
  /** SQL comparison operator, e.g. `=`, `~`, `LIKE` */
  readonly operator: string;
  readonly choices: Choices;
  /** Adds `{column} is NULL`; a string is used as the null nickname (default `NULL`) */
  readonly includeNull?: boolean | string;
  /** Longer quantity names are truncated and numbered */
  readonly maxlen?: number;
  /** Include the operator in quantity names (default true) */
  readonly operatorInName?: boolean;
  /** Forces (true) or suppresses (false) quoting of choice values */
  readonly quoteChoices?: boolean;
}

export interface CategoricalOptions extends Omit<CompareOptions, 'operator' | 'choices'> {
  readonly choices: CategoricalChoices;
}

export const NULL_CATEGORY = 'NULL';

// ─────────────────────────────────────────────────────────────────────────────
// Name truncation
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Truncates every name when any exceeds `maxlen`, appending a zero-padded index so
 * names stay distinct. Input order is kept, but truncated names no longer sort in
 * that order.
 */
export const truncateNames = (names: readonly string[], maxlen: number): string[] => {
  if (!names.some((name) => name.length > maxlen)) {
    return [...names];
  }

  const width = Math.max(2, String(names.length - 1).length);
  const keep = maxlen - width - 1;
  if (!Number.isInteger(maxlen) || keep < 1) {
    throw new AggregationConfigError(
      `maxlen ${String(maxlen)} is too short to number ${String(names.length)} names`,
      'maxlen'
    );
  }

  const truncated = names.map(
    (name, index) => `${name.slice(0, keep)}_${String(index).padStart(width, '0')}`
  );
  if (new Set(truncated).size !== truncated.length) {
    throw new AggregationConfigError(
      `Truncated names are not unique: ${truncated.join(', ')}`,
      'maxlen',
      { names: truncated }
    );
  }
  return truncated;
};

// ─────────────────────────────────────────────────────────────────────────────
// Quantity synthesis
// ─────────────────────────────────────────────────────────────────────────────

const isChoiceList = <T>(
  choices: readonly T[] | Readonly<Record<string, T>>
): choices is readonly T[] => Array.isArray(choices);

const choiceEntries = (choices: Choices): [string, ChoiceValue][] =>
  isChoiceList(choices)
    ? choices.map((choice): [string, ChoiceValue] => [String(choice), choice])
    : Object.entries(choices);

export const buildCompareQuantities = (options: CompareOptions): Record<string, string> => {
  const { column, operator, includeNull = false, operatorInName = true } = options;
  const opname = operatorInName ? `_${operator}_` : '_';

  const entries = new Map<string, string>();
  const addEntry = (name: string, expression: string): void => {
    const existing = entries.get(name);
    if (existing !== undefined) {
      throw new AggregationConfigError(
        `Comparisons ${existing} and ${expression} both produce the quantity name ${name}`,
        'choices',
        { name }
      );
    }
    entries.set(name, expression);
  };

  for (const [nickname, choice] of choiceEntries(options.choices)) {
    addEntry(
      `${column}${opname}${nickname}`,
      `(${column} ${operator} ${escapeTemplate(maybequote(choice, options.quoteChoices))})::INT`
    );
  }

  if (includeNull !== false) {
    const nullName = includeNull === true ? NULL_CATEGORY : includeNull;
    addEntry(`${column}_${nullName}`, `(${column} is NULL)::INT`);
  }

  const names = [...entries.keys()];
  const finalNames = options.maxlen !== undefined ? truncateNames(names, options.maxlen) : names;
  const expressions = [...entries.values()];

  return Object.fromEntries(finalNames.map((name, index) => [name, expressions[index] ?? '']));
};

/**
 * Separates `null` choices from values without touching the caller's collection.
 * A `null` list entry enables the default null category; a record key mapped to
 * `null` becomes the null nickname.
 */
export const splitNullChoice = (
  choices: CategoricalChoices
): { choices: Choices; includeNull: boolean | string } => {
  if (isChoiceList(choices)) {
    const values = choices.filter((choice): choice is ChoiceValue => choice !== null);
    return { choices: values, includeNull: values.length !== choices.length };
  }

  const values: Record<string, ChoiceValue> = {};
  let includeNull: boolean | string = false;
  for (const [nickname, value] of Object.entries(choices)) {
    if (value === null) {
      includeNull = nickname;
    } else {
      values[nickname] = value;
    }
  }
  return { choices: values, includeNull };
};

// ─────────────────────────────────────────────────────────────────────────────
// Aggregates
// ─────────────────────────────────────────────────────────────────────────────

export class Compare extends Aggregate {
  constructor(options: CompareOptions) {
    super({
      quantity: buildCompareQuantities(options),
      function: options.function,
      order: options.order,
      imputation: options.imputation,
      coltype: options.coltype,
    });
  }
}

/**
 * Equality comparisons, with the operator left out of names and a `categorical`
 * column type by default.
 */
export class Categorical extends Compare {
  constructor(options: CategoricalOptions) {
    const { choices, includeNull } = splitNullChoice(options.choices);
    super({
      ...options,
      operator: '=',
      choices,
      operatorInName: options.operatorInName ?? false,
      includeNull: includeNull !== false ? includeNull : (options.includeNull ?? false),
      coltype: options.coltype ?? 'categorical',
    });
  }
}
