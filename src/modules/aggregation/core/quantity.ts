/**
 * Quantity helpers: argument normalisation, DISTINCT detection and literal quoting.
 */

import { stringLiteral } from '@/infra/database/query-builders/index.js';

/** SQL arguments of one aggregate call; more than one for e.g. `corr`, `regr_slope` */
export type QuantityArgs = readonly [string, ...string[]];

export type ChoiceValue = string | number | boolean;

const isList = <T>(value: T | readonly T[]): value is readonly T[] => Array.isArray(value);

export const makeList = <T>(value: T | readonly T[]): readonly T[] =>
  isList(value) ? value : [value];

/**
 * Turns a single expression or an argument list into a non-empty argument tuple.
 */
export const makeTuple = (value: string | readonly string[]): QuantityArgs => {
  if (typeof value === 'string') {
    return [value];
  }
  const [first, ...rest] = value;
  if (first === undefined) {
    throw new Error('A quantity needs at least one SQL expression');
  }
  return [first, ...rest];
};

const DISTINCT_PATTERN = /^distinct[ (]/;

export interface SplitDistinct {
  readonly distinct: '' | 'distinct ';
  readonly args: QuantityArgs;
}

/**
 * Detects a leading `distinct ` / `distinct(` on a one-argument quantity and strips it.
 *
 * @example
 * ```typescript
 * splitDistinct(['distinct user_id']) // { distinct: 'distinct ', args: ['user_id'] }
 * splitDistinct(['distinct(user_id)']) // { distinct: 'distinct ', args: ['(user_id)'] }
 * ```
 */
export const splitDistinct = (args: QuantityArgs): SplitDistinct => {
  // DISTINCT is only supported for one-argument quantities
  if (args.length !== 1) {
    return { distinct: '', args };
  }
  const [quantity] = args;
  if (DISTINCT_PATTERN.test(quantity)) {
    return { distinct: 'distinct ', args: [quantity.slice('distinct'.length).trimStart()] };
  }
  return { distinct: '', args };
};

/**
 * Quotes a value for SQL based on its type: numbers and booleans stay bare,
 * everything else is single-quoted. `quoteOverride` forces either behaviour.
 */
export const maybequote = (value: ChoiceValue, quoteOverride?: boolean): string => {
  const text = String(value);
  if (quoteOverride === undefined) {
    return typeof value === 'string' ? stringLiteral(text) : text;
  }
  return quoteOverride ? stringLiteral(text) : text;
};
