/**
 * Imputation rule engine.
 *
 * Turns a column's rule into a COALESCE expression filling its missing values.
 * Categorical columns come in families sharing a `_NULL` indicator column; the
 * indicator absorbs missing rows while the other category columns are filled.
 */

import { err, ok, type Result } from 'neverthrow';

import { quoteIdentifier } from '@/infra/database/query-builders/index.js';

import {
  createInvalidImputationError,
  createMissingImputationValueError,
  createNullsFoundError,
  type ImputationError,
} from './errors.js';
import { isCategoricalType, type ImputationRule } from './types.js';

export const NULL_INDICATOR_MARKER = '_NULL';

export const isNullIndicator = (column: string): boolean => column.includes(NULL_INDICATOR_MARKER);

/**
 * Within-date mean, falling back to 0 when the whole date is NULL.
 */
const meanWithinDate = (column: string, outputDateColumn: string): string =>
  `AVG(${quoteIdentifier(column)}) OVER (PARTITION BY ${outputDateColumn}), 0`;

/**
 * Builds the SELECT-list entry imputing one column.
 *
 * @example
 * ```typescript
 * imputeSql('events_entity_id_all_amount_sum', { type: 'zero', coltype: 'aggregate' }, 'date')
 * // ok('COALESCE("events_entity_id_all_amount_sum", 0) AS "events_entity_id_all_amount_sum"')
 * ```
 */
export const imputeSql = (
  column: string,
  rule: ImputationRule,
  outputDateColumn: string
): Result<string, ImputationError> => {
  const categorical = isCategoricalType(rule.coltype);
  const nullIndicator = categorical && isNullIndicator(column);
  const coalesce = (fill: string | number): string =>
    `COALESCE(${quoteIdentifier(column)}, ${String(fill)}) AS ${quoteIdentifier(column)}`;

  switch (rule.type) {
    case 'mean':
      return ok(coalesce(nullIndicator ? 1 : meanWithinDate(column, outputDateColumn)));

    case 'constant': {
      if (rule.value === undefined) {
        return err(createMissingImputationValueError(column));
      }
      if (!categorical) {
        return ok(coalesce(rule.value));
      }
      // fill the chosen category and the null indicator, zero the rest; category
      // names sit between underscores, as in {column}_{category}_{function}
      const chosen = column.includes(`_${String(rule.value)}_`);
      return ok(coalesce(chosen || nullIndicator ? 1 : 0));
    }

    case 'zero':
      return ok(coalesce(nullIndicator ? 1 : 0));

    case 'null_category':
      if (!categorical) {
        return err(createInvalidImputationError(column, rule.type));
      }
      return ok(coalesce(nullIndicator ? 1 : 0));

    case 'error':
      return err(createNullsFoundError(column));

    default:
      // rules parsed from untyped input may carry any string
      return err(createInvalidImputationError(column, String(rule.type)));
  }
};

/**
 * Flag column recording whether a non-categorical value was imputed.
 */
export const imputedFlagSql = (column: string): string =>
  `CASE WHEN ${quoteIdentifier(column)} IS NULL THEN 1 ELSE 0 END AS ${quoteIdentifier(`${column}_imp`)}`;
