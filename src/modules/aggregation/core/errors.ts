/**
 * Aggregation Module - Domain Errors
 *
 * Runtime errors are discriminated unions with a 'type' field for easy matching.
 * Configuration mistakes are programming errors and throw at construction.
 */

import {
  createValidationError,
  describeCause,
  type InfraError,
  type ValidationError,
} from '@/common/types/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Configuration Errors (thrown)
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Thrown when an aggregate or aggregation is declared inconsistently.
 */
export class AggregationConfigError extends Error {
  constructor(
    message: string,
    public readonly field: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'AggregationConfigError';
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Runtime Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A statement failed in the database.
 */
export interface ExecutionError extends InfraError {
  readonly type: 'DatabaseError';
  /** SQL text of the failing statement */
  readonly statement: string;
}

/**
 * An as-of date and interval reach back before the configured input floor.
 */
export interface TemporalValidationError {
  readonly type: 'TemporalValidationError';
  readonly message: string;
  readonly date: string;
  readonly interval: string;
  readonly inputMinDate: string;
}

/**
 * A column cannot be imputed under its rule.
 */
export interface ImputationError {
  readonly type: 'ImputationError';
  readonly message: string;
  readonly column: string;
  readonly imputationType: string;
  readonly reason: 'NullsFound' | 'InvalidType' | 'MissingValue';
}

/**
 * Imputation column lists do not partition the rule columns.
 */
export interface ColumnClassificationError {
  readonly type: 'ColumnClassificationError';
  readonly message: string;
  readonly missing: readonly string[];
  readonly duplicated: readonly string[];
  readonly unknown: readonly string[];
}

export type AggregationError =
  | ExecutionError
  | TemporalValidationError
  | ImputationError
  | ColumnClassificationError
  | ValidationError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

export const createExecutionError = (statement: string, cause: unknown): ExecutionError => ({
  type: 'DatabaseError',
  message: `Statement failed: ${describeCause(cause)}`,
  retryable: false,
  statement,
  cause,
});

export const createTemporalValidationError = (
  date: string,
  interval: string,
  inputMinDate: string
): TemporalValidationError => ({
  type: 'TemporalValidationError',
  message: `date '${date}' - '${interval}' is before input_min_date ('${inputMinDate}')`,
  date,
  interval,
  inputMinDate,
});

export const createNullsFoundError = (column: string): ImputationError => ({
  type: 'ImputationError',
  message: `NULL values found in column ${column}`,
  column,
  imputationType: 'error',
  reason: 'NullsFound',
});

export const createInvalidImputationError = (
  column: string,
  imputationType: string
): ImputationError => ({
  type: 'ImputationError',
  message: `Invalid imputation type ${imputationType} for column ${column}`,
  column,
  imputationType,
  reason: 'InvalidType',
});

export const createMissingImputationValueError = (column: string): ImputationError => ({
  type: 'ImputationError',
  message: `Imputation type constant for column ${column} requires a value`,
  column,
  imputationType: 'constant',
  reason: 'MissingValue',
});

export const createColumnClassificationError = (
  missing: readonly string[],
  duplicated: readonly string[],
  unknown: readonly string[]
): ColumnClassificationError => {
  const parts = [
    missing.length > 0 ? `unclassified: ${missing.join(', ')}` : '',
    duplicated.length > 0 ? `in both lists: ${duplicated.join(', ')}` : '',
    unknown.length > 0 ? `without imputation rule: ${unknown.join(', ')}` : '',
  ].filter((part) => part !== '');

  return {
    type: 'ColumnClassificationError',
    message: `Imputation columns must partition the aggregation columns (${parts.join('; ')})`,
    missing,
    duplicated,
    unknown,
  };
};

/**
 * The NULL count row lacks columns, e.g. when the database shortened their names.
 */
export const createMissingNullCountError = (
  missing: readonly string[]
): ColumnClassificationError => ({
  type: 'ColumnClassificationError',
  message: `No NULL count returned for columns: ${missing.join(', ')}`,
  missing,
  duplicated: [],
  unknown: [],
});

export { createValidationError };
