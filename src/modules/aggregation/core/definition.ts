/**
 * Aggregation definitions
 *
 * Builds aggregates and a SpacetimeAggregation from validated plain data.
 */

import { TypeCompiler } from '@sinclair/typebox/compiler';
import { err, ok, type Result } from 'neverthrow';

import { Aggregate } from './aggregate.js';
import { Categorical, Compare } from './compare.js';
import { AggregationConfigError, createValidationError } from './errors.js';
import {
  AggregationDefinitionSchema,
  type AggregateEntry,
  type AggregationDefinition,
} from './schemas/definition.js';
import { SpacetimeAggregation } from './spacetime-aggregation.js';

import type { ColumnSource } from './types.js';
import type { ValidationError } from '@/common/types/errors.js';
import type { ValueError } from '@sinclair/typebox/errors';

const validator = TypeCompiler.Compile(AggregationDefinitionSchema);

const formatSchemaErrors = (errors: Iterable<ValueError>): string[] =>
  Array.from(errors).map((error) => `${error.path}: ${error.message}`);

/**
 * Validates an aggregation definition against the schema.
 */
export const parseAggregationDefinition = (
  input: unknown
): Result<AggregationDefinition, ValidationError> => {
  if (!validator.Check(input)) {
    const details = formatSchemaErrors(validator.Errors(input));
    return err(
      createValidationError(`Invalid aggregation definition: ${details.join('; ')}`, undefined, details)
    );
  }
  return ok(input);
};

export const buildAggregate = (entry: AggregateEntry): ColumnSource => {
  switch (entry.kind) {
    case 'aggregate':
      return new Aggregate(entry);
    case 'compare':
      return new Compare(entry);
    case 'categorical':
      return new Categorical(entry);
  }
};

/**
 * Builds the aggregation a definition describes. Inconsistent declarations (name
 * counts, truncation collisions, unknown placeholders) become validation errors.
 */
export const createSpacetimeAggregation = (
  definition: AggregationDefinition
): Result<SpacetimeAggregation, ValidationError> => {
  try {
    return ok(
      new SpacetimeAggregation({
        ...definition,
        aggregates: definition.aggregates.map(buildAggregate),
      })
    );
  } catch (error) {
    if (error instanceof AggregationConfigError) {
      return err(createValidationError(error.message, error.field, error.details));
    }
    throw error;
  }
};
