/**
 * Aggregation definition schema.
 *
 * A spacetime aggregation declared as plain data (JSON or YAML), validated before
 * any aggregate object is built.
 */

import { Type, type Static } from '@sinclair/typebox';

// ─────────────────────────────────────────────────────────────────────────────
// Shared pieces
// ─────────────────────────────────────────────────────────────────────────────

const NonEmptyString = Type.String({ minLength: 1 });

const ImputationTypeSchema = Type.Union([
  Type.Literal('mean'),
  Type.Literal('constant'),
  Type.Literal('zero'),
  Type.Literal('null_category'),
  Type.Literal('error'),
]);

const ColumnTypeSchema = Type.Union([
  Type.Literal('aggregate'),
  Type.Literal('categorical'),
  Type.Literal('array_categorical'),
]);

export const ImputationRuleSchema = Type.Object(
  {
    type: ImputationTypeSchema,
    value: Type.Optional(Type.Union([Type.String(), Type.Number()])),
  },
  { additionalProperties: false }
);

const ImputationSchema = Type.Record(Type.String(), ImputationRuleSchema, {
  description: 'Rules keyed by aggregate function name, or `all`',
});

const QuantityEntrySchema = Type.Union([NonEmptyString, Type.Array(NonEmptyString, { minItems: 1 })]);

const FunctionSchema = Type.Union([NonEmptyString, Type.Array(NonEmptyString, { minItems: 1 })]);

const OrderSchema = Type.Union([
  Type.Null(),
  NonEmptyString,
  Type.Array(Type.Union([NonEmptyString, Type.Null()]), { minItems: 1 }),
]);

const ChoiceValueSchema = Type.Union([Type.String(), Type.Number(), Type.Boolean()]);

const sharedAggregateFields = {
  function: FunctionSchema,
  order: Type.Optional(OrderSchema),
  imputation: Type.Optional(ImputationSchema),
  coltype: Type.Optional(ColumnTypeSchema),
};

const comparisonFields = {
  column: NonEmptyString,
  includeNull: Type.Optional(Type.Union([Type.Boolean(), NonEmptyString])),
  maxlen: Type.Optional(Type.Integer({ minimum: 4 })),
  operatorInName: Type.Optional(Type.Boolean()),
  quoteChoices: Type.Optional(Type.Boolean()),
};

// ─────────────────────────────────────────────────────────────────────────────
// Aggregates
// ─────────────────────────────────────────────────────────────────────────────

export const AggregateDefinitionSchema = Type.Object(
  {
    kind: Type.Literal('aggregate'),
    quantity: Type.Union([
      NonEmptyString,
      Type.Array(QuantityEntrySchema, { minItems: 1 }),
      Type.Record(Type.String(), QuantityEntrySchema),
    ]),
    names: Type.Optional(Type.Array(NonEmptyString)),
    ...sharedAggregateFields,
  },
  { additionalProperties: false }
);

export const CompareDefinitionSchema = Type.Object(
  {
    kind: Type.Literal('compare'),
    operator: NonEmptyString,
    choices: Type.Union([
      Type.Array(ChoiceValueSchema, { minItems: 1 }),
      Type.Record(Type.String(), ChoiceValueSchema),
    ]),
    ...comparisonFields,
    ...sharedAggregateFields,
  },
  { additionalProperties: false }
);

export const CategoricalDefinitionSchema = Type.Object(
  {
    kind: Type.Literal('categorical'),
    choices: Type.Union([
      Type.Array(Type.Union([ChoiceValueSchema, Type.Null()]), { minItems: 1 }),
      Type.Record(Type.String(), Type.Union([ChoiceValueSchema, Type.Null()])),
    ]),
    ...comparisonFields,
    ...sharedAggregateFields,
  },
  { additionalProperties: false }
);

export const AggregateEntrySchema = Type.Union([
  AggregateDefinitionSchema,
  CompareDefinitionSchema,
  CategoricalDefinitionSchema,
]);

// ─────────────────────────────────────────────────────────────────────────────
// Aggregation
// ─────────────────────────────────────────────────────────────────────────────

export const AggregationDefinitionSchema = Type.Object(
  {
    from: NonEmptyString,
    prefix: Type.Optional(NonEmptyString),
    suffix: Type.Optional(NonEmptyString),
    schema: Type.Optional(NonEmptyString),
    groups: Type.Union([
      Type.Array(NonEmptyString, { minItems: 1 }),
      Type.Record(Type.String(), NonEmptyString),
    ]),
    intervals: Type.Union([
      Type.Array(NonEmptyString, { minItems: 1 }),
      Type.Record(Type.String(), Type.Array(NonEmptyString, { minItems: 1 })),
    ]),
    dates: Type.Array(NonEmptyString, { minItems: 1 }),
    stateTable: NonEmptyString,
    stateGroup: Type.Optional(NonEmptyString),
    dateColumn: Type.Optional(NonEmptyString),
    outputDateColumn: Type.Optional(NonEmptyString),
    inputMinDate: Type.Optional(NonEmptyString),
    aggregates: Type.Array(AggregateEntrySchema, { minItems: 1 }),
  },
  { additionalProperties: false }
);

export type AggregateEntry = Static<typeof AggregateEntrySchema>;
export type AggregationDefinition = Static<typeof AggregationDefinitionSchema>;
