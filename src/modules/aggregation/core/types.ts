/**
 * Aggregation Module - Domain Types
 *
 * Column sources, generated columns and imputation rules.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Template placeholders
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Every placeholder a naming or quantity template may reference.
 */
export const TEMPLATE_PLACEHOLDERS = [
  'name1',
  'operator',
  'name2',
  'collate_date',
  'collate_interval',
] as const;

export type TemplatePlaceholder = (typeof TEMPLATE_PLACEHOLDERS)[number];

/**
 * Placeholders substituted per as-of date and interval.
 */
export type DatePlaceholder = Extract<TemplatePlaceholder, 'collate_date' | 'collate_interval'>;

export const DATE_PLACEHOLDERS: ReadonlySet<DatePlaceholder> = new Set([
  'collate_date',
  'collate_interval',
]);

export type TemplateValues = Partial<Record<TemplatePlaceholder, string>>;

// ─────────────────────────────────────────────────────────────────────────────
// Imputation
// ─────────────────────────────────────────────────────────────────────────────

export const IMPUTATION_TYPES = ['mean', 'constant', 'zero', 'null_category', 'error'] as const;

export type ImputationType = (typeof IMPUTATION_TYPES)[number];

export const COLUMN_TYPES = ['aggregate', 'categorical', 'array_categorical'] as const;

/**
 * `categorical` and `array_categorical` columns carry a dedicated `_NULL` indicator
 * column; `aggregate` columns get an `_imp` flag when imputed.
 */
export type ColumnType = (typeof COLUMN_TYPES)[number];

/**
 * Imputation policy as declared on an aggregate.
 * `value` is SQL text (or a number) for `constant` rules on numeric columns, and the
 * chosen category name for `constant` rules on categorical columns.
 */
export interface ImputationRuleSpec {
  readonly type: ImputationType;
  readonly value?: string | number;
}

/**
 * Imputation rules keyed by aggregate function name, with `all` as fallback.
 */
export type ImputationRules = Readonly<Record<string, ImputationRuleSpec>>;

/**
 * Resolved rule for one output column.
 */
export interface ImputationRule extends ImputationRuleSpec {
  readonly coltype: ColumnType;
}

export const isImputationType = (value: string): value is ImputationType =>
  IMPUTATION_TYPES.some((type) => type === value);

export const isCategoricalType = (coltype: ColumnType): boolean =>
  coltype === 'categorical' || coltype === 'array_categorical';

// ─────────────────────────────────────────────────────────────────────────────
// Columns
// ─────────────────────────────────────────────────────────────────────────────

/**
 * One generated aggregate column.
 */
export interface AggregateColumn {
  /** SQL expression, e.g. `sum(amount) FILTER (WHERE ...)` */
  readonly sql: string;
  /** Output column name, quote characters stripped */
  readonly name: string;
  readonly imputation: ImputationRule;
}

export interface ColumnOptions {
  /** Predicate restricting the rows fed to each aggregate (FILTER clause) */
  readonly when?: string | undefined;
  readonly prefix?: string | undefined;
  readonly format?: TemplateValues | undefined;
}

/**
 * Anything that expands into a flat list of named aggregate columns.
 */
export interface ColumnSource {
  /**
   * Returns a finite iterable; every iteration regenerates the columns.
   */
  getColumns(options?: ColumnOptions): Iterable<AggregateColumn>;

  /**
   * Date placeholders the source needs values for.
   */
  readonly placeholders: ReadonlySet<DatePlaceholder>;
}
