/**
 * Unit tests for AggregateExpression
 */

import { describe, expect, it } from 'vitest';

import { Aggregate } from '@/modules/aggregation/core/aggregate.js';
import { add, div, eq, mul } from '@/modules/aggregation/core/aggregate-expression.js';
import { AggregationConfigError } from '@/modules/aggregation/core/errors.js';

import type { ColumnOptions, ColumnSource } from '@/modules/aggregation/core/types.js';

const spend = (): Aggregate =>
  new Aggregate({ quantity: 'amount', function: 'sum', imputation: { all: { type: 'zero' } } });

const visits = (): Aggregate => new Aggregate({ quantity: { visits: '*' }, function: 'count' });

const columns = (source: ColumnSource, options?: ColumnOptions) => [...source.getColumns(options)];

describe('AggregateExpression', () => {
  it('divides with a cast forcing non-integer division', () => {
    expect(columns(div(spend(), visits()))).toEqual([
      {
        sql: '(sum(amount)*1.0 / count(*))',
        name: 'amount_sum/visits_count',
        imputation: { type: 'zero', coltype: 'aggregate' },
      },
    ]);
  });

  it('uses the SQL operator in expressions and the symbol in names', () => {
    const [column] = columns(eq(spend(), visits()));

    expect(column?.sql).toBe('(sum(amount) = count(*))');
    expect(column?.name).toBe('amount_sum==visits_count');
  });

  it('adds without a cast', () => {
    const [column] = columns(add(spend(), visits()));

    expect(column?.sql).toBe('(sum(amount) + count(*))');
  });

  it('takes a cast override', () => {
    const [column] = columns(div(spend(), visits(), { cast: '::decimal' }));

    expect(column?.sql).toBe('(sum(amount)::decimal / count(*))');
  });

  it('passes the predicate to both operands and the prefix to the name only', () => {
    const [column] = columns(div(spend(), visits()), { when: 'x > 1', prefix: 'p_' });

    expect(column?.sql).toBe(
      '(sum(amount) FILTER (WHERE x > 1)*1.0 / count(*) FILTER (WHERE x > 1))'
    );
    expect(column?.name).toBe('p_amount_sum/visits_count');
  });

  it('crosses every left column with every right column', () => {
    const left = new Aggregate({ quantity: 'amount', function: ['sum', 'max'] });

    expect(columns(mul(left, visits())).map((column) => column.name)).toEqual([
      'amount_sum*visits_count',
      'amount_max*visits_count',
    ]);
  });

  it('nests expressions', () => {
    const [column] = columns(add(div(spend(), visits()), spend()));

    expect(column?.sql).toBe('((sum(amount)*1.0 / count(*)) + sum(amount))');
    expect(column?.name).toBe('amount_sum/visits_count+amount_sum');
  });

  describe('naming templates', () => {
    it('renames through alias', () => {
      const expression = div(spend(), visits()).alias('spend_per_visit');

      expect(columns(expression).map((column) => column.name)).toEqual(['spend_per_visit']);
    });

    it('fills date placeholders and reports them', () => {
      const expression = div(spend(), visits(), {
        template: '{name1}_per_{name2}_{collate_interval}',
      });

      expect([...expression.placeholders]).toEqual(['collate_interval']);
      expect(
        columns(expression, {
          format: { collate_date: '2016-01-01', collate_interval: '1 year' },
        }).map((column) => column.name)
      ).toEqual(['amount_sum_per_visits_count_1 year']);
    });

    it('rejects unknown placeholders', () => {
      expect(() => div(spend(), visits()).alias('{ratio}')).toThrow(AggregationConfigError);
    });
  });

  it('overrides the imputation rule and keeps the left column type', () => {
    const [column] = columns(div(spend(), visits(), { imputation: { type: 'mean' } }));

    expect(column?.imputation).toEqual({ type: 'mean', coltype: 'aggregate' });
  });
});
