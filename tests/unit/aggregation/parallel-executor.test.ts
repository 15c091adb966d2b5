import { describe, expect, it } from 'vitest';

import { makeParallelExecutor } from '@/modules/aggregation/shell/executor/parallel-executor.js';

import { makeEventsAggregation } from '../../fixtures/builders.js';
import { makeFakeSqlRunner, makeTestLogger, type FakeSqlRunner } from '../../fixtures/fakes.js';

const FINAL_CREATE_PREFIX = 'CREATE TABLE "features"."events_aggregation" AS';

const makeTwoGroupAggregation = () =>
  makeEventsAggregation({
    groups: ['entity_id', 'zip'],
    dates: ['2016-01-01', '2017-01-01', '2018-01-01'],
  });

/** Commit position of the transaction containing a statement starting with `prefix` */
const positions = (runner: FakeSqlRunner, prefix: string): number[] =>
  runner.committed.flatMap((statements, index) =>
    statements.some((sql) => sql.startsWith(prefix)) ? [index] : []
  );

describe('makeParallelExecutor', () => {
  it('keeps each group in drop/create, insert, index order', async () => {
    const runner = makeFakeSqlRunner({ delayMs: 2 });
    const executor = makeParallelExecutor(
      { runner, logger: makeTestLogger() },
      { concurrency: 3 }
    );

    const result = await executor.execute(makeTwoGroupAggregation().getPlan());

    expect(result.isOk()).toBe(true);
    // schema, 2 × (drop/create + 3 inserts + index), final
    expect(runner.committed).toHaveLength(1 + 2 * 5 + 1);
    expect(runner.committed[0]).toEqual(['CREATE SCHEMA IF NOT EXISTS "features"']);

    for (const group of ['entity_id', 'zip']) {
      const table = `"features"."events_${group}"`;
      const [created = -1] = positions(runner, `CREATE TABLE ${table}`);
      const inserted = positions(runner, `INSERT INTO ${table}`);
      const [indexed = -1] = positions(runner, `CREATE INDEX ON ${table}`);

      expect(runner.committed[created]).toHaveLength(2);
      expect(inserted).toHaveLength(3);
      expect(Math.min(...inserted)).toBeGreaterThan(created);
      expect(Math.max(...inserted)).toBeLessThan(indexed);
    }

    const last = runner.committed[runner.committed.length - 1] ?? [];
    expect(last[0]).toBe('DROP TABLE IF EXISTS "features"."events_aggregation"');
    expect(last[1]?.startsWith(FINAL_CREATE_PREFIX)).toBe(true);
  });

  it('never exceeds the configured concurrency', async () => {
    const runner = makeFakeSqlRunner({ delayMs: 5 });
    const executor = makeParallelExecutor(
      { runner, logger: makeTestLogger() },
      { concurrency: 2 }
    );

    await executor.execute(makeTwoGroupAggregation().getPlan());

    expect(runner.maxActive).toBe(2);
  });

  it('leaves the final table alone when a group fails', async () => {
    const runner = makeFakeSqlRunner({
      failOn: (sql) => sql.startsWith('INSERT INTO "features"."events_zip"'),
    });
    const executor = makeParallelExecutor(
      { runner, logger: makeTestLogger() },
      { concurrency: 2 }
    );

    const result = await executor.execute(makeTwoGroupAggregation().getPlan());

    expect(result._unsafeUnwrapErr().type).toBe('DatabaseError');
    expect(positions(runner, FINAL_CREATE_PREFIX)).toEqual([]);
    expect(positions(runner, 'CREATE INDEX ON "features"."events_zip"')).toEqual([]);
    expect(runner.rolledBack).toHaveLength(3);
  });

  it('stops before the groups when the schema cannot be created', async () => {
    const runner = makeFakeSqlRunner({ failOn: (sql) => sql.startsWith('CREATE SCHEMA') });
    const executor = makeParallelExecutor(
      { runner, logger: makeTestLogger() },
      { concurrency: 2 }
    );

    const result = await executor.execute(makeTwoGroupAggregation().getPlan());

    expect(result.isErr()).toBe(true);
    expect(runner.committed).toEqual([]);
    expect(runner.rolledBack).toEqual([['CREATE SCHEMA IF NOT EXISTS "features"']]);
  });
});
