/**
 * Query Builders Tests
 *
 * Verifies naming, literal quoting, select rendering and DDL statement shapes.
 */

import { describe, it, expect } from 'vitest';

import {
  compileStatement,
  createIndex,
  createSchemaIfNotExists,
  createTableAs,
  dateLiteral,
  dropTableIfExists,
  insertFromSelect,
  intervalLiteral,
  labelColumn,
  qualifiedTableName,
  quoteIdentifier,
  renderSelect,
  selectText,
  setStatementTimeout,
  stringLiteral,
  toSqlName,
  withLimit,
  type SelectQuery,
} from '@/infra/database/query-builders/index.js';

import { makeRecordingDb } from '../../../fixtures/fakes.js';

// ============================================================================
// Test Data
// ============================================================================

const SELECT: SelectQuery = {
  columns: ['entity_id', labelColumn('count(*)', 'events_entity_id_all_n')],
  from: 'events',
  groupBy: ['entity_id'],
};

// ============================================================================
// Tests
// ============================================================================

describe('Query Builders', () => {
  describe('identifiers', () => {
    it('strips quote characters from generated names', () => {
      expect(toSqlName('"events"_amount')).toBe('events_amount');
    });

    it('quotes names with spaces', () => {
      expect(quoteIdentifier('events_entity_id_1 year_amount_sum')).toBe(
        '"events_entity_id_1 year_amount_sum"'
      );
    });

    it('qualifies table names with a schema', () => {
      expect(qualifiedTableName('events_entity_id', 'features')).toBe(
        '"features"."events_entity_id"'
      );
      expect(qualifiedTableName('events_entity_id')).toBe('"events_entity_id"');
    });
  });

  describe('literals', () => {
    it('doubles embedded quotes', () => {
      expect(stringLiteral("o'clock")).toBe("'o''clock'");
    });

    it('renders dates and intervals', () => {
      expect(dateLiteral('2016-01-01')).toBe("'2016-01-01'::date");
      expect(intervalLiteral('6 months')).toBe("interval '6 months'");
    });
  });

  describe('selects', () => {
    it('renders clauses in order', () => {
      expect(selectText({ ...SELECT, where: "date < '2016-01-01'" })).toBe(
        'SELECT entity_id, count(*) AS "events_entity_id_all_n" FROM events WHERE date < \'2016-01-01\' GROUP BY entity_id'
      );
    });

    it('omits empty WHERE and GROUP BY clauses', () => {
      expect(selectText({ columns: ['1'], from: 'events', where: '', groupBy: [] })).toBe(
        'SELECT 1 FROM events'
      );
    });

    it('adds a LIMIT to a copy of the query', () => {
      const limited = withLimit(SELECT, 0);

      expect(selectText(limited).endsWith(' GROUP BY entity_id LIMIT 0')).toBe(true);
      expect(SELECT.limit).toBeUndefined();
    });

    it('rejects a negative LIMIT', () => {
      expect(() => withLimit(SELECT, -1)).toThrow('LIMIT must be a non-negative integer, got: -1');
    });
  });

  describe('statements', () => {
    it('compiles DDL shapes', () => {
      const table = '"features"."events_entity_id"';

      expect(compileStatement(createTableAs(table, renderSelect(withLimit(SELECT, 0))))).toBe(
        'CREATE TABLE "features"."events_entity_id" AS SELECT entity_id, count(*) AS "events_entity_id_all_n" FROM events GROUP BY entity_id LIMIT 0'
      );
      expect(compileStatement(insertFromSelect(table, renderSelect(SELECT)))).toBe(
        'INSERT INTO "features"."events_entity_id" (SELECT entity_id, count(*) AS "events_entity_id_all_n" FROM events GROUP BY entity_id)'
      );
      expect(compileStatement(dropTableIfExists(table))).toBe(
        'DROP TABLE IF EXISTS "features"."events_entity_id"'
      );
      expect(compileStatement(createIndex(table, ['entity_id', 'date']))).toBe(
        'CREATE INDEX ON "features"."events_entity_id" (entity_id, date)'
      );
      expect(compileStatement(createSchemaIfNotExists('features'))).toBe(
        'CREATE SCHEMA IF NOT EXISTS "features"'
      );
    });

    it('rejects an index without keys', () => {
      expect(() => createIndex('"t"', [])).toThrow('Index on "t" needs at least one key');
    });
  });

  describe('setStatementTimeout', () => {
    it('issues SET LOCAL with the validated value', async () => {
      const { db, log } = makeRecordingDb();

      await setStatementTimeout(db, 60_000);

      expect(log).toEqual(['SET LOCAL statement_timeout = 60000']);
    });

    it('rejects non-integer and out-of-range values', async () => {
      const { db, log } = makeRecordingDb();

      await expect(setStatementTimeout(db, 1.5)).rejects.toThrow(
        'Statement timeout must be an integer, got: 1.5'
      );
      await expect(setStatementTimeout(db, 999)).rejects.toThrow(
        'Statement timeout must be between 1000ms and 86400000ms, got: 999'
      );
      expect(log).toEqual([]);
    });
  });
});
