import { ok, type Result } from 'neverthrow';

import type { ExecutionError } from './errors.js';
import type { SqlSession } from './ports.js';
import type { Statement } from '@/infra/database/query-builders/index.js';

/**
 * Executes statements in order on one session, stopping at the first failure.
 */
export const runStatements = async (
  session: SqlSession,
  statements: readonly Statement[]
): Promise<Result<void, ExecutionError>> => {
  for (const statement of statements) {
    const result = await session.execute(statement);
    if (result.isErr()) {
      return result;
    }
  }
  return ok(undefined);
};
