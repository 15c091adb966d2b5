/**
 * Runtime factory
 * Wires configuration, database client, SQL runner and executor strategy together
 */

import { createDatabaseClient, type CollateDbClient } from '../infra/database/client.js';
import {
  makeKyselySqlRunner,
  makeParallelExecutor,
  makeSequentialExecutor,
  type PlanExecutor,
  type SqlRunner,
} from '../modules/aggregation/index.js';

import type { AppConfig } from '../infra/config/env.js';
import type { Logger } from 'pino';

export interface RuntimeDeps {
  /** Database client; created from config when omitted */
  db?: CollateDbClient;
}

export interface Runtime {
  db: CollateDbClient;
  runner: SqlRunner;
  executor: PlanExecutor;
  logger: Logger;
  /** Closes the connection pool */
  destroy(): Promise<void>;
}

export const buildRuntime = (config: AppConfig, logger: Logger, deps: RuntimeDeps = {}): Runtime => {
  const db = deps.db ?? createDatabaseClient(config);

  const runner = makeKyselySqlRunner({
    db,
    logger,
    statementTimeoutMs: config.database.statementTimeoutMs,
  });

  const executor =
    config.executor.strategy === 'parallel'
      ? makeParallelExecutor({ runner, logger }, { concurrency: config.executor.concurrency })
      : makeSequentialExecutor({ runner, logger });

  logger.info(
    { strategy: config.executor.strategy, concurrency: config.executor.concurrency },
    'Runtime ready'
  );

  return {
    db,
    runner,
    executor,
    logger,
    destroy: () => db.destroy(),
  };
};
