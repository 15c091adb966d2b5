/**
 * feature-collate
 *
 * SQL generation for time-windowed aggregate feature tables.
 */

export * from './modules/aggregation/index.js';

export { buildRuntime, type Runtime, type RuntimeDeps } from './app/build-runtime.js';
export { createConfig, parseEnv, type AppConfig, type Env } from './infra/config/index.js';
export { createLogger, type Logger, type LogLevel } from './infra/logger/index.js';
export { compileStatement, type Statement } from './infra/database/query-builders/index.js';
