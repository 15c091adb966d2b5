/**
 * Statement Timeout Helper
 *
 * Sets PostgreSQL statement timeouts for a plan transaction without using sql.raw()
 * outside the query-builders module.
 *
 * SECURITY: The timeout value is validated to be an integer within bounds.
 */

import { sql, type Kysely } from 'kysely';

// ============================================================================
// Constants
// ============================================================================

/** Minimum allowed timeout in milliseconds (1 second) */
export const MIN_STATEMENT_TIMEOUT_MS = 1_000;

/** Maximum allowed timeout in milliseconds (24 hours); feature inserts run long */
export const MAX_STATEMENT_TIMEOUT_MS = 86_400_000;

// ============================================================================
// Timeout Helper
// ============================================================================

/**
 * Sets the statement timeout for the current transaction.
 *
 * @param db - Kysely transaction (or database) instance
 * @param timeoutMs - Timeout in milliseconds
 * @throws Error if timeout is invalid
 */
export async function setStatementTimeout<DB>(db: Kysely<DB>, timeoutMs: number): Promise<void> {
  if (!Number.isInteger(timeoutMs)) {
    throw new Error(`Statement timeout must be an integer, got: ${String(timeoutMs)}`);
  }

  if (timeoutMs < MIN_STATEMENT_TIMEOUT_MS || timeoutMs > MAX_STATEMENT_TIMEOUT_MS) {
    throw new Error(
      `Statement timeout must be between ${String(MIN_STATEMENT_TIMEOUT_MS)}ms and ${String(MAX_STATEMENT_TIMEOUT_MS)}ms, got: ${String(timeoutMs)}`
    );
  }

  // SET LOCAL doesn't support parameterized values; the value is validated above.
  await sql.raw(`SET LOCAL statement_timeout = ${String(timeoutMs)}`).execute(db);
}
