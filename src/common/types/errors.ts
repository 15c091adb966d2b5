/**
 * Base error types for the application
 * All domain errors should extend these base types
 */

/**
 * Base interface for all application errors
 */
export interface AppError {
  readonly type: string;
  readonly message: string;
  readonly cause?: unknown;
}

/**
 * Infrastructure errors (database, timeouts)
 */
export interface InfraError extends AppError {
  readonly type: 'DatabaseError' | 'TimeoutError';
  readonly retryable: boolean;
}

/**
 * Validation errors (input validation failures)
 */
export interface ValidationError extends AppError {
  readonly type: 'ValidationError';
  readonly field?: string | undefined;
  readonly value?: unknown;
}

export const createValidationError = (
  message: string,
  field?: string,
  value?: unknown
): ValidationError => ({
  type: 'ValidationError',
  message,
  ...(field !== undefined && { field }),
  ...(value !== undefined && { value }),
});

/**
 * Extracts a readable message from an unknown thrown value.
 */
export const describeCause = (cause: unknown): string =>
  cause instanceof Error ? cause.message : String(cause);
