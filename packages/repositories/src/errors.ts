// Errors raised by repository implementations.
// Codes follow Postgres SQLSTATE so callers handle every backend the same way.

export const FOREIGN_KEY_VIOLATION = '23503';

/**
 * A write would break referential integrity between segments and observations.
 */
export class ForeignKeyViolationError extends Error {
  readonly code = FOREIGN_KEY_VIOLATION;
  readonly constraint: string;

  constructor(constraint: string, message: string) {
    super(message);
    this.name = 'ForeignKeyViolationError';
    this.constraint = constraint;
  }
}

/**
 * Check for a foreign key violation from any backend
 * (ForeignKeyViolationError or a postgres.js PostgresError).
 */
export function isForeignKeyViolation(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === FOREIGN_KEY_VIOLATION
  );
}
