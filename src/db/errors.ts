/**
 * PostgreSQL SQLSTATE for unique constraint violations
 */
export const UNIQUE_VIOLATION = '23505';

/**
 * SQLSTATEs raised when a parameter does not fit its column, such as a
 * malformed uuid or an integer beyond INT4
 */
export const INVALID_TEXT_REPRESENTATION = '22P02';
export const NUMERIC_VALUE_OUT_OF_RANGE = '22003';

/**
 * Error raised by the query helpers
 *
 * Carries the PostgreSQL SQLSTATE so callers can recognise constraint violations.
 */
export class DatabaseError extends Error {
  constructor(
    message: string,
    public readonly code?: string,
    public readonly detail?: string,
    public readonly constraint?: string
  ) {
    super(message);
    this.name = 'DatabaseError';
    Object.setPrototypeOf(this, DatabaseError.prototype);
  }
}

export function isUniqueViolation(error: unknown): boolean {
  return error instanceof DatabaseError && error.code === UNIQUE_VIOLATION;
}

export function isInvalidInput(error: unknown): boolean {
  return (
    error instanceof DatabaseError &&
    (error.code === INVALID_TEXT_REPRESENTATION || error.code === NUMERIC_VALUE_OUT_OF_RANGE)
  );
}

export function isInvalidIdentifier(error: unknown): boolean {
  return error instanceof DatabaseError && error.code === INVALID_TEXT_REPRESENTATION;
}
