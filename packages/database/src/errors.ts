const UNIQUE_VIOLATION = '23505';

/**
 * True for a PostgreSQL unique-constraint violation, optionally on a
 * specific constraint or index.
 */
export function isUniqueViolation(error: unknown, constraint?: string): boolean {
  if (typeof error !== 'object' || error === null) {
    return false;
  }
  if (!('code' in error) || error.code !== UNIQUE_VIOLATION) {
    return false;
  }
  if (constraint === undefined) {
    return true;
  }
  return 'constraint' in error && error.constraint === constraint;
}
