const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/**
 * Fast-return check for ids that would make PostgreSQL reject a uuid cast.
 */
export function isUuid(value: string): boolean {
  return UUID_PATTERN.test(value);
}
