import { QueryFailedError } from 'typeorm';

/** SQLite result codes reported by better-sqlite3 for a violated UNIQUE constraint. */
const UNIQUE_VIOLATION_CODES: ReadonlySet<string> = new Set([
  'SQLITE_CONSTRAINT_UNIQUE',
  'SQLITE_CONSTRAINT_PRIMARYKEY',
]);

/**
 * True when a write failed because it would have duplicated a unique key.
 *
 * TypeORM wraps the driver error in a QueryFailedError; the driver error
 * carries the SQLite extended result code.
 */
export function isUniqueViolation(error: unknown): boolean {
  if (!(error instanceof QueryFailedError)) {
    return false;
  }

  const driverError: unknown = error.driverError;
  return (
    typeof driverError === 'object' &&
    driverError !== null &&
    'code' in driverError &&
    typeof driverError.code === 'string' &&
    UNIQUE_VIOLATION_CODES.has(driverError.code)
  );
}
