/**
 * Database error utilities
 */

/**
 * Check if an error is a SQLite UNIQUE constraint violation
 *
 * better-sqlite3 raises SqliteError with code "SQLITE_CONSTRAINT_UNIQUE"
 * and a message of the form "UNIQUE constraint failed: table.column".
 */
export function isUniqueConstraintError(err: unknown): boolean {
  if (!(err instanceof Error)) {
    return false;
  }

  if ("code" in err && err.code === "SQLITE_CONSTRAINT_UNIQUE") {
    return true;
  }

  return err.message.startsWith("UNIQUE constraint failed:");
}
