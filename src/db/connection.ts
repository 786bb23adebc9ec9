/**
 * SQLite database connection
 *
 * One process-wide connection, opened by the runner and injected by the
 * test harness.
 */

import Database from "better-sqlite3";
import { mkdirSync } from "fs";
import { dirname, join } from "path";
import { DEFAULT_DB_PATH } from "@/constants";

let db: Database.Database | null = null;

/**
 * Resolve the database path (explicit > DB_PATH > default) and make sure
 * its parent directory exists
 */
function resolveDbPath(explicitPath?: string): string {
  const dbPath =
    explicitPath || process.env.DB_PATH || join(process.cwd(), DEFAULT_DB_PATH);

  if (dbPath !== ":memory:") {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  return dbPath;
}

/**
 * Apply the pragmas every connection needs
 */
export function configureConnection(connection: Database.Database): void {
  // SQLite default is OFF
  connection.pragma("foreign_keys = ON");
  connection.pragma("journal_mode = WAL");
}

/**
 * Open database connection with required pragmas
 * Returns existing connection if already open
 *
 * @param dbPath - Optional path; ":memory:" is accepted
 */
export function openDb(dbPath?: string): Database.Database {
  if (db) {
    return db;
  }

  db = new Database(resolveDbPath(dbPath));
  configureConnection(db);

  return db;
}

export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
  }
}

/**
 * Get current database connection (must be opened first)
 */
export function getDb(): Database.Database {
  if (!db) {
    throw new Error("Database not opened. Call openDb() first.");
  }
  return db;
}

/**
 * Inject a connection into the singleton.
 *
 * @internal Test use only
 */
export function setDbForTesting(testDb: Database.Database | null): void {
  db = testDb;
}
