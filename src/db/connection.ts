/**
 * SQLite database connection
 *
 * One process-wide connection to the record store (DB_PATH).
 */

import Database from "better-sqlite3";
import { mkdirSync } from "fs";
import { dirname, join } from "path";

let db: Database.Database | null = null;

/**
 * Database file path from DB_PATH, defaulting to data/aggregator.db
 */
export function getDbPath(): string {
  const dbPath = process.env.DB_PATH || join(process.cwd(), "data", "aggregator.db");

  if (dbPath !== ":memory:") {
    mkdirSync(dirname(dbPath), { recursive: true });
  }
  return dbPath;
}

/**
 * Open the connection (idempotent)
 */
export function openDb(): Database.Database {
  if (db) {
    return db;
  }

  db = new Database(getDbPath());
  // raw_artifacts cascade on company_records
  db.pragma("foreign_keys = ON");
  // concurrent batch runs read while one writes
  db.pragma("journal_mode = WAL");
  db.pragma("busy_timeout = 5000");

  return db;
}

export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
  }
}

/**
 * Current connection (must be opened first)
 */
export function getDb(): Database.Database {
  if (!db) {
    throw new Error("Database not opened. Call openDb() first.");
  }
  return db;
}

/**
 * Inject a connection (tests only)
 *
 * @internal
 */
export function setDbForTesting(testDb: Database.Database | null): void {
  db = testDb;
}
