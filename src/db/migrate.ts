/**
 * Database migration runner
 *
 * Applies SQL migrations from migrations/ in filename order, each in its
 * own transaction, recorded in schema_migrations.
 */

import "dotenv/config";
import type Database from "better-sqlite3";
import { readdirSync, readFileSync } from "fs";
import { join } from "path";
import { openDb, closeDb } from "./connection";
import * as logger from "@/logger";

export function migrationsDir(): string {
  return join(process.cwd(), "migrations");
}

function ensureMigrationsTable(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      version TEXT NOT NULL UNIQUE,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);
}

function getAppliedMigrations(db: Database.Database): Set<string> {
  const rows = db
    .prepare<[], { version: string }>("SELECT version FROM schema_migrations")
    .all();
  return new Set(rows.map((row) => row.version));
}

function getPendingMigrations(dir: string, applied: Set<string>): string[] {
  let files: string[];
  try {
    files = readdirSync(dir);
  } catch (err) {
    logger.warn("No migrations directory", { dir, error: String(err) });
    return [];
  }

  return files
    .filter((file) => file.endsWith(".sql"))
    .sort()
    .filter((file) => !applied.has(file));
}

function applyMigration(db: Database.Database, dir: string, filename: string): void {
  const sql = readFileSync(join(dir, filename), "utf-8");

  db.transaction(() => {
    db.exec(sql);
    db.prepare("INSERT INTO schema_migrations (version) VALUES (?)").run(filename);
  })();
}

/**
 * Apply pending migrations to a connection
 *
 * @returns names of the migrations applied
 */
export function applyMigrations(db: Database.Database, dir: string = migrationsDir()): string[] {
  ensureMigrationsTable(db);
  const pending = getPendingMigrations(dir, getAppliedMigrations(db));

  for (const migration of pending) {
    logger.info("Applying migration", { migration });
    applyMigration(db, dir, migration);
  }
  return pending;
}

/**
 * Open the configured database, migrate it and close it
 */
export function runMigrations(): void {
  const db = openDb();
  try {
    const applied = applyMigrations(db);
    logger.info(applied.length === 0 ? "No pending migrations" : "Migrations complete", {
      applied: applied.length,
    });
  } finally {
    closeDb();
  }
}

if (require.main === module) {
  runMigrations();
}
