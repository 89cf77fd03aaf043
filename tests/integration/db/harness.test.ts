/**
 * DB Harness Smoke Test
 *
 * Verifies that the test database harness works correctly:
 * - Creates a fresh DB with real migrations
 * - Repos write through the injected connection
 * - Cleanup removes the temp file
 */

import { describe, it, expect, afterEach } from "vitest";
import { existsSync } from "fs";
import { createTestDb, type TestDbHarness } from "../../helpers/testDb";
import type { RawArtifact } from "@/types";
import { applyMigrations, listRawArtifacts, upsertCompanyRecord, upsertRawArtifact } from "@/db";

const ARTIFACT: RawArtifact = {
  source: "northdata",
  field: "html_filepath",
  reference: "northdata/hrb1.html",
  format: "html",
  content: "<html></html>",
};

describe("Test DB Harness", () => {
  let harness: TestDbHarness | null = null;

  afterEach(() => {
    if (harness) {
      harness.cleanup();
      harness = null;
    }
  });

  it("creates a fresh database with migrations applied", () => {
    harness = createTestDb();

    expect(existsSync(harness.dbPath)).toBe(true);
    const versions = harness.db
      .prepare<[], { version: string }>("SELECT version FROM schema_migrations")
      .all()
      .map((row) => row.version);
    expect(versions).toEqual(["0001_init.sql"]);
  });

  it("does not reapply recorded migrations", () => {
    harness = createTestDb();

    expect(applyMigrations(harness.db)).toEqual([]);

    const count = harness.db
      .prepare<[], { n: number }>("SELECT COUNT(*) AS n FROM schema_migrations")
      .get();
    expect(count?.n).toBe(1);
  });

  it("lets repos work with the test database", () => {
    harness = createTestDb();

    const recordId = upsertCompanyRecord({
      fingerprint: "reg:HRB1",
      companyName: "Harness GmbH",
      record: { fields: { registernummer: "HRB1" }, provenance: {} },
      summary: {
        runId: "run-1",
        finishedAt: "2024-05-02T10:00:00.000Z",
        sources: {},
        missingFields: [],
        conflictCount: 0,
      },
      runId: "run-1",
    });
    upsertRawArtifact("reg:HRB1", ARTIFACT);

    expect(recordId).toBe(1);

    const rows = listRawArtifacts("reg:HRB1");
    expect(rows).toHaveLength(1);
    expect(rows[0].reference).toBe("northdata/hrb1.html");
    expect(rows[0].byte_length).toBe(13);
  });

  it("enforces foreign keys between artifacts and records", () => {
    harness = createTestDb();

    expect(() => upsertRawArtifact("reg:UNKNOWN", ARTIFACT)).toThrow("FOREIGN KEY constraint failed");
    expect(listRawArtifacts("reg:UNKNOWN")).toEqual([]);
  });

  it("deletes the temp file on cleanup()", () => {
    harness = createTestDb();
    const dbPath = harness.dbPath;

    harness.cleanup();
    harness = null;

    expect(existsSync(dbPath)).toBe(false);
  });
});
