/**
 * Source sessions repository integration tests
 */

import { describe, it, expect, afterEach } from "vitest";
import { createTestDb, type TestDbHarness } from "../../helpers/testDb";
import {
  getSourceSession,
  invalidateSourceSession,
  saveSourceSession,
  sqliteSessionStore,
} from "@/db";
import { SessionManager } from "@/sessions";

const SESSION = {
  source: "linkedin" as const,
  credential: "test-session-cookie",
  lastValidatedAt: "2024-05-01T08:00:00.000Z",
  valid: true,
};

describe("source sessions", () => {
  let harness: TestDbHarness | null = null;

  afterEach(() => {
    if (harness) {
      harness.cleanup();
      harness = null;
    }
  });

  it("should round-trip a stored session", () => {
    harness = createTestDb();

    saveSourceSession(SESSION);

    expect(getSourceSession("linkedin")).toEqual(SESSION);
    expect(getSourceSession("northdata")).toBeNull();
  });

  it("should invalidate once and keep the first invalidation time", () => {
    harness = createTestDb();
    saveSourceSession(SESSION);

    expect(invalidateSourceSession("linkedin")).toBe(true);
    const firstInvalidation = harness.db
      .prepare<[], { invalidated_at: string }>("SELECT invalidated_at FROM source_sessions")
      .get();
    expect(invalidateSourceSession("linkedin")).toBe(false);

    expect(getSourceSession("linkedin")?.valid).toBe(false);
    expect(
      harness.db.prepare<[], { invalidated_at: string }>("SELECT invalidated_at FROM source_sessions").get(),
    ).toEqual(firstInvalidation);
  });

  it("should clear the invalidation when a new credential is saved", () => {
    harness = createTestDb();
    saveSourceSession(SESSION);
    invalidateSourceSession("linkedin");

    saveSourceSession({ ...SESSION, credential: "fresh-cookie" });

    expect(getSourceSession("linkedin")).toEqual({ ...SESSION, credential: "fresh-cookie" });
  });

  it("should back the session manager", () => {
    harness = createTestDb();
    const manager = new SessionManager(sqliteSessionStore, () => new Date("2024-05-02T10:00:00.000Z"));

    manager.refresh("linkedin", "test-session-cookie");
    manager.markInvalid("linkedin");

    const fresh = new SessionManager(sqliteSessionStore);
    expect(fresh.load("linkedin")).toEqual({
      source: "linkedin",
      credential: "test-session-cookie",
      lastValidatedAt: "2024-05-02T10:00:00.000Z",
      valid: false,
    });
  });
});
