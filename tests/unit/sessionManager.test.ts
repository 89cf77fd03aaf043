/**
 * Unit tests for SessionManager
 */

import { describe, it, expect } from "vitest";
import { InMemorySessionStore, SessionManager } from "@/sessions";

const NOW = new Date("2024-05-02T10:00:00.000Z");

describe("SessionManager", () => {
  it("should return null when no session is stored", () => {
    const manager = new SessionManager(new InMemorySessionStore());

    expect(manager.load("linkedin")).toBeNull();
    expect(manager.isValid("linkedin")).toBe(false);
  });

  it("should install a refreshed credential as valid", () => {
    const store = new InMemorySessionStore();
    const manager = new SessionManager(store, () => NOW);

    const state = manager.refresh("linkedin", "li_at=test-cookie");

    expect(state).toEqual({
      source: "linkedin",
      credential: "li_at=test-cookie",
      lastValidatedAt: "2024-05-02T10:00:00.000Z",
      valid: true,
    });
    expect(Object.isFrozen(state)).toBe(true);
    expect(store.load("linkedin")).toEqual(state);
    expect(manager.isValid("linkedin")).toBe(true);
  });

  it("should mark a session invalid in cache and store", () => {
    const store = new InMemorySessionStore();
    const manager = new SessionManager(store, () => NOW);
    const before = manager.refresh("linkedin", "li_at=test-cookie");

    manager.markInvalid("linkedin");

    expect(manager.isValid("linkedin")).toBe(false);
    expect(store.load("linkedin")?.valid).toBe(false);
    expect(before.valid).toBe(true);
  });

  it("should tolerate repeated invalidation", () => {
    const store = new InMemorySessionStore();
    const manager = new SessionManager(store, () => NOW);
    manager.refresh("linkedin", "li_at=test-cookie");

    manager.markInvalid("linkedin");
    manager.markInvalid("linkedin");

    expect(manager.load("linkedin")?.valid).toBe(false);
  });

  it("should revalidate after an out-of-band refresh", () => {
    const manager = new SessionManager(new InMemorySessionStore(), () => NOW);
    manager.refresh("linkedin", "li_at=old");
    manager.markInvalid("linkedin");

    manager.refresh("linkedin", "li_at=new");

    expect(manager.load("linkedin")?.credential).toBe("li_at=new");
    expect(manager.isValid("linkedin")).toBe(true);
  });
});
