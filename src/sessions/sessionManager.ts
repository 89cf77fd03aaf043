/**
 * Session manager: authentication state of sources that need a login
 *
 * States are immutable snapshots. The only mutations are markInvalid
 * (called when an adapter reports an auth rejection) and refresh (the
 * out-of-band re-authentication path). Both replace the cached snapshot
 * in one assignment and write through to the store in one statement.
 *
 * The manager never re-authenticates on its own.
 */

import type { SessionState, SessionStore, SourceId } from "@/types";
import * as logger from "@/logger";

export class SessionManager {
  private readonly states = new Map<SourceId, SessionState>();

  constructor(
    private readonly store: SessionStore,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  /**
   * Session for a source, loaded from the store on first use
   */
  load(source: SourceId): SessionState | null {
    const cached = this.states.get(source);
    if (cached) {
      return cached;
    }

    const stored = this.store.load(source);
    if (stored) {
      this.states.set(source, Object.freeze({ ...stored }));
    }
    return stored;
  }

  isValid(source: SourceId): boolean {
    return this.load(source)?.valid === true;
  }

  /**
   * Record that the source rejected its credential
   *
   * Safe to call concurrently from several runs: invalidating an already
   * invalid session is a no-op.
   */
  markInvalid(source: SourceId): void {
    const current = this.load(source);
    if (current && !current.valid) {
      return;
    }

    if (current) {
      this.states.set(source, Object.freeze({ ...current, valid: false }));
    }
    this.store.markInvalid(source);

    logger.warn("Session marked invalid, re-authentication required", { source });
  }

  /**
   * Install a freshly obtained credential (out-of-band re-authentication)
   */
  refresh(source: SourceId, credential: string): SessionState {
    const state: SessionState = Object.freeze({
      source,
      credential,
      lastValidatedAt: this.clock().toISOString(),
      valid: true,
    });

    this.store.save(state);
    this.states.set(source, state);

    logger.info("Session refreshed", { source });
    return state;
  }
}

/**
 * In-process store, used by tests and runs without a database
 */
export class InMemorySessionStore implements SessionStore {
  private readonly rows = new Map<SourceId, SessionState>();

  constructor(initial: SessionState[] = []) {
    for (const state of initial) {
      this.rows.set(state.source, state);
    }
  }

  load(source: SourceId): SessionState | null {
    return this.rows.get(source) ?? null;
  }

  save(state: SessionState): void {
    this.rows.set(state.source, state);
  }

  markInvalid(source: SourceId): void {
    const current = this.rows.get(source);
    if (current) {
      this.rows.set(source, { ...current, valid: false });
    }
  }
}
