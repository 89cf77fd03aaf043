/**
 * Source sessions repository
 *
 * Data access layer for source_sessions table.
 * Backs the session manager for sources that require a login.
 */

import type { SessionState, SessionStore, SourceId, SourceSessionRow } from "@/types";
import { getDb } from "@/db/connection";

function toSessionState(source: SourceId, row: SourceSessionRow): SessionState {
  return Object.freeze({
    source,
    credential: row.credential,
    lastValidatedAt: row.last_validated_at,
    valid: row.is_valid === 1,
  });
}

/**
 * Get session state for a source
 *
 * @returns Session state or null if none was ever stored
 */
export function getSourceSession(source: SourceId): SessionState | null {
  const row = getDb()
    .prepare<[string], SourceSessionRow>("SELECT * FROM source_sessions WHERE source = ?")
    .get(source);

  return row ? toSessionState(source, row) : null;
}

/**
 * Store (or replace) a session, e.g. after out-of-band re-authentication
 */
export function saveSourceSession(state: SessionState): void {
  getDb()
    .prepare(
      `
    INSERT INTO source_sessions (source, credential, last_validated_at, is_valid, invalidated_at)
    VALUES (?, ?, ?, ?, NULL)
    ON CONFLICT(source) DO UPDATE SET
      credential = excluded.credential,
      last_validated_at = excluded.last_validated_at,
      is_valid = excluded.is_valid,
      invalidated_at = NULL,
      updated_at = datetime('now')
  `,
    )
    .run(state.source, state.credential, state.lastValidatedAt, state.valid ? 1 : 0);
}

/**
 * Mark a session invalid in a single statement
 *
 * Idempotent: the first invalidation timestamp is kept when several
 * runs detect the expiry at the same time.
 *
 * @returns true if a stored session changed state
 */
export function invalidateSourceSession(source: SourceId): boolean {
  const result = getDb()
    .prepare(
      `
    UPDATE source_sessions SET
      is_valid = 0,
      invalidated_at = COALESCE(invalidated_at, datetime('now')),
      updated_at = datetime('now')
    WHERE source = ? AND is_valid = 1
  `,
    )
    .run(source);

  return result.changes > 0;
}

/**
 * SessionStore backed by the SQLite connection
 */
export const sqliteSessionStore: SessionStore = {
  load: getSourceSession,
  save: saveSourceSession,
  markInvalid: (source) => {
    invalidateSourceSession(source);
  },
};
