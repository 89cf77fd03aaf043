/**
 * Session type definitions
 *
 * Persisted authentication state for sources that require a login.
 */

import type { SourceId } from "./sources";

/**
 * Session state for one stateful source (immutable snapshot)
 */
export type SessionState = {
  readonly source: SourceId;
  /** Opaque credential blob (cookie header, token, ...) */
  readonly credential: string;
  /** ISO 8601 timestamp of the last successful validation or refresh */
  readonly lastValidatedAt: string;
  readonly valid: boolean;
};

/**
 * Source session row (database entity)
 * Stored in source_sessions table
 */
export type SourceSessionRow = {
  source: string;
  credential: string;
  last_validated_at: string;
  is_valid: number;
  invalidated_at: string | null;
  updated_at: string;
};

/**
 * Backing store for session state
 *
 * markInvalid must be a single atomic write so that concurrent runs
 * detecting expiry at the same time cannot lose an update.
 */
export interface SessionStore {
  load(source: SourceId): SessionState | null;
  save(state: SessionState): void;
  markInvalid(source: SourceId): void;
}
