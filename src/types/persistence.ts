/**
 * Persistence type definitions
 */

import type { StorageError } from "@/errors";

export type PersistResult =
  | { ok: true; recordId: number }
  | { ok: false; error: StorageError };
