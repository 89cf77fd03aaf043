/**
 * Raw artifacts repository
 *
 * Data access layer for raw_artifacts table. Keeps the latest document
 * per (fingerprint, source, field); references are stored verbatim.
 */

import type { RawArtifact, RawArtifactRow } from "@/types";
import { getDb } from "@/db/connection";

/**
 * Insert or replace one artifact
 */
export function upsertRawArtifact(fingerprint: string, artifact: RawArtifact): void {
  const content =
    typeof artifact.content === "string" ? Buffer.from(artifact.content, "utf-8") : artifact.content;

  getDb()
    .prepare(
      `
    INSERT INTO raw_artifacts (fingerprint, source, field, reference, format, content, byte_length)
    VALUES (?, ?, ?, ?, ?, ?, ?)
    ON CONFLICT(fingerprint, source, field) DO UPDATE SET
      reference = excluded.reference,
      format = excluded.format,
      content = excluded.content,
      byte_length = excluded.byte_length,
      updated_at = datetime('now')
  `,
    )
    .run(
      fingerprint,
      artifact.source,
      artifact.field,
      artifact.reference,
      artifact.format,
      content,
      content.byteLength,
    );
}

/**
 * List stored artifacts of a record, ordered by source then field
 */
export function listRawArtifacts(fingerprint: string): RawArtifactRow[] {
  return getDb()
    .prepare<[string], RawArtifactRow>(
      "SELECT * FROM raw_artifacts WHERE fingerprint = ? ORDER BY source, field",
    )
    .all(fingerprint);
}
