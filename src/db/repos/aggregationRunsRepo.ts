/**
 * Aggregation runs repository
 *
 * Append-only history of runs, one row per run id.
 */

import type { AggregationReport, AggregationRunRow } from "@/types";
import { getDb } from "@/db/connection";

/**
 * Record a finished run
 *
 * Re-recording the same run id is a no-op.
 *
 * @returns true if a row was inserted
 */
export function insertAggregationRun(report: AggregationReport): boolean {
  const entries = Object.values(report.sources);
  const count = (predicate: (status: string) => boolean) =>
    entries.filter((entry) => predicate(entry.status)).length;

  const result = getDb()
    .prepare(
      `
    INSERT INTO aggregation_runs (
      run_id, fingerprint, started_at, finished_at,
      success_count, failed_count, skipped_count, deadline_exceeded, report_json
    ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    ON CONFLICT(run_id) DO NOTHING
  `,
    )
    .run(
      report.runId,
      report.fingerprint,
      report.startedAt,
      report.finishedAt,
      count((status) => status === "Success" || status === "PartialSuccess"),
      count((status) => status === "Failed"),
      count((status) => status === "Skipped"),
      report.deadlineExceeded ? 1 : 0,
      JSON.stringify(report),
    );

  return result.changes > 0;
}

/**
 * Run history of one record, oldest first
 */
export function listAggregationRuns(fingerprint: string): AggregationRunRow[] {
  return getDb()
    .prepare<[string], AggregationRunRow>(
      "SELECT * FROM aggregation_runs WHERE fingerprint = ? ORDER BY started_at, id",
    )
    .all(fingerprint);
}
