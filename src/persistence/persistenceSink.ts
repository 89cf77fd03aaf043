/**
 * SQLite persistence sink
 *
 * Writes the merged record, its raw artifacts and the run history row
 * in one transaction. Idempotent per identity fingerprint.
 */

import type { PersistenceSink } from "@/interfaces";
import type {
  AggregationReport,
  CanonicalCompanyRecord,
  CompanyIdentity,
  PersistResult,
  RawArtifact,
  ReportSummary,
} from "@/types";
import { getDb } from "@/db/connection";
import { upsertCompanyRecord } from "@/db/repos/companyRecordsRepo";
import { upsertRawArtifact } from "@/db/repos/rawArtifactsRepo";
import { insertAggregationRun } from "@/db/repos/aggregationRunsRepo";
import { StorageError, errorMessage } from "@/errors";
import { identityFingerprint } from "@/utils/identity/companyIdentity";
import * as logger from "@/logger";

/**
 * Compact per-source summary stored on the record row
 */
export function buildReportSummary(report: AggregationReport): ReportSummary {
  const sources: ReportSummary["sources"] = {};
  for (const [source, entry] of Object.entries(report.sources)) {
    sources[source] = {
      status: entry.status,
      attemptCount: entry.attemptCount,
      ...(entry.failureKind ? { failureKind: entry.failureKind } : {}),
    };
  }
  return {
    runId: report.runId,
    finishedAt: report.finishedAt,
    sources,
    missingFields: [...report.missingFields],
    conflictCount: report.conflicts.length,
  };
}

/**
 * Persist one aggregation result
 */
export function persist(
  identity: CompanyIdentity,
  record: CanonicalCompanyRecord,
  report: AggregationReport,
  artifacts: readonly RawArtifact[],
): PersistResult {
  const fingerprint = identityFingerprint(identity);

  try {
    const db = getDb();
    const write = db.transaction((): number => {
      const recordId = upsertCompanyRecord({
        fingerprint,
        companyName: identity.company_name,
        record,
        summary: buildReportSummary(report),
        runId: report.runId,
      });
      for (const artifact of artifacts) {
        upsertRawArtifact(fingerprint, artifact);
      }
      insertAggregationRun(report);
      return recordId;
    });

    const recordId = write();
    logger.debug("Aggregation result persisted", {
      fingerprint,
      recordId,
      artifacts: artifacts.length,
    });
    return { ok: true, recordId };
  } catch (err) {
    logger.error("Failed to persist aggregation result", {
      fingerprint,
      runId: report.runId,
      error: errorMessage(err),
    });
    return {
      ok: false,
      error: new StorageError(`Persisting ${fingerprint} failed: ${errorMessage(err)}`, err),
    };
  }
}

export const sqlitePersistenceSink: PersistenceSink = { persist };
