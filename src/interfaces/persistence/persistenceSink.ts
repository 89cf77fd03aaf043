/**
 * Persistence sink contract
 *
 * Called once per run, after merge. Must not throw: storage failures are
 * returned as a StorageError result.
 */

import type {
  AggregationReport,
  CanonicalCompanyRecord,
  CompanyIdentity,
  PersistResult,
  RawArtifact,
} from "@/types";

export interface PersistenceSink {
  persist(
    identity: CompanyIdentity,
    record: CanonicalCompanyRecord,
    report: AggregationReport,
    artifacts: readonly RawArtifact[],
  ): PersistResult;
}
