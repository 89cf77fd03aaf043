/**
 * Aggregation type definitions
 *
 * Types for the retry controller policy, merge priority, run configuration
 * and the report emitted alongside each canonical record.
 */

import type {
  CanonicalCompanyRecord,
  CanonicalFieldName,
  CanonicalFieldValue,
  CompanyIdentity,
} from "./company";
import type {
  AttemptRecord,
  FailureKind,
  RawArtifact,
  SourceId,
  SourceStatus,
} from "./sources";
import type { PersistResult } from "./persistence";

export type BackoffStrategy = "fixed" | "exponential";

export type BackoffPolicy = {
  strategy: BackoffStrategy;
  /** Delay in ms (fixed) or base delay in ms (exponential) */
  baseMs: number;
  /** Upper bound for a single delay in ms */
  capMs: number;
  /** Scale each delay by a random factor in [0.5, 1.0] */
  jitter: boolean;
};

/**
 * Retry policy for one source pipeline
 *
 * Kinds listed in neither list are treated as non-retryable.
 */
export type RetryPolicy = {
  /** Maximum number of attempts (including the first) */
  maxAttempts: number;
  backoff: BackoffPolicy;
  retryableKinds: FailureKind[];
  nonRetryableKinds: FailureKind[];
  /** Budget for one fetch+parse attempt in ms */
  attemptTimeoutMs: number;
};

/**
 * Source priority, highest first. A nested array is one tier of
 * equal-priority sources. Sources not listed rank below every tier.
 */
export type PriorityOrder = Array<SourceId | SourceId[]>;

export type MergePriority = {
  /** Order used for every field without an override */
  default: PriorityOrder;
  /** Per-field overrides */
  fields: Partial<Record<CanonicalFieldName, PriorityOrder>>;
};

export type SourceConfig = {
  enabled: boolean;
  policy: RetryPolicy;
};

/**
 * Configuration of one aggregation run
 */
export type AggregationConfig = {
  /** Per-run deadline in ms, independent of per-source timeouts */
  globalDeadlineMs: number;
  sources: Record<SourceId, SourceConfig>;
  priority: MergePriority;
};

/**
 * A value discarded during merge
 *
 * - lower_priority: a higher-priority source (or the request) populated the field
 * - older_fetch: equal priority, the chosen value was fetched more recently
 * - source_order: equal priority and fetch time, ordered by source id
 */
export type DiscardedValue = {
  source: SourceId;
  value: CanonicalFieldValue;
  fetchedAt: string;
  reason: "lower_priority" | "older_fetch" | "source_order";
};

export type FieldConflict = {
  field: CanonicalFieldName;
  chosen: { source: SourceId | "request"; value: CanonicalFieldValue };
  discarded: DiscardedValue[];
};

export type SourceReportEntry = {
  status: SourceStatus;
  failureKind?: FailureKind;
  failureDetail?: string;
  attemptCount: number;
  attempts: AttemptRecord[];
  elapsedMs: number;
  /** Fields this source populated (before merge) */
  fields: CanonicalFieldName[];
};

export type AggregationReport = {
  runId: string;
  fingerprint: string;
  identity: CompanyIdentity;
  startedAt: string;
  finishedAt: string;
  elapsedMs: number;
  /** True when the global deadline fired before every pipeline finished */
  deadlineExceeded: boolean;
  sources: Record<SourceId, SourceReportEntry>;
  /** Which source each merged field came from */
  fieldSources: Partial<Record<CanonicalFieldName, SourceId | "request">>;
  conflicts: FieldConflict[];
  /** Canonical fields left unpopulated after merge */
  missingFields: CanonicalFieldName[];
};

export type AggregationResult = {
  record: CanonicalCompanyRecord;
  report: AggregationReport;
  /** Raw documents of every source that fetched, for the persistence sink */
  artifacts: RawArtifact[];
  /** Set when a persistence sink was configured for the run */
  persistence?: PersistResult;
};
