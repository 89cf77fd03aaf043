/**
 * Aggregation orchestrator: one identity in, one canonical record and
 * one report out
 *
 * Fans out one retry-wrapped pipeline per source, waits once for all of
 * them or the global deadline, merges whatever came back and reports on
 * every source. Source failures never fail the run; only an invalid
 * identity does, before any pipeline starts.
 */

import { randomUUID } from "crypto";
import type { PersistenceSink, SourceAdapter } from "@/interfaces";
import type {
  AggregationConfig,
  AggregationReport,
  AggregationResult,
  CanonicalFieldName,
  CompanyIdentity,
  DiscardedValue,
  DocumentFormat,
  KnownCompany,
  RawArtifact,
  SourceId,
  SourceReportEntry,
  SourceResult,
} from "@/types";
import type { DocumentParser } from "@/parsers";
import type { SessionManager } from "@/sessions";
import { CANONICAL_FIELDS } from "@/constants/canonicalFields";
import { IDENTITY_AUTHORITATIVE_FIELDS, IDENTITY_SEEDED_FIELDS } from "@/constants/aggregation";
import {
  identityFingerprint,
  normalizeRegisternummer,
  validateIdentity,
} from "@/utils/identity/companyIdentity";
import { classifyThrown } from "@/sources/shared/classifyFailure";
import * as logger from "@/logger";
import { enrichIdentity } from "./knownCompanies";
import { mergePartials, valuesEqual } from "./mergePartials";
import type { MergeInput, MergeOutput } from "./mergePartials";
import { PipelineTracker } from "./pipelineTracker";
import { runPipeline } from "./retryController";
import { mapSources } from "./sourceMap";

export type AggregateDeps = {
  adapters: Partial<Record<SourceId, SourceAdapter>>;
  sessionManager?: SessionManager;
  knownCompanies?: readonly KnownCompany[];
  /** Invoked once after merge when present */
  sink?: PersistenceSink;
  parsers?: Record<DocumentFormat, DocumentParser>;
  clock?: () => Date;
  random?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  runId?: () => string;
};

export type IdentityInput = {
  company_name?: string;
  registernummer?: string;
  ust_idnr?: string;
};

function toReportEntry(result: SourceResult): SourceReportEntry {
  const entry: SourceReportEntry = {
    status: result.status,
    attemptCount: result.attempts.length,
    attempts: result.attempts,
    elapsedMs: result.elapsedMs,
    fields: CANONICAL_FIELDS.filter((field) => result.fields[field] !== undefined),
  };
  if (result.failureKind) entry.failureKind = result.failureKind;
  if (result.failureDetail) entry.failureDetail = result.failureDetail;
  return entry;
}

type SeededField = (typeof IDENTITY_SEEDED_FIELDS)[number];

function seededValue(identity: CompanyIdentity, field: SeededField): string | undefined {
  const value = identity[field];
  if (!value) return undefined;
  return field === "registernummer" ? normalizeRegisternummer(value) : value;
}

/**
 * Put a request value into the merged record
 *
 * Seeded fields only fill gaps. Authoritative fields replace what the
 * sources found, and the scraped values that differ become a conflict.
 */
function applyRequestValue(
  merged: MergeOutput,
  field: SeededField,
  value: string,
  fetchedAt: string,
): void {
  const current = merged.fields[field];
  if (current !== undefined && !IDENTITY_AUTHORITATIVE_FIELDS.includes(field)) return;

  const conflictIndex = merged.conflicts.findIndex((conflict) => conflict.field === field);
  const previous = conflictIndex === -1 ? undefined : merged.conflicts[conflictIndex];
  const origin = merged.provenance[field];

  const scraped: DiscardedValue[] = [];
  if (current !== undefined && origin && origin.source !== "request") {
    scraped.push({
      source: origin.source,
      value: current,
      fetchedAt: origin.fetchedAt,
      reason: "lower_priority",
    });
  }
  for (const discarded of previous?.discarded ?? []) {
    scraped.push({ ...discarded, reason: "lower_priority" });
  }
  const discarded = scraped.filter((candidate) => !valuesEqual(candidate.value, value));

  merged.fields[field] = value;
  merged.provenance[field] = { source: "request", fetchedAt };

  const conflict = { field, chosen: { source: "request" as const, value }, discarded };
  if (conflictIndex !== -1) {
    if (discarded.length > 0) {
      merged.conflicts[conflictIndex] = conflict;
    } else {
      merged.conflicts.splice(conflictIndex, 1);
    }
  } else if (discarded.length > 0) {
    merged.conflicts.push(conflict);
  }
}

/**
 * Run one aggregation
 *
 * @throws {InvalidIdentityError} When the identity has no identifying field
 */
export async function aggregate(
  input: IdentityInput,
  config: AggregationConfig,
  deps: AggregateDeps,
): Promise<AggregationResult> {
  const clock = deps.clock ?? (() => new Date());
  const validated = validateIdentity(input);
  const identity = deps.knownCompanies ? enrichIdentity(validated, deps.knownCompanies) : validated;

  const runId = (deps.runId ?? randomUUID)();
  const fingerprint = identityFingerprint(identity);
  const started = clock();
  const log = logger.withContext({ runId, fingerprint });

  log.info("Aggregation run started", {
    company: identity.company_name,
    globalDeadlineMs: config.globalDeadlineMs,
  });

  const runController = new AbortController();
  const trackers = mapSources((source) => new PipelineTracker(source, clock));

  const pipelines = Object.values(trackers).map(async (tracker): Promise<void> => {
    const source = tracker.source;
    const sourceConfig = config.sources[source];
    const adapter = deps.adapters[source];

    if (!sourceConfig.enabled || !adapter) {
      tracker.finalize({
        status: "Skipped",
        detail: sourceConfig.enabled ? "No adapter registered" : "Source disabled in configuration",
      });
      return;
    }

    try {
      const result = await runPipeline(identity, adapter, sourceConfig.policy, {
        sessionManager: deps.sessionManager,
        parsers: deps.parsers,
        signal: runController.signal,
        tracker,
        clock,
        random: deps.random,
        sleep: deps.sleep,
      });
      log.info("Source finished", {
        source,
        status: result.status,
        failureKind: result.failureKind,
        attempts: result.attempts.length,
        elapsedMs: result.elapsedMs,
      });
    } catch (err) {
      const failure = classifyThrown(err);
      tracker.finalize({ status: "Failed", failureKind: failure.kind, detail: failure.detail });
      log.error("Source pipeline crashed", { source, error: failure.detail });
    }
  });

  let deadlineTimer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<"deadline">((resolve) => {
    deadlineTimer = setTimeout(() => resolve("deadline"), config.globalDeadlineMs);
  });
  const winner = await Promise.race([
    Promise.all(pipelines).then(() => "done" as const),
    deadline,
  ]);
  clearTimeout(deadlineTimer);

  const deadlineExceeded = winner === "deadline";
  if (deadlineExceeded) {
    const pending = Object.values(trackers).filter((tracker) => !tracker.isFinalized);
    log.warn("Global deadline reached, abandoning pending sources", {
      pending: pending.map((tracker) => tracker.source),
    });
    runController.abort();
  }

  const timeoutOutcome = {
    status: "Failed",
    failureKind: "Timeout",
    detail: `Global deadline of ${config.globalDeadlineMs}ms reached`,
  } as const;
  const results = mapSources((source) => trackers[source].finalize(timeoutOutcome));

  const mergeInputs: MergeInput[] = Object.values(results).flatMap((result) =>
    (result.status === "Success" || result.status === "PartialSuccess") && result.fetchedAt
      ? [{ source: result.source, fields: result.fields, fetchedAt: result.fetchedAt }]
      : [],
  );
  const merged = mergePartials(mergeInputs, config.priority);

  for (const field of IDENTITY_SEEDED_FIELDS) {
    const value = seededValue(identity, field);
    if (value) applyRequestValue(merged, field, value, started.toISOString());
  }
  const fields = merged.fields;
  const provenance = merged.provenance;

  const fieldSources: AggregationReport["fieldSources"] = {};
  for (const field of CANONICAL_FIELDS) {
    const origin = provenance[field];
    if (origin) fieldSources[field] = origin.source;
  }
  const missingFields: CanonicalFieldName[] = CANONICAL_FIELDS.filter(
    (field) => fields[field] === undefined,
  );

  const artifacts: RawArtifact[] = Object.values(results).flatMap((result) => result.artifacts);
  const finished = clock();

  const report: AggregationReport = {
    runId,
    fingerprint,
    identity,
    startedAt: started.toISOString(),
    finishedAt: finished.toISOString(),
    elapsedMs: Math.max(0, finished.getTime() - started.getTime()),
    deadlineExceeded,
    sources: mapSources((source) => toReportEntry(results[source])),
    fieldSources,
    conflicts: merged.conflicts,
    missingFields,
  };

  const statuses = Object.values(results).map((result) => result.status);
  log.info("Aggregation run finished", {
    success: statuses.filter((status) => status === "Success").length,
    partial: statuses.filter((status) => status === "PartialSuccess").length,
    failed: statuses.filter((status) => status === "Failed").length,
    skipped: statuses.filter((status) => status === "Skipped").length,
    populatedFields: CANONICAL_FIELDS.length - missingFields.length,
    conflicts: merged.conflicts.length,
    deadlineExceeded,
    elapsedMs: report.elapsedMs,
  });

  const record = { fields, provenance };
  if (!deps.sink) {
    return { record, report, artifacts };
  }

  const persistence = deps.sink.persist(identity, record, report, artifacts);
  if (!persistence.ok) {
    log.error("Aggregation result not persisted", { error: persistence.error.message });
  }
  return { record, report, artifacts, persistence };
}
