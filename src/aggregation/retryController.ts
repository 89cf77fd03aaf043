/**
 * Retry/fallback controller: runs one source's fetch+parse pipeline
 * under its retry policy
 *
 * Retry decisions are a pure function of the failure kind. Attempts are
 * strictly sequential; each one is bounded by the policy's attempt
 * timeout and by the run signal.
 */

import type { SourceAdapter } from "@/interfaces";
import type {
  BackoffPolicy,
  CompanyIdentity,
  DocumentFormat,
  FailureKind,
  ParsedPayload,
  RetryPolicy,
  SessionState,
  SourceFailure,
  SourceResult,
} from "@/types";
import type { DocumentParser } from "@/parsers";
import { DOCUMENT_PARSERS, parsePayload } from "@/parsers";
import type { SessionManager } from "@/sessions";
import { classifyThrown } from "@/sources/shared/classifyFailure";
import { NEVER_RETRIED_KINDS } from "@/constants/failureKinds";
import { sleep } from "@/utils/async/sleep";
import * as logger from "@/logger";
import { PipelineTracker } from "./pipelineTracker";

export type PipelineDeps = {
  /** Required when the adapter has requiresSession */
  sessionManager?: SessionManager;
  parsers?: Record<DocumentFormat, DocumentParser>;
  /** Run-level cancellation (global deadline) */
  signal?: AbortSignal;
  /** Tracker shared with the orchestrator; created when absent */
  tracker?: PipelineTracker;
  clock?: () => Date;
  /** Jitter source in [0, 1) */
  random?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
};

type AttemptOutcome =
  | { ok: true; parsed: ParsedPayload; fetchedAt: string }
  | { ok: false; failure: SourceFailure };

/**
 * Whether a failure kind may be retried under the policy
 *
 * AuthExpired, RecordNotFound and InvalidIdentity are never retried.
 * Kinds listed in neither policy list are not retried.
 */
export function isRetryable(kind: FailureKind, policy: RetryPolicy): boolean {
  if (NEVER_RETRIED_KINDS.includes(kind)) return false;
  if (policy.nonRetryableKinds.includes(kind)) return false;
  return policy.retryableKinds.includes(kind);
}

/**
 * Delay before the next attempt
 *
 * fixed: baseMs; exponential: min(capMs, baseMs * 2^(attempt-1)).
 * With jitter the delay is scaled by a factor in [0.5, 1.0].
 *
 * @param attempt - 1-based number of the attempt that just failed
 */
export function computeBackoff(
  attempt: number,
  backoff: BackoffPolicy,
  random: () => number = Math.random,
): number {
  const raw =
    backoff.strategy === "fixed"
      ? backoff.baseMs
      : backoff.baseMs * Math.pow(2, attempt - 1);
  const capped = Math.min(raw, backoff.capMs);

  if (!backoff.jitter) {
    return capped;
  }
  return Math.floor(capped * (0.5 + random() * 0.5));
}

/**
 * Missing identity fields the adapter needs, if any
 */
export function missingIdentityFields(
  identity: CompanyIdentity,
  adapter: SourceAdapter,
): string[] {
  return adapter.requiredIdentity.filter((field) => {
    const value = identity[field];
    return !value || !value.trim();
  });
}

class AttemptAbortedError extends Error {
  constructor(readonly reason: "attempt_timeout" | "run_aborted") {
    super(reason === "attempt_timeout" ? "Attempt timed out" : "Run aborted");
    this.name = "AttemptAbortedError";
  }
}

/**
 * Settle with the task, or reject as soon as the signal aborts even if
 * the task ignores it
 */
function raceAbort<T>(task: Promise<T>, signal: AbortSignal, reason: () => Error): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    if (signal.aborted) {
      reject(reason());
      return;
    }
    const onAbort = () => reject(reason());
    signal.addEventListener("abort", onAbort, { once: true });
    task.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      },
    );
  });
}

/**
 * One fetch+parse attempt, classified
 */
async function runAttempt(
  identity: CompanyIdentity,
  adapter: SourceAdapter,
  policy: RetryPolicy,
  session: SessionState | undefined,
  deps: PipelineDeps,
): Promise<AttemptOutcome> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), policy.attemptTimeoutMs);
  const onRunAbort = () => controller.abort();
  deps.signal?.addEventListener("abort", onRunAbort, { once: true });

  const abortReason = (): "attempt_timeout" | "run_aborted" =>
    deps.signal?.aborted ? "run_aborted" : "attempt_timeout";

  const attempt = async (): Promise<AttemptOutcome> => {
    const fetched = await adapter.fetch({
      identity: Object.freeze({ ...identity }),
      session,
      signal: controller.signal,
    });
    if (!fetched.ok) {
      return fetched;
    }

    const { payload } = fetched;
    if (payload.documents.length === 0) {
      return { ok: false, failure: { kind: "MalformedResponse", detail: "Adapter returned no documents" } };
    }

    const parsed = await parsePayload(payload, deps.parsers ?? DOCUMENT_PARSERS);
    if (parsed.parsedDocuments === 0) {
      const first = parsed.failures[0];
      return {
        ok: false,
        failure: {
          kind: first?.kind ?? "MalformedResponse",
          detail: parsed.failures.map((f) => `${f.reference}: ${f.detail}`).join("; "),
        },
      };
    }

    return { ok: true, parsed, fetchedAt: payload.fetchedAt };
  };

  try {
    return await raceAbort(attempt(), controller.signal, () => new AttemptAbortedError(abortReason()));
  } catch (err) {
    if (err instanceof AttemptAbortedError || controller.signal.aborted) {
      return {
        ok: false,
        failure: {
          kind: "Timeout",
          detail:
            abortReason() === "run_aborted"
              ? "Run deadline reached during attempt"
              : `Attempt exceeded ${policy.attemptTimeoutMs}ms`,
        },
      };
    }
    return { ok: false, failure: classifyThrown(err) };
  } finally {
    clearTimeout(timer);
    deps.signal?.removeEventListener("abort", onRunAbort);
  }
}

/**
 * Run one source pipeline to a terminal SourceResult
 *
 * Never throws: every failure ends in a classified Failed result.
 */
export async function runPipeline(
  identity: CompanyIdentity,
  adapter: SourceAdapter,
  policy: RetryPolicy,
  deps: PipelineDeps = {},
): Promise<SourceResult> {
  const clock = deps.clock ?? (() => new Date());
  const wait = deps.sleep ?? sleep;
  const tracker = deps.tracker ?? new PipelineTracker(adapter.id, clock);
  const log = logger.withContext({ source: adapter.id });

  const missing = missingIdentityFields(identity, adapter);
  if (missing.length > 0) {
    log.info("Source skipped, identity incomplete", { missing });
    return tracker.finalize({ status: "Skipped", detail: `Identity lacks ${missing.join(", ")}` });
  }

  let session: SessionState | undefined;
  if (adapter.requiresSession) {
    const state = deps.sessionManager?.load(adapter.id) ?? null;
    if (!state || !state.valid) {
      log.warn("Session invalid or missing, source needs re-authentication");
      return tracker.finalize({
        status: "Failed",
        failureKind: "AuthExpired",
        detail: state ? "Session marked invalid; re-authenticate out of band" : "No stored session",
      });
    }
    session = state;
  }

  let lastFailure: SourceFailure = { kind: "Timeout", detail: "Run deadline reached before first attempt" };

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    if (deps.signal?.aborted || tracker.isFinalized) {
      break;
    }

    const startedAt = clock().toISOString();
    const outcome = await runAttempt(identity, adapter, policy, session, deps);
    const finishedAt = clock().toISOString();

    if (outcome.ok) {
      tracker.recordAttempt({ attempt, startedAt, finishedAt, outcome: "success" });

      const { parsed } = outcome;
      const partial = parsed.failures.length > 0;
      const result = tracker.finalize({
        status: partial ? "PartialSuccess" : "Success",
        fields: parsed.fields,
        artifacts: parsed.artifacts,
        fetchedAt: outcome.fetchedAt,
        detail: partial
          ? parsed.failures.map((f) => `${f.reference}: ${f.kind} ${f.detail}`).join("; ")
          : undefined,
      });

      log.debug("Source pipeline finished", {
        status: result.status,
        attempts: attempt,
        fields: Object.keys(result.fields).length,
      });
      return result;
    }

    lastFailure = outcome.failure;
    tracker.recordAttempt({
      attempt,
      startedAt,
      finishedAt,
      outcome: "failure",
      failureKind: outcome.failure.kind,
      detail: outcome.failure.detail,
    });

    if (outcome.failure.kind === "AuthExpired" && adapter.requiresSession) {
      deps.sessionManager?.markInvalid(adapter.id);
    }

    if (!isRetryable(outcome.failure.kind, policy) || attempt >= policy.maxAttempts) {
      break;
    }

    const delayMs = computeBackoff(attempt, policy.backoff, deps.random);
    tracker.recordBackoff(delayMs);
    log.warn("Source attempt failed, retrying", {
      attempt,
      maxAttempts: policy.maxAttempts,
      failureKind: outcome.failure.kind,
      detail: outcome.failure.detail,
      delayMs,
    });
    await wait(delayMs, deps.signal);
  }

  if (deps.signal?.aborted && lastFailure.kind !== "Timeout" && isRetryable(lastFailure.kind, policy)) {
    lastFailure = { kind: "Timeout", detail: "Run deadline reached during backoff" };
  }

  const result = tracker.finalize({
    status: "Failed",
    failureKind: lastFailure.kind,
    detail: lastFailure.detail,
  });

  log.info("Source pipeline failed", {
    failureKind: result.failureKind,
    attempts: result.attempts.length,
  });
  return result;
}
