/**
 * Pipeline tracker: owns one SourceResult from pipeline start until it
 * is finalized, exactly once
 *
 * The retry controller appends attempts as they happen. Whoever finalizes
 * first wins: normally the pipeline itself, or the orchestrator when the
 * global deadline fires while the pipeline is still in flight. Later
 * finalization calls are ignored.
 */

import type {
  AttemptRecord,
  FailureKind,
  PartialFieldMap,
  RawArtifact,
  SourceId,
  SourceResult,
  SourceStatus,
} from "@/types";

export type PipelineOutcome =
  | {
      status: "Success" | "PartialSuccess";
      fields: PartialFieldMap;
      artifacts: RawArtifact[];
      fetchedAt: string;
      /** Parse failures of individual documents (PartialSuccess) */
      detail?: string;
    }
  | { status: "Failed"; failureKind: FailureKind; detail: string }
  | { status: "Skipped"; detail: string };

export class PipelineTracker {
  private readonly attempts: AttemptRecord[] = [];
  private readonly startedAtMs: number;
  private finalized: SourceResult | null = null;

  constructor(
    readonly source: SourceId,
    private readonly clock: () => Date = () => new Date(),
  ) {
    this.startedAtMs = clock().getTime();
  }

  get isFinalized(): boolean {
    return this.finalized !== null;
  }

  /** Finalized result, or null while the pipeline is in flight */
  get result(): SourceResult | null {
    return this.finalized;
  }

  get attemptCount(): number {
    return this.attempts.length;
  }

  recordAttempt(attempt: AttemptRecord): void {
    if (!this.finalized) {
      this.attempts.push(attempt);
    }
  }

  /**
   * Set the backoff slept after the latest attempt
   */
  recordBackoff(backoffMs: number): void {
    const last = this.attempts[this.attempts.length - 1];
    if (!this.finalized && last) {
      this.attempts[this.attempts.length - 1] = { ...last, backoffMs };
    }
  }

  /**
   * Finalize the result
   *
   * @returns the final result: the one built from this outcome, or the
   * one already finalized earlier
   */
  finalize(outcome: PipelineOutcome): SourceResult {
    if (this.finalized) {
      return this.finalized;
    }

    const finishedAt = this.clock();
    const status: SourceStatus = outcome.status;
    const result: SourceResult = {
      source: this.source,
      status,
      fields: outcome.status === "Success" || outcome.status === "PartialSuccess" ? outcome.fields : {},
      artifacts:
        outcome.status === "Success" || outcome.status === "PartialSuccess" ? outcome.artifacts : [],
      attempts: [...this.attempts],
      startedAt: new Date(this.startedAtMs).toISOString(),
      finishedAt: finishedAt.toISOString(),
      elapsedMs: Math.max(0, finishedAt.getTime() - this.startedAtMs),
    };

    if (outcome.status === "Failed") {
      result.failureKind = outcome.failureKind;
      result.failureDetail = outcome.detail;
    } else if (outcome.status === "Skipped") {
      result.failureDetail = outcome.detail;
    } else {
      result.fetchedAt = outcome.fetchedAt;
      if (outcome.detail) result.failureDetail = outcome.detail;
    }

    this.finalized = Object.freeze(result);
    return this.finalized;
  }
}
