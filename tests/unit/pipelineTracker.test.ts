/**
 * Unit tests for PipelineTracker (single finalization of a source result)
 */

import { describe, it, expect } from "vitest";
import { PipelineTracker } from "@/aggregation";

function steppingClock(...isoTimes: string[]): () => Date {
  let index = 0;
  return () => new Date(isoTimes[Math.min(index++, isoTimes.length - 1)]);
}

describe("PipelineTracker", () => {
  it("should build the result from recorded attempts", () => {
    const tracker = new PipelineTracker(
      "northdata",
      steppingClock("2024-05-02T10:00:00.000Z", "2024-05-02T10:00:01.500Z"),
    );
    tracker.recordAttempt({
      attempt: 1,
      startedAt: "2024-05-02T10:00:00.000Z",
      finishedAt: "2024-05-02T10:00:01.000Z",
      outcome: "failure",
      failureKind: "Timeout",
    });
    tracker.recordBackoff(250);

    const result = tracker.finalize({ status: "Failed", failureKind: "Timeout", detail: "slow" });

    expect(result).toEqual({
      source: "northdata",
      status: "Failed",
      failureKind: "Timeout",
      failureDetail: "slow",
      fields: {},
      artifacts: [],
      attempts: [
        {
          attempt: 1,
          startedAt: "2024-05-02T10:00:00.000Z",
          finishedAt: "2024-05-02T10:00:01.000Z",
          outcome: "failure",
          failureKind: "Timeout",
          backoffMs: 250,
        },
      ],
      startedAt: "2024-05-02T10:00:00.000Z",
      finishedAt: "2024-05-02T10:00:01.500Z",
      elapsedMs: 1500,
    });
    expect(Object.isFrozen(result)).toBe(true);
  });

  it("should keep the first finalization", () => {
    const tracker = new PipelineTracker("linkedin");

    const first = tracker.finalize({ status: "Failed", failureKind: "Timeout", detail: "deadline" });
    const second = tracker.finalize({
      status: "Success",
      fields: { mitarbeiter: 50 },
      artifacts: [],
      fetchedAt: "2024-05-02T10:00:00.000Z",
    });

    expect(second).toBe(first);
    expect(tracker.result?.status).toBe("Failed");
    expect(tracker.isFinalized).toBe(true);
  });

  it("should ignore attempts recorded after finalization", () => {
    const tracker = new PipelineTracker("linkedin");
    tracker.finalize({ status: "Skipped", detail: "Source disabled in configuration" });

    tracker.recordAttempt({
      attempt: 1,
      startedAt: "2024-05-02T10:00:00.000Z",
      finishedAt: "2024-05-02T10:00:01.000Z",
      outcome: "success",
    });

    expect(tracker.attemptCount).toBe(0);
    expect(tracker.result?.failureDetail).toBe("Source disabled in configuration");
  });

  it("should carry fetchedAt and fields on success", () => {
    const tracker = new PipelineTracker("northdata");

    const result = tracker.finalize({
      status: "Success",
      fields: { mitarbeiter: 42 },
      artifacts: [],
      fetchedAt: "2024-05-02T10:00:00.000Z",
    });

    expect(result.fields).toEqual({ mitarbeiter: 42 });
    expect(result.fetchedAt).toBe("2024-05-02T10:00:00.000Z");
    expect(result.failureKind).toBeUndefined();
  });
});
