/**
 * Persistence sink integration tests
 *
 * Real migrations on a temporary SQLite file. Results come from the
 * orchestrator with scripted sources.
 */

import { describe, it, expect, afterEach } from "vitest";
import { createTestDb, type TestDbHarness } from "../../helpers/testDb";
import { createFakeSources } from "../../helpers/fakeSources";
import { aggregate } from "@/aggregation";
import { defaultAggregationConfig } from "@/config";
import {
  countCompanyRecords,
  getCompanyRecordByFingerprint,
  listAggregationRuns,
  listRawArtifacts,
  loadCanonicalRecord,
} from "@/db";
import { persist, sqlitePersistenceSink } from "@/persistence";

const MAGNA = { company_name: "MAGNA Real Estate GmbH", registernummer: "HRB 182742" };
const FINGERPRINT = "reg:HRB182742";

function scriptedRun(runId: string) {
  const fakes = createFakeSources();
  fakes.add("handelsregister", [
    { fields: { handelsregister: "Hamburg", geschaeftsfuehrer: ["Hans Beispiel"], paragraph_34_gewo: true } },
  ]);
  fakes.add("northdata", [{ fields: { mitarbeiter: 42, umsatz: 1200000, insolvenz: false } }]);
  return {
    fakes,
    deps: {
      adapters: fakes.adapters,
      parsers: fakes.parsers,
      clock: () => new Date("2024-05-02T10:00:00.000Z"),
      runId: () => runId,
    },
  };
}

describe("SQLite persistence sink", () => {
  let harness: TestDbHarness | null = null;

  afterEach(() => {
    if (harness) {
      harness.cleanup();
      harness = null;
    }
  });

  it("should store record, artifacts and run history", async () => {
    harness = createTestDb();
    const { deps } = scriptedRun("run-1");

    const result = await aggregate(MAGNA, defaultAggregationConfig(), { ...deps, sink: sqlitePersistenceSink });

    expect(result.persistence?.ok).toBe(true);
    expect(countCompanyRecords()).toBe(1);
    expect(loadCanonicalRecord(FINGERPRINT)).toEqual(result.record);

    const row = getCompanyRecordByFingerprint(FINGERPRINT);
    expect(row?.company_name).toBe("MAGNA Real Estate GmbH");
    expect(row?.paragraph_34_gewo).toBe(1);
    expect(row?.insolvenz).toBe(0);
    expect(row?.umsatz).toBe(1200000);
    expect(row?.email).toBeNull();
    expect(row?.last_run_id).toBe("run-1");

    const artifacts = listRawArtifacts(FINGERPRINT);
    expect(artifacts.map((a) => [a.source, a.field, a.reference])).toEqual([
      ["handelsregister", "xml_filepath", "handelsregister/fake/attempt-1"],
      ["northdata", "html_filepath", "northdata/fake/attempt-1"],
    ]);
    expect(artifacts[0].content.toString("utf-8")).toBe("<html></html>");
    expect(artifacts[0].byte_length).toBe(13);

    const runs = listAggregationRuns(FINGERPRINT);
    expect(runs).toHaveLength(1);
    expect(runs[0]).toMatchObject({
      run_id: "run-1",
      success_count: 2,
      failed_count: 0,
      skipped_count: 2,
      deadline_exceeded: 0,
    });
  });

  it("should keep one record per identity across re-runs", async () => {
    harness = createTestDb();

    const first = await aggregate(MAGNA, defaultAggregationConfig(), {
      ...scriptedRun("run-1").deps,
      sink: sqlitePersistenceSink,
    });
    const second = await aggregate(MAGNA, defaultAggregationConfig(), {
      ...scriptedRun("run-2").deps,
      sink: sqlitePersistenceSink,
    });

    expect(first.persistence).toEqual(second.persistence);
    expect(countCompanyRecords()).toBe(1);
    expect(listRawArtifacts(FINGERPRINT)).toHaveLength(2);
    expect(listAggregationRuns(FINGERPRINT).map((run) => run.run_id)).toEqual(["run-1", "run-2"]);
    expect(getCompanyRecordByFingerprint(FINGERPRINT)?.last_run_id).toBe("run-2");
  });

  it("should not duplicate history when the same run is persisted twice", async () => {
    harness = createTestDb();
    const { record, report, artifacts } = await aggregate(MAGNA, defaultAggregationConfig(), scriptedRun("run-1").deps);

    const once = persist(report.identity, record, report, artifacts);
    const twice = persist(report.identity, record, report, artifacts);

    expect(once).toEqual(twice);
    expect(listAggregationRuns(FINGERPRINT)).toHaveLength(1);
  });

  it("should roll back and report a storage error when a write fails", async () => {
    harness = createTestDb();
    const { record, report, artifacts } = await aggregate(MAGNA, defaultAggregationConfig(), scriptedRun("run-1").deps);
    harness.db.exec("DROP TABLE raw_artifacts");

    const outcome = persist(report.identity, record, report, artifacts);

    expect(outcome.ok).toBe(false);
    expect(!outcome.ok && outcome.error.name).toBe("StorageError");
    expect(countCompanyRecords()).toBe(0);
  });

  it("should return null for identities never persisted", () => {
    harness = createTestDb();

    expect(loadCanonicalRecord("name:unbekannt")).toBeNull();
  });
});
