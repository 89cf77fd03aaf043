/**
 * Unit tests for batch aggregation
 */

import { describe, it, expect, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { aggregateBatch, loadIdentities, mapSources } from "@/aggregation";
import { defaultAggregationConfig } from "@/config";
import { ConfigError } from "@/errors";
import { createFakeSources } from "../helpers/fakeSources";

let dir: string | undefined;

afterEach(() => {
  if (dir) rmSync(dir, { recursive: true, force: true });
  dir = undefined;
});

function config() {
  const base = defaultAggregationConfig();
  return {
    ...base,
    globalDeadlineMs: 5000,
    sources: mapSources(() => ({ enabled: true, policy: { ...base.sources.northdata.policy, maxAttempts: 1 } })),
  };
}

describe("aggregateBatch", () => {
  it("should return one entry per identity in input order", async () => {
    const fakes = createFakeSources();
    fakes.add("northdata", [{ fields: { mitarbeiter: 42 } }]);
    const inputs = [
      { company_name: "MAGNA Real Estate GmbH" },
      { company_name: "" },
      { company_name: "Beispiel Bau GmbH", registernummer: "HRB 1001" },
    ];

    const entries = await aggregateBatch(
      inputs,
      config(),
      { adapters: fakes.adapters, parsers: fakes.parsers },
      2,
    );

    expect(entries.map((entry) => entry.ok)).toEqual([true, false, true]);
    expect(entries.map((entry) => entry.input)).toEqual(inputs);

    const rejected = entries[1];
    expect(rejected.ok === false && rejected.invalidIdentity).toBe(true);

    const last = entries[2];
    expect(last.ok && last.result.report.fingerprint).toBe("reg:HRB1001");
    expect(fakes.calls("northdata")).toHaveLength(2);
  });

  it("should accept a concurrency below one", async () => {
    const fakes = createFakeSources();
    fakes.add("northdata", [{ fields: { mitarbeiter: 42 } }]);

    const entries = await aggregateBatch(
      [{ company_name: "MAGNA Real Estate GmbH" }],
      config(),
      { adapters: fakes.adapters, parsers: fakes.parsers },
      0,
    );

    expect(entries).toHaveLength(1);
    expect(entries[0].ok).toBe(true);
  });
});

describe("loadIdentities", () => {
  it("should read a JSON array of identities", () => {
    dir = mkdtempSync(join(tmpdir(), "identities-"));
    const path = join(dir, "identities.json");
    writeFileSync(path, JSON.stringify([{ company_name: "MAGNA Real Estate GmbH" }, { ust_idnr: "DE123456789" }]));

    expect(loadIdentities(path)).toEqual([
      { company_name: "MAGNA Real Estate GmbH" },
      { ust_idnr: "DE123456789" },
    ]);
  });

  it("should reject entries of the wrong shape", () => {
    dir = mkdtempSync(join(tmpdir(), "identities-"));
    const path = join(dir, "identities.json");
    writeFileSync(path, JSON.stringify({ company_name: "not an array" }));

    expect(() => loadIdentities(path)).toThrow(ConfigError);
  });
});
