/**
 * Unit tests for the known-companies directory
 */

import { describe, it, expect, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { enrichIdentity, loadKnownCompanies } from "@/aggregation";
import { ConfigError } from "@/errors";

const KNOWN = [
  { company_name: "MAGNA Real Estate AG", registernummer: "HRB 182742", ust_idnr: "DE123456789" },
  { company_name: "Beispiel Bau GmbH", registernummer: "HRB 1001" },
];

let dir: string | undefined;

afterEach(() => {
  if (dir) rmSync(dir, { recursive: true, force: true });
  dir = undefined;
});

function writeFile(content: string): string {
  dir = mkdtempSync(join(tmpdir(), "known-companies-"));
  const path = join(dir, "companies.json");
  writeFileSync(path, content);
  return path;
}

describe("enrichIdentity", () => {
  it("should fill missing register number and VAT id from a name match", () => {
    const identity = enrichIdentity({ company_name: "Magna Real Estate GmbH" }, KNOWN);

    expect(identity).toEqual({
      company_name: "Magna Real Estate GmbH",
      registernummer: "HRB 182742",
      ust_idnr: "DE123456789",
    });
    expect(Object.isFrozen(identity)).toBe(true);
  });

  it("should never replace fields already present", () => {
    const identity = enrichIdentity(
      { company_name: "MAGNA Real Estate", registernummer: "HRB182742" },
      KNOWN,
    );

    expect(identity.registernummer).toBe("HRB182742");
    expect(identity.ust_idnr).toBe("DE123456789");
  });

  it("should not match when register numbers disagree", () => {
    const input = { company_name: "MAGNA Real Estate", registernummer: "HRB 999" };

    expect(enrichIdentity(input, KNOWN)).toBe(input);
  });

  it("should return the same identity when nothing matches", () => {
    const input = { company_name: "Unbekannt GmbH" };

    expect(enrichIdentity(input, KNOWN)).toBe(input);
  });
});

describe("loadKnownCompanies", () => {
  it("should read a JSON array of identities", () => {
    const path = writeFile(JSON.stringify(KNOWN));

    expect(loadKnownCompanies(path)).toEqual(KNOWN);
  });

  it("should reject malformed VAT ids", () => {
    const path = writeFile(JSON.stringify([{ company_name: "X GmbH", ust_idnr: "123" }]));

    expect(() => loadKnownCompanies(path)).toThrow(ConfigError);
  });

  it("should reject unreadable files", () => {
    const path = writeFile("[{");

    expect(() => loadKnownCompanies(path)).toThrow(/Cannot read known companies/);
  });
});
