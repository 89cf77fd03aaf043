/**
 * Unit tests for company identity utilities
 *
 * Tests pure, deterministic normalization, validation and fingerprinting
 * No DB, no network, no side effects
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import {
  hasKnownRegisterType,
  identityFingerprint,
  normalizeCompanyName,
  normalizeRegisternummer,
  normalizeUstIdnr,
  splitRegisternummer,
  validateIdentity,
} from "@/utils";
import { InvalidIdentityError } from "@/errors";

describe("normalizeCompanyName", () => {
  it("should return empty string for empty input", () => {
    expect(normalizeCompanyName("")).toBe("");
    expect(normalizeCompanyName("   ")).toBe("");
  });

  it("should lowercase and collapse whitespace", () => {
    expect(normalizeCompanyName("  MAGNA   Real Estate  ")).toBe("magna real estate");
  });

  it("should strip umlauts and expand ß", () => {
    expect(normalizeCompanyName("Müller Großhandel")).toBe("muller grosshandel");
  });

  describe("legal form removal", () => {
    it("should remove trailing GmbH", () => {
      expect(normalizeCompanyName("MAGNA Real Estate GmbH")).toBe("magna real estate");
    });

    it("should remove GmbH & Co. KG as one suffix", () => {
      expect(normalizeCompanyName("Nordlicht Beteiligungs GmbH & Co. KG")).toBe(
        "nordlicht beteiligungs",
      );
    });

    it("should remove UG (haftungsbeschränkt)", () => {
      expect(normalizeCompanyName("Kleinbau UG (haftungsbeschränkt)")).toBe("kleinbau");
    });

    it("should keep legal-form words in the middle of the name", () => {
      expect(normalizeCompanyName("AG Immobilien Verwaltung")).toBe("ag immobilien verwaltung");
    });
  });
});

describe("register numbers", () => {
  it("should normalize to compact uppercase", () => {
    expect(normalizeRegisternummer("HRB 182742 B")).toBe("HRB182742B");
    expect(normalizeRegisternummer("hrb 182742")).toBe("HRB182742");
  });

  it("should split type and number", () => {
    expect(splitRegisternummer("HRB 182742")).toEqual({ type: "HRB", number: "182742" });
    expect(splitRegisternummer("HRA12345 B")).toEqual({ type: "HRA", number: "12345" });
  });

  it("should return null for unknown register types", () => {
    expect(splitRegisternummer("XYZ 123")).toBeNull();
    expect(splitRegisternummer("HRB")).toBeNull();
  });
});

describe("normalizeUstIdnr", () => {
  it("should remove spaces and uppercase", () => {
    expect(normalizeUstIdnr("de 305 962 143")).toBe("DE305962143");
  });
});

describe("validateIdentity", () => {
  it("should trim fields and drop empty optionals", () => {
    const identity = validateIdentity({
      company_name: "  MAGNA Real Estate GmbH ",
      registernummer: "  ",
      ust_idnr: "",
    });

    expect(identity).toEqual({ company_name: "MAGNA Real Estate GmbH" });
  });

  it("should normalize the VAT id", () => {
    const identity = validateIdentity({ company_name: "MAGNA", ust_idnr: "DE 305962143" });
    expect(identity.ust_idnr).toBe("DE305962143");
  });

  it("should return a frozen identity", () => {
    const identity = validateIdentity({ registernummer: "HRB 182742" });
    expect(Object.isFrozen(identity)).toBe(true);
    expect(identity.company_name).toBe("");
  });

  it("should reject an identity without any identifying field", () => {
    expect(() => validateIdentity({})).toThrow(InvalidIdentityError);
    expect(() => validateIdentity({ company_name: "  ", registernummer: "" })).toThrow(
      InvalidIdentityError,
    );
  });

  describe("unusual identifiers", () => {
    afterEach(() => {
      vi.restoreAllMocks();
      vi.unstubAllEnvs();
    });

    it("should keep a foreign VAT id and log a warning", () => {
      vi.stubEnv("LOG_LEVEL", "info");
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

      const identity = validateIdentity({ company_name: "Alpen Holz GmbH", ust_idnr: "ATU 12345678" });

      expect(identity).toEqual({ company_name: "Alpen Holz GmbH", ust_idnr: "ATU12345678" });
      expect(warn).toHaveBeenCalledTimes(1);
      expect(warn.mock.calls[0][0]).toContain('VAT id is not a German USt-IdNr {"ust_idnr":"ATU 12345678"}');
    });

    it("should keep a short German VAT id", () => {
      vi.spyOn(console, "warn").mockImplementation(() => {});

      expect(validateIdentity({ company_name: "MAGNA", ust_idnr: "DE1234" }).ust_idnr).toBe("DE1234");
    });

    it("should keep a register number of unknown type and log a warning", () => {
      vi.stubEnv("LOG_LEVEL", "info");
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

      const identity = validateIdentity({ company_name: "MAGNA", registernummer: "XYZ 1" });

      expect(identity.registernummer).toBe("XYZ 1");
      expect(warn.mock.calls[0][0]).toContain(
        'Register number has no known register type {"registernummer":"XYZ 1"}',
      );
    });

    it("should not warn for well-formed identifiers", () => {
      vi.stubEnv("LOG_LEVEL", "info");
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

      validateIdentity({ company_name: "MAGNA", registernummer: "HRB 182742", ust_idnr: "DE305962143" });

      expect(warn).not.toHaveBeenCalled();
    });
  });
});

describe("hasKnownRegisterType", () => {
  it("should accept every register type regardless of case and spacing", () => {
    expect(hasKnownRegisterType("HRB 182742")).toBe(true);
    expect(hasKnownRegisterType("hra12345")).toBe(true);
    expect(hasKnownRegisterType("GnR 7")).toBe(true);
  });

  it("should reject unknown prefixes", () => {
    expect(hasKnownRegisterType("XYZ 1")).toBe(false);
    expect(hasKnownRegisterType("182742")).toBe(false);
  });
});

describe("identityFingerprint", () => {
  it("should prefer the register number", () => {
    expect(
      identityFingerprint({ company_name: "MAGNA Real Estate GmbH", registernummer: "HRB 182742" }),
    ).toBe("reg:HRB182742");
  });

  it("should fall back to the normalized name", () => {
    expect(identityFingerprint({ company_name: "MAGNA Real Estate GmbH" })).toBe(
      "name:magna real estate",
    );
  });

  it("should fall back to the VAT id", () => {
    expect(identityFingerprint({ company_name: "", ust_idnr: "DE305962143" })).toBe(
      "ust:DE305962143",
    );
  });

  it("should be equal for spellings of the same register number", () => {
    expect(identityFingerprint({ company_name: "A", registernummer: "HRB182742" })).toBe(
      identityFingerprint({ company_name: "B", registernummer: "hrb 182742" }),
    );
  });
});
