/**
 * Unit tests for search-result link helpers
 */

import { describe, it, expect } from "vitest";
import {
  artifactReference,
  extractLinks,
  findCompanyLink,
  findLinkByExactText,
  findLinkContainingText,
  resolveHref,
} from "@/sources/shared/pageLinks";

const PAGE = "https://www.northdata.de/search?query=magna";

describe("resolveHref", () => {
  it("should resolve relative links against the page URL", () => {
    expect(resolveHref("/MAGNA-Real-Estate-GmbH-Hamburg", PAGE)).toBe(
      "https://www.northdata.de/MAGNA-Real-Estate-GmbH-Hamburg",
    );
  });

  it("should drop anchors and script links", () => {
    expect(resolveHref("#top", PAGE)).toBeNull();
    expect(resolveHref("javascript:void(0)", PAGE)).toBeNull();
    expect(resolveHref("mailto:info@example.invalid", PAGE)).toBeNull();
    expect(resolveHref(undefined, PAGE)).toBeNull();
  });
});

describe("extractLinks", () => {
  it("should return anchors in document order with collapsed text", () => {
    const html = '<a href="/a">  Erste\n Firma </a><a href="#">skip</a><a href="https://x.example/b">B</a>';

    expect(extractLinks(html, PAGE)).toEqual([
      { text: "Erste Firma", href: "https://www.northdata.de/a" },
      { text: "B", href: "https://x.example/b" },
    ]);
  });
});

describe("link lookup", () => {
  const links = [
    { text: "Other Real Estate GmbH, Berlin", href: "https://www.northdata.de/Other" },
    { text: "MAGNA Real Estate GmbH, Hamburg", href: "https://www.northdata.de/MAGNA" },
    { text: "AD", href: "https://www.handelsregister.de/ad" },
  ];

  it("should find links by exact or partial text", () => {
    expect(findLinkByExactText(links, "ad")?.href).toBe("https://www.handelsregister.de/ad");
    expect(findLinkContainingText(links, "magna")?.href).toBe("https://www.northdata.de/MAGNA");
  });

  it("should match the company by normalized name before the seat", () => {
    expect(findCompanyLink(links, { company_name: "Magna Real Estate" })?.href).toBe(
      "https://www.northdata.de/MAGNA",
    );
    expect(findCompanyLink(links, { company_name: "Unbekannt GmbH" })).toBeUndefined();
  });

  it("should prefer a link naming the register number", () => {
    const withRegister = [...links, { text: "Treffer HRB 182742", href: "https://www.northdata.de/reg" }];

    expect(findCompanyLink(withRegister, { company_name: "MAGNA", registernummer: "HRB 182742" })?.href).toBe(
      "https://www.northdata.de/reg",
    );
  });
});

describe("artifactReference", () => {
  it("should key references by register number or normalized name", () => {
    expect(artifactReference("handelsregister", { company_name: "X", registernummer: "HRB 182742" }, "si.xml")).toBe(
      "handelsregister/HRB182742/si.xml",
    );
    expect(artifactReference("northdata", { company_name: "MAGNA Real Estate GmbH" }, "detail.html")).toBe(
      "northdata/magna_real_estate/detail.html",
    );
  });
});
