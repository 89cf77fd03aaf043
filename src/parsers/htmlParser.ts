/**
 * HTML parser: company pages, search results and annual reports
 *
 * Three layers, first found wins per field:
 *   1. schema.org JSON-LD blocks
 *   2. labelled dt/dd pairs (about pages)
 *   3. text patterns over the visible body text
 */

import * as cheerio from "cheerio";
import type { ParseOutcome, PartialFieldMap, RawDocument } from "@/types";
import { COUNTRY_GERMANY } from "@/constants/parsers";
import * as logger from "@/logger";
import { errorMessage } from "@/errors";
import { extractFromText } from "./textPatterns";

type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringValue(value: unknown): string | undefined {
  if (typeof value === "string" && value.trim()) return value.trim();
  if (typeof value === "number") return String(value);
  return undefined;
}

/**
 * Flatten JSON-LD roots: single objects, arrays and @graph containers
 */
function jsonLdNodes(root: unknown): JsonObject[] {
  if (Array.isArray(root)) {
    return root.flatMap(jsonLdNodes);
  }
  if (!isJsonObject(root)) {
    return [];
  }
  const graph = root["@graph"];
  return Array.isArray(graph) ? [root, ...graph.flatMap(jsonLdNodes)] : [root];
}

function formatPostalAddress(address: unknown): string | undefined {
  if (typeof address === "string") return stringValue(address);
  if (!isJsonObject(address)) return undefined;

  const street = stringValue(address.streetAddress);
  const postalCode = stringValue(address.postalCode);
  const locality = stringValue(address.addressLocality);
  const cityPart = [postalCode, locality].filter(Boolean).join(" ");

  const formatted = [street, cityPart].filter(Boolean).join(", ");
  return formatted || undefined;
}

function isGermanCountry(address: unknown): boolean {
  if (!isJsonObject(address)) return false;
  const country = address.addressCountry;
  const code = isJsonObject(country) ? stringValue(country.name) : stringValue(country);
  return code !== undefined && ["de", "deu", "deutschland", "germany"].includes(code.toLowerCase());
}

/**
 * Read schema.org Organization facts from JSON-LD script blocks
 */
export function extractJsonLd($: cheerio.CheerioAPI): PartialFieldMap {
  const fields: PartialFieldMap = {};

  $('script[type="application/ld+json"]').each((_, el) => {
    const raw = $(el).text();
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      logger.debug("Skipping unparseable JSON-LD block", { error: errorMessage(err) });
      return;
    }

    for (const node of jsonLdNodes(parsed)) {
      const foundingDate = stringValue(node.foundingDate);
      if (foundingDate && /^\d{4}-\d{2}-\d{2}$/.test(foundingDate) && !fields.gruendungsdatum) {
        fields.gruendungsdatum = foundingDate;
        fields.aktiv_seit = foundingDate.slice(0, 4);
      }

      const telephone = stringValue(node.telephone);
      if (telephone && !fields.telefonnummer) fields.telefonnummer = telephone;

      const email = stringValue(node.email);
      if (email && !fields.email) fields.email = email.replace(/^mailto:/i, "");

      const url = stringValue(node.url);
      if (url && !fields.website && /^https?:\/\//i.test(url)) fields.website = url;

      const vatId = stringValue(node.vatID);
      if (vatId && !fields.ust_idnr) fields.ust_idnr = vatId.replace(/\s+/g, "");

      const address = formatPostalAddress(node.address);
      if (address && !fields.geschaeftsadresse) fields.geschaeftsadresse = address;
      if (isGermanCountry(node.address) && !fields.land_des_hauptsitzes) {
        fields.land_des_hauptsitzes = COUNTRY_GERMANY;
      }

      const employees = node.numberOfEmployees;
      const employeeCount = isJsonObject(employees)
        ? stringValue(employees.value)
        : stringValue(employees);
      if (employeeCount && /^\d+$/.test(employeeCount) && fields.mitarbeiter === undefined) {
        fields.mitarbeiter = Number(employeeCount);
      }
    }
  });

  return fields;
}

/**
 * Upper bound of a size range ("11-50 employees" → 50, "1.001–5.000" → 5000)
 */
export function parseCompanySize(text: string): number | undefined {
  const numbers = (text.match(/\d[\d.,]*/g) ?? [])
    .map((n) => Number(n.replace(/[.,]/g, "")))
    .filter((n) => Number.isFinite(n));
  return numbers.length > 0 ? Math.max(...numbers) : undefined;
}

function splitNames(text: string): string[] {
  return text
    .split(/[;,\n]|\s+und\s+/)
    .map((name) => name.replace(/\s+/g, " ").trim())
    .filter((name) => name.length > 0);
}

/**
 * Read labelled definition lists (about pages, register summaries)
 */
export function extractDefinitionList($: cheerio.CheerioAPI): PartialFieldMap {
  const fields: PartialFieldMap = {};

  $("dt").each((_, el) => {
    const label = $(el).text().replace(/\s+/g, " ").trim().toLowerCase();
    const dd = $(el).nextAll("dd").first();
    if (dd.length === 0) return;

    const value = dd.text().replace(/\s+/g, " ").trim();
    const href = dd.find("a").first().attr("href");

    if (label === "website" || label === "webseite") {
      const url = href && /^https?:\/\//i.test(href) ? href : value;
      if (url && !fields.website) fields.website = url;
    } else if (label === "phone" || label === "telefon") {
      const phone = href?.startsWith("tel:") ? href.slice(4) : value;
      if (phone && !fields.telefonnummer) fields.telefonnummer = phone.trim();
    } else if (label === "company size" || label === "unternehmensgröße") {
      const size = parseCompanySize(value);
      if (size !== undefined && fields.mitarbeiter === undefined) fields.mitarbeiter = size;
    } else if (label === "founded" || label === "gegründet") {
      const year = value.match(/\b(\d{4})\b/);
      if (year && !fields.aktiv_seit) fields.aktiv_seit = year[1];
    } else if (label === "geschäftsführer" || label === "geschäftsführung") {
      const items = dd.find("li");
      const names = items.length > 0
        ? items.map((__, li) => $(li).text().replace(/\s+/g, " ").trim()).get()
        : splitNames(value);
      if (names.length > 0 && !fields.geschaeftsfuehrer) fields.geschaeftsfuehrer = names;
    } else if (label === "e-mail" || label === "email") {
      const email = href?.startsWith("mailto:") ? href.slice(7) : value;
      if (email && !fields.email) fields.email = email;
    } else if (label === "adresse" || label === "geschäftsadresse" || label === "anschrift") {
      if (value && !fields.geschaeftsadresse) fields.geschaeftsadresse = value;
    }
  });

  return fields;
}

/**
 * Visible body text with one space between elements
 */
function visibleText($: cheerio.CheerioAPI): string {
  $("script, style, noscript, template").remove();
  $("br").replaceWith(" ");
  $("body *").each((_, el) => {
    $(el).append(" ");
  });
  return $("body").text().replace(/\s+/g, " ").trim();
}

/**
 * Parse one HTML document into a partial field map
 */
export async function parseHtml(document: RawDocument): Promise<ParseOutcome> {
  const html = typeof document.body === "string" ? document.body : document.body.toString("utf-8");

  if (!/<html[\s>]/i.test(html) && !/<body[\s>]/i.test(html)) {
    return {
      ok: false,
      failure: { kind: "MalformedResponse", detail: "HTML document has no <html> or <body> root" },
    };
  }

  const $ = cheerio.load(html);
  const jsonLd = extractJsonLd($);
  const definitions = extractDefinitionList($);
  const text = visibleText($);

  if (!text && Object.keys(jsonLd).length === 0) {
    return {
      ok: false,
      failure: { kind: "MalformedResponse", detail: "HTML document has an empty body" },
    };
  }

  // Earlier layers win: spread lowest priority first
  const fields: PartialFieldMap = { ...extractFromText(text), ...definitions, ...jsonLd };
  return { ok: true, fields };
}
