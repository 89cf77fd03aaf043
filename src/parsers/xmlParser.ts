/**
 * XML parser: XJustiz structured register extracts ("SI" documents)
 *
 * Namespace prefixes vary between extracts, so they are stripped before
 * loading and elements are selected by local name.
 */

import * as cheerio from "cheerio";
import type { ParseOutcome, PartialFieldMap, RawDocument } from "@/types";
import {
  COUNTRY_GERMANY,
  XJUSTIZ_PURPOSE_PLACEHOLDER,
  XJUSTIZ_ROLE_MANAGING_DIRECTOR,
  XJUSTIZ_STATE_GERMANY,
} from "@/constants/parsers";
import { extractUstIdnr } from "./textPatterns";
import courtsJson from "../../data/courts.json";

type Court = { city: string; court: string };

const COURTS: Record<string, Court> = courtsJson;

/**
 * Court for an XJustiz court code (e.g. K1101R → Amtsgericht Hamburg)
 */
export function lookupCourt(code: string): Court | undefined {
  return COURTS[code];
}

/**
 * Drop namespace prefixes from element names ("<tns:register>" → "<register>")
 */
export function stripNamespacePrefixes(xml: string): string {
  return xml.replace(/<(\/?)[A-Za-z_][\w.-]*:([A-Za-z_][\w.-]*)/g, "<$1$2");
}

/**
 * Parse one XJustiz register extract into a partial field map
 */
export async function parseXml(document: RawDocument): Promise<ParseOutcome> {
  const xml = typeof document.body === "string" ? document.body : document.body.toString("utf-8");
  const $ = cheerio.load(stripNamespacePrefixes(xml), { xmlMode: true });

  const text = (selector: string): string | undefined => {
    const value = $(selector).first().text().trim();
    return value || undefined;
  };

  if ($.root().children().length === 0 || $("nachrichtenkopf").length === 0) {
    return {
      ok: false,
      failure: { kind: "MalformedResponse", detail: "XML document has no XJustiz nachrichtenkopf" },
    };
  }

  const fields: PartialFieldMap = {};

  const registerCode = text("register > code");
  const runningNumber = text("laufendeNummer");
  if (registerCode && runningNumber) {
    fields.registernummer = `${registerCode}${runningNumber}`.replace(/\s+/g, "");
  }

  const courtCode = text("gericht > code");
  const court = courtCode ? lookupCourt(courtCode) : undefined;
  if (court) {
    fields.handelsregister = court.city;
    fields.gerichtsstand = court.court;
  }

  const directors: string[] = [];
  $("beteiligung").each((_, el) => {
    const participation = $(el);
    const isDirector = participation
      .find("code")
      .toArray()
      .some((code) => $(code).text().trim() === XJUSTIZ_ROLE_MANAGING_DIRECTOR);
    if (!isDirector) return;

    const firstName = participation.find("vorname").first().text().trim();
    const lastName = participation.find("nachname").first().text().trim();
    if (firstName && lastName) {
      directors.push(`${firstName} ${lastName}`);
    }
  });
  if (directors.length > 0) {
    fields.geschaeftsfuehrer = directors;
  }

  const street = text("strasse");
  const houseNumber = text("hausnummer");
  const postalCode = text("postleitzahl");
  const city = text("ort");
  if (street && houseNumber && postalCode && city) {
    fields.geschaeftsadresse = `${street} ${houseNumber}, ${postalCode} ${city}`;
  }

  const purpose = text("basisdatenRegister > gegenstand");
  if (purpose && purpose !== XJUSTIZ_PURPOSE_PLACEHOLDER) {
    fields.unternehmenszweck = purpose.replace(/\s+/g, " ");
    if (/§\s*34\s*c\s*GewO/i.test(purpose)) {
      fields.paragraph_34_gewo = true;
    }
  }

  if (text("anschrift > staat > code") === XJUSTIZ_STATE_GERMANY) {
    fields.land_des_hauptsitzes = COUNTRY_GERMANY;
  }

  // no dedicated element; the VAT id turns up in free-text entries
  const ustIdnr = extractUstIdnr($.root().text());
  if (ustIdnr) {
    fields.ust_idnr = ustIdnr;
  }

  return { ok: true, fields };
}
