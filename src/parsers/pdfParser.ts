/**
 * PDF parser: register printouts ("AD" documents) and annual reports
 *
 * Byte bodies go through pdf-parse; adapters that already hold the text
 * layer hand it over as a string.
 */

import type { ParseOutcome, PartialFieldMap, RawDocument } from "@/types";
import { MAX_TEXT_FIELD_LENGTH, REGISTER_TYPES } from "@/constants/parsers";
import { errorMessage } from "@/errors";
import { extractFromText } from "./textPatterns";

const PDF_MAGIC = "%PDF";

const ADDRESS_PATTERN = /Geschäftsanschrift:\s*([\s\S]+?)(?=\n[a-z]\)|\n\d+\.|$)/i;
const PURPOSE_PATTERN = /Gegenstand\s+des\s+Unternehmens:\s*([\s\S]+?)(?=\n\d+\.|$)/i;
const DIRECTOR_PATTERN = /Geschäftsführer(?:in)?:\s*([^\n]+)/i;
const REGISTER_COURT_PATTERN =
  /Handelsregister\s+([A-Z])\s+des\s+Amtsgerichts\s+([A-ZÄÖÜ][A-Za-zÄÖÜäöüß-]+)/;
const COMPANY_NUMBER_PATTERN = new RegExp(
  String.raw`Nummer\s+der\s+Firma:\s*((?:${REGISTER_TYPES.join("|")})\s*\d+(?:\s?[A-Z]\b)?)`,
);

/**
 * Text layer of a PDF body, or null when the body is not a PDF
 */
export async function extractPdfText(body: string | Buffer): Promise<string | null> {
  if (typeof body === "string") {
    return body;
  }
  if (body.subarray(0, PDF_MAGIC.length).toString("latin1") !== PDF_MAGIC) {
    return null;
  }

  // Loaded on first use: only byte bodies need the PDF engine
  const { default: pdfParse } = await import("pdf-parse");
  const data = await pdfParse(body);
  return data.text;
}

/**
 * "Müller, Hans, Hamburg, *01.01.1970" → "Hans Müller"
 */
export function formatDirectorEntry(entry: string): string {
  const parts = entry.split(",").map((part) => part.trim()).filter(Boolean);
  if (parts.length >= 2 && !parts[1].startsWith("*")) {
    return `${parts[1]} ${parts[0]}`;
  }
  return entry.trim();
}

function collapse(value: string): string {
  return value.replace(/\s+/g, " ").trim().slice(0, MAX_TEXT_FIELD_LENGTH);
}

/**
 * Register-printout specific patterns; generic text patterns fill the rest
 */
export function extractFromPdfText(text: string): PartialFieldMap {
  const fields: PartialFieldMap = {};

  const companyNumber = text.match(COMPANY_NUMBER_PATTERN);
  if (companyNumber) {
    fields.registernummer = companyNumber[1].replace(/\s+/g, "");
  }

  const registerCourt = text.match(REGISTER_COURT_PATTERN);
  if (registerCourt) {
    fields.handelsregister = registerCourt[2];
    fields.gerichtsstand = `Amtsgericht ${registerCourt[2]}`;
  }

  const address = text.match(ADDRESS_PATTERN);
  if (address && collapse(address[1])) {
    fields.geschaeftsadresse = collapse(address[1]);
  }

  const purpose = text.match(PURPOSE_PATTERN);
  if (purpose && collapse(purpose[1])) {
    fields.unternehmenszweck = collapse(purpose[1]);
  }

  const directors = text.match(DIRECTOR_PATTERN);
  if (directors) {
    const names = directors[1]
      .split(";")
      .map(formatDirectorEntry)
      .filter((name) => name.length > 0);
    if (names.length > 0) fields.geschaeftsfuehrer = names;
  }

  return { ...extractFromText(text), ...fields };
}

/**
 * Parse one PDF document into a partial field map
 */
export async function parsePdf(document: RawDocument): Promise<ParseOutcome> {
  let text: string | null;
  try {
    text = await extractPdfText(document.body);
  } catch (err) {
    return {
      ok: false,
      failure: { kind: "MalformedResponse", detail: `PDF text extraction failed: ${errorMessage(err)}` },
    };
  }

  if (text === null) {
    return {
      ok: false,
      failure: { kind: "MalformedResponse", detail: "Document body is not a PDF" },
    };
  }
  if (!text.trim()) {
    return {
      ok: false,
      failure: { kind: "MalformedResponse", detail: "PDF has no text layer" },
    };
  }

  return { ok: true, fields: extractFromPdfText(text) };
}
