/**
 * Field extraction from plain document text
 *
 * Shared by the HTML parser (body text) and the PDF parser (page text).
 * Every extractor returns undefined when its pattern is not found, so the
 * resulting map only carries fields that were actually present.
 */

import type { PartialFieldMap } from "@/types";
import {
  COUNTRY_GERMANY,
  INSOLVENCY_MARKERS,
  MAX_TEXT_FIELD_LENGTH,
  REGISTERNUMMER_PATTERN,
  UST_IDNR_PATTERN,
} from "@/constants/parsers";
import { parseGermanAmount, parseGermanInteger } from "@/utils/text/germanNumbers";

/** German amount, optionally signed and scaled ("-1.234,56", "24,1 Mio.") */
const AMOUNT = String.raw`(?<![\d.,])-?\d[\d.]*(?:,\d+)?(?:\s*(?:Mio|Mrd|Tsd)\.?)?`;
const CURRENCY = String.raw`\s*(?:€|EUR)`;

function amountAfter(label: string): RegExp {
  return new RegExp(`${label}[^€\\n]{0,60}?(${AMOUNT})${CURRENCY}`, "i");
}

const EMPLOYEE_PATTERNS = [
  /durchschnittlich\s+(\d[\d.]*)\s+(?:Mitarbeiter|Arbeitnehmer|Beschäftigte)/i,
  /(\d[\d.]*)\s*Mitarbeiter/i,
  /Mitarbeiter(?:anzahl)?:\s*(\d[\d.]*)/i,
];

const REVENUE_PATTERNS = [amountAfter("Umsatzerlöse"), amountAfter("Umsatz")];

/** sign: +1 keeps the parsed sign, -1 forces a loss */
const PROFIT_PATTERNS: Array<{ pattern: RegExp; sign: 1 | -1 }> = [
  { pattern: amountAfter("Jahresüberschuss"), sign: 1 },
  { pattern: amountAfter("Jahresfehlbetrag"), sign: -1 },
  { pattern: amountAfter(String.raw`\bGewinn\b(?!-)`), sign: 1 },
  { pattern: amountAfter(String.raw`\bVerlust\b`), sign: -1 },
];

const COURT_PATTERN = /Amtsgericht\s+([A-ZÄÖÜ][A-Za-zÄÖÜäöüß-]+)/;
const PARAGRAPH_34_PATTERN = /34\s*c\s*(?:Abs\.?\s*\d+\s*)?(?:Satz\s*\d+\s*)?(?:Nr\.?\s*\d+\s*)?GewO/i;
const COUNTRY_POSTCODE_PATTERN = /\bD-\d{5}\b/;
const EMAIL_PATTERN = /[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}/g;
const IMAGE_SUFFIX_PATTERN = /\.(png|jpe?g|gif|svg|webp)$/i;
const PHONE_PATTERN = /(?:Telefon|Tel\.|Phone|Fon):?\s*(\+?\d[\d\s()/.-]{5,}\d)/i;
const PURPOSE_PATTERN =
  /Gegenstand des Unternehmens(?: der Gesellschaft)?(?: ist)?:?\s*([\s\S]{10,500}?\.)(?=\s+[A-ZÄÖÜ]|\s*$)/;
const FOUNDING_DATE_PATTERN =
  /(?:Gründungsdatum|Gründung|gegründet(?: am)?)\s*:?\s*(\d{1,2})\.(\d{1,2})\.(\d{4})/i;
const PROPERTY_COUNT_PATTERN = /(\d[\d.]*)\s+(?:Immobilien|Objekte|Liegenschaften)\b/i;
const PROPERTY_VALUE_PATTERN = amountAfter("Grundstücke");
const LEI_PATTERN = /\bLEI:?\s*([A-Z0-9]{18}\d{2})\b/;
const TRADEMARK_PATTERN = /(Wort-?\/Bildmarke|Wortmarke|Bildmarke):?\s*["„“']([^"“”']+)["“”']/g;

function firstGroup(text: string, patterns: RegExp[]): string | undefined {
  for (const pattern of patterns) {
    const match = text.match(pattern);
    if (match?.[1]) {
      return match[1];
    }
  }
  return undefined;
}

function collapse(value: string): string {
  return value.replace(/\s+/g, " ").trim().slice(0, MAX_TEXT_FIELD_LENGTH);
}

export function extractEmployees(text: string): number | undefined {
  const raw = firstGroup(text, EMPLOYEE_PATTERNS);
  const value = raw === undefined ? null : parseGermanInteger(raw);
  return value === null ? undefined : value;
}

export function extractRevenue(text: string): number | undefined {
  const raw = firstGroup(text, REVENUE_PATTERNS);
  const value = raw === undefined ? null : parseGermanAmount(raw);
  return value === null ? undefined : value;
}

export function extractProfit(text: string): number | undefined {
  for (const { pattern, sign } of PROFIT_PATTERNS) {
    const match = text.match(pattern);
    if (!match?.[1]) continue;

    const value = parseGermanAmount(match[1]);
    if (value === null) continue;

    return sign === -1 ? -Math.abs(value) : value;
  }
  return undefined;
}

/**
 * Register number in compact form ("HRB 182742 B" → "HRB182742B")
 */
export function extractRegisternummer(text: string): string | undefined {
  const match = text.match(REGISTERNUMMER_PATTERN);
  if (!match) return undefined;
  return `${match[1]}${match[2]}${match[3] ?? ""}`;
}

export function extractUstIdnr(text: string): string | undefined {
  const match = text.match(UST_IDNR_PATTERN);
  return match ? `DE${match[1]}` : undefined;
}

export function extractEmail(text: string): string | undefined {
  const matches = text.match(EMAIL_PATTERN) ?? [];
  return matches.find((candidate) => !IMAGE_SUFFIX_PATTERN.test(candidate));
}

export function extractPhone(text: string): string | undefined {
  const match = text.match(PHONE_PATTERN);
  return match ? collapse(match[1]) : undefined;
}

export function extractPurpose(text: string): string | undefined {
  const match = text.match(PURPOSE_PATTERN);
  return match ? collapse(match[1]) : undefined;
}

/**
 * German date "01.03.2015" → ISO "2015-03-01"
 */
export function extractFoundingDate(text: string): string | undefined {
  const match = text.match(FOUNDING_DATE_PATTERN);
  if (!match) return undefined;
  const [, day, month, year] = match;
  return `${year}-${month.padStart(2, "0")}-${day.padStart(2, "0")}`;
}

export function extractOtherRights(text: string): string[] | undefined {
  const rights: string[] = [];

  const lei = text.match(LEI_PATTERN);
  if (lei) {
    rights.push(`LEI: ${lei[1]}`);
  }

  for (const match of text.matchAll(TRADEMARK_PATTERN)) {
    const entry = `${match[1]}: ${match[2].trim()}`;
    if (!rights.includes(entry)) {
      rights.push(entry);
    }
  }

  return rights.length > 0 ? rights : undefined;
}

export function hasInsolvencyMarker(text: string): boolean {
  const lower = text.toLowerCase();
  return INSOLVENCY_MARKERS.some((marker) => lower.includes(marker));
}

/**
 * Extract every text-pattern field found in the given text
 */
export function extractFromText(text: string): PartialFieldMap {
  const fields: PartialFieldMap = {};

  const registernummer = extractRegisternummer(text);
  if (registernummer) fields.registernummer = registernummer;

  const court = text.match(COURT_PATTERN);
  if (court) {
    fields.handelsregister = court[1];
    fields.gerichtsstand = `Amtsgericht ${court[1]}`;
  }

  const purpose = extractPurpose(text);
  if (purpose) fields.unternehmenszweck = purpose;

  if (COUNTRY_POSTCODE_PATTERN.test(text)) {
    fields.land_des_hauptsitzes = COUNTRY_GERMANY;
  }

  if (PARAGRAPH_34_PATTERN.test(text)) {
    fields.paragraph_34_gewo = true;
  }

  const employees = extractEmployees(text);
  if (employees !== undefined) fields.mitarbeiter = employees;

  const revenue = extractRevenue(text);
  if (revenue !== undefined) fields.umsatz = revenue;

  const profit = extractProfit(text);
  if (profit !== undefined) fields.gewinn = profit;

  if (hasInsolvencyMarker(text)) {
    fields.insolvenz = true;
  }

  const propertyCount = text.match(PROPERTY_COUNT_PATTERN);
  if (propertyCount) {
    const count = parseGermanInteger(propertyCount[1]);
    if (count !== null) fields.anzahl_immobilien = count;
  }

  const propertyValue = text.match(PROPERTY_VALUE_PATTERN);
  if (propertyValue) {
    const value = parseGermanAmount(propertyValue[1]);
    if (value !== null) fields.gesamtwert_immobilien = value;
  }

  const rights = extractOtherRights(text);
  if (rights) fields.sonstige_rechte = rights;

  const foundingDate = extractFoundingDate(text);
  if (foundingDate) {
    fields.gruendungsdatum = foundingDate;
    fields.aktiv_seit = foundingDate.slice(0, 4);
  }

  const phone = extractPhone(text);
  if (phone) fields.telefonnummer = phone;

  const email = extractEmail(text);
  if (email) fields.email = email;

  const ustIdnr = extractUstIdnr(text);
  if (ustIdnr) fields.ust_idnr = ustIdnr;

  return fields;
}
