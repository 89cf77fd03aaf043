/**
 * Canonical record field catalog
 */

import type { ArtifactFieldName, CanonicalFieldName } from "@/types";

/**
 * All 27 canonical fields in report order
 */
export const CANONICAL_FIELDS: readonly CanonicalFieldName[] = [
  "registernummer",
  "handelsregister",
  "geschaeftsadresse",
  "unternehmenszweck",
  "land_des_hauptsitzes",
  "gerichtsstand",
  "paragraph_34_gewo",
  "mitarbeiter",
  "umsatz",
  "gewinn",
  "insolvenz",
  "anzahl_immobilien",
  "gesamtwert_immobilien",
  "sonstige_rechte",
  "gruendungsdatum",
  "aktiv_seit",
  "geschaeftsfuehrer",
  "telefonnummer",
  "email",
  "website",
  "html_filepath",
  "about_html",
  "pdf_filepath",
  "xml_filepath",
  "search_results_html",
  "jahresabschluss_html",
  "ust_idnr",
] as const;

export const ARTIFACT_FIELDS: readonly ArtifactFieldName[] = [
  "html_filepath",
  "about_html",
  "pdf_filepath",
  "xml_filepath",
  "search_results_html",
  "jahresabschluss_html",
] as const;

/**
 * Logical field groups, used for priority defaults
 */
export const FIELD_GROUPS = {
  REGISTRY: [
    "registernummer",
    "handelsregister",
    "geschaeftsadresse",
    "unternehmenszweck",
    "land_des_hauptsitzes",
    "gerichtsstand",
    "paragraph_34_gewo",
  ],
  FINANCIAL: ["mitarbeiter", "umsatz", "gewinn", "insolvenz"],
  REAL_ESTATE: ["anzahl_immobilien", "gesamtwert_immobilien"],
  MISC: ["sonstige_rechte", "gruendungsdatum", "aktiv_seit"],
  CONTACT: ["geschaeftsfuehrer", "telefonnummer", "email", "website"],
} as const satisfies Record<string, readonly CanonicalFieldName[]>;
