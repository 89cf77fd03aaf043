/**
 * Company type definitions
 *
 * Identity input and the 27-field canonical company record.
 */

import type { SourceId } from "./sources";

/**
 * Immutable identity key for one aggregation run
 *
 * At least one of the three fields must be non-empty after trimming.
 */
export type CompanyIdentity = {
  readonly company_name: string;
  readonly registernummer?: string;
  readonly ust_idnr?: string;
};

/**
 * Value types of the canonical fields
 *
 * Money amounts are EUR, `gewinn` is negative for a loss.
 * Artifact references are opaque strings handed out by adapters.
 */
export type CanonicalFields = {
  // registry facts
  registernummer: string;
  handelsregister: string;
  geschaeftsadresse: string;
  unternehmenszweck: string;
  land_des_hauptsitzes: string;
  gerichtsstand: string;
  paragraph_34_gewo: boolean;
  // financial facts
  mitarbeiter: number;
  umsatz: number;
  gewinn: number;
  insolvenz: boolean;
  // real-estate facts
  anzahl_immobilien: number;
  gesamtwert_immobilien: number;
  // miscellany
  sonstige_rechte: string[];
  gruendungsdatum: string;
  aktiv_seit: string;
  // contact facts
  geschaeftsfuehrer: string[];
  telefonnummer: string;
  email: string;
  website: string;
  // raw-artifact references
  html_filepath: string;
  about_html: string;
  pdf_filepath: string;
  xml_filepath: string;
  search_results_html: string;
  jahresabschluss_html: string;
  // tax id
  ust_idnr: string;
};

export type CanonicalFieldName = keyof CanonicalFields;

export type CanonicalFieldValue = CanonicalFields[CanonicalFieldName];

/**
 * Canonical fields that hold raw-artifact references
 */
export type ArtifactFieldName =
  | "html_filepath"
  | "about_html"
  | "pdf_filepath"
  | "xml_filepath"
  | "search_results_html"
  | "jahresabschluss_html";

/**
 * Subset of canonical fields populated by one document or one source.
 * A missing key means "not found", never "confirmed empty".
 */
export type PartialFieldMap = Partial<CanonicalFields>;

/**
 * Where a record value came from. "request" marks values copied
 * from the inbound identity because no source reported them.
 */
export type ProvenanceSource = SourceId | "request";

export type FieldProvenance = {
  source: ProvenanceSource;
  /** ISO 8601 timestamp of the fetch that produced the value */
  fetchedAt: string;
};

/**
 * Merged output of one aggregation run
 */
export type CanonicalCompanyRecord = {
  fields: PartialFieldMap;
  provenance: Partial<Record<CanonicalFieldName, FieldProvenance>>;
};

/**
 * Entry of the known-companies directory (data/companies.json)
 */
export type KnownCompany = {
  company_name: string;
  registernummer?: string;
  ust_idnr?: string;
};
