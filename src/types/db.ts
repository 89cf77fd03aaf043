/**
 * Database type definitions
 *
 * Row shapes for the tables in migrations/.
 * SQLite has no boolean type: flags are stored as 0/1 integers,
 * string lists and provenance as JSON text.
 */

/**
 * Company record row (one per identity fingerprint)
 * Stored in company_records table
 */
export type CompanyRecordRow = {
  id: number;
  fingerprint: string;
  company_name: string;
  // registry facts
  registernummer: string | null;
  handelsregister: string | null;
  geschaeftsadresse: string | null;
  unternehmenszweck: string | null;
  land_des_hauptsitzes: string | null;
  gerichtsstand: string | null;
  paragraph_34_gewo: number | null;
  // financial facts
  mitarbeiter: number | null;
  umsatz: number | null;
  gewinn: number | null;
  insolvenz: number | null;
  // real-estate facts
  anzahl_immobilien: number | null;
  gesamtwert_immobilien: number | null;
  // miscellany
  sonstige_rechte: string | null; // JSON string[]
  gruendungsdatum: string | null;
  aktiv_seit: string | null;
  // contact facts
  geschaeftsfuehrer: string | null; // JSON string[]
  telefonnummer: string | null;
  email: string | null;
  website: string | null;
  // raw-artifact references
  html_filepath: string | null;
  about_html: string | null;
  pdf_filepath: string | null;
  xml_filepath: string | null;
  search_results_html: string | null;
  jahresabschluss_html: string | null;
  // tax id
  ust_idnr: string | null;
  // bookkeeping
  provenance_json: string;
  report_summary_json: string;
  last_run_id: string;
  created_at: string;
  updated_at: string;
};

/**
 * Raw artifact row
 * Stored in raw_artifacts table, unique per (fingerprint, source, field)
 */
export type RawArtifactRow = {
  id: number;
  fingerprint: string;
  source: string;
  field: string;
  reference: string;
  format: string;
  content: Buffer;
  byte_length: number;
  created_at: string;
  updated_at: string;
};

/**
 * Aggregation run row (append-only history)
 * Stored in aggregation_runs table
 */
export type AggregationRunRow = {
  id: number;
  run_id: string;
  fingerprint: string;
  started_at: string;
  finished_at: string;
  success_count: number;
  failed_count: number;
  skipped_count: number;
  deadline_exceeded: number;
  report_json: string;
};

/**
 * Compact report stored alongside the record
 */
export type ReportSummary = {
  runId: string;
  finishedAt: string;
  sources: Record<string, { status: string; failureKind?: string; attemptCount: number }>;
  missingFields: string[];
  conflictCount: number;
};
