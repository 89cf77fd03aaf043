/**
 * Company records repository
 *
 * Data access layer for company_records table. One row per identity
 * fingerprint; each persist replaces the stored fields with the latest
 * merged record.
 */

import type {
  CanonicalCompanyRecord,
  CanonicalFieldName,
  CanonicalFieldValue,
  CompanyRecordRow,
  FieldProvenance,
  PartialFieldMap,
  ReportSummary,
} from "@/types";
import { CANONICAL_FIELDS } from "@/constants/canonicalFields";
import { fieldProvenanceSchema, stringListSchema } from "@/config/schemas";
import { getDb } from "@/db/connection";
import { warn } from "@/logger";

const TEXT_FIELDS = [
  "registernummer",
  "handelsregister",
  "geschaeftsadresse",
  "unternehmenszweck",
  "land_des_hauptsitzes",
  "gerichtsstand",
  "gruendungsdatum",
  "aktiv_seit",
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
] as const satisfies readonly CanonicalFieldName[];

const NUMBER_FIELDS = [
  "mitarbeiter",
  "umsatz",
  "gewinn",
  "anzahl_immobilien",
  "gesamtwert_immobilien",
] as const satisfies readonly CanonicalFieldName[];

const BOOLEAN_FIELDS = ["paragraph_34_gewo", "insolvenz"] as const satisfies readonly CanonicalFieldName[];

const LIST_FIELDS = ["sonstige_rechte", "geschaeftsfuehrer"] as const satisfies readonly CanonicalFieldName[];

type ColumnValue = string | number | null;

export type CompanyRecordInput = {
  fingerprint: string;
  companyName: string;
  record: CanonicalCompanyRecord;
  summary: ReportSummary;
  runId: string;
};

function toColumn(value: CanonicalFieldValue | undefined): ColumnValue {
  if (value === undefined) return null;
  if (typeof value === "boolean") return value ? 1 : 0;
  if (Array.isArray(value)) return JSON.stringify(value);
  return value;
}

function parseJsonColumn(raw: string, column: string, fingerprint: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (err) {
    warn("Unreadable JSON column", { column, fingerprint, error: String(err) });
    return null;
  }
}

const COLUMN_LIST = CANONICAL_FIELDS.join(", ");
const PARAM_LIST = CANONICAL_FIELDS.map((field) => `@${field}`).join(", ");
const UPDATE_LIST = CANONICAL_FIELDS.map((field) => `${field} = excluded.${field}`).join(",\n      ");

/**
 * Insert or replace the record stored under a fingerprint
 *
 * Returns the record id (stable across re-persists)
 */
export function upsertCompanyRecord(input: CompanyRecordInput): number {
  const db = getDb();

  const params: Record<string, ColumnValue> = {
    fingerprint: input.fingerprint,
    company_name: input.companyName,
    provenance_json: JSON.stringify(input.record.provenance),
    report_summary_json: JSON.stringify(input.summary),
    last_run_id: input.runId,
  };
  for (const field of CANONICAL_FIELDS) {
    params[field] = toColumn(input.record.fields[field]);
  }

  db.prepare(
    `
    INSERT INTO company_records (
      fingerprint, company_name, ${COLUMN_LIST},
      provenance_json, report_summary_json, last_run_id
    ) VALUES (
      @fingerprint, @company_name, ${PARAM_LIST},
      @provenance_json, @report_summary_json, @last_run_id
    )
    ON CONFLICT(fingerprint) DO UPDATE SET
      company_name = excluded.company_name,
      ${UPDATE_LIST},
      provenance_json = excluded.provenance_json,
      report_summary_json = excluded.report_summary_json,
      last_run_id = excluded.last_run_id,
      updated_at = datetime('now')
  `,
  ).run(params);

  const row = db
    .prepare<[string], { id: number }>("SELECT id FROM company_records WHERE fingerprint = ?")
    .get(input.fingerprint);
  if (!row) {
    throw new Error(`Record for ${input.fingerprint} missing after upsert`);
  }
  return row.id;
}

/**
 * Get the stored row for a fingerprint
 *
 * @returns Row or undefined if never persisted
 */
export function getCompanyRecordByFingerprint(fingerprint: string): CompanyRecordRow | undefined {
  return getDb()
    .prepare<[string], CompanyRecordRow>("SELECT * FROM company_records WHERE fingerprint = ?")
    .get(fingerprint);
}

/**
 * Count stored records (one per fingerprint)
 */
export function countCompanyRecords(): number {
  const row = getDb()
    .prepare<[], { count: number }>("SELECT COUNT(*) AS count FROM company_records")
    .get();
  return row?.count ?? 0;
}

/**
 * Rebuild the canonical record from a stored row
 *
 * NULL columns stay absent; they are never turned into empty values.
 */
export function toCanonicalRecord(row: CompanyRecordRow): CanonicalCompanyRecord {
  const fields: PartialFieldMap = {};

  for (const field of TEXT_FIELDS) {
    const value = row[field];
    if (value !== null) fields[field] = value;
  }
  for (const field of NUMBER_FIELDS) {
    const value = row[field];
    if (value !== null) fields[field] = value;
  }
  for (const field of BOOLEAN_FIELDS) {
    const value = row[field];
    if (value !== null) fields[field] = value === 1;
  }
  for (const field of LIST_FIELDS) {
    const value = row[field];
    if (value === null) continue;
    const parsed = stringListSchema.safeParse(parseJsonColumn(value, field, row.fingerprint));
    if (parsed.success) fields[field] = parsed.data;
  }

  const provenance: Partial<Record<CanonicalFieldName, FieldProvenance>> = {};
  const storedProvenance = parseJsonColumn(row.provenance_json, "provenance_json", row.fingerprint);
  if (storedProvenance && typeof storedProvenance === "object") {
    const entries = new Map(Object.entries(storedProvenance));
    for (const field of CANONICAL_FIELDS) {
      const parsed = fieldProvenanceSchema.safeParse(entries.get(field));
      if (parsed.success && fields[field] !== undefined) provenance[field] = parsed.data;
    }
  }

  return { fields, provenance };
}

/**
 * Point lookup of the canonical record stored under a fingerprint
 */
export function loadCanonicalRecord(fingerprint: string): CanonicalCompanyRecord | null {
  const row = getCompanyRecordByFingerprint(fingerprint);
  return row ? toCanonicalRecord(row) : null;
}
