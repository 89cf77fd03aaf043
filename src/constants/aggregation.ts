/**
 * Aggregation constants: deadlines, retry defaults and merge priority
 */

import type { MergePriority, PriorityOrder, SourceId } from "@/types";
import { FIELD_GROUPS } from "./canonicalFields";

/**
 * Sources in launch and report order
 */
export const SOURCE_IDS: readonly SourceId[] = [
  "handelsregister",
  "northdata",
  "linkedin",
  "unternehmensregister",
] as const;

/**
 * Default per-run deadline (3 minutes)
 * Larger than any single source attempt budget
 */
export const DEFAULT_GLOBAL_DEADLINE_MS = 180_000;

/**
 * Default budget for one fetch+parse attempt (60 seconds)
 */
export const DEFAULT_ATTEMPT_TIMEOUT_MS = 60_000;

/**
 * Default maximum attempts per source (1 initial + 2 retries)
 */
export const DEFAULT_MAX_ATTEMPTS = 3;

/**
 * Exponential backoff defaults: ~2s, ~4s, capped at 30s
 */
export const DEFAULT_BACKOFF_BASE_MS = 2_000;
export const DEFAULT_BACKOFF_CAP_MS = 30_000;

/**
 * Registry sources of record outrank aggregator sites by default
 */
const REGISTRY_FIRST: PriorityOrder = [
  "handelsregister",
  "unternehmensregister",
  "northdata",
  "linkedin",
];

/**
 * Contact details are most current on the company's own network profile
 */
const CONTACT_FIRST: PriorityOrder = [
  "linkedin",
  "northdata",
  "unternehmensregister",
  "handelsregister",
];

/**
 * Annual reports carry audited figures; aggregator estimates come next
 */
const FINANCIAL_FIRST: PriorityOrder = [
  "unternehmensregister",
  "northdata",
  "handelsregister",
  "linkedin",
];

/**
 * Default merge priority
 *
 * Founding dates come from the aggregator's structured data first: the
 * register only carries the date of the current articles of association.
 */
export const DEFAULT_MERGE_PRIORITY: MergePriority = {
  default: REGISTRY_FIRST,
  fields: {
    telefonnummer: CONTACT_FIRST,
    email: CONTACT_FIRST,
    website: CONTACT_FIRST,
    mitarbeiter: FINANCIAL_FIRST,
    umsatz: FINANCIAL_FIRST,
    gewinn: FINANCIAL_FIRST,
    gruendungsdatum: ["northdata", "handelsregister", "unternehmensregister", "linkedin"],
    aktiv_seit: ["northdata", "handelsregister", "unternehmensregister", "linkedin"],
  },
};

/**
 * Fields the run copies from the inbound identity when no source has them
 */
export const IDENTITY_SEEDED_FIELDS = ["registernummer", "ust_idnr"] as const;

/**
 * Seeded fields where the caller's value beats every source; differing
 * scraped values are kept as conflicts
 */
export const IDENTITY_AUTHORITATIVE_FIELDS: readonly (typeof IDENTITY_SEEDED_FIELDS)[number][] = [
  "ust_idnr",
];

/**
 * Groups referenced by configuration files ("group:CONTACT")
 */
export const PRIORITY_FIELD_GROUPS = FIELD_GROUPS;
