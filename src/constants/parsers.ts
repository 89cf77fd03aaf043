/**
 * Document parser constants
 */

/**
 * German VAT id: "DE" followed by nine digits
 */
export const UST_IDNR_PATTERN = /\bDE\s?(\d{9})\b/;

/**
 * Register number: register type followed by the running number,
 * optionally with a trailing letter (e.g. "HRB 12345 B")
 */
export const REGISTERNUMMER_PATTERN = /\b(HRB|HRA|GnR|PR|VR|GsR)\s*(\d+)(?:\s?([A-Z])\b)?/;

export const REGISTER_TYPES = ["HRB", "HRA", "GnR", "PR", "VR", "GsR"] as const;

/**
 * XJustiz namespace used by register extracts
 */
export const XJUSTIZ_NAMESPACE = "http://www.xjustiz.de";

/**
 * XJustiz role code for managing directors (Geschäftsführer)
 */
export const XJUSTIZ_ROLE_MANAGING_DIRECTOR = "086";

/**
 * XJustiz state code for Germany
 */
export const XJUSTIZ_STATE_GERMANY = "000";

/**
 * Placeholder text some extracts carry instead of a purpose
 */
export const XJUSTIZ_PURPOSE_PLACEHOLDER = "Strukturierter Registerinhalt";

export const COUNTRY_GERMANY = "Deutschland";

/**
 * Insolvency markers found on aggregator pages
 */
export const INSOLVENCY_MARKERS = [
  "insolvenzverfahren eröffnet",
  "insolvenzeröffnung",
  "in insolvenz",
  "insolvenzverwalter",
];

/**
 * Maximum length of a free-text field (purpose, address)
 */
export const MAX_TEXT_FIELD_LENGTH = 2_000;
