/**
 * Identity normalization constants
 */

/**
 * Trailing German legal-form suffixes stripped from company names
 * Longest forms first so "gmbh & co. kg" wins over "kg".
 */
export const LEGAL_FORM_SUFFIX_PATTERN =
  /[,\s]+(gmbh\s*&\s*co\.?\s*kgaa|gmbh\s*&\s*co\.?\s*kg|ug\s*\(haftungsbeschrankt\)|kgaa|gmbh|mbh|ag|ug|kg|ohg|gbr|se|e\.\s?k\.?|e\.\s?v\.?|eg)$/i;

/**
 * Fingerprint prefixes, by identity field used
 */
export const FINGERPRINT_PREFIX = {
  registernummer: "reg:",
  company_name: "name:",
  ust_idnr: "ust:",
} as const;
