/**
 * Company identity utilities: normalization, validation and fingerprinting
 *
 * The fingerprint is the stable key a company record is stored under:
 * re-running the same identity must land on the same row.
 */

import type { CompanyIdentity } from "@/types";
import { FINGERPRINT_PREFIX, LEGAL_FORM_SUFFIX_PATTERN } from "@/constants/identity";
import { REGISTER_TYPES, UST_IDNR_PATTERN } from "@/constants/parsers";
import { InvalidIdentityError } from "@/errors";
import { removeDiacritics } from "@/utils/text/removeDiacritics";
import * as logger from "@/logger";

/**
 * Normalize company name for deterministic identity matching
 *
 * - trim, lowercase, ß → ss
 * - strip accents/diacritics (ä → a)
 * - collapse repeated whitespace
 * - remove trailing legal-form suffixes (GmbH, AG, UG (haftungsbeschränkt), GmbH & Co. KG, ...)
 */
export function normalizeCompanyName(raw: string): string {
  if (!raw) return "";

  let normalized = raw.trim().toLowerCase().replace(/ß/g, "ss");
  normalized = removeDiacritics(normalized);
  normalized = normalized.replace(/\s+/g, " ");
  normalized = normalized.replace(LEGAL_FORM_SUFFIX_PATTERN, "");

  return normalized.trim();
}

/**
 * Normalize a register number: uppercase, whitespace removed
 *
 * @example normalizeRegisternummer("HRB 182742 B") // "HRB182742B"
 */
export function normalizeRegisternummer(raw: string): string {
  if (!raw) return "";
  return raw.replace(/\s+/g, "").toUpperCase();
}

/**
 * Normalize a German VAT id ("DE 305 962 143" → "DE305962143")
 */
export function normalizeUstIdnr(raw: string): string {
  if (!raw) return "";
  return raw.replace(/\s+/g, "").toUpperCase();
}

/**
 * True when the register number starts with a known register type
 */
export function hasKnownRegisterType(registernummer: string): boolean {
  const normalized = normalizeRegisternummer(registernummer);
  return REGISTER_TYPES.some((type) => normalized.startsWith(type.toUpperCase()));
}

/**
 * Split a register number into type and number ("HRB182742B" → HRB / 182742)
 * Returns null for values without a known register type.
 */
export function splitRegisternummer(
  registernummer: string,
): { type: string; number: string } | null {
  const normalized = normalizeRegisternummer(registernummer);
  for (const type of REGISTER_TYPES) {
    if (normalized.startsWith(type.toUpperCase())) {
      const rest = normalized.slice(type.length).match(/^(\d+)/);
      if (rest) {
        return { type, number: rest[1] };
      }
    }
  }
  return null;
}

/**
 * Validate and freeze an inbound identity
 *
 * Trims every field and drops empty optionals. At least one identifying
 * field must remain. Unusual register numbers or VAT ids (foreign ids,
 * unknown register types) are kept as given and only logged.
 *
 * @throws {InvalidIdentityError} When no identifying field is present
 */
export function validateIdentity(input: {
  company_name?: string;
  registernummer?: string;
  ust_idnr?: string;
}): CompanyIdentity {
  const companyName = input.company_name?.trim() ?? "";
  const registernummer = input.registernummer?.trim() ?? "";
  const ustIdnr = input.ust_idnr?.trim() ?? "";

  if (!companyName && !registernummer && !ustIdnr) {
    throw new InvalidIdentityError(
      "Identity needs at least one of company_name, registernummer, ust_idnr",
    );
  }

  if (registernummer && !hasKnownRegisterType(registernummer)) {
    logger.warn("Register number has no known register type", { registernummer });
  }
  if (ustIdnr && !UST_IDNR_PATTERN.test(normalizeUstIdnr(ustIdnr))) {
    logger.warn("VAT id is not a German USt-IdNr", { ust_idnr: ustIdnr });
  }

  const identity: CompanyIdentity = {
    company_name: companyName,
    ...(registernummer ? { registernummer } : {}),
    ...(ustIdnr ? { ust_idnr: normalizeUstIdnr(ustIdnr) } : {}),
  };

  return Object.freeze(identity);
}

/**
 * Stable identity fingerprint
 *
 * reg:<normalized registernummer>, else name:<normalized name>,
 * else ust:<normalized ust_idnr>.
 */
export function identityFingerprint(identity: CompanyIdentity): string {
  if (identity.registernummer) {
    const reg = normalizeRegisternummer(identity.registernummer);
    if (reg) return FINGERPRINT_PREFIX.registernummer + reg;
  }

  const name = normalizeCompanyName(identity.company_name);
  if (name) return FINGERPRINT_PREFIX.company_name + name;

  if (identity.ust_idnr) {
    const ust = normalizeUstIdnr(identity.ust_idnr);
    if (ust) return FINGERPRINT_PREFIX.ust_idnr + ust;
  }

  throw new InvalidIdentityError("Identity has no field to fingerprint");
}
