/**
 * Known-companies directory: identities the operator already knows
 *
 * Used to complete an inbound identity (register number, VAT id) before
 * the run starts, so that sources requiring those fields are not skipped.
 */

import { readFileSync } from "fs";
import { z } from "zod";
import type { CompanyIdentity, KnownCompany } from "@/types";
import { ConfigError, errorMessage } from "@/errors";
import {
  normalizeCompanyName,
  normalizeRegisternummer,
} from "@/utils/identity/companyIdentity";
import * as logger from "@/logger";

const knownCompanySchema = z.object({
  company_name: z.string().min(1),
  registernummer: z.string().optional(),
  ust_idnr: z.string().regex(/^DE\d{9}$/).optional(),
});

const knownCompaniesSchema = z.array(knownCompanySchema);

/**
 * Read and validate the directory file (a JSON array of identities)
 *
 * @throws {ConfigError} On unreadable or invalid files
 */
export function loadKnownCompanies(path: string): KnownCompany[] {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new ConfigError(`Cannot read known companies from ${path}`, [errorMessage(err)]);
  }

  const parsed = knownCompaniesSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid known companies file ${path}`,
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }
  return parsed.data;
}

function matches(identity: CompanyIdentity, entry: KnownCompany): boolean {
  const name = normalizeCompanyName(identity.company_name);
  if (!name || name !== normalizeCompanyName(entry.company_name)) {
    return false;
  }
  if (identity.registernummer && entry.registernummer) {
    return (
      normalizeRegisternummer(identity.registernummer) ===
      normalizeRegisternummer(entry.registernummer)
    );
  }
  return true;
}

/**
 * Fill missing registernummer / ust_idnr from the first matching entry
 *
 * An entry matches on normalized company name; when both sides carry a
 * register number, it must match too. Present fields are never replaced.
 *
 * @returns the same identity when nothing was filled, else a new frozen copy
 */
export function enrichIdentity(
  identity: CompanyIdentity,
  known: readonly KnownCompany[],
): CompanyIdentity {
  const entry = known.find((candidate) => matches(identity, candidate));
  if (!entry) {
    return identity;
  }

  const registernummer = identity.registernummer ?? entry.registernummer;
  const ustIdnr = identity.ust_idnr ?? entry.ust_idnr;
  if (registernummer === identity.registernummer && ustIdnr === identity.ust_idnr) {
    return identity;
  }

  logger.debug("Identity completed from known companies", {
    company: identity.company_name,
    filled: [
      registernummer !== identity.registernummer ? "registernummer" : null,
      ustIdnr !== identity.ust_idnr ? "ust_idnr" : null,
    ].filter((field): field is string => field !== null),
  });

  return Object.freeze({
    company_name: identity.company_name,
    ...(registernummer ? { registernummer } : {}),
    ...(ustIdnr ? { ust_idnr: ustIdnr } : {}),
  });
}
