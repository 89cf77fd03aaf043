/**
 * Link extraction helpers for search-then-navigate sources
 */

import * as cheerio from "cheerio";
import type { CompanyIdentity, SourceId } from "@/types";
import {
  normalizeCompanyName,
  normalizeRegisternummer,
} from "@/utils/identity/companyIdentity";

export type PageLink = {
  text: string;
  /** Absolute URL */
  href: string;
};

/**
 * Resolve a possibly relative href against the page URL
 *
 * @returns absolute URL, or null for unusable hrefs (javascript:, #, malformed)
 */
export function resolveHref(href: string | undefined, pageUrl: string): string | null {
  if (!href || href.startsWith("#") || /^(javascript|mailto|tel):/i.test(href)) {
    return null;
  }
  try {
    return new URL(href, pageUrl).toString();
  } catch {
    return null;
  }
}

/**
 * All anchors of a page, in document order, with absolute URLs
 */
export function extractLinks(html: string, pageUrl: string, selector = "a[href]"): PageLink[] {
  const $ = cheerio.load(html);
  const links: PageLink[] = [];

  $(selector).each((_, el) => {
    const href = resolveHref($(el).attr("href"), pageUrl);
    if (href) {
      links.push({ text: $(el).text().replace(/\s+/g, " ").trim(), href });
    }
  });

  return links;
}

/**
 * First link whose text equals the label (case-insensitive)
 */
export function findLinkByExactText(links: PageLink[], label: string): PageLink | undefined {
  const wanted = label.toLowerCase();
  return links.find((link) => link.text.toLowerCase() === wanted);
}

/**
 * First link whose text contains the fragment (case-insensitive)
 */
export function findLinkContainingText(links: PageLink[], fragment: string): PageLink | undefined {
  const wanted = fragment.toLowerCase();
  return links.find((link) => link.text.toLowerCase().includes(wanted));
}

/**
 * Pick the search result that matches the identity
 *
 * A link naming the register number wins, then one whose normalized
 * text (up to the first comma, which separates the seat) equals the
 * normalized company name.
 */
export function findCompanyLink(
  links: PageLink[],
  identity: CompanyIdentity,
): PageLink | undefined {
  if (identity.registernummer) {
    const reg = normalizeRegisternummer(identity.registernummer);
    const byRegister = links.find((link) => normalizeRegisternummer(link.text).includes(reg));
    if (byRegister) return byRegister;
  }

  const name = normalizeCompanyName(identity.company_name);
  if (!name) return undefined;

  return links.find((link) => normalizeCompanyName(link.text.split(",")[0]) === name);
}

/**
 * Opaque artifact reference: <source>/<company key>/<file name>
 */
export function artifactReference(
  source: SourceId,
  identity: CompanyIdentity,
  fileName: string,
): string {
  const key = identity.registernummer
    ? normalizeRegisternummer(identity.registernummer)
    : normalizeCompanyName(identity.company_name).replace(/[^a-z0-9]+/g, "_").replace(/^_|_$/g, "");
  return `${source}/${key || "unknown"}/${fileName}`;
}
