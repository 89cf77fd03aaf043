/**
 * Source adapter constants: base URLs, paths and page markers
 *
 * Markers are matched case-insensitively against response bodies to
 * classify pages that answer 200 but are not the expected content.
 */

/**
 * Commercial-register lookup service
 */
export const HANDELSREGISTER_BASE_URL = "https://www.handelsregister.de";
export const HANDELSREGISTER_SEARCH_PATH = "/rp_web/erweitertesuche.xhtml";
/** Link labels of the downloadable register documents */
export const HANDELSREGISTER_DOCUMENT_LABELS = {
  /** Aktueller Abdruck (PDF) */
  AD: "AD",
  /** Strukturierter Registerinhalt (XML) */
  SI: "SI",
} as const;
export const HANDELSREGISTER_NO_RESULTS_MARKERS = [
  "keine treffer",
  "no results",
  "aucun résultat",
];

/**
 * Business-data aggregator
 */
export const NORTHDATA_BASE_URL = "https://www.northdata.de";
export const NORTHDATA_SEARCH_PATH = "/search";
export const NORTHDATA_NO_RESULTS_MARKERS = ["keine ergebnisse", "no results"];

/**
 * Professional network
 */
export const LINKEDIN_BASE_URL = "https://www.linkedin.com";
export const LINKEDIN_COMPANY_SEARCH_PATH = "/search/results/companies/";
/** Session cookie name the stored credential is sent as */
export const LINKEDIN_SESSION_COOKIE = "li_at";
/** Final-URL fragments of a redirect to the login wall */
export const LINKEDIN_LOGIN_WALL_URL_MARKERS = [
  "/authwall",
  "/login",
  "/checkpoint/",
  "session_redirect",
];
/** Body markers of a login wall served in place of the page */
export const LINKEDIN_LOGIN_WALL_BODY_MARKERS = ["authwall", 'name="session_key"'];

/**
 * Official company register
 */
export const UNTERNEHMENSREGISTER_BASE_URL = "https://www.unternehmensregister.de";
export const UNTERNEHMENSREGISTER_SEARCH_PATH = "/ureg/result.html";
export const UNTERNEHMENSREGISTER_ANNUAL_REPORT_LINK_TEXT =
  "Jahresabschluss zum Geschäftsjahr";
export const UNTERNEHMENSREGISTER_NO_RESULTS_MARKERS = [
  "keine treffer",
  "es wurden keine",
];

/**
 * Captcha / bot-check markers shared by all sources
 * A captcha page is treated as rate limiting.
 */
export const CAPTCHA_MARKERS = ["captcha", "are you a human", "bitte bestätigen sie"];

/**
 * Browser-like headers sent with every source request
 */
export const SOURCE_REQUEST_HEADERS: Record<string, string> = {
  "User-Agent":
    "Mozilla/5.0 (compatible; CompanyAggregator/1.0; +https://example.invalid/bot)",
  "Accept-Language": "de-DE,de;q=0.9,en;q=0.8",
};
