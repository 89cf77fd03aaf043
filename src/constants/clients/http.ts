/**
 * HTTP client constants: defaults and configuration
 */

/**
 * Default request timeout in milliseconds (30 seconds)
 */
export const DEFAULT_HTTP_TIMEOUT_MS = 30_000;

/**
 * Maximum length of error body snippet to include in error messages
 */
export const ERROR_BODY_SNIPPET_MAX_LENGTH = 200;

/**
 * Accept header per response type
 */
export const ACCEPT_HEADERS = {
  text: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
  bytes: "application/pdf,application/octet-stream;q=0.9,*/*;q=0.5",
} as const;

/**
 * HTTP status codes treated as transient (worth another attempt)
 * - 408: Request Timeout
 * - 5xx: Server errors
 */
export const TRANSIENT_STATUS_CODES = [408, 500, 502, 503, 504];

/**
 * HTTP status codes meaning the session was rejected
 */
export const AUTH_REJECTED_STATUS_CODES = [401, 403];

/**
 * HTTP status code for rate limiting
 */
export const RATE_LIMITED_STATUS_CODE = 429;

/**
 * HTTP status code for a missing record
 */
export const NOT_FOUND_STATUS_CODES = [404, 410];
