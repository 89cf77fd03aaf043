/**
 * Failure classification at the adapter boundary
 *
 * Maps HTTP errors, transport errors and blocked pages onto the closed
 * FailureKind taxonomy. Retry decisions downstream depend on the kind only.
 */

import type { SourceFailure } from "@/types";
import { HttpError } from "@/clients/http";
import { SourceFailureError, errorMessage } from "@/errors";
import {
  AUTH_REJECTED_STATUS_CODES,
  NOT_FOUND_STATUS_CODES,
  RATE_LIMITED_STATUS_CODE,
  TRANSIENT_STATUS_CODES,
} from "@/constants/clients/http";
import { CAPTCHA_MARKERS } from "@/constants/sources";

/** Node/undici error codes of a dropped or refused connection */
const TRANSIENT_ERROR_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ENOTFOUND",
  "EAI_AGAIN",
  "ETIMEDOUT",
  "EPIPE",
  "UND_ERR_SOCKET",
  "UND_ERR_CONNECT_TIMEOUT",
]);

/**
 * Classify a non-2xx HTTP response
 */
export function classifyHttpError(error: HttpError): SourceFailure {
  const detail = `HTTP ${error.status} ${error.statusText} - ${error.url}`;

  if (NOT_FOUND_STATUS_CODES.includes(error.status)) {
    return { kind: "RecordNotFound", detail };
  }
  if (AUTH_REJECTED_STATUS_CODES.includes(error.status)) {
    return { kind: "AuthExpired", detail };
  }
  if (error.status === RATE_LIMITED_STATUS_CODE) {
    const retryAfterMs = error.retryAfterMs();
    return {
      kind: "RateLimited",
      detail: retryAfterMs === null ? detail : `${detail} (retry after ${retryAfterMs}ms)`,
    };
  }
  if (TRANSIENT_STATUS_CODES.includes(error.status) || error.status >= 500) {
    return { kind: "TransientNetwork", detail };
  }
  return { kind: "MalformedResponse", detail };
}

function errorCode(error: Error): string | undefined {
  const candidates: unknown[] = [error, error.cause];
  for (const candidate of candidates) {
    if (typeof candidate === "object" && candidate !== null && "code" in candidate) {
      const { code } = candidate;
      if (typeof code === "string") return code;
    }
  }
  return undefined;
}

/**
 * Classify anything thrown during an attempt
 *
 * Unknown errors are MalformedResponse (non-retryable by default):
 * an adapter bug should not be hammered with retries.
 */
export function classifyThrown(error: unknown): SourceFailure {
  if (error instanceof SourceFailureError) {
    return error.toFailure();
  }
  if (error instanceof HttpError) {
    return classifyHttpError(error);
  }
  if (error instanceof Error) {
    if (error.name === "AbortError" || error.name === "TimeoutError") {
      return { kind: "Timeout", detail: error.message || "Request aborted" };
    }

    const code = errorCode(error);
    if (code && TRANSIENT_ERROR_CODES.has(code)) {
      return { kind: "TransientNetwork", detail: `${code}: ${error.message}` };
    }
    // fetch() rejects with a bare TypeError on network failure
    if (error.name === "TypeError" && /fetch failed|network/i.test(error.message)) {
      return { kind: "TransientNetwork", detail: error.message };
    }
  }
  return { kind: "MalformedResponse", detail: `Unexpected error: ${errorMessage(error)}` };
}

/**
 * Detect pages answered with 200 that are not the requested content
 *
 * @returns the failure to report, or null for a regular page
 */
export function inspectPage(
  page: { body: string; url: string },
  options: { loginWallUrlMarkers?: string[]; loginWallBodyMarkers?: string[] } = {},
): SourceFailure | null {
  const url = page.url.toLowerCase();
  const body = page.body.toLowerCase();

  if ((options.loginWallUrlMarkers ?? []).some((marker) => url.includes(marker))) {
    return { kind: "AuthExpired", detail: `Redirected to login wall: ${page.url}` };
  }
  if ((options.loginWallBodyMarkers ?? []).some((marker) => body.includes(marker.toLowerCase()))) {
    return { kind: "AuthExpired", detail: `Login wall served instead of content: ${page.url}` };
  }
  if (CAPTCHA_MARKERS.some((marker) => body.includes(marker))) {
    return { kind: "RateLimited", detail: `Captcha page: ${page.url}` };
  }
  return null;
}

/**
 * True when the page body carries one of the "no results" markers
 */
export function isEmptySearch(body: string, markers: string[]): boolean {
  const lower = body.toLowerCase();
  return markers.some((marker) => lower.includes(marker));
}
