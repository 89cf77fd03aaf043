/**
 * HttpError class: structured error for HTTP failures
 *
 * Thrown by the HTTP client for every non-2xx response.
 */

import type { HttpErrorDetails } from "@/types";

/**
 * Structured error class for HTTP failures
 * Contains status, URL, and optional response body snippet for debugging
 */
export class HttpError extends Error {
  public readonly status: number;
  public readonly statusText: string;
  public readonly url: string;
  public readonly bodySnippet?: string;
  public readonly headers?: Headers;

  constructor(details: HttpErrorDetails) {
    super(
      `HTTP ${details.status} ${details.statusText} - ${details.url}${
        details.bodySnippet ? ` - ${details.bodySnippet}` : ""
      }`,
    );
    this.name = "HttpError";
    this.status = details.status;
    this.statusText = details.statusText;
    this.url = details.url;
    this.bodySnippet = details.bodySnippet;
    this.headers = details.headers;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, HttpError);
    }
  }

  /**
   * Retry-After header in milliseconds (seconds or HTTP-date form),
   * or null when absent or unparseable
   */
  retryAfterMs(now: number = Date.now()): number | null {
    const header = this.headers?.get("retry-after");
    if (!header) {
      return null;
    }

    const seconds = parseInt(header, 10);
    if (!isNaN(seconds) && seconds > 0) {
      return seconds * 1000;
    }

    const date = new Date(header);
    if (!isNaN(date.getTime())) {
      const delayMs = date.getTime() - now;
      return delayMs > 0 ? delayMs : null;
    }

    return null;
  }
}
