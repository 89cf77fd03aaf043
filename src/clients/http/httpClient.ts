/**
 * HTTP client wrapper: text/bytes client using native fetch
 * Supports timeouts, caller abort signals, query params, form bodies
 * and structured error handling.
 *
 * One call is one attempt: retries are owned by the aggregation
 * retry controller, which knows the failure taxonomy and the budgets.
 */

import type {
  HttpFetcher,
  HttpRequest,
  HttpResponse,
  HttpResponseType,
} from "@/types";
import { HttpError } from "./httpError";
import {
  ACCEPT_HEADERS,
  DEFAULT_HTTP_TIMEOUT_MS,
  ERROR_BODY_SNIPPET_MAX_LENGTH,
} from "@/constants/clients/http";
import * as logger from "@/logger";

/**
 * Build URL with query parameters
 */
export function buildUrl(
  baseUrl: string,
  query?: Record<string, string | number | boolean>,
): string {
  if (!query || Object.keys(query).length === 0) {
    return baseUrl;
  }

  const url = new URL(baseUrl);
  Object.entries(query).forEach(([key, value]) => {
    url.searchParams.append(key, String(value));
  });

  return url.toString();
}

/**
 * Extract a snippet of the error response body for debugging
 */
async function extractBodySnippet(response: Response): Promise<string | undefined> {
  try {
    const text = await response.text();
    if (!text) {
      return undefined;
    }
    return text.length > ERROR_BODY_SNIPPET_MAX_LENGTH
      ? text.substring(0, ERROR_BODY_SNIPPET_MAX_LENGTH) + "..."
      : text;
  } catch (err) {
    logger.debug("Could not read error body", {
      url: response.url,
      error: err instanceof Error ? err.message : String(err),
    });
    return undefined;
  }
}

/**
 * Perform a single HTTP request attempt
 *
 * The request is aborted when either the timeout elapses or the caller
 * signal fires, whichever comes first. Abort surfaces as the platform
 * AbortError / TimeoutError so callers can classify it.
 */
async function performRequest(
  req: HttpRequest,
  responseType: HttpResponseType,
): Promise<Response> {
  const timeoutMs = req.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
  const url = buildUrl(req.url, req.query);

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
  const onCallerAbort = () => controller.abort();

  if (req.signal) {
    if (req.signal.aborted) {
      controller.abort();
    } else {
      req.signal.addEventListener("abort", onCallerAbort, { once: true });
    }
  }

  try {
    // Defaults first, caller headers override
    const headers: Record<string, string> = {
      Accept: ACCEPT_HEADERS[responseType],
      ...req.headers,
    };

    const options: RequestInit = {
      method: req.method,
      headers,
      signal: controller.signal,
      redirect: "follow",
    };

    if (req.form) {
      headers["Content-Type"] = "application/x-www-form-urlencoded";
      options.body = new URLSearchParams(req.form).toString();
    }

    const response = await fetch(url, options);

    if (!response.ok) {
      const bodySnippet = await extractBodySnippet(response);
      throw new HttpError({
        status: response.status,
        statusText: response.statusText,
        url,
        bodySnippet,
        headers: response.headers,
      });
    }

    return response;
  } finally {
    clearTimeout(timeoutId);
    req.signal?.removeEventListener("abort", onCallerAbort);
  }
}

/**
 * Fetch a document as UTF-8 text
 *
 * @throws {HttpError} On non-2xx status codes
 * @throws {Error} On network errors, timeouts and aborts
 */
export async function fetchText(req: HttpRequest): Promise<HttpResponse<string>> {
  const response = await performRequest(req, "text");
  const body = await response.text();

  logger.debug("HTTP text response", {
    method: req.method,
    url: response.url || req.url,
    status: response.status,
    length: body.length,
  });

  return {
    status: response.status,
    url: response.url || req.url,
    headers: response.headers,
    body,
  };
}

/**
 * Fetch a document as raw bytes (PDF downloads)
 *
 * @throws {HttpError} On non-2xx status codes
 * @throws {Error} On network errors, timeouts and aborts
 */
export async function fetchBytes(req: HttpRequest): Promise<HttpResponse<Buffer>> {
  const response = await performRequest(req, "bytes");
  const body = Buffer.from(await response.arrayBuffer());

  logger.debug("HTTP bytes response", {
    method: req.method,
    url: response.url || req.url,
    status: response.status,
    length: body.length,
  });

  return {
    status: response.status,
    url: response.url || req.url,
    headers: response.headers,
    body,
  };
}

/**
 * Default transport for source adapters
 */
export const defaultHttpFetcher: HttpFetcher = {
  text: fetchText,
  bytes: fetchBytes,
};
