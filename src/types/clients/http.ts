/**
 * HTTP client type definitions
 */

export type HttpMethod = "GET" | "POST" | "HEAD";

/**
 * How the response body is returned
 * - text: UTF-8 string (HTML, XML)
 * - bytes: Buffer (PDF downloads)
 */
export type HttpResponseType = "text" | "bytes";

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  query?: Record<string, string | number | boolean>;
  /** URL-encoded form body (POST) */
  form?: Record<string, string>;
  timeoutMs?: number;
  /** Caller signal (attempt timeout / run deadline); aborts the request when fired */
  signal?: AbortSignal;
}

export interface HttpResponse<T> {
  status: number;
  /** Final URL after redirects */
  url: string;
  headers: Headers;
  body: T;
}

export interface HttpErrorDetails {
  status: number;
  statusText: string;
  url: string;
  bodySnippet?: string;
  headers?: Headers;
}

/**
 * Transport used by source adapters (injectable for tests)
 */
export interface HttpFetcher {
  text(req: HttpRequest): Promise<HttpResponse<string>>;
  bytes(req: HttpRequest): Promise<HttpResponse<Buffer>>;
}
