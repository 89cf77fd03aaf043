/**
 * HTTP client public API
 */

export { fetchText, fetchBytes, defaultHttpFetcher, buildUrl } from "./httpClient";
export { HttpError } from "./httpError";
export type {
  HttpRequest,
  HttpResponse,
  HttpMethod,
  HttpErrorDetails,
  HttpFetcher,
} from "@/types";
