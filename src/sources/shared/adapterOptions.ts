/**
 * Construction options shared by the HTTP source adapters
 */

import type { HttpFetcher } from "@/types";
import { defaultHttpFetcher } from "@/clients/http";

export type AdapterOptions = {
  /** Transport (mocked in tests) */
  http?: HttpFetcher;
  /** Time source for fetchedAt stamps */
  clock?: () => Date;
  /** Per-request timeout in ms; the attempt signal still applies */
  requestTimeoutMs?: number;
};

export function resolveAdapterOptions(options: AdapterOptions = {}): {
  http: HttpFetcher;
  clock: () => Date;
  requestTimeoutMs?: number;
} {
  return {
    http: options.http ?? defaultHttpFetcher,
    clock: options.clock ?? (() => new Date()),
    requestTimeoutMs: options.requestTimeoutMs,
  };
}
