/**
 * Official company register adapter
 *
 * Flow: search by company name (and register number when known), keep
 * the result page, then open the latest annual report linked from it.
 * A company without a published annual report still yields the search
 * result document.
 */

import type { SourceAdapter } from "@/interfaces";
import type { AdapterContext, FetchOutcome, RawDocument } from "@/types";
import {
  SOURCE_REQUEST_HEADERS,
  UNTERNEHMENSREGISTER_ANNUAL_REPORT_LINK_TEXT,
  UNTERNEHMENSREGISTER_BASE_URL,
  UNTERNEHMENSREGISTER_NO_RESULTS_MARKERS,
  UNTERNEHMENSREGISTER_SEARCH_PATH,
} from "@/constants/sources";
import * as logger from "@/logger";
import type { AdapterOptions } from "../shared";
import {
  artifactReference,
  extractLinks,
  findLinkContainingText,
  inspectPage,
  isEmptySearch,
  resolveAdapterOptions,
} from "../shared";

export function createUnternehmensregisterAdapter(options: AdapterOptions = {}): SourceAdapter {
  const { http, clock, requestTimeoutMs } = resolveAdapterOptions(options);

  async function fetch(ctx: AdapterContext): Promise<FetchOutcome> {
    const { identity, signal } = ctx;

    const search = await http.text({
      method: "GET",
      url: UNTERNEHMENSREGISTER_BASE_URL + UNTERNEHMENSREGISTER_SEARCH_PATH,
      query: {
        companyName: identity.company_name,
        ...(identity.registernummer ? { registerNumber: identity.registernummer } : {}),
      },
      headers: SOURCE_REQUEST_HEADERS,
      timeoutMs: requestTimeoutMs,
      signal,
    });

    const blocked = inspectPage(search);
    if (blocked) return { ok: false, failure: blocked };

    if (isEmptySearch(search.body, UNTERNEHMENSREGISTER_NO_RESULTS_MARKERS)) {
      return {
        ok: false,
        failure: { kind: "RecordNotFound", detail: `No register publications for "${identity.company_name}"` },
      };
    }

    const documents: RawDocument[] = [
      {
        format: "html",
        body: search.body,
        artifactField: "search_results_html",
        reference: artifactReference("unternehmensregister", identity, "search_results.html"),
      },
    ];

    const reportLink = findLinkContainingText(
      extractLinks(search.body, search.url),
      UNTERNEHMENSREGISTER_ANNUAL_REPORT_LINK_TEXT,
    );

    if (reportLink) {
      const report = await http.text({
        method: "GET",
        url: reportLink.href,
        headers: SOURCE_REQUEST_HEADERS,
        timeoutMs: requestTimeoutMs,
        signal,
      });

      const reportBlocked = inspectPage(report);
      if (reportBlocked) return { ok: false, failure: reportBlocked };

      documents.push({
        format: "html",
        body: report.body,
        artifactField: "jahresabschluss_html",
        reference: artifactReference("unternehmensregister", identity, "jahresabschluss.html"),
      });
    } else {
      logger.debug("No annual report linked from search results", {
        source: "unternehmensregister",
        company: identity.company_name,
      });
    }

    return {
      ok: true,
      payload: { source: "unternehmensregister", fetchedAt: clock().toISOString(), documents },
    };
  }

  return {
    id: "unternehmensregister",
    formats: ["html"],
    requiresSession: false,
    requiredIdentity: ["company_name"],
    fetch,
  };
}
