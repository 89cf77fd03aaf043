/**
 * Business-data aggregator adapter
 *
 * Flow: search by company name (and register number when known), follow
 * the matching result to the company detail page.
 */

import type { SourceAdapter } from "@/interfaces";
import type { AdapterContext, FetchOutcome } from "@/types";
import {
  NORTHDATA_BASE_URL,
  NORTHDATA_NO_RESULTS_MARKERS,
  NORTHDATA_SEARCH_PATH,
  SOURCE_REQUEST_HEADERS,
} from "@/constants/sources";
import type { AdapterOptions } from "../shared";
import {
  artifactReference,
  extractLinks,
  findCompanyLink,
  inspectPage,
  isEmptySearch,
  resolveAdapterOptions,
} from "../shared";

export function createNorthdataAdapter(options: AdapterOptions = {}): SourceAdapter {
  const { http, clock, requestTimeoutMs } = resolveAdapterOptions(options);

  async function fetch(ctx: AdapterContext): Promise<FetchOutcome> {
    const { identity, signal } = ctx;
    const query = [identity.company_name, identity.registernummer].filter(Boolean).join(" ");

    const search = await http.text({
      method: "GET",
      url: NORTHDATA_BASE_URL + NORTHDATA_SEARCH_PATH,
      query: { query },
      headers: SOURCE_REQUEST_HEADERS,
      timeoutMs: requestTimeoutMs,
      signal,
    });

    const blocked = inspectPage(search);
    if (blocked) return { ok: false, failure: blocked };

    if (isEmptySearch(search.body, NORTHDATA_NO_RESULTS_MARKERS)) {
      return { ok: false, failure: { kind: "RecordNotFound", detail: `No search results for "${query}"` } };
    }

    const companyLink = findCompanyLink(extractLinks(search.body, search.url), identity);
    if (!companyLink) {
      return {
        ok: false,
        failure: { kind: "RecordNotFound", detail: `No search result matches "${identity.company_name}"` },
      };
    }

    const detail = await http.text({
      method: "GET",
      url: companyLink.href,
      headers: SOURCE_REQUEST_HEADERS,
      timeoutMs: requestTimeoutMs,
      signal,
    });

    const detailBlocked = inspectPage(detail);
    if (detailBlocked) return { ok: false, failure: detailBlocked };

    return {
      ok: true,
      payload: {
        source: "northdata",
        fetchedAt: clock().toISOString(),
        documents: [
          {
            format: "html",
            body: detail.body,
            artifactField: "html_filepath",
            reference: artifactReference("northdata", identity, "northdata.html"),
          },
        ],
      },
    };
  }

  return {
    id: "northdata",
    formats: ["html"],
    requiresSession: false,
    requiredIdentity: ["company_name"],
    fetch,
  };
}
