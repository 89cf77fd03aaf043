/**
 * Commercial-register lookup adapter
 *
 * Flow: submit the extended search for the register number, then download
 * the structured extract (SI, XML) and the current printout (AD, PDF)
 * linked from the first result.
 */

import type { SourceAdapter } from "@/interfaces";
import type { AdapterContext, FetchOutcome, RawDocument } from "@/types";
import {
  HANDELSREGISTER_BASE_URL,
  HANDELSREGISTER_DOCUMENT_LABELS,
  HANDELSREGISTER_NO_RESULTS_MARKERS,
  HANDELSREGISTER_SEARCH_PATH,
  SOURCE_REQUEST_HEADERS,
} from "@/constants/sources";
import { splitRegisternummer } from "@/utils/identity/companyIdentity";
import * as logger from "@/logger";
import type { AdapterOptions } from "../shared";
import {
  artifactReference,
  extractLinks,
  findLinkByExactText,
  inspectPage,
  isEmptySearch,
  resolveAdapterOptions,
} from "../shared";

export function createHandelsregisterAdapter(options: AdapterOptions = {}): SourceAdapter {
  const { http, clock, requestTimeoutMs } = resolveAdapterOptions(options);

  async function fetch(ctx: AdapterContext): Promise<FetchOutcome> {
    const { identity, signal } = ctx;
    const register = identity.registernummer ? splitRegisternummer(identity.registernummer) : null;
    if (!register) {
      return {
        ok: false,
        failure: {
          kind: "InvalidIdentity",
          detail: `Unrecognized register number: ${identity.registernummer ?? "(none)"}`,
        },
      };
    }

    const searchUrl = HANDELSREGISTER_BASE_URL + HANDELSREGISTER_SEARCH_PATH;
    const search = await http.text({
      method: "POST",
      url: searchUrl,
      headers: SOURCE_REQUEST_HEADERS,
      form: {
        registerArt: register.type,
        registerNummer: register.number,
        schlagwoerter: identity.company_name,
        suchTyp: "n",
      },
      timeoutMs: requestTimeoutMs,
      signal,
    });

    const blocked = inspectPage(search);
    if (blocked) return { ok: false, failure: blocked };

    if (isEmptySearch(search.body, HANDELSREGISTER_NO_RESULTS_MARKERS)) {
      return {
        ok: false,
        failure: { kind: "RecordNotFound", detail: `No register entry for ${register.type} ${register.number}` },
      };
    }

    const links = extractLinks(search.body, search.url);
    const siLink = findLinkByExactText(links, HANDELSREGISTER_DOCUMENT_LABELS.SI);
    const adLink = findLinkByExactText(links, HANDELSREGISTER_DOCUMENT_LABELS.AD);
    if (!siLink && !adLink) {
      return {
        ok: false,
        failure: { kind: "RecordNotFound", detail: "Search result offers no register documents" },
      };
    }

    const documents: RawDocument[] = [];
    const key = `${register.type}${register.number}`;

    if (siLink) {
      const si = await http.text({
        method: "GET",
        url: siLink.href,
        headers: SOURCE_REQUEST_HEADERS,
        timeoutMs: requestTimeoutMs,
        signal,
      });
      documents.push({
        format: "xml",
        body: si.body,
        artifactField: "xml_filepath",
        reference: artifactReference("handelsregister", identity, `${key}_SI.xml`),
      });
    }

    if (adLink) {
      const ad = await http.bytes({
        method: "GET",
        url: adLink.href,
        headers: SOURCE_REQUEST_HEADERS,
        timeoutMs: requestTimeoutMs,
        signal,
      });
      documents.push({
        format: "pdf",
        body: ad.body,
        artifactField: "pdf_filepath",
        reference: artifactReference("handelsregister", identity, `${key}_AD.pdf`),
      });
    }

    logger.debug("Register documents downloaded", {
      source: "handelsregister",
      register: key,
      documents: documents.length,
    });

    return {
      ok: true,
      payload: { source: "handelsregister", fetchedAt: clock().toISOString(), documents },
    };
  }

  return {
    id: "handelsregister",
    formats: ["xml", "pdf"],
    requiresSession: false,
    requiredIdentity: ["registernummer"],
    fetch,
  };
}
