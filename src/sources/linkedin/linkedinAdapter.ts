/**
 * Professional-network adapter (authenticated)
 *
 * Sends the stored session cookie, finds the company page through the
 * company search and fetches its "about" tab. A redirect to the login
 * wall is reported as AuthExpired so the session gets invalidated.
 */

import type { SourceAdapter } from "@/interfaces";
import type { AdapterContext, FetchOutcome } from "@/types";
import {
  LINKEDIN_BASE_URL,
  LINKEDIN_COMPANY_SEARCH_PATH,
  LINKEDIN_LOGIN_WALL_BODY_MARKERS,
  LINKEDIN_LOGIN_WALL_URL_MARKERS,
  LINKEDIN_SESSION_COOKIE,
  SOURCE_REQUEST_HEADERS,
} from "@/constants/sources";
import type { AdapterOptions } from "../shared";
import {
  artifactReference,
  extractLinks,
  inspectPage,
  resolveAdapterOptions,
} from "../shared";

const LOGIN_WALL = {
  loginWallUrlMarkers: LINKEDIN_LOGIN_WALL_URL_MARKERS,
  loginWallBodyMarkers: LINKEDIN_LOGIN_WALL_BODY_MARKERS,
};

/**
 * Company slug from a company page URL ("/company/magna-real-estate/" → "magna-real-estate")
 */
export function companySlug(href: string): string | null {
  const match = new URL(href).pathname.match(/^\/company\/([^/]+)/);
  return match ? decodeURIComponent(match[1]) : null;
}

export function createLinkedinAdapter(options: AdapterOptions = {}): SourceAdapter {
  const { http, clock, requestTimeoutMs } = resolveAdapterOptions(options);

  async function fetch(ctx: AdapterContext): Promise<FetchOutcome> {
    const { identity, session, signal } = ctx;
    if (!session) {
      return { ok: false, failure: { kind: "AuthExpired", detail: "No session available" } };
    }

    const headers = {
      ...SOURCE_REQUEST_HEADERS,
      Cookie: `${LINKEDIN_SESSION_COOKIE}=${session.credential}`,
    };

    const search = await http.text({
      method: "GET",
      url: LINKEDIN_BASE_URL + LINKEDIN_COMPANY_SEARCH_PATH,
      query: { keywords: identity.company_name },
      headers,
      timeoutMs: requestTimeoutMs,
      signal,
    });

    const blocked = inspectPage(search, LOGIN_WALL);
    if (blocked) return { ok: false, failure: blocked };

    const slug = extractLinks(search.body, search.url, 'a[href*="/company/"]')
      .map((link) => companySlug(link.href))
      .find((candidate): candidate is string => candidate !== null);
    if (!slug) {
      return {
        ok: false,
        failure: { kind: "RecordNotFound", detail: `No company page found for "${identity.company_name}"` },
      };
    }

    const about = await http.text({
      method: "GET",
      url: `${LINKEDIN_BASE_URL}/company/${encodeURIComponent(slug)}/about/`,
      headers,
      timeoutMs: requestTimeoutMs,
      signal,
    });

    const aboutBlocked = inspectPage(about, LOGIN_WALL);
    if (aboutBlocked) return { ok: false, failure: aboutBlocked };

    return {
      ok: true,
      payload: {
        source: "linkedin",
        fetchedAt: clock().toISOString(),
        documents: [
          {
            format: "html",
            body: about.body,
            artifactField: "about_html",
            reference: artifactReference("linkedin", identity, "about.html"),
          },
        ],
      },
    };
  }

  return {
    id: "linkedin",
    formats: ["html"],
    requiresSession: true,
    requiredIdentity: ["company_name"],
    fetch,
  };
}
