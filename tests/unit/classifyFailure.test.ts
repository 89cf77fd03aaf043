/**
 * Unit tests for failure classification at the adapter boundary
 */

import { describe, it, expect } from "vitest";
import { HttpError } from "@/clients/http";
import { SourceFailureError } from "@/errors";
import {
  classifyHttpError,
  classifyThrown,
  inspectPage,
  isEmptySearch,
} from "@/sources/shared/classifyFailure";

function httpError(status: number, statusText: string, headers?: Headers): HttpError {
  return new HttpError({ status, statusText, url: "https://www.northdata.de/search", headers });
}

describe("classifyHttpError", () => {
  it("should map status codes onto failure kinds", () => {
    expect(classifyHttpError(httpError(404, "Not Found")).kind).toBe("RecordNotFound");
    expect(classifyHttpError(httpError(410, "Gone")).kind).toBe("RecordNotFound");
    expect(classifyHttpError(httpError(401, "Unauthorized")).kind).toBe("AuthExpired");
    expect(classifyHttpError(httpError(403, "Forbidden")).kind).toBe("AuthExpired");
    expect(classifyHttpError(httpError(503, "Service Unavailable")).kind).toBe("TransientNetwork");
    expect(classifyHttpError(httpError(520, "Unknown")).kind).toBe("TransientNetwork");
    expect(classifyHttpError(httpError(400, "Bad Request")).kind).toBe("MalformedResponse");
  });

  it("should include Retry-After in rate-limit details", () => {
    const failure = classifyHttpError(httpError(429, "Too Many Requests", new Headers({ "Retry-After": "30" })));

    expect(failure).toEqual({
      kind: "RateLimited",
      detail: "HTTP 429 Too Many Requests - https://www.northdata.de/search (retry after 30000ms)",
    });
  });
});

describe("classifyThrown", () => {
  it("should unwrap already classified failures", () => {
    expect(classifyThrown(new SourceFailureError("RecordNotFound", "no hits"))).toEqual({
      kind: "RecordNotFound",
      detail: "no hits",
    });
  });

  it("should treat aborts as timeouts", () => {
    const abort = new Error("This operation was aborted");
    abort.name = "AbortError";

    expect(classifyThrown(abort)).toEqual({ kind: "Timeout", detail: "This operation was aborted" });
  });

  it("should treat connection errors as transient", () => {
    const reset = Object.assign(new Error("socket hang up"), { code: "ECONNRESET" });
    const fetchFailed = new TypeError("fetch failed", {
      cause: Object.assign(new Error("getaddrinfo"), { code: "ENOTFOUND" }),
    });

    expect(classifyThrown(reset)).toEqual({ kind: "TransientNetwork", detail: "ECONNRESET: socket hang up" });
    expect(classifyThrown(fetchFailed)).toEqual({ kind: "TransientNetwork", detail: "ENOTFOUND: fetch failed" });
  });

  it("should classify anything else as a malformed response", () => {
    expect(classifyThrown("boom")).toEqual({ kind: "MalformedResponse", detail: "Unexpected error: boom" });
  });
});

describe("inspectPage", () => {
  const options = { loginWallUrlMarkers: ["/authwall"], loginWallBodyMarkers: ['name="session_key"'] };

  it("should detect a redirect to the login wall", () => {
    const failure = inspectPage({ body: "<html></html>", url: "https://www.linkedin.com/authwall?trk=x" }, options);

    expect(failure?.kind).toBe("AuthExpired");
  });

  it("should detect a login form served in place of the page", () => {
    const failure = inspectPage(
      { body: '<form><input name="session_key"></form>', url: "https://www.linkedin.com/company/x/about/" },
      options,
    );

    expect(failure?.kind).toBe("AuthExpired");
  });

  it("should treat captcha pages as rate limiting", () => {
    const failure = inspectPage({ body: "<h1>Please solve the CAPTCHA</h1>", url: "https://www.northdata.de/x" });

    expect(failure).toEqual({ kind: "RateLimited", detail: "Captcha page: https://www.northdata.de/x" });
  });

  it("should pass regular pages", () => {
    expect(inspectPage({ body: "<h1>MAGNA</h1>", url: "https://www.northdata.de/x" }, options)).toBeNull();
  });
});

describe("isEmptySearch", () => {
  it("should match no-results markers case-insensitively", () => {
    expect(isEmptySearch("<p>Keine Treffer gefunden</p>", ["keine treffer"])).toBe(true);
    expect(isEmptySearch("<p>1 Treffer</p>", ["keine treffer"])).toBe(false);
  });
});
