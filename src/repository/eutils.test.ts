/**
 * Tests for the E-utilities search and fetch client.
 */

import { beforeEach, describe, expect, it, vi } from "vitest";
import { FetchError, SearchError } from "../errors.js";
import { createEutilsClient, normalizePmcid } from "./eutils.js";

const mockFetch = vi.fn();
vi.stubGlobal("fetch", mockFetch);

function createMockResponse(
  overrides: Partial<{
    ok: boolean;
    status: number;
    statusText: string;
    json: () => Promise<unknown>;
    text: () => Promise<string>;
    headers: Map<string, string>;
  }> = {},
) {
  const headers = new Map(overrides.headers ?? [["content-type", "text/xml; charset=UTF-8"]]);
  return {
    ok: overrides.ok ?? true,
    status: overrides.status ?? 200,
    statusText: overrides.statusText ?? "OK",
    json: overrides.json ?? (() => Promise.resolve({})),
    text: overrides.text ?? (() => Promise.resolve("<article></article>")),
    headers: {
      get: (key: string) => headers.get(key.toLowerCase()) ?? null,
    },
  };
}

function requestedUrl(callIndex = 0): URL {
  const call = mockFetch.mock.calls[callIndex];
  if (!call) throw new Error(`fetch call ${callIndex} not made`);
  return new URL(String(call[0]));
}

describe("normalizePmcid", () => {
  it("strips the PMC prefix", () => {
    expect(normalizePmcid("PMC1234567")).toBe("1234567");
    expect(normalizePmcid("pmc1234567")).toBe("1234567");
    expect(normalizePmcid("1234567")).toBe("1234567");
  });
});

describe("createEutilsClient().search", () => {
  beforeEach(() => {
    mockFetch.mockReset();
  });

  it("searches open access PMC articles by relevance", async () => {
    mockFetch.mockResolvedValueOnce(
      createMockResponse({
        json: () => Promise.resolve({ esearchresult: { count: "2", idlist: ["111", "222"] } }),
      }),
    );

    const ids = await createEutilsClient().search("western blot liver", 5);

    expect(ids).toEqual(["111", "222"]);
    const url = requestedUrl();
    expect(url.pathname).toBe("/entrez/eutils/esearch.fcgi");
    expect(url.searchParams.get("db")).toBe("pmc");
    expect(url.searchParams.get("term")).toBe("western blot liver AND open access[filter]");
    expect(url.searchParams.get("retmax")).toBe("5");
    expect(url.searchParams.get("sort")).toBe("relevance");
    expect(url.searchParams.get("retmode")).toBe("json");
  });

  it("passes API identification parameters", async () => {
    mockFetch.mockResolvedValueOnce(
      createMockResponse({ json: () => Promise.resolve({ esearchresult: { idlist: [] } }) }),
    );

    await createEutilsClient({ apiKey: "test-key", email: "lab@example.org", tool: "protocol-extractor" }).search(
      "PCR",
      3,
    );

    const url = requestedUrl();
    expect(url.searchParams.get("api_key")).toBe("test-key");
    expect(url.searchParams.get("email")).toBe("lab@example.org");
    expect(url.searchParams.get("tool")).toBe("protocol-extractor");
  });

  it("returns an empty list when nothing matches", async () => {
    mockFetch.mockResolvedValueOnce(
      createMockResponse({ json: () => Promise.resolve({ esearchresult: { count: "0", idlist: [] } }) }),
    );

    await expect(createEutilsClient().search("nothing", 5)).resolves.toEqual([]);
  });

  it("caps the list at maxResults", async () => {
    mockFetch.mockResolvedValueOnce(
      createMockResponse({ json: () => Promise.resolve({ esearchresult: { idlist: ["1", "2", "3"] } }) }),
    );

    await expect(createEutilsClient().search("PCR", 2)).resolves.toEqual(["1", "2"]);
  });

  it("throws SearchError on a malformed response", async () => {
    mockFetch.mockResolvedValueOnce(
      createMockResponse({ json: () => Promise.resolve({ esearchresult: { ERROR: "Invalid query" } }) }),
    );

    await expect(createEutilsClient().search("PCR", 5)).rejects.toThrow(SearchError);
  });

  it("throws SearchError when the body is not JSON", async () => {
    mockFetch.mockResolvedValueOnce(
      createMockResponse({ json: () => Promise.reject(new SyntaxError("Unexpected token <")) }),
    );

    await expect(createEutilsClient().search("PCR", 5)).rejects.toThrow(/not valid JSON/);
  });

  it("throws SearchError on HTTP errors", async () => {
    mockFetch.mockResolvedValueOnce(
      createMockResponse({ ok: false, status: 429, statusText: "Too Many Requests" }),
    );

    await expect(createEutilsClient().search("PCR", 5)).rejects.toThrow(
      'Search failed for "PCR": HTTP 429 Too Many Requests',
    );
  });

  it("reports timeouts", async () => {
    const timeout = new Error("The operation was aborted due to timeout");
    timeout.name = "TimeoutError";
    mockFetch.mockRejectedValueOnce(timeout);

    await expect(createEutilsClient({ searchTimeoutMs: 250 }).search("PCR", 5)).rejects.toThrow(
      'Search failed for "PCR": timed out after 250 ms',
    );
  });

  it("passes an abort signal to fetch", async () => {
    mockFetch.mockResolvedValueOnce(
      createMockResponse({ json: () => Promise.resolve({ esearchresult: { idlist: [] } }) }),
    );

    await createEutilsClient().search("PCR", 5);

    expect(mockFetch).toHaveBeenCalledWith(
      expect.any(String),
      expect.objectContaining({ signal: expect.any(AbortSignal) }),
    );
  });
});

describe("createEutilsClient().fetchXml", () => {
  beforeEach(() => {
    mockFetch.mockReset();
  });

  it("fetches PMC XML by numeric id", async () => {
    const xml = "<pmc-articleset><article><body><p>x</p></body></article></pmc-articleset>";
    mockFetch.mockResolvedValueOnce(createMockResponse({ text: () => Promise.resolve(xml) }));

    await expect(createEutilsClient().fetchXml("PMC7654321")).resolves.toBe(xml);

    const url = requestedUrl();
    expect(url.pathname).toBe("/entrez/eutils/efetch.fcgi");
    expect(url.searchParams.get("db")).toBe("pmc");
    expect(url.searchParams.get("id")).toBe("7654321");
    expect(url.searchParams.get("retmode")).toBe("xml");
  });

  it("throws FetchError on HTTP errors", async () => {
    mockFetch.mockResolvedValueOnce(createMockResponse({ ok: false, status: 404, statusText: "Not Found" }));

    await expect(createEutilsClient().fetchXml("7654321")).rejects.toThrow(
      "Fetch failed for article 7654321: HTTP 404 Not Found",
    );
  });

  it("throws FetchError when the response is not XML", async () => {
    mockFetch.mockResolvedValueOnce(
      createMockResponse({ headers: new Map([["content-type", "text/html"]]) }),
    );

    await expect(createEutilsClient().fetchXml("7654321")).rejects.toThrow(/Content-Type: text\/html/);
  });

  it("throws FetchError on network errors", async () => {
    mockFetch.mockRejectedValueOnce(new Error("ECONNREFUSED"));

    const error = await createEutilsClient()
      .fetchXml("7654321")
      .then(
        () => null,
        (err: unknown) => err,
      );

    expect(error).toBeInstanceOf(FetchError);
    expect(error instanceof FetchError ? error.subject : "").toBe("7654321");
  });
});
