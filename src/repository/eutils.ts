/**
 * PMC search and fetch via NCBI E-utilities.
 *
 * Search: https://eutils.ncbi.nlm.nih.gov/entrez/eutils/esearch.fcgi?db=pmc&term={q}&retmode=json
 * Fetch:  https://eutils.ncbi.nlm.nih.gov/entrez/eutils/efetch.fcgi?db=pmc&id={id}&retmode=xml
 */

import { z } from "zod";
import { FetchError, SearchError, describeError } from "../errors.js";

const EUTILS_BASE = "https://eutils.ncbi.nlm.nih.gov/entrez/eutils";

/** Content types accepted as valid XML responses */
const VALID_XML_TYPES = ["text/xml", "application/xml"];

const USER_AGENT = "protocol-extractor/0.1.0";

/** Restricts PMC searches to the open access subset. */
const OPEN_ACCESS_FILTER = "open access[filter]";

export const DEFAULT_SEARCH_TIMEOUT_MS = 10_000;
export const DEFAULT_FETCH_TIMEOUT_MS = 30_000;

const ESearchResponseSchema = z.object({
  esearchresult: z.object({
    idlist: z.array(z.string()),
  }),
});

/** Finds article ids for a query. */
export interface ArticleSearcher {
  search(query: string, maxResults: number): Promise<string[]>;
}

/** Downloads the raw JATS XML of one article. */
export interface ArticleFetcher {
  fetchXml(pmcId: string): Promise<string>;
}

export interface EutilsOptions {
  apiKey?: string;
  email?: string;
  tool?: string;
  searchTimeoutMs?: number;
  fetchTimeoutMs?: number;
}

/** Strip "PMC" prefix if present, returning the numeric id. */
export function normalizePmcid(pmcid: string): string {
  return pmcid.trim().replace(/^PMC/i, "");
}

function isValidXmlContentType(contentType: string | null): boolean {
  if (!contentType) return false;
  const base = (contentType.split(";")[0] ?? "").trim().toLowerCase();
  return VALID_XML_TYPES.includes(base);
}

function isTimeout(err: unknown): boolean {
  return err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError");
}

export function createEutilsClient(options: EutilsOptions = {}): ArticleSearcher & ArticleFetcher {
  const searchTimeoutMs = options.searchTimeoutMs ?? DEFAULT_SEARCH_TIMEOUT_MS;
  const fetchTimeoutMs = options.fetchTimeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;

  const buildUrl = (tool: string, params: Record<string, string | number>): string => {
    const url = new URL(`${EUTILS_BASE}/${tool}.fcgi`);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, String(value));
    }
    if (options.apiKey) url.searchParams.set("api_key", options.apiKey);
    if (options.email) url.searchParams.set("email", options.email);
    if (options.tool) url.searchParams.set("tool", options.tool);
    return url.toString();
  };

  const search = async (query: string, maxResults: number): Promise<string[]> => {
    const url = buildUrl("esearch", {
      db: "pmc",
      term: `${query} AND ${OPEN_ACCESS_FILTER}`,
      retmode: "json",
      retmax: maxResults,
      sort: "relevance",
    });

    let response: Response;
    try {
      response = await fetch(url, {
        headers: { "User-Agent": USER_AGENT },
        signal: AbortSignal.timeout(searchTimeoutMs),
      });
    } catch (err) {
      const reason = isTimeout(err) ? `timed out after ${searchTimeoutMs} ms` : describeError(err);
      throw new SearchError(query, reason, { cause: err });
    }

    if (!response.ok) {
      throw new SearchError(query, `HTTP ${response.status} ${response.statusText}`);
    }

    let data: unknown;
    try {
      data = await response.json();
    } catch (err) {
      throw new SearchError(query, "response is not valid JSON", { cause: err });
    }

    const parsed = ESearchResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new SearchError(query, "response has no esearchresult.idlist", { cause: parsed.error });
    }
    return parsed.data.esearchresult.idlist.slice(0, maxResults);
  };

  const fetchXml = async (pmcId: string): Promise<string> => {
    const numericId = normalizePmcid(pmcId);
    const url = buildUrl("efetch", { db: "pmc", id: numericId, retmode: "xml" });

    let response: Response;
    try {
      response = await fetch(url, {
        headers: { "User-Agent": USER_AGENT },
        signal: AbortSignal.timeout(fetchTimeoutMs),
      });
    } catch (err) {
      const reason = isTimeout(err) ? `timed out after ${fetchTimeoutMs} ms` : describeError(err);
      throw new FetchError(numericId, reason, { cause: err });
    }

    if (!response.ok) {
      throw new FetchError(numericId, `HTTP ${response.status} ${response.statusText}`);
    }

    const contentType = response.headers.get("content-type");
    if (!isValidXmlContentType(contentType)) {
      throw new FetchError(numericId, `unexpected Content-Type: ${contentType ?? "none"} (expected XML)`);
    }

    try {
      return await response.text();
    } catch (err) {
      throw new FetchError(numericId, describeError(err), { cause: err });
    }
  };

  return { search, fetchXml };
}
