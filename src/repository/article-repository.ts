/**
 * Cache-checked access to PMC articles.
 *
 * Search results are cached under `search_{query}_{maxResults}` and parsed
 * articles under `article_{pmcId}`. A failed cache write is logged and the
 * freshly computed value is still returned.
 */

import { type CacheStore, readCached } from "../cache/cache-store.js";
import { CacheWriteError, FetchError, SearchError, describeError } from "../errors.js";
import { extractArticleFields } from "../extract/article-fields.js";
import { parseJatsDocument } from "../extract/jats-document.js";
import { locateMethods } from "../extract/methods-extractor.js";
import { type Logger, silentLogger } from "../logging/logger.js";
import { ArticleSchema, IdListSchema, freezeArticle } from "../schemas.js";
import type { Article } from "../types.js";
import { type ArticleFetcher, type ArticleSearcher, normalizePmcid } from "./eutils.js";

export const DEFAULT_MAX_RESULTS = 5;

export interface ArticleFailure {
  pmcId: string;
  error: FetchError;
}

export interface FetchAllResult {
  articles: Article[];
  failures: ArticleFailure[];
}

export interface ArticleRepository {
  /** PMC ids of open access articles matching `query`, most relevant first. */
  search(query: string, maxResults?: number): Promise<string[]>;
  fetch(pmcId: string): Promise<Article>;
  /** Fetch each id in order; failures are collected rather than thrown. */
  fetchAll(pmcIds: readonly string[]): Promise<FetchAllResult>;
}

export interface ArticleRepositoryOptions {
  cache: CacheStore;
  searcher: ArticleSearcher;
  fetcher: ArticleFetcher;
  logger?: Logger;
  /** Clock used for the "current year" default */
  now?: () => Date;
}

export function pmcArticleUrl(pmcId: string): string {
  return `https://www.ncbi.nlm.nih.gov/pmc/articles/PMC${pmcId}/`;
}

/**
 * Build an Article from JATS XML.
 * Returns null when the document has no parseable article root.
 */
export function parseArticleXml(pmcId: string, xml: string, now: Date = new Date()): Article | null {
  const doc = parseJatsDocument(xml);
  if (!doc) return null;

  const fields = extractArticleFields(doc, now);
  const methods = locateMethods(doc);

  return freezeArticle({
    pmcId,
    pmid: fields.pmid,
    title: fields.title,
    authors: fields.authors,
    journal: fields.journal,
    year: fields.year,
    doi: fields.doi,
    abstract: fields.abstract,
    methodsText: methods?.text ?? null,
    fullTextUrl: pmcArticleUrl(pmcId),
  });
}

export function createArticleRepository(options: ArticleRepositoryOptions): ArticleRepository {
  const { cache, searcher, fetcher } = options;
  const logger = options.logger ?? silentLogger;
  const now = options.now ?? (() => new Date());

  const store = async (key: string, payload: unknown, subject: Record<string, unknown>): Promise<void> => {
    try {
      await cache.put(key, payload);
    } catch (err) {
      if (!(err instanceof CacheWriteError)) throw err;
      logger.warn("Could not cache result; continuing without it", { ...subject, reason: err.message });
    }
  };

  const search = async (query: string, maxResults: number = DEFAULT_MAX_RESULTS): Promise<string[]> => {
    if (!Number.isInteger(maxResults) || maxResults < 1) {
      throw new SearchError(query, `maxResults must be a positive integer, got ${maxResults}`);
    }

    const key = cache.keyFor(`search_${query}_${maxResults}`);
    const cached = await readCached(cache, key, IdListSchema);
    if (cached) {
      logger.debug("Search served from cache", { query, maxResults });
      return cached;
    }

    let ids: string[];
    try {
      ids = (await searcher.search(query, maxResults)).map(normalizePmcid);
    } catch (err) {
      if (err instanceof SearchError) throw err;
      throw new SearchError(query, describeError(err), { cause: err });
    }

    logger.info("Search completed", { query, results: ids.length });
    await store(key, ids, { query });
    return ids;
  };

  const fetch = async (pmcId: string): Promise<Article> => {
    const id = normalizePmcid(pmcId);
    const key = cache.keyFor(`article_${id}`);
    const cached = await readCached(cache, key, ArticleSchema);
    if (cached) {
      logger.debug("Article served from cache", { pmcId: id });
      return freezeArticle(cached);
    }

    let xml: string;
    try {
      xml = await fetcher.fetchXml(id);
    } catch (err) {
      if (err instanceof FetchError) throw err;
      throw new FetchError(id, describeError(err), { cause: err });
    }

    const article = parseArticleXml(id, xml, now());
    if (!article) {
      throw new FetchError(id, "document has no parseable <article> root");
    }

    logger.info("Article fetched", { pmcId: id, hasMethods: article.methodsText !== null });
    await store(key, article, { pmcId: id });
    return article;
  };

  const fetchAll = async (pmcIds: readonly string[]): Promise<FetchAllResult> => {
    const articles: Article[] = [];
    const failures: ArticleFailure[] = [];
    for (const pmcId of pmcIds) {
      try {
        articles.push(await fetch(pmcId));
      } catch (err) {
        if (!(err instanceof FetchError)) throw err;
        logger.warn("Skipping article that could not be fetched", { pmcId: err.subject, reason: err.message });
        failures.push({ pmcId: err.subject, error: err });
      }
    }
    return { articles, failures };
  };

  return { search, fetch, fetchAll };
}
