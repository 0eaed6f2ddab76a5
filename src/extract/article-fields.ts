/**
 * Bibliographic field rules for JATS articles.
 *
 * Every rule searches the whole article tree and takes the first match in
 * document order. Absent fields fall back to a default or null.
 */

import {
  type JatsDocument,
  elementText,
  findChild,
  findDescendants,
  findFirstDescendant,
} from "./jats-document.js";

export const UNTITLED = "untitled";
export const UNKNOWN_JOURNAL = "Unknown journal";

export interface ArticleFields {
  title: string;
  authors: string[];
  journal: string;
  year: string;
  doi: string | null;
  pmid: string | null;
  abstract: string | null;
}

/** Text of the first `<article-title>`, or "untitled". */
export function extractTitle(doc: JatsDocument): string {
  const title = elementText(findFirstDescendant(doc.article.children, "article-title"));
  return title || UNTITLED;
}

/**
 * "Given-names Surname" for every author contributor.
 * Contributors without a surname (e.g. collaborations) are skipped.
 */
export function extractAuthors(doc: JatsDocument): string[] {
  const authors: string[] = [];
  for (const contrib of findDescendants(doc.article.children, "contrib")) {
    if (contrib.attrs["contrib-type"] !== "author") continue;
    const surname = elementText(findFirstDescendant(contrib.children, "surname"));
    if (!surname) continue;
    const givenNames = elementText(findFirstDescendant(contrib.children, "given-names"));
    authors.push(`${givenNames} ${surname}`.trim());
  }
  return authors;
}

export function extractJournal(doc: JatsDocument): string {
  const journal = elementText(findFirstDescendant(doc.article.children, "journal-title"));
  return journal || UNKNOWN_JOURNAL;
}

/** Year of the first `<pub-date>` that has one, else the current year. */
export function extractYear(doc: JatsDocument, now: Date = new Date()): string {
  for (const pubDate of findDescendants(doc.article.children, "pub-date")) {
    const year = elementText(findChild(pubDate.children, "year"));
    if (year) return year;
  }
  return String(now.getFullYear());
}

/** Value of the first `<article-id pub-id-type="…">` of the given type. */
export function extractArticleId(doc: JatsDocument, idType: string): string | null {
  for (const articleId of findDescendants(doc.article.children, "article-id")) {
    if (articleId.attrs["pub-id-type"] !== idType) continue;
    const value = elementText(articleId);
    if (value) return value;
  }
  return null;
}

export function extractAbstract(doc: JatsDocument): string | null {
  const abstract = findFirstDescendant(doc.article.children, "abstract");
  if (!abstract) return null;
  return elementText(abstract) || null;
}

export function extractArticleFields(doc: JatsDocument, now: Date = new Date()): ArticleFields {
  return {
    title: extractTitle(doc),
    authors: extractAuthors(doc),
    journal: extractJournal(doc),
    year: extractYear(doc, now),
    doi: extractArticleId(doc, "doi"),
    pmid: extractArticleId(doc, "pmid"),
    abstract: extractAbstract(doc),
  };
}
