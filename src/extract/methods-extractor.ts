/**
 * Methods-section location.
 *
 * An ordered list of strategies, each a pure function from a parsed
 * document to the methods text or null. The first strategy that returns
 * text wins; later strategies are not run. Empty text counts as no match.
 *
 * 1. titled-section: a `<sec>` whose `<title>` names a methods synonym.
 * 2. body-pattern: a "Methods:"-style run in the body text, ending at the
 *    next Results / Discussion / Conclusion.
 */

import {
  type JatsDocument,
  type JatsElement,
  type OrderedNode,
  findDescendants,
  getTagName,
  normalizeWhitespace,
  textOf,
} from "./jats-document.js";

export interface MethodsStrategy {
  name: string;
  extract: (doc: JatsDocument) => string | null;
}

/** Case-folded section titles that mark a methods section. */
export const METHODS_SECTION_TITLES: readonly string[] = [
  "methods",
  "materials and methods",
  "experimental procedures",
  "methodology",
  "experimental methods",
  "materials & methods",
  "experimental section",
  "experimental",
];

/** Body-text headings, in priority order. */
export const METHODS_BODY_PATTERNS: readonly string[] = ["Materials and Methods", "Methods", "Experimental"];

const SECTION_TERMINATORS = "(?:Results|Discussion|Conclusion)";

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function isMethodsTitle(title: string): boolean {
  const folded = title.toLowerCase();
  return METHODS_SECTION_TITLES.some((synonym) => folded.includes(synonym));
}

/** The section's children minus its own heading (the first direct `<title>`). */
function withoutHeading(section: JatsElement): OrderedNode[] {
  const index = section.children.findIndex((child) => getTagName(child) === "title");
  if (index === -1) return section.children;
  return [...section.children.slice(0, index), ...section.children.slice(index + 1)];
}

/** Text of the first `<sec>`, in document order, whose title names a methods synonym. */
export function titledSectionStrategy(doc: JatsDocument): string | null {
  for (const section of findDescendants(doc.article.children, "sec")) {
    const title = section.children.find((child) => getTagName(child) === "title");
    if (!title) continue;
    if (!isMethodsTitle(normalizeWhitespace(textOf([title])))) continue;
    const text = normalizeWhitespace(textOf(withoutHeading(section)));
    if (text) return text;
  }
  return null;
}

/** The text after the first body heading pattern that matches, up to the next results-type heading. */
export function bodyPatternStrategy(doc: JatsDocument): string | null {
  if (!doc.body) return null;
  const bodyText = textOf(doc.body.children);

  for (const pattern of METHODS_BODY_PATTERNS) {
    const regex = new RegExp(`${escapeRegExp(pattern)}[:\\s]+(.*?)${SECTION_TERMINATORS}`, "is");
    const match = regex.exec(bodyText);
    const text = normalizeWhitespace(match?.[1] ?? "");
    if (text) return text;
  }
  return null;
}

export const METHODS_STRATEGIES: readonly MethodsStrategy[] = [
  { name: "titled-section", extract: titledSectionStrategy },
  { name: "body-pattern", extract: bodyPatternStrategy },
];

export interface MethodsMatch {
  strategy: string;
  text: string;
}

/**
 * Run the strategies in order and report which one matched.
 * Null means the article has no methods section we can locate.
 */
export function locateMethods(
  doc: JatsDocument,
  strategies: readonly MethodsStrategy[] = METHODS_STRATEGIES,
): MethodsMatch | null {
  for (const strategy of strategies) {
    const text = strategy.extract(doc);
    if (text !== null) return { strategy: strategy.name, text };
  }
  return null;
}

/** Methods text of the document, or null. */
export function extractMethods(doc: JatsDocument): string | null {
  return locateMethods(doc)?.text ?? null;
}
