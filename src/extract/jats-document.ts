/**
 * JATS XML document model for PMC articles.
 *
 * Uses fast-xml-parser with `preserveOrder: true` so that text and inline
 * elements keep their document order, which the section heuristics rely on.
 */

import { XMLParser, XMLValidator } from "fast-xml-parser";

/**
 * A node in the preserveOrder output.
 * Either a text node `{ "#text": string }` or an element node
 * `{ tagName: OrderedNode[], ":@"?: { "@_attr": value } }`.
 */
export type OrderedNode = Record<string, unknown>;

/** An element located in the tree, with its children and attributes resolved. */
export interface JatsElement {
  tag: string;
  children: OrderedNode[];
  attrs: Record<string, string>;
}

/** A parsed article: the `<article>` element and its `<body>`, if any. */
export interface JatsDocument {
  article: JatsElement;
  body: JatsElement | undefined;
}

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  textNodeName: "#text",
  trimValues: false,
  parseTagValue: false,
  parseAttributeValue: false,
  preserveOrder: true,
  processEntities: true,
  htmlEntities: true,
});

/** Elements whose text is separated from its neighbours by whitespace. */
const BLOCK_TAGS = new Set([
  "abstract",
  "body",
  "caption",
  "disp-formula",
  "disp-quote",
  "fig",
  "label",
  "list",
  "list-item",
  "p",
  "sec",
  "table-wrap",
  "td",
  "th",
  "title",
  "tr",
]);

// ─── Navigation Helpers ──────────────────────────────────────────────

/** Get the tag name of an ordered node (the first key that isn't ":@" or "#text"). */
export function getTagName(node: OrderedNode): string | undefined {
  for (const key of Object.keys(node)) {
    if (key !== ":@" && key !== "#text") return key;
  }
  return undefined;
}

function getChildren(node: OrderedNode, tag: string): OrderedNode[] {
  const children = node[tag];
  return Array.isArray(children) ? children.filter(isOrderedNode) : [];
}

function isOrderedNode(value: unknown): value is OrderedNode {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Get all attributes of an element node, without the "@_" prefix. */
function getAttrs(node: OrderedNode): Record<string, string> {
  const attrs = node[":@"];
  if (!isOrderedNode(attrs)) return {};
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(attrs)) {
    if (key.startsWith("@_")) {
      result[key.slice(2)] = String(value);
    }
  }
  return result;
}

function toElement(node: OrderedNode): JatsElement | undefined {
  const tag = getTagName(node);
  if (!tag) return undefined;
  return { tag, children: getChildren(node, tag), attrs: getAttrs(node) };
}

/** Find the first direct child element with the given tag name. */
export function findChild(children: OrderedNode[], tagName: string): JatsElement | undefined {
  for (const child of children) {
    if (tagName in child) return toElement(child);
  }
  return undefined;
}

/** All descendant elements with the given tag name, in document (pre-)order. */
export function findDescendants(children: OrderedNode[], tagName: string): JatsElement[] {
  const found: JatsElement[] = [];
  const visit = (nodes: OrderedNode[]): void => {
    for (const node of nodes) {
      const element = toElement(node);
      if (!element) continue;
      if (element.tag === tagName) found.push(element);
      visit(element.children);
    }
  };
  visit(children);
  return found;
}

/** The first descendant element with the given tag name, in document order. */
export function findFirstDescendant(children: OrderedNode[], tagName: string): JatsElement | undefined {
  for (const node of children) {
    const element = toElement(node);
    if (!element) continue;
    if (element.tag === tagName) return element;
    const nested = findFirstDescendant(element.children, tagName);
    if (nested) return nested;
  }
  return undefined;
}

// ─── Text Extraction ─────────────────────────────────────────────────

function getTextContent(node: OrderedNode): string | undefined {
  if ("#text" in node) {
    const val = node["#text"];
    return val != null ? String(val) : undefined;
  }
  return undefined;
}

/**
 * Concatenate all text beneath `children` in document order.
 * Block-level elements are padded with spaces so that adjacent
 * paragraphs or cells do not run together; inline markup is not.
 */
export function textOf(children: OrderedNode[]): string {
  const parts: string[] = [];
  for (const child of children) {
    const text = getTextContent(child);
    if (text != null) {
      parts.push(text);
      continue;
    }
    const element = toElement(child);
    if (!element) continue;
    const inner = textOf(element.children);
    parts.push(BLOCK_TAGS.has(element.tag) ? ` ${inner} ` : inner);
  }
  return parts.join("");
}

/** Collapse runs of whitespace to single spaces and trim. */
export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/** Normalized text of an element, or "" when absent. */
export function elementText(element: JatsElement | undefined): string {
  return element ? normalizeWhitespace(textOf(element.children)) : "";
}

// ─── Document ────────────────────────────────────────────────────────

/**
 * Find the <article> element, handling the optional <pmc-articleset> wrapper
 * that appears in efetch responses.
 */
function findArticle(parsed: OrderedNode[]): JatsElement | undefined {
  const direct = findChild(parsed, "article");
  if (direct) return direct;
  const wrapper = findChild(parsed, "pmc-articleset");
  if (wrapper) return findChild(wrapper.children, "article");
  return undefined;
}

/**
 * Parse JATS XML into a document.
 * Returns null when the XML is not well-formed or has no <article> root.
 */
export function parseJatsDocument(xml: string): JatsDocument | null {
  if (XMLValidator.validate(xml) !== true) return null;

  const parsed: unknown = parser.parse(xml);
  if (!Array.isArray(parsed)) return null;

  const article = findArticle(parsed.filter(isOrderedNode));
  if (!article) return null;

  return { article, body: findChild(article.children, "body") };
}
