import { describe, expect, it } from "vitest";
import {
  elementText,
  findDescendants,
  findFirstDescendant,
  normalizeWhitespace,
  parseJatsDocument,
  textOf,
} from "./jats-document.js";

describe("parseJatsDocument", () => {
  it("finds the article and its body", () => {
    const doc = parseJatsDocument(`
      <article>
        <front><article-meta><title-group><article-title>Test</article-title></title-group></article-meta></front>
        <body><p>Body text.</p></body>
      </article>
    `);

    expect(doc).not.toBeNull();
    expect(doc?.article.tag).toBe("article");
    expect(elementText(doc?.body)).toBe("Body text.");
  });

  it("unwraps the pmc-articleset wrapper of efetch responses", () => {
    const doc = parseJatsDocument(`<?xml version="1.0" encoding="UTF-8"?>
      <pmc-articleset>
        <article article-type="research-article">
          <body><p>Wrapped.</p></body>
        </article>
      </pmc-articleset>
    `);

    expect(doc?.article.attrs["article-type"]).toBe("research-article");
    expect(elementText(doc?.body)).toBe("Wrapped.");
  });

  it("reports a missing body as undefined", () => {
    const doc = parseJatsDocument("<article><front></front></article>");
    expect(doc).not.toBeNull();
    expect(doc?.body).toBeUndefined();
  });

  it("returns null for malformed XML", () => {
    expect(parseJatsDocument("<article><body><p>unclosed</body></article>")).toBeNull();
    expect(parseJatsDocument("not xml at all")).toBeNull();
  });

  it("returns null when there is no article root", () => {
    expect(
      parseJatsDocument("<pmc-articleset><error>Cannot find ID 99999999</error></pmc-articleset>"),
    ).toBeNull();
  });
});

describe("text extraction", () => {
  it("keeps inline markup flush with the surrounding text", () => {
    const doc = parseJatsDocument(
      "<article><body><p>Cells of <italic>E. coli</italic> were grown in <bold>LB</bold>.</p></body></article>",
    );
    expect(elementText(doc?.body)).toBe("Cells of E. coli were grown in LB.");
  });

  it("separates adjacent block elements", () => {
    const doc = parseJatsDocument("<article><body><p>First.</p><p>Second.</p></body></article>");
    expect(elementText(doc?.body)).toBe("First. Second.");
  });

  it("decodes XML entities", () => {
    const doc = parseJatsDocument("<article><body><p>Tris &amp; EDTA, pH &lt; 8</p></body></article>");
    expect(elementText(doc?.body)).toBe("Tris & EDTA, pH < 8");
  });

  it("returns raw text with whitespace intact from textOf", () => {
    const doc = parseJatsDocument("<article><body><p>a</p></body></article>");
    expect(textOf(doc?.body?.children ?? [])).toBe(" a ");
  });

  it("normalizes whitespace runs", () => {
    expect(normalizeWhitespace("  a \n\t b  ")).toBe("a b");
  });
});

describe("element search", () => {
  const doc = parseJatsDocument(`
    <article>
      <body>
        <sec id="s1"><title>One</title>
          <sec id="s1.1"><title>One point one</title></sec>
        </sec>
        <sec id="s2"><title>Two</title></sec>
      </body>
    </article>
  `);

  it("lists descendants in document order, parents before children", () => {
    const ids = findDescendants(doc?.article.children ?? [], "sec").map((sec) => sec.attrs["id"]);
    expect(ids).toEqual(["s1", "s1.1", "s2"]);
  });

  it("finds the first descendant", () => {
    expect(elementText(findFirstDescendant(doc?.article.children ?? [], "title"))).toBe("One");
  });

  it("returns undefined when nothing matches", () => {
    expect(findFirstDescendant(doc?.article.children ?? [], "table")).toBeUndefined();
  });
});
