/**
 * Domain types shared by the repository, the synthesizer and the pipeline.
 */

/**
 * A PMC article as extracted from its JATS XML.
 * Built only by the article repository and frozen once built.
 */
export interface Article {
  /** Numeric PMC id, without the "PMC" prefix */
  readonly pmcId: string;
  /** PubMed id, when the document carries one */
  readonly pmid: string | null;
  readonly title: string;
  /** "Given-names Surname", in document order */
  readonly authors: readonly string[];
  readonly journal: string;
  readonly year: string;
  readonly doi: string | null;
  readonly abstract: string | null;
  /** Located methods section; null when the article has none we can find */
  readonly methodsText: string | null;
  readonly fullTextUrl: string;
}

export type ProtocolStyle = "detailed" | "concise" | "educational";

export const PROTOCOL_STYLES: readonly ProtocolStyle[] = ["detailed", "concise", "educational"];

export interface ProcedureStep {
  /** 1-based, contiguous in array order */
  readonly step: number;
  readonly action: string;
  readonly duration?: string;
  readonly temperature?: string;
  readonly note?: string;
}

export interface Protocol {
  readonly title: string;
  readonly article: Article;
  readonly reagents: readonly string[];
  readonly materials: readonly string[];
  readonly preparation: readonly string[];
  readonly procedure: readonly ProcedureStep[];
  readonly conditions: Readonly<Record<string, string>>;
  readonly criticalNotes: readonly string[];
  readonly safetyWarnings: readonly string[];
  /** ISO 8601 */
  readonly generatedAt: string;
  /** Generator model name */
  readonly model: string;
}
