/**
 * Query to articles to protocol.
 *
 * Missing methods text and a missing synthesizer are reported as outcomes;
 * network and synthesis errors propagate.
 */

import type { FetchAllResult, ArticleRepository } from "./repository/article-repository.js";
import type { ProtocolSynthesizer } from "./synthesis/protocol-synthesizer.js";
import type { Article, Protocol, ProtocolStyle } from "./types.js";

export const NO_METHODS_MESSAGE = "no methods text available";
export const GENERATION_UNAVAILABLE_MESSAGE = "protocol generation is unavailable: no generator is configured";

export type ProtocolOutcome =
  | { status: "generated"; article: Article; protocol: Protocol }
  | { status: "no-methods"; article: Article; message: string }
  | { status: "generation-unavailable"; article: Article; message: string };

export interface ProtocolPipeline {
  /** Search, then fetch every hit; unfetchable hits are returned as failures. */
  findArticles(query: string, maxResults?: number): Promise<FetchAllResult>;
  generateProtocol(article: Article, style: ProtocolStyle): Promise<ProtocolOutcome>;
  protocolFor(articleId: string, style: ProtocolStyle): Promise<ProtocolOutcome>;
}

export interface ProtocolPipelineOptions {
  repository: ArticleRepository;
  /** null when no generator is configured */
  synthesizer: ProtocolSynthesizer | null;
}

export function createProtocolPipeline(options: ProtocolPipelineOptions): ProtocolPipeline {
  const { repository, synthesizer } = options;

  const findArticles = async (query: string, maxResults?: number): Promise<FetchAllResult> => {
    const ids = await repository.search(query, maxResults);
    return repository.fetchAll(ids);
  };

  const generateProtocol = async (article: Article, style: ProtocolStyle): Promise<ProtocolOutcome> => {
    const methodsText = article.methodsText;
    if (methodsText === null || methodsText.trim() === "") {
      return { status: "no-methods", article, message: NO_METHODS_MESSAGE };
    }
    if (!synthesizer) {
      return { status: "generation-unavailable", article, message: GENERATION_UNAVAILABLE_MESSAGE };
    }
    const protocol = await synthesizer.synthesize(methodsText, article, style);
    return { status: "generated", article, protocol };
  };

  const protocolFor = async (articleId: string, style: ProtocolStyle): Promise<ProtocolOutcome> =>
    generateProtocol(await repository.fetch(articleId), style);

  return { findArticles, generateProtocol, protocolFor };
}
