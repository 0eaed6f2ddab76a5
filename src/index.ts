/**
 * # protocol-extractor
 *
 * Turns the methods sections of open access PubMed Central articles into
 * structured laboratory protocols.
 *
 * ## Workflow
 *
 * 1. **Search** — Find open access PMC articles for a query.
 * 2. **Fetch** — Download JATS XML, extract bibliographic fields and the methods section.
 * 3. **Synthesize** — Ask a text generator for a structured, validated protocol.
 *
 * Every step is cached on disk for seven days by default.
 *
 * ## Quick Example
 *
 * ```typescript
 * import { loadConfigFromEnv, openProtocolExtractor } from "protocol-extractor";
 *
 * const extractor = await openProtocolExtractor(loadConfigFromEnv());
 * try {
 *   const { articles } = await extractor.pipeline.findArticles("western blot liver", 5);
 *   const first = articles[0];
 *   if (first) {
 *     const outcome = await extractor.pipeline.generateProtocol(first, "detailed");
 *     if (outcome.status === "generated") console.log(outcome.protocol.procedure);
 *     else console.log(outcome.message);
 *   }
 * } finally {
 *   await extractor.close();
 * }
 * ```
 *
 * ## Configuration
 *
 * Read from the environment (and `.env`); see {@link loadConfig}.
 * Without `ANTHROPIC_API_KEY` search and fetch work and generation reports itself unavailable.
 *
 * @module protocol-extractor
 */

// === Application ===
export { openProtocolExtractor } from "./app.js";
export type { ProtocolExtractor, ProtocolExtractorOverrides } from "./app.js";
export { loadConfig, loadConfigFromEnv, defaultCacheDirectory } from "./config.js";
export type { Config, Env } from "./config.js";
export { createProtocolPipeline, NO_METHODS_MESSAGE, GENERATION_UNAVAILABLE_MESSAGE } from "./pipeline.js";
export type { ProtocolOutcome, ProtocolPipeline, ProtocolPipelineOptions } from "./pipeline.js";

// === Cache ===
export {
  openCacheStore,
  createDisabledCacheStore,
  cacheKeyFor,
  readCached,
  DEFAULT_CACHE_TTL_MS,
} from "./cache/cache-store.js";
export type { CacheEntry, CacheStore, CacheStoreOptions } from "./cache/cache-store.js";

// === Articles ===
export { createArticleRepository, parseArticleXml, pmcArticleUrl } from "./repository/article-repository.js";
export type {
  ArticleFailure,
  ArticleRepository,
  ArticleRepositoryOptions,
  FetchAllResult,
} from "./repository/article-repository.js";
export { createEutilsClient, normalizePmcid } from "./repository/eutils.js";
export type { ArticleFetcher, ArticleSearcher, EutilsOptions } from "./repository/eutils.js";

// === Extraction ===
export { parseJatsDocument } from "./extract/jats-document.js";
export type { JatsDocument } from "./extract/jats-document.js";
export { extractArticleFields } from "./extract/article-fields.js";
export {
  extractMethods,
  locateMethods,
  titledSectionStrategy,
  bodyPatternStrategy,
  METHODS_STRATEGIES,
} from "./extract/methods-extractor.js";
export type { MethodsStrategy } from "./extract/methods-extractor.js";

// === Synthesis ===
export { createProtocolSynthesizer } from "./synthesis/protocol-synthesizer.js";
export type { CacheKeyMode, ProtocolSynthesizer, ProtocolSynthesizerOptions } from "./synthesis/protocol-synthesizer.js";
export { createAnthropicGenerator } from "./synthesis/anthropic.js";
export type { AnthropicGeneratorOptions } from "./synthesis/anthropic.js";
export type { GenerationRequest, TextGenerator } from "./synthesis/generator.js";
export { parseProtocolResponse } from "./synthesis/response.js";

// === Logging & Errors ===
export { createLogger, silentLogger } from "./logging/logger.js";
export type { Logger, LoggerOptions, LogLevel } from "./logging/logger.js";
export {
  ProtocolExtractorError,
  SearchError,
  FetchError,
  EmptyInputError,
  SynthesisError,
  CacheWriteError,
  ConfigError,
} from "./errors.js";

// === Types ===
export { PROTOCOL_STYLES } from "./types.js";
export type { Article, ProcedureStep, Protocol, ProtocolStyle } from "./types.js";
