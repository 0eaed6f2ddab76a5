/**
 * Builds the whole extractor from a Config and owns the cache lifecycle.
 */

import { type CacheStore, createDisabledCacheStore, openCacheStore } from "./cache/cache-store.js";
import type { Config } from "./config.js";
import { type Logger, createLogger } from "./logging/logger.js";
import { type ProtocolPipeline, createProtocolPipeline } from "./pipeline.js";
import { type ArticleRepository, createArticleRepository } from "./repository/article-repository.js";
import { createEutilsClient } from "./repository/eutils.js";
import { createAnthropicGenerator } from "./synthesis/anthropic.js";
import type { TextGenerator } from "./synthesis/generator.js";
import { type ProtocolSynthesizer, createProtocolSynthesizer } from "./synthesis/protocol-synthesizer.js";

const DAY_MS = 24 * 60 * 60 * 1000;

export interface ProtocolExtractor {
  cache: CacheStore;
  repository: ArticleRepository;
  /** null when no generation API key is configured */
  synthesizer: ProtocolSynthesizer | null;
  pipeline: ProtocolPipeline;
  logger: Logger;
  close(): Promise<void>;
}

export interface ProtocolExtractorOverrides {
  logger?: Logger;
  /** Replaces the Anthropic generator */
  generator?: TextGenerator;
}

export async function openProtocolExtractor(
  config: Config,
  overrides: ProtocolExtractorOverrides = {},
): Promise<ProtocolExtractor> {
  const logger =
    overrides.logger ??
    createLogger({ level: config.logging.level, ...(config.logging.file ? { file: config.logging.file } : {}) });

  const cache = config.cache.enabled
    ? await openCacheStore({ directory: config.cache.directory, ttlMs: config.cache.ttlDays * DAY_MS, logger })
    : createDisabledCacheStore();

  const eutils = createEutilsClient(config.ncbi);
  const repository = createArticleRepository({ cache, searcher: eutils, fetcher: eutils, logger });

  const { apiKey, model, timeoutMs, cacheKeyMode } = config.generation;
  let generator = overrides.generator ?? null;
  if (!generator && apiKey) {
    generator = createAnthropicGenerator({ apiKey, model, timeoutMs });
  }
  if (!generator) {
    logger.warn("No generation API key configured; protocol generation is disabled");
  }
  const synthesizer = generator ? createProtocolSynthesizer({ cache, generator, logger, cacheKeyMode }) : null;

  const pipeline = createProtocolPipeline({ repository, synthesizer });

  return {
    cache,
    repository,
    synthesizer,
    pipeline,
    logger,
    close: () => cache.close(),
  };
}
