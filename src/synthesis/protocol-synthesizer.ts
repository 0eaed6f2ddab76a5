/**
 * Methods text to structured Protocol, through a TextGenerator.
 *
 * Results are cached under `protocol_{text}_{style}`. In "full-text" key
 * mode `text` is the whole methods text; in "prefix" mode only its first
 * `prefixLength` characters, so methods sections sharing an opening share
 * a protocol.
 */

import { type CacheStore, readCached } from "../cache/cache-store.js";
import { CacheWriteError, EmptyInputError, SynthesisError, describeError } from "../errors.js";
import { type Logger, silentLogger } from "../logging/logger.js";
import { ProtocolSchema, freezeProtocol } from "../schemas.js";
import type { Article, Protocol, ProtocolStyle } from "../types.js";
import type { TextGenerator } from "./generator.js";
import { SYSTEM_INSTRUCTION, buildUserInstruction } from "./prompts.js";
import { parseProtocolResponse } from "./response.js";

export type CacheKeyMode = "full-text" | "prefix";

export const CACHE_KEY_MODES: readonly CacheKeyMode[] = ["full-text", "prefix"];

export const DEFAULT_TEMPERATURE = 0.3;
export const DEFAULT_MAX_OUTPUT_TOKENS = 4000;
export const DEFAULT_PREFIX_LENGTH = 100;

export interface ProtocolSynthesizer {
  /**
   * Structured protocol for `methodsText`.
   * @throws EmptyInputError when the text is blank; no call is made
   * @throws SynthesisError when generation fails or returns unusable content
   */
  synthesize(methodsText: string, article: Article, style: ProtocolStyle): Promise<Protocol>;
}

export interface ProtocolSynthesizerOptions {
  cache: CacheStore;
  generator: TextGenerator;
  logger?: Logger;
  now?: () => Date;
  cacheKeyMode?: CacheKeyMode;
  prefixLength?: number;
  temperature?: number;
  maxOutputTokens?: number;
}

export function createProtocolSynthesizer(options: ProtocolSynthesizerOptions): ProtocolSynthesizer {
  const { cache, generator } = options;
  const logger = options.logger ?? silentLogger;
  const now = options.now ?? (() => new Date());
  const cacheKeyMode = options.cacheKeyMode ?? "full-text";
  const prefixLength = options.prefixLength ?? DEFAULT_PREFIX_LENGTH;
  const temperature = options.temperature ?? DEFAULT_TEMPERATURE;
  const maxOutputTokens = options.maxOutputTokens ?? DEFAULT_MAX_OUTPUT_TOKENS;

  const semanticKey = (methodsText: string, style: ProtocolStyle): string => {
    const text = cacheKeyMode === "prefix" ? methodsText.slice(0, prefixLength) : methodsText;
    return `protocol_${text}_${style}`;
  };

  const synthesize = async (methodsText: string, article: Article, style: ProtocolStyle): Promise<Protocol> => {
    if (methodsText.trim() === "") {
      throw new EmptyInputError(article.pmcId);
    }

    const key = cache.keyFor(semanticKey(methodsText, style));
    const cached = await readCached(cache, key, ProtocolSchema);
    if (cached) {
      logger.debug("Protocol served from cache", { pmcId: article.pmcId, style });
      return freezeProtocol(cached);
    }

    logger.info("Generating protocol", { pmcId: article.pmcId, style, model: generator.model });
    let text: string;
    try {
      text = await generator.generate({
        system: SYSTEM_INSTRUCTION,
        prompt: buildUserInstruction(methodsText, style),
        temperature,
        maxOutputTokens,
        json: true,
      });
    } catch (err) {
      throw new SynthesisError(article.pmcId, describeError(err), { cause: err });
    }

    const parsed = parseProtocolResponse(text);
    if (!parsed.success) {
      throw new SynthesisError(article.pmcId, parsed.reason);
    }

    const protocol = freezeProtocol({
      ...parsed.data,
      article,
      generatedAt: now().toISOString(),
      model: generator.model,
    });

    try {
      await cache.put(key, protocol);
    } catch (err) {
      if (!(err instanceof CacheWriteError)) throw err;
      logger.warn("Could not cache protocol; continuing without it", { pmcId: article.pmcId, reason: err.message });
    }
    return protocol;
  };

  return { synthesize };
}
