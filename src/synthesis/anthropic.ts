/**
 * TextGenerator backed by the Anthropic Messages API.
 */

import Anthropic from "@anthropic-ai/sdk";
import type { GenerationRequest, TextGenerator } from "./generator.js";

export const DEFAULT_MODEL = "claude-sonnet-4-20250514";
export const DEFAULT_GENERATION_TIMEOUT_MS = 120_000;

/** Assistant prefill that pins the reply to a JSON object. */
const JSON_PREFILL = "{";

export interface AnthropicGeneratorOptions {
  apiKey: string;
  model?: string;
  timeoutMs?: number;
  maxRetries?: number;
  /** Override the API host, for proxies */
  baseURL?: string;
}

export function createAnthropicGenerator(options: AnthropicGeneratorOptions): TextGenerator {
  const model = options.model ?? DEFAULT_MODEL;
  const client = new Anthropic({
    apiKey: options.apiKey,
    timeout: options.timeoutMs ?? DEFAULT_GENERATION_TIMEOUT_MS,
    maxRetries: options.maxRetries ?? 2,
    ...(options.baseURL ? { baseURL: options.baseURL } : {}),
  });

  const generate = async (request: GenerationRequest): Promise<string> => {
    const messages: Anthropic.MessageParam[] = [{ role: "user", content: request.prompt }];
    if (request.json) {
      messages.push({ role: "assistant", content: JSON_PREFILL });
    }

    const response = await client.messages.create({
      model,
      max_tokens: request.maxOutputTokens,
      temperature: request.temperature,
      system: request.system,
      messages,
    });

    let text = "";
    for (const block of response.content) {
      if (block.type === "text") text += block.text;
    }
    return request.json ? JSON_PREFILL + text : text;
  };

  return { model, generate };
}
