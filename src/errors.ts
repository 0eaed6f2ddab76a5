/**
 * Error taxonomy.
 *
 * Every error names the operation that failed and the query, identifier
 * or key it failed on. Messages never carry filesystem paths.
 */

export type Operation = "search" | "fetch" | "synthesize" | "cache-write" | "config";

export class ProtocolExtractorError extends Error {
  readonly operation: Operation;
  readonly subject: string;

  constructor(operation: Operation, subject: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ProtocolExtractorError";
    this.operation = operation;
    this.subject = subject;
  }
}

/** The search collaborator failed or answered with something unreadable. */
export class SearchError extends ProtocolExtractorError {
  constructor(query: string, reason: string, options?: ErrorOptions) {
    super("search", query, `Search failed for "${query}": ${reason}`, options);
    this.name = "SearchError";
  }
}

/** Transport failure, or a document without a parseable article root. */
export class FetchError extends ProtocolExtractorError {
  constructor(articleId: string, reason: string, options?: ErrorOptions) {
    super("fetch", articleId, `Fetch failed for article ${articleId}: ${reason}`, options);
    this.name = "FetchError";
  }
}

export class EmptyInputError extends ProtocolExtractorError {
  constructor(articleId: string) {
    super("synthesize", articleId, `No methods text to synthesize a protocol from (article ${articleId})`);
    this.name = "EmptyInputError";
  }
}

export class SynthesisError extends ProtocolExtractorError {
  constructor(articleId: string, reason: string, options?: ErrorOptions) {
    super("synthesize", articleId, `Protocol synthesis failed for article ${articleId}: ${reason}`, options);
    this.name = "SynthesisError";
  }
}

/** Non-fatal: the value being cached is still valid for the caller. */
export class CacheWriteError extends ProtocolExtractorError {
  constructor(key: string, reason: string, options?: ErrorOptions) {
    super("cache-write", key, `Cache write failed for entry ${key}: ${reason}`, options);
    this.name = "CacheWriteError";
  }
}

export class ConfigError extends ProtocolExtractorError {
  constructor(variable: string, reason: string) {
    super("config", variable, `Invalid configuration for ${variable}: ${reason}`);
    this.name = "ConfigError";
  }
}

/** Reduce an unknown thrown value to a one-line reason. */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
