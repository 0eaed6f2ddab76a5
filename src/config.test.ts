import { homedir } from "node:os";
import { join } from "node:path";
import { describe, expect, it } from "vitest";
import { loadConfig } from "./config.js";
import { ConfigError } from "./errors.js";

describe("loadConfig", () => {
  it("applies defaults to an empty environment", () => {
    expect(loadConfig({})).toEqual({
      ncbi: { tool: "protocol-extractor", searchTimeoutMs: 10000, fetchTimeoutMs: 30000 },
      generation: { model: "claude-sonnet-4-20250514", timeoutMs: 120000, cacheKeyMode: "full-text" },
      cache: { enabled: true, directory: join(homedir(), ".protocol-extractor", "cache"), ttlDays: 7 },
      logging: { level: "info" },
    });
  });

  it("reads every variable", () => {
    const config = loadConfig({
      NCBI_API_KEY: "test-ncbi-key",
      NCBI_EMAIL: "lab@example.org",
      NCBI_TOOL: "bench-helper",
      ANTHROPIC_API_KEY: "test-key",
      PROTOCOL_MODEL: "test-model",
      PROTOCOL_CACHE_DIR: "/tmp/protocol-cache",
      PROTOCOL_CACHE_TTL_DAYS: "3",
      PROTOCOL_CACHE_ENABLED: "no",
      PROTOCOL_CACHE_KEY_MODE: "prefix",
      SEARCH_TIMEOUT_MS: "500",
      FETCH_TIMEOUT_MS: "1500",
      GENERATION_TIMEOUT_MS: "60000",
      LOG_LEVEL: "DEBUG",
      LOG_FILE: "/tmp/protocol.log",
    });

    expect(config).toEqual({
      ncbi: {
        apiKey: "test-ncbi-key",
        email: "lab@example.org",
        tool: "bench-helper",
        searchTimeoutMs: 500,
        fetchTimeoutMs: 1500,
      },
      generation: { apiKey: "test-key", model: "test-model", timeoutMs: 60000, cacheKeyMode: "prefix" },
      cache: { enabled: false, directory: "/tmp/protocol-cache", ttlDays: 3 },
      logging: { level: "debug", file: "/tmp/protocol.log" },
    });
  });

  it("treats blank values as unset", () => {
    const config = loadConfig({ ANTHROPIC_API_KEY: "  ", PROTOCOL_CACHE_TTL_DAYS: "" });

    expect(config.generation.apiKey).toBeUndefined();
    expect(config.cache.ttlDays).toBe(7);
  });

  it.each([
    ["PROTOCOL_CACHE_TTL_DAYS", "0"],
    ["PROTOCOL_CACHE_TTL_DAYS", "seven"],
    ["SEARCH_TIMEOUT_MS", "1.5"],
    ["PROTOCOL_CACHE_ENABLED", "maybe"],
    ["PROTOCOL_CACHE_KEY_MODE", "hash"],
    ["LOG_LEVEL", "verbose"],
    ["NCBI_EMAIL", "not-an-address"],
  ])("rejects %s=%s", (variable, value) => {
    const error = (() => {
      try {
        loadConfig({ [variable]: value });
        return null;
      } catch (err) {
        return err;
      }
    })();

    expect(error).toBeInstanceOf(ConfigError);
    expect(error instanceof ConfigError ? error.subject : "").toBe(variable);
  });
});
