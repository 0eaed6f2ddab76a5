/**
 * Environment variable loading and validation.
 */

import { homedir } from "node:os";
import { join } from "node:path";
import { config as loadDotenv } from "dotenv";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import type { LogLevel } from "./logging/logger.js";
import { DEFAULT_MODEL, DEFAULT_GENERATION_TIMEOUT_MS } from "./synthesis/anthropic.js";
import type { CacheKeyMode } from "./synthesis/protocol-synthesizer.js";
import { DEFAULT_FETCH_TIMEOUT_MS, DEFAULT_SEARCH_TIMEOUT_MS } from "./repository/eutils.js";

export type Env = Readonly<Record<string, string | undefined>>;

export interface Config {
  ncbi: {
    apiKey?: string;
    email?: string;
    tool: string;
    searchTimeoutMs: number;
    fetchTimeoutMs: number;
  };
  generation: {
    /** Unset disables protocol generation */
    apiKey?: string;
    model: string;
    timeoutMs: number;
    cacheKeyMode: CacheKeyMode;
  };
  cache: {
    enabled: boolean;
    directory: string;
    ttlDays: number;
  };
  logging: {
    level: LogLevel;
    file?: string;
  };
}

export const DEFAULT_TOOL_NAME = "protocol-extractor";
export const DEFAULT_CACHE_TTL_DAYS = 7;

export function defaultCacheDirectory(): string {
  return join(homedir(), ".protocol-extractor", "cache");
}

const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);
const CacheKeyModeSchema = z.enum(["full-text", "prefix"]);
const PositiveIntSchema = z.coerce.number().int().positive();

function optionalEnv(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value !== undefined && value !== "" ? value : undefined;
}

function envString(env: Env, key: string, defaultValue: string): string {
  return optionalEnv(env, key) ?? defaultValue;
}

function envPositiveInt(env: Env, key: string, defaultValue: number): number {
  const value = optionalEnv(env, key);
  if (value === undefined) return defaultValue;
  const parsed = PositiveIntSchema.safeParse(value);
  if (!parsed.success) {
    throw new ConfigError(key, `must be a positive integer, got: ${value}`);
  }
  return parsed.data;
}

/** Recognizes true, false, 1, 0, yes, no (case-insensitive). */
function envBool(env: Env, key: string, defaultValue: boolean): boolean {
  const value = optionalEnv(env, key);
  if (value === undefined) return defaultValue;
  const normalized = value.toLowerCase();
  if (["true", "1", "yes"].includes(normalized)) return true;
  if (["false", "0", "no"].includes(normalized)) return false;
  throw new ConfigError(key, `must be a boolean (true/false/1/0/yes/no), got: ${value}`);
}

function envEnum<T extends string>(env: Env, key: string, schema: z.ZodType<T>, defaultValue: T): T {
  const value = optionalEnv(env, key);
  if (value === undefined) return defaultValue;
  const parsed = schema.safeParse(value.toLowerCase());
  if (!parsed.success) {
    throw new ConfigError(key, `unsupported value: ${value}`);
  }
  return parsed.data;
}

/**
 * Build a Config from environment variables.
 * @throws ConfigError naming the first invalid variable
 */
export function loadConfig(env: Env): Config {
  const config: Config = {
    ncbi: {
      tool: envString(env, "NCBI_TOOL", DEFAULT_TOOL_NAME),
      searchTimeoutMs: envPositiveInt(env, "SEARCH_TIMEOUT_MS", DEFAULT_SEARCH_TIMEOUT_MS),
      fetchTimeoutMs: envPositiveInt(env, "FETCH_TIMEOUT_MS", DEFAULT_FETCH_TIMEOUT_MS),
    },
    generation: {
      model: envString(env, "PROTOCOL_MODEL", DEFAULT_MODEL),
      timeoutMs: envPositiveInt(env, "GENERATION_TIMEOUT_MS", DEFAULT_GENERATION_TIMEOUT_MS),
      cacheKeyMode: envEnum(env, "PROTOCOL_CACHE_KEY_MODE", CacheKeyModeSchema, "full-text"),
    },
    cache: {
      enabled: envBool(env, "PROTOCOL_CACHE_ENABLED", true),
      directory: envString(env, "PROTOCOL_CACHE_DIR", defaultCacheDirectory()),
      ttlDays: envPositiveInt(env, "PROTOCOL_CACHE_TTL_DAYS", DEFAULT_CACHE_TTL_DAYS),
    },
    logging: {
      level: envEnum(env, "LOG_LEVEL", LogLevelSchema, "info"),
    },
  };

  const ncbiApiKey = optionalEnv(env, "NCBI_API_KEY");
  if (ncbiApiKey) config.ncbi.apiKey = ncbiApiKey;
  const email = optionalEnv(env, "NCBI_EMAIL");
  if (email) {
    if (!z.string().email().safeParse(email).success) {
      throw new ConfigError("NCBI_EMAIL", `not an email address: ${email}`);
    }
    config.ncbi.email = email;
  }
  const generationApiKey = optionalEnv(env, "ANTHROPIC_API_KEY");
  if (generationApiKey) config.generation.apiKey = generationApiKey;
  const logFile = optionalEnv(env, "LOG_FILE");
  if (logFile) config.logging.file = logFile;

  return config;
}

/** Load `.env` into `process.env`, then build the Config from it. */
export function loadConfigFromEnv(): Config {
  loadDotenv();
  return loadConfig(process.env);
}
