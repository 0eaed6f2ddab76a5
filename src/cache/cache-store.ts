/**
 * Content-addressed cache with expiry.
 *
 * Each entry lives in `<directory>/<key>.json` as `{ key, timestamp, payload }`.
 * Keys are SHA-256 digests of a semantic string such as `article_12345`.
 * Unreadable, malformed or expired entries read as misses; `get` never deletes.
 */

import { createHash } from "node:crypto";
import { mkdir, readdir, readFile, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";
import { CacheWriteError } from "../errors.js";
import { type Logger, silentLogger } from "../logging/logger.js";

export const DEFAULT_CACHE_TTL_MS = 7 * 24 * 60 * 60 * 1000;

const ENTRY_SUFFIX = ".json";

export interface CacheEntry {
  key: string;
  /** Epoch milliseconds at write time */
  timestamp: number;
  payload: unknown;
}

const CacheEntrySchema = z.object({
  key: z.string(),
  timestamp: z.number().finite(),
  payload: z.unknown(),
});

export interface CacheStore {
  /** Deterministic digest of a semantic key string. */
  keyFor(semantic: string): string;
  /** The live entry for `key`, or null when absent, unreadable or expired. */
  get(key: string): Promise<CacheEntry | null>;
  /** Store `payload` under `key` with the current time. Throws CacheWriteError. */
  put(key: string, payload: unknown): Promise<void>;
  clear(): Promise<void>;
  /** Number of entries currently on disk, expired ones included. */
  size(): Promise<number>;
  close(): Promise<void>;
}

export interface CacheStoreOptions {
  directory: string;
  ttlMs?: number;
  /** Clock in epoch milliseconds, for tests */
  now?: () => number;
  logger?: Logger;
}

/** SHA-256 hex digest of the UTF-8 bytes of `semantic`. */
export function cacheKeyFor(semantic: string): string {
  return createHash("sha256").update(semantic, "utf8").digest("hex");
}

/** Error code of a Node.js I/O error, or its message for anything else. */
function ioReason(err: unknown): string {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return err instanceof Error ? err.name : String(err);
}

/**
 * Open a file-backed cache store, creating its directory.
 * The handle is the only access path to the directory; close it at exit.
 */
export async function openCacheStore(options: CacheStoreOptions): Promise<CacheStore> {
  const { directory } = options;
  const ttlMs = options.ttlMs ?? DEFAULT_CACHE_TTL_MS;
  const now = options.now ?? Date.now;
  const logger = options.logger ?? silentLogger;
  let closed = false;

  try {
    await mkdir(directory, { recursive: true });
  } catch (err) {
    throw new CacheWriteError("(store)", `cannot open cache directory (${ioReason(err)})`, { cause: err });
  }

  const pathFor = (key: string) => join(directory, `${key}${ENTRY_SUFFIX}`);

  const listEntryFiles = async (): Promise<string[]> => {
    try {
      const names = await readdir(directory);
      return names.filter((name) => name.endsWith(ENTRY_SUFFIX));
    } catch {
      return [];
    }
  };

  const get = async (key: string): Promise<CacheEntry | null> => {
    if (closed) return null;

    let raw: string;
    try {
      raw = await readFile(pathFor(key), "utf-8");
    } catch {
      return null;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      logger.debug("Cache entry is not valid JSON; treating as miss", { key });
      return null;
    }

    const entry = CacheEntrySchema.safeParse(parsed);
    if (!entry.success || entry.data.key !== key) {
      logger.debug("Cache entry is malformed; treating as miss", { key });
      return null;
    }

    const age = now() - entry.data.timestamp;
    if (age >= ttlMs) {
      logger.debug("Cache entry expired", { key, ageMs: age });
      return null;
    }

    logger.debug("Cache hit", { key });
    return { key, timestamp: entry.data.timestamp, payload: entry.data.payload };
  };

  const put = async (key: string, payload: unknown): Promise<void> => {
    if (closed) {
      throw new CacheWriteError(key, "cache store is closed");
    }

    const entry: CacheEntry = { key, timestamp: now(), payload };
    let json: string;
    try {
      json = JSON.stringify(entry, null, 2);
    } catch (err) {
      throw new CacheWriteError(key, "payload is not serializable", { cause: err });
    }

    try {
      await writeFile(pathFor(key), json + "\n", "utf-8");
    } catch (err) {
      throw new CacheWriteError(key, ioReason(err), { cause: err });
    }
    logger.debug("Cache entry written", { key });
  };

  const clear = async (): Promise<void> => {
    const files = await listEntryFiles();
    await Promise.all(files.map((name) => rm(join(directory, name), { force: true })));
    logger.info("Cache cleared", { entries: files.length });
  };

  const size = async (): Promise<number> => (await listEntryFiles()).length;

  const close = async (): Promise<void> => {
    // Writes are not buffered, so there is nothing to flush.
    closed = true;
  };

  return { keyFor: cacheKeyFor, get, put, clear, size, close };
}

/** A store that never hits and never writes. */
export function createDisabledCacheStore(): CacheStore {
  return {
    keyFor: cacheKeyFor,
    get: async () => null,
    put: async () => {},
    clear: async () => {},
    size: async () => 0,
    close: async () => {},
  };
}

/**
 * `get` plus schema validation of the payload.
 * A payload that does not match is a miss.
 */
export async function readCached<T>(
  cache: CacheStore,
  key: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): Promise<T | null> {
  const entry = await cache.get(key);
  if (!entry) return null;
  const result = schema.safeParse(entry.payload);
  return result.success ? result.data : null;
}
