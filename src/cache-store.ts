import { promises as fs } from "fs";
import { join } from "path";
import { getCodec } from "./codecs.js";
import type { EntryCodec } from "./codecs.js";
import { locateDirectory, resolveDirectory } from "./config.js";
import { ConfigurationError, SerializationError } from "./errors.js";
import { deriveKey } from "./key-deriver.js";
import { createLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import type { CacheRequest, CacheStats } from "./types.js";
import { isJsonValue, isMissing, trimName } from "./utils.js";

export interface CacheStoreOptions {
  logger?: Logger;
}

/** A validated entry location and the codec that reads and writes it */
export interface ResolvedEntry {
  path: string;
  codec: EntryCodec;
}

/**
 * CacheStore - maps a call onto a file and serves it from disk or computes it.
 *
 * Features:
 * - Hash or name keyed entries, optionally tagged with a comment
 * - Gzip or plain JSON entries behind one codec interface
 * - Forced refresh
 * - Temp-file-then-rename writes, so a failed write never leaves a partial entry
 *
 * There is no in-memory tier: every hit re-reads and re-decodes the file.
 */
export class CacheStore {
  private readonly logger: Logger;
  private readonly counters: CacheStats = { hits: 0, misses: 0, refreshes: 0, writes: 0, passThrough: 0 };

  constructor(options: CacheStoreOptions = {}) {
    this.logger = options.logger ?? createLogger(false, false);
  }

  /**
   * Build the entry file name: key, optional `_comment`, trimmed, plus extension.
   */
  entryName(request: CacheRequest, codec: EntryCodec): string {
    const key = deriveKey(request.invocation, request.mode, request.name);
    const suffix = request.comment ? `_${request.comment}` : "";
    const base = trimName(`${key}${suffix}`);
    if (base.length === 0) {
      throw new ConfigurationError(
        `Cache entry name '${key}${suffix}' is empty once punctuation is removed`,
      );
    }
    return `${base}.cache.${codec.extension}`;
  }

  /**
   * Resolve where a call's entry lives, without reading or computing.
   * Returns null when no directory is configured (pass-through).
   */
  async resolveEntry(request: CacheRequest): Promise<ResolvedEntry | null> {
    const dir = resolveDirectory(request.dirs);
    if (dir === undefined) return null;

    const codec = getCodec(request.format);
    const name = this.entryName(request, codec);
    const location = await locateDirectory(dir);
    return { path: join(location, name), codec };
  }

  /**
   * Resolve the entry path for a call, or null in pass-through mode.
   */
  async entryPath(request: CacheRequest): Promise<string | null> {
    return (await this.resolveEntry(request))?.path ?? null;
  }

  /**
   * Return the stored result for a call, or compute, persist and return it.
   * @throws ConfigurationError for a bad mode or format, before any I/O
   * @throws DirectoryError when the directory cannot be found
   * @throws SerializationError when the result is not JSON or the entry is corrupt
   */
  async getOrCompute<T>(request: CacheRequest, compute: () => T | Promise<T>): Promise<T> {
    const entry = await this.resolveEntry(request);
    if (entry === null) {
      this.counters.passThrough++;
      return compute();
    }

    const { path, codec } = entry;
    const exists = await fileExists(path);

    if (exists && !request.forceRefresh) {
      this.counters.hits++;
      this.logger.verbose(`hit ${path}`);
      return this.load<T>(path, codec);
    }

    if (exists) {
      this.counters.refreshes++;
    } else {
      this.counters.misses++;
    }
    this.logger.log(`generating ${path}`);

    const result = await compute();
    await this.persist(path, codec, result);
    this.counters.writes++;
    return result;
  }

  /**
   * Counters since this store was created.
   */
  stats(): CacheStats {
    return { ...this.counters };
  }

  private async load<T>(path: string, codec: EntryCodec): Promise<T> {
    const reader = await codec.openRead(path);
    let text: string;
    try {
      text = await reader.read();
    } finally {
      await reader.close();
    }

    try {
      return JSON.parse(text) as T;
    } catch (err) {
      throw new SerializationError(`Cache entry ${path} is not valid JSON`, path, { cause: err });
    }
  }

  private async persist(path: string, codec: EntryCodec, value: unknown): Promise<void> {
    const writer = await codec.openWrite(path);

    // JSON.stringify would silently drop or rewrite these (Set -> {}, NaN -> null)
    if (!isJsonValue(value)) {
      await writer.abort();
      this.logger.error(`could not serialize result for ${path}; nothing was written`);
      throw new SerializationError(
        `Cannot cache value of type ${describeType(value)}. Value must be JSON-serializable.`,
        path,
      );
    }

    try {
      await writer.write(JSON.stringify(value));
    } catch (err) {
      await writer.abort();
      throw err;
    }
    await writer.close();
  }
}

async function fileExists(path: string): Promise<boolean> {
  try {
    await fs.access(path);
    return true;
  } catch (err) {
    if (isMissing(err)) return false;
    throw err;
  }
}

function describeType(value: unknown): string {
  if (value === null || typeof value !== "object") return typeof value;
  if (Array.isArray(value)) return "array";
  return value.constructor?.name ?? "object";
}
