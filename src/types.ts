import type { CacheStore } from "./cache-store.js";
import type { Logger } from "./logger.js";

/** Key derivation mode: argument hash or the function's own name */
export type CacheMode = "hash" | "name";

/** On-disk serialization: gzip-compressed JSON or plain UTF-8 JSON */
export type CacheFormat = "gzip" | "json";

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

/**
 * The captured arguments of one memoized call.
 * `kwargs` is empty for calls made through `memoize`; direct callers of the
 * store may supply keyword data there.
 */
export interface Invocation {
  args: readonly unknown[];
  kwargs: Readonly<Record<string, unknown>>;
}

/**
 * Cache settings that can be supplied when wrapping a function and
 * overridden again for a single call.
 */
export interface CacheOverrides {
  /** Cache directory. Must already exist. No directory disables caching. */
  dir?: string;
  /** Key derivation mode (default: hash) */
  mode?: CacheMode;
  /** Appended to the entry name as `_<comment>` */
  comment?: string;
  /** Recompute and overwrite even when an entry exists (default: false) */
  forceRefresh?: boolean;
  /** Serialization format (default: gzip) */
  format?: CacheFormat;
}

/**
 * Options accepted by `memoize`.
 *
 * @remarks
 * **Known Limitations:**
 * - Results must be plain JSON: strings, finite numbers, booleans, null, arrays
 *   and plain objects. Anything else (Set, Map, Date, NaN, undefined members)
 *   fails with SerializationError instead of being stored in a lossy form.
 * - There is no locking: two processes missing on the same entry both compute,
 *   and the last rename wins.
 */
export interface MemoizeOptions extends CacheOverrides {
  /** Name used in `name` mode (default: the function's `name`) */
  name?: string;
  /** Share one store (and its stats) between wrappers */
  store?: CacheStore;
  /** Logger for the store this wrapper creates; not allowed together with `store` */
  logger?: Logger;
}

/** Fully merged settings for one call, directory excluded */
export interface ResolvedOptions {
  mode: CacheMode;
  comment: string | undefined;
  forceRefresh: boolean;
  format: CacheFormat;
}

/**
 * Everything the store needs to serve one call.
 * `dirs` is ordered by precedence; the first non-empty entry wins.
 */
export interface CacheRequest {
  invocation: Invocation;
  name: string;
  dirs: readonly (string | undefined)[];
  /** `hash` or `name`; anything else fails with ConfigurationError */
  mode: string;
  comment?: string;
  forceRefresh: boolean;
  /** `gzip` or `json`; anything else fails with ConfigurationError */
  format: string;
}

export interface CacheStats {
  /** Entries served from disk */
  hits: number;
  /** Computations with no existing entry */
  misses: number;
  /** Computations that replaced an existing entry */
  refreshes: number;
  /** Entries written */
  writes: number;
  /** Calls run without caching because no directory resolved */
  passThrough: number;
}

export const DEFAULT_OPTIONS: ResolvedOptions = {
  mode: "hash",
  comment: undefined,
  forceRefresh: false,
  format: "gzip",
};
