export { memoize, hasCacheDir } from "./memoize.js";
export type { Memoized, MemoizedCall, CacheDirHolder } from "./memoize.js";
export { CacheStore } from "./cache-store.js";
export type { CacheStoreOptions, ResolvedEntry } from "./cache-store.js";
export { deriveKey, hashableView } from "./key-deriver.js";
export { getCodec, GzipCodec, JsonCodec } from "./codecs.js";
export type { EntryCodec, EntryReader, EntryWriter } from "./codecs.js";
export {
  CacheFormatSchema,
  CacheModeSchema,
  CacheOverridesSchema,
  locateDirectory,
  mergeOptions,
  parseOverrides,
  resolveDirectory,
} from "./config.js";
export { CacheError, ConfigurationError, DirectoryError, SerializationError } from "./errors.js";
export { createLogger, silentLogger } from "./logger.js";
export type { Logger } from "./logger.js";
export { DEFAULT_OPTIONS } from "./types.js";
export type {
  CacheFormat,
  CacheMode,
  CacheOverrides,
  CacheRequest,
  CacheStats,
  Invocation,
  JsonValue,
  MemoizeOptions,
  ResolvedOptions,
} from "./types.js";
