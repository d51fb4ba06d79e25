import { CacheStore } from "./cache-store.js";
import { mergeOptions, parseOverrides } from "./config.js";
import { ConfigurationError } from "./errors.js";
import type { CacheOverrides, MemoizeOptions } from "./types.js";

export type MemoizedCall<Self, A extends unknown[], R> = (this: Self, ...args: A) => Promise<R>;

export type Memoized<Self, A extends unknown[], R> = MemoizedCall<Self, A, R> & {
  /**
   * Apply call-time overrides; they take precedence over the wrapper's options.
   * `dir: ""` turns caching off for calls made through the returned function.
   */
  with(overrides: CacheOverrides): MemoizedCall<Self, A, R>;
  readonly store: CacheStore;
};

/** Object that carries its own cache directory, e.g. a service instance */
export interface CacheDirHolder {
  cacheDir: string;
}

export function hasCacheDir(receiver: unknown): receiver is CacheDirHolder {
  return (
    typeof receiver === "object" &&
    receiver !== null &&
    "cacheDir" in receiver &&
    typeof receiver.cacheDir === "string"
  );
}

/**
 * Wrap a function so its results are stored on disk.
 *
 * Directory precedence is: the receiver's `cacheDir` (when called as a method),
 * then a call-time `dir`, then `options.dir`. The first one that is set wins,
 * so an empty string there disables caching for the call. With no directory
 * the function simply runs.
 *
 * @example
 * ```ts
 * const report = memoize(buildReport, { dir: "./cache", format: "json" });
 * await report("2024-q1");
 * await report.with({ forceRefresh: true })("2024-q1");
 * ```
 *
 * @throws ConfigurationError when options are invalid
 */
export function memoize<Self, A extends unknown[], R>(
  fn: (this: Self, ...args: A) => R | Promise<R>,
  options: MemoizeOptions = {},
): Memoized<Self, A, R> {
  const { name, store, logger, ...cacheOptions } = options;
  if (store && logger) {
    throw new ConfigurationError("Pass either store or logger; a shared store keeps its own logger");
  }
  const decorated = parseOverrides(cacheOptions);
  const cacheStore = store ?? new CacheStore({ logger });
  const entryName = name ?? fn.name;

  function run(self: Self, args: A, overrides: CacheOverrides): Promise<R> {
    const resolved = mergeOptions(decorated, overrides);
    return cacheStore.getOrCompute<R>(
      {
        ...resolved,
        invocation: { args, kwargs: {} },
        name: entryName,
        dirs: [hasCacheDir(self) ? self.cacheDir : undefined, overrides.dir, decorated.dir],
      },
      () => fn.apply(self, args),
    );
  }

  function bind(overrides: CacheOverrides): MemoizedCall<Self, A, R> {
    return function (this: Self, ...args: A): Promise<R> {
      return run(this, args, overrides);
    };
  }

  const memoized = Object.assign(bind({}), {
    with: (overrides: CacheOverrides) => bind(parseOverrides(overrides)),
    store: cacheStore,
  });
  Object.defineProperty(memoized, "name", { value: entryName });
  return memoized;
}
