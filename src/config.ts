import { promises as fs } from "fs";
import { join } from "path";
import { z } from "zod";
import { ConfigurationError, DirectoryError } from "./errors.js";
import type { CacheOverrides, ResolvedOptions } from "./types.js";
import { DEFAULT_OPTIONS } from "./types.js";
import { isMissing } from "./utils.js";

export const CacheModeSchema = z.enum(["hash", "name"]);
export const CacheFormatSchema = z.enum(["gzip", "json"]);

export const CacheOverridesSchema = z
  .object({
    dir: z.string().optional(),
    mode: CacheModeSchema.optional(),
    comment: z
      .string()
      .refine((c) => !/[\\/]/.test(c), "comment must not contain path separators")
      .optional(),
    forceRefresh: z.boolean().optional(),
    format: CacheFormatSchema.optional(),
  })
  .strict();

/**
 * Validate user-supplied cache settings.
 * @throws ConfigurationError listing every invalid field
 */
export function parseOverrides(input: unknown): CacheOverrides {
  const result = CacheOverridesSchema.safeParse(input);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "options"}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid cache options: ${details}`);
  }
  return result.data;
}

/**
 * Merge option layers, lowest precedence first.
 * An `undefined` field never overrides a lower layer.
 */
export function mergeOptions(...layers: readonly CacheOverrides[]): ResolvedOptions {
  const merged: ResolvedOptions = { ...DEFAULT_OPTIONS };
  for (const layer of layers) {
    if (layer.mode !== undefined) merged.mode = layer.mode;
    if (layer.comment !== undefined) merged.comment = layer.comment;
    if (layer.forceRefresh !== undefined) merged.forceRefresh = layer.forceRefresh;
    if (layer.format !== undefined) merged.format = layer.format;
  }
  return merged;
}

/**
 * Pick the directory from candidates ordered by precedence.
 * The first candidate that is set decides: an empty string there turns
 * caching off for the call instead of falling through to later candidates.
 * Returns undefined when caching is bypassed.
 */
export function resolveDirectory(candidates: readonly (string | undefined)[]): string | undefined {
  const dir = candidates.find((candidate) => candidate !== undefined);
  return dir === "" ? undefined : dir;
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await fs.stat(path)).isDirectory();
  } catch (err) {
    if (isMissing(err)) return false;
    throw err;
  }
}

/**
 * Find the directory on disk: as given, then relative to the working directory.
 * @throws DirectoryError when neither exists
 */
export async function locateDirectory(dir: string): Promise<string> {
  if (await isDirectory(dir)) return dir;

  const fromCwd = join(process.cwd(), dir);
  if (await isDirectory(fromCwd)) return fromCwd;

  throw new DirectoryError(dir, [dir, fromCwd]);
}
