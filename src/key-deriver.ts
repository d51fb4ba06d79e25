import { ConfigurationError } from "./errors.js";
import type { Invocation, JsonValue } from "./types.js";
import { canonicalJson, hashKey, isEligible } from "./utils.js";

/**
 * Build the hashed view of an invocation: eligible positional values in
 * order, and eligible keyword entries. Everything else is left out.
 */
export function hashableView(invocation: Invocation): { args: JsonValue[]; kwargs: { [key: string]: JsonValue } } {
  const args = invocation.args.filter(isEligible);
  const kwargs = Object.fromEntries(
    Object.entries(invocation.kwargs).filter((entry): entry is [string, JsonValue] => isEligible(entry[1])),
  );
  return { args, kwargs };
}

/**
 * Derive the cache identifier for a call.
 * - `name`: the function's name, verbatim
 * - `hash`: a 128-bit hex digest of the canonical JSON of the eligible arguments
 */
export function deriveKey(invocation: Invocation, mode: string, name: string): string {
  switch (mode) {
    case "name":
      return name;
    case "hash":
      return hashKey(canonicalJson(hashableView(invocation)));
    default:
      throw new ConfigurationError(
        `'${mode}' is not a valid caching mode; use 'name' or 'hash'.`,
      );
  }
}
