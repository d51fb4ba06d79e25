import { createHash } from "crypto";
import type { JsonValue } from "./types.js";

/**
 * Generate a hash for a cache key.
 * Returns a 32-character hex string (128 bits). This names cache files; it is
 * not a security boundary.
 */
export function hashKey(key: string): string {
  return createHash("sha256").update(key).digest("hex").slice(0, 32);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== "object" || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Check whether a value maps onto JSON without loss.
 * Nested nulls are allowed; non-finite numbers, sparse or undefined members,
 * class instances (Set, Map, Date) and cycles are not.
 */
export function isJsonValue(value: unknown, ancestors: Set<object> = new Set()): value is JsonValue {
  if (value === null) return true;
  if (typeof value === "object") {
    if (ancestors.has(value)) return false;
    let members: unknown[];
    if (Array.isArray(value)) {
      members = Array.from(value);
    } else if (isPlainObject(value)) {
      members = Object.values(value);
    } else {
      return false;
    }
    ancestors.add(value);
    const ok = members.every((member) => isJsonValue(member, ancestors));
    ancestors.delete(value);
    return ok;
  }
  switch (typeof value) {
    case "string":
    case "boolean":
      return true;
    case "number":
      return Number.isFinite(value);
    default:
      return false;
  }
}

/**
 * Check whether an argument takes part in hash-based key derivation.
 * Eligibility is by type: strings, finite numbers, booleans, and arrays or
 * plain objects made of JSON values. A top-level null is not eligible.
 */
export function isEligible(value: unknown): value is JsonValue {
  return value !== null && isJsonValue(value);
}

/**
 * Sort object keys recursively so equal structures stringify identically.
 */
export function sortKeys(value: JsonValue): JsonValue {
  if (value === null || typeof value !== "object") return value;
  if (Array.isArray(value)) return value.map(sortKeys);

  const record = value;
  // fromEntries keeps a "__proto__" key as an own property
  return Object.fromEntries(
    Object.keys(record)
      .sort()
      .map((key): [string, JsonValue] => [key, sortKeys(record[key])]),
  );
}

/**
 * Deterministic JSON text for a value.
 */
export function canonicalJson(value: JsonValue): string {
  return JSON.stringify(sortKeys(value));
}

/**
 * Strip leading and trailing characters that are not letters or digits
 * (e.g. `__call__` becomes `call`).
 */
export function trimName(name: string): string {
  return name.replace(/^[^\p{L}\p{N}]+|[^\p{L}\p{N}]+$/gu, "");
}

/**
 * True for errors meaning "nothing at this path".
 */
export function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && (err.code === "ENOENT" || err.code === "ENOTDIR");
}
