import { createHash } from "node:crypto";

/** JSON value accepted by schemas, fingerprints and diagnostics. */
export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/** Hash algorithm used for fingerprints and schema hashes. */
const HASH_ALGORITHM = "sha256";

/**
 * Recursively sorts object keys and normalises dates so logically equivalent
 * payloads serialise identically regardless of property ordering. `undefined`
 * entries are dropped, cycles are replaced with a marker.
 */
export function canonicalise(value: unknown, seen: WeakSet<object> = new WeakSet()): unknown {
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value === "bigint") {
    return value.toString();
  }
  if (value === null || typeof value !== "object") {
    return value;
  }
  if (seen.has(value)) {
    return "[Circular]";
  }
  seen.add(value);
  try {
    if (Array.isArray(value)) {
      return value.map((entry) => canonicalise(entry, seen));
    }
    const normalised: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      const entry: unknown = Reflect.get(value, key);
      if (entry === undefined) {
        continue;
      }
      normalised[key] = canonicalise(entry, seen);
    }
    return normalised;
  } finally {
    seen.delete(value);
  }
}

/** Serialises the value with sorted keys. */
export function stableStringify(value: unknown): string {
  return JSON.stringify(canonicalise(value)) ?? "null";
}

/** Hex digest of the canonical JSON form of the value. */
export function hashCanonical(value: unknown): string {
  return createHash(HASH_ALGORITHM).update(stableStringify(value)).digest("hex");
}
