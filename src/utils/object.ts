/** Helpers operating on plain JSON-like records. */

/** Narrows an arbitrary value to a non-array object record. */
export function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Like {@link isPlainRecord}, but rejects class instances, maps and dates. */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (!isPlainRecord(value)) {
    return false;
  }
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

/** Returns true when the record owns the key (prototype keys are ignored). */
export function hasOwn(record: object, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(record, key);
}
