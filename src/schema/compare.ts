import { hashCanonical, stableStringify, type JsonValue } from "../utils/canonical.js";
import type { ObjectSchema, PropertySchema } from "./derive.js";

/** One difference between a previously published schema and a fresh one. */
export type SchemaChange =
  | { kind: "property_added"; property: string }
  | { kind: "property_removed"; property: string }
  | { kind: "required_added"; property: string }
  | { kind: "required_removed"; property: string }
  | { kind: "type_changed"; property: string; before: string; after: string }
  | { kind: "default_changed"; property: string; before: JsonValue | undefined; after: JsonValue | undefined }
  | { kind: "structure_changed"; property: string };

/** Compact label describing a property's type, e.g. `array<string>|null`. */
export function describePropertyType(schema: PropertySchema): string {
  let label: string;
  if (schema.anyOf) {
    label = schema.anyOf.map((branch) => describePropertyType(branch)).join("|");
  } else if (schema.type === "array" && schema.items) {
    label = `array<${describePropertyType(schema.items)}>`;
  } else {
    label = schema.type ?? "any";
  }
  return schema.nullable ? `${label}|null` : label;
}

function withoutDescription(schema: PropertySchema): PropertySchema {
  const { description: _description, ...rest } = schema;
  return rest;
}

/**
 * Lists the differences between two input schemas in a stable order:
 * property membership, then requiredness, then per-property type, default and
 * nested structure. Descriptions are ignored. A missing previous schema
 * compares as an empty object.
 */
export function diffInputSchemas(previous: ObjectSchema | undefined, next: ObjectSchema): SchemaChange[] {
  const before = previous ?? { type: "object", properties: {}, required: [] };
  const changes: SchemaChange[] = [];
  const names = Array.from(new Set([...Object.keys(before.properties), ...Object.keys(next.properties)])).sort();

  for (const property of names) {
    const inBefore = property in before.properties;
    const inNext = property in next.properties;
    if (!inBefore) {
      changes.push({ kind: "property_added", property });
    } else if (!inNext) {
      changes.push({ kind: "property_removed", property });
    }
  }

  const requiredBefore = new Set(before.required);
  const requiredNext = new Set(next.required);
  for (const property of Array.from(new Set([...before.required, ...next.required])).sort()) {
    if (!requiredBefore.has(property)) {
      changes.push({ kind: "required_added", property });
    } else if (!requiredNext.has(property)) {
      changes.push({ kind: "required_removed", property });
    }
  }

  for (const property of names) {
    const old = before.properties[property];
    const fresh = next.properties[property];
    if (!old || !fresh) {
      continue;
    }
    const typeBefore = describePropertyType(old);
    const typeAfter = describePropertyType(fresh);
    const typeChanged = typeBefore !== typeAfter;
    if (typeChanged) {
      changes.push({ kind: "type_changed", property, before: typeBefore, after: typeAfter });
    }
    const defaultChanged = "default" in old !== "default" in fresh || stableStringify(old.default) !== stableStringify(fresh.default);
    if (defaultChanged) {
      changes.push({ kind: "default_changed", property, before: old.default, after: fresh.default });
    }
    if (!typeChanged && !defaultChanged && stableStringify(withoutDescription(old)) !== stableStringify(withoutDescription(fresh))) {
      changes.push({ kind: "structure_changed", property });
    }
  }
  return changes;
}

/** True when the published schema must be republished to match `next`. */
export function schemaNeedsUpdate(previous: ObjectSchema | undefined, next: ObjectSchema): boolean {
  return previous === undefined || diffInputSchemas(previous, next).length > 0;
}

/** sha256 of the schema's canonical JSON. */
export function schemaHash(schema: ObjectSchema): string {
  return hashCanonical(schema);
}
