import { z } from "zod";

import type { JsonValue } from "../utils/canonical.js";
import { isPlainObject } from "../utils/object.js";

export type JsonSchemaType = "string" | "integer" | "number" | "boolean" | "array" | "object" | "null";

/**
 * Published description of one argument. Declared as a type alias (not an
 * interface) so it stays assignable to the index-signature shapes used by
 * MCP tool listings.
 */
export type PropertySchema = {
  type?: JsonSchemaType;
  enum?: JsonValue[];
  items?: PropertySchema;
  properties?: Record<string, PropertySchema>;
  required?: string[];
  additionalProperties?: PropertySchema;
  anyOf?: PropertySchema[];
  nullable?: boolean;
  default?: JsonValue;
  description?: string;
};

/** Input schema of a tool: always an object of named arguments. */
export type ObjectSchema = {
  type: "object";
  properties: Record<string, PropertySchema>;
  required: string[];
};

/**
 * Patch applied to a tool's parameter shape before derivation. Overrides
 * apply to validation as well, so the published schema and the accepted
 * arguments never disagree.
 */
export interface SchemaOverride {
  /** Replacement (or additional) parameter types, keyed by argument name. */
  readonly properties?: Readonly<Record<string, z.ZodTypeAny>>;
  /** Arguments removed from the shape. */
  readonly omit?: readonly string[];
}

/** Overrides keyed by tool name. */
export type SchemaOverrideTable = ReadonlyMap<string, SchemaOverride>;

/** Validator built from a parameter shape; unknown keys are rejected. */
export type ArgumentValidator = z.ZodObject<z.ZodRawShape, "strict">;

interface UnwrappedParameter {
  inner: z.ZodTypeAny;
  optional: boolean;
  nullable: boolean;
  hasDefault: boolean;
  defaultValue: JsonValue | undefined;
  description: string | undefined;
}

/**
 * Converts a runtime value to JSON, or `undefined` when it has no JSON form.
 * Valid dates become ISO strings; other non-plain objects have none.
 */
export function toJsonValue(value: unknown): JsonValue | undefined {
  if (value === null || typeof value === "string" || typeof value === "boolean") {
    return value;
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : undefined;
  }
  if (Array.isArray(value)) {
    const items: JsonValue[] = [];
    for (const entry of value) {
      const converted = toJsonValue(entry);
      if (converted === undefined) {
        return undefined;
      }
      items.push(converted);
    }
    return items;
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? undefined : value.toISOString();
  }
  if (isPlainObject(value)) {
    const result: { [key: string]: JsonValue } = {};
    for (const [key, entry] of Object.entries(value)) {
      const converted = toJsonValue(entry);
      if (converted === undefined) {
        return undefined;
      }
      result[key] = converted;
    }
    return result;
  }
  return undefined;
}

/** Peels optional/nullable/default and transparent wrappers off a parameter type. */
function unwrapParameter(schema: z.ZodTypeAny): UnwrappedParameter {
  const result: UnwrappedParameter = {
    inner: schema,
    optional: false,
    nullable: false,
    hasDefault: false,
    defaultValue: undefined,
    description: schema.description,
  };
  let current = schema;
  for (;;) {
    result.description ??= current.description;
    if (current instanceof z.ZodOptional) {
      result.optional = true;
      current = current.unwrap();
    } else if (current instanceof z.ZodNullable) {
      result.nullable = true;
      current = current.unwrap();
    } else if (current instanceof z.ZodDefault) {
      const produced: unknown = current._def.defaultValue();
      result.hasDefault = true;
      result.defaultValue = toJsonValue(produced);
      current = current.removeDefault();
    } else if (current instanceof z.ZodEffects) {
      current = current.innerType();
    } else if (current instanceof z.ZodBranded || current instanceof z.ZodReadonly) {
      current = current.unwrap();
    } else if (current instanceof z.ZodCatch) {
      current = current.removeCatch();
    } else if (current instanceof z.ZodPipeline) {
      current = current._def.in;
    } else {
      break;
    }
  }
  result.inner = current;
  return result;
}

function literalType(value: unknown): JsonSchemaType | undefined {
  if (value === null) {
    return "null";
  }
  if (typeof value === "string") {
    return "string";
  }
  if (typeof value === "boolean") {
    return "boolean";
  }
  if (typeof value === "number") {
    return Number.isInteger(value) ? "integer" : "number";
  }
  return undefined;
}

/** An empty description carries no type information ("any"). */
function isUntyped(schema: PropertySchema): boolean {
  return schema.type === undefined && schema.anyOf === undefined && schema.enum === undefined;
}

function isNullBranch(schema: z.ZodTypeAny): boolean {
  const { inner } = unwrapParameter(schema);
  return inner instanceof z.ZodNull || inner instanceof z.ZodUndefined || (inner instanceof z.ZodLiteral && inner.value === null);
}

function describeUnion(options: readonly z.ZodTypeAny[]): PropertySchema {
  const nullable = options.some((option) => isNullBranch(option));
  const described: PropertySchema[] = [];
  const seen = new Set<string>();
  for (const option of options) {
    if (isNullBranch(option)) {
      continue;
    }
    const schema = describeMember(option);
    const key = JSON.stringify(schema);
    if (!seen.has(key)) {
      seen.add(key);
      described.push(schema);
    }
  }
  if (described.length === 0) {
    return { type: "null" };
  }
  const [first] = described;
  const base: PropertySchema = described.length === 1 && first ? first : { anyOf: described };
  return nullable ? { ...base, nullable: true } : base;
}

/** Structural description of an unwrapped type. */
function describeStructure(schema: z.ZodTypeAny): PropertySchema {
  if (schema instanceof z.ZodString || schema instanceof z.ZodDate) {
    return { type: "string" };
  }
  if (schema instanceof z.ZodNumber) {
    return { type: schema.isInt ? "integer" : "number" };
  }
  if (schema instanceof z.ZodBigInt) {
    return { type: "integer" };
  }
  if (schema instanceof z.ZodBoolean) {
    return { type: "boolean" };
  }
  if (schema instanceof z.ZodNull) {
    return { type: "null" };
  }
  if (schema instanceof z.ZodLiteral) {
    const value: unknown = schema.value;
    const type = literalType(value);
    const json = toJsonValue(value);
    return type && json !== undefined ? { type, enum: [json] } : {};
  }
  if (schema instanceof z.ZodEnum) {
    const options: string[] = [...schema.options];
    return { type: "string", enum: options };
  }
  if (schema instanceof z.ZodArray) {
    return describeContainer(schema.element);
  }
  if (schema instanceof z.ZodSet) {
    return describeContainer(schema._def.valueType);
  }
  if (schema instanceof z.ZodTuple) {
    return { type: "array" };
  }
  if (schema instanceof z.ZodObject) {
    const shape: z.ZodRawShape = schema.shape;
    return deriveObjectSchema(shape);
  }
  if (schema instanceof z.ZodRecord) {
    const value = describeMember(schema.valueSchema);
    return isUntyped(value) ? { type: "object" } : { type: "object", additionalProperties: value };
  }
  if (schema instanceof z.ZodMap) {
    return { type: "object" };
  }
  if (schema instanceof z.ZodUnion || schema instanceof z.ZodDiscriminatedUnion) {
    const options: z.ZodTypeAny[] = [...schema.options];
    return describeUnion(options);
  }
  return {};
}

function describeContainer(element: z.ZodTypeAny): PropertySchema {
  const items = describeMember(element);
  return isUntyped(items) ? { type: "array" } : { type: "array", items };
}

/** Description of a nested member (array element, record value, union branch). */
function describeMember(schema: z.ZodTypeAny): PropertySchema {
  const unwrapped = unwrapParameter(schema);
  const structure = describeStructure(unwrapped.inner);
  return unwrapped.optional || unwrapped.nullable ? { ...structure, nullable: true } : structure;
}

/** Description of a top-level argument plus its requiredness. */
function describeParameter(schema: z.ZodTypeAny): { schema: PropertySchema; required: boolean } {
  const unwrapped = unwrapParameter(schema);
  let described = describeStructure(unwrapped.inner);
  if ((unwrapped.optional || unwrapped.nullable) && described.nullable !== true) {
    described = { ...described, nullable: true };
  }
  if (unwrapped.defaultValue !== undefined) {
    described = { ...described, default: unwrapped.defaultValue };
  }
  if (unwrapped.description !== undefined && unwrapped.description.length > 0) {
    described = { ...described, description: unwrapped.description };
  }
  return { schema: described, required: !unwrapped.optional && !unwrapped.hasDefault };
}

/**
 * Derives the published input schema from a parameter shape. A parameter is
 * required unless it is optional or carries a default. The output only
 * depends on the shape, so deriving twice yields byte-identical JSON.
 */
export function deriveObjectSchema(shape: z.ZodRawShape): ObjectSchema {
  const properties: Record<string, PropertySchema> = {};
  const required: string[] = [];
  for (const [name, parameter] of Object.entries(shape)) {
    const described = describeParameter(parameter);
    properties[name] = described.schema;
    if (described.required) {
      required.push(name);
    }
  }
  return { type: "object", properties, required };
}

/** Applies an override to a parameter shape, returning a new shape. */
export function applySchemaOverride(shape: z.ZodRawShape, override: SchemaOverride | undefined): z.ZodRawShape {
  if (!override) {
    return { ...shape };
  }
  const omitted = new Set(override.omit ?? []);
  const patched: z.ZodRawShape = {};
  for (const [name, parameter] of Object.entries(shape)) {
    if (!omitted.has(name)) {
      patched[name] = parameter;
    }
  }
  for (const [name, parameter] of Object.entries(override.properties ?? {})) {
    patched[name] = parameter;
  }
  return patched;
}

/** Derives the schema of a shape after applying the optional override. */
export function deriveInputSchema(shape: z.ZodRawShape, override?: SchemaOverride): ObjectSchema {
  return deriveObjectSchema(applySchemaOverride(shape, override));
}

/** Strict validator matching the published schema of the shape. */
export function buildArgumentValidator(shape: z.ZodRawShape): ArgumentValidator {
  return z.object(shape).strict();
}
