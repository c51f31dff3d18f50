import { describe, it } from "mocha";
import { expect } from "chai";
import { z } from "zod";

import { describePropertyType, diffInputSchemas, schemaHash, schemaNeedsUpdate } from "../src/schema/compare.js";
import { deriveInputSchema } from "../src/schema/derive.js";

describe("schema comparison", () => {
  it("always publishes when no previous schema exists", () => {
    expect(schemaNeedsUpdate(undefined, deriveInputSchema({ a: z.string() }))).to.equal(true);
  });

  it("reports no change for identical schemas", () => {
    const previous = deriveInputSchema({ a: z.string(), b: z.number().optional() });
    const next = deriveInputSchema({ a: z.string(), b: z.number().optional() });
    expect(diffInputSchemas(previous, next)).to.deep.equal([]);
    expect(schemaNeedsUpdate(previous, next)).to.equal(false);
  });

  it("treats a new default as a change even when requiredness is unchanged", () => {
    const previous = deriveInputSchema({ limit: z.number().int().optional() });
    const next = deriveInputSchema({ limit: z.number().int().optional().default(5) });

    expect(previous.required).to.deep.equal(next.required);
    expect(diffInputSchemas(previous, next)).to.deep.equal([
      { kind: "default_changed", property: "limit", before: undefined, after: 5 },
    ]);
    expect(schemaNeedsUpdate(previous, next)).to.equal(true);
  });

  it("reports type changes with readable labels", () => {
    const previous = deriveInputSchema({ paths: z.string() });
    const next = deriveInputSchema({ paths: z.array(z.string()) });
    expect(diffInputSchemas(previous, next)).to.deep.equal([
      { kind: "type_changed", property: "paths", before: "string", after: "array<string>" },
    ]);
  });

  it("reports added properties and requiredness", () => {
    const previous = deriveInputSchema({ a: z.string() });
    const next = deriveInputSchema({ a: z.string(), b: z.string() });
    expect(diffInputSchemas(previous, next)).to.deep.equal([
      { kind: "property_added", property: "b" },
      { kind: "required_added", property: "b" },
    ]);
  });

  it("ignores description-only edits", () => {
    const previous = deriveInputSchema({ ref: z.string() });
    const next = deriveInputSchema({ ref: z.string().describe("Target branch") });
    expect(schemaNeedsUpdate(previous, next)).to.equal(false);
  });

  it("hashes schemas deterministically", () => {
    const first = schemaHash(deriveInputSchema({ a: z.string() }));
    expect(first).to.match(/^[0-9a-f]{64}$/);
    expect(schemaHash(deriveInputSchema({ a: z.string() }))).to.equal(first);
    expect(schemaHash(deriveInputSchema({ a: z.number() }))).to.not.equal(first);
  });

  it("labels nullable arrays", () => {
    expect(describePropertyType({ type: "array", items: { type: "string" }, nullable: true })).to.equal(
      "array<string>|null",
    );
    expect(describePropertyType({})).to.equal("any");
  });
});
