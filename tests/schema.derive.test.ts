import { describe, it } from "mocha";
import { expect } from "chai";
import { z } from "zod";

import {
  applySchemaOverride,
  buildArgumentValidator,
  deriveInputSchema,
  toJsonValue,
} from "../src/schema/derive.js";

describe("schema derivation", () => {
  it("publishes a required integer parameter", () => {
    expect(deriveInputSchema({ value: z.number().int() })).to.deep.equal({
      type: "object",
      properties: { value: { type: "integer" } },
      required: ["value"],
    });
  });

  it("marks optional, nullable and defaulted parameters", () => {
    const schema = deriveInputSchema({
      name: z.string(),
      limit: z.number().int().default(10),
      tags: z.array(z.string()).optional(),
      note: z.string().nullable(),
      mode: z.enum(["fast", "slow"]).nullish(),
    });

    expect(schema.properties).to.deep.equal({
      name: { type: "string" },
      limit: { type: "integer", default: 10 },
      tags: { type: "array", items: { type: "string" }, nullable: true },
      note: { type: "string", nullable: true },
      mode: { type: "string", enum: ["fast", "slow"], nullable: true },
    });
    expect(schema.required).to.deep.equal(["name", "note"]);
  });

  it("leaves untyped containers without item schemas", () => {
    const schema = deriveInputSchema({ entries: z.array(z.unknown()), extra: z.record(z.any()) });
    expect(schema.properties).to.deep.equal({ entries: { type: "array" }, extra: { type: "object" } });
  });

  it("keeps typed record values", () => {
    const schema = deriveInputSchema({ headers: z.record(z.string()) });
    expect(schema.properties.headers).to.deep.equal({ type: "object", additionalProperties: { type: "string" } });
  });

  it("publishes anyOf for unions and keeps nullability", () => {
    const schema = deriveInputSchema({ id: z.union([z.string(), z.number(), z.null()]) });
    expect(schema.properties.id).to.deep.equal({
      anyOf: [{ type: "string" }, { type: "number" }],
      nullable: true,
    });
    expect(schema.required).to.deep.equal(["id"]);
  });

  it("recurses into nested objects", () => {
    const schema = deriveInputSchema({
      location: z.object({ path: z.string(), line: z.number().int().optional() }),
    });
    expect(schema.properties.location).to.deep.equal({
      type: "object",
      properties: { path: { type: "string" }, line: { type: "integer", nullable: true } },
      required: ["path"],
    });
  });

  it("maps literals, dates and bigints", () => {
    const schema = deriveInputSchema({ kind: z.literal("push"), since: z.date(), size: z.bigint() });
    expect(schema.properties).to.deep.equal({
      kind: { type: "string", enum: ["push"] },
      since: { type: "string" },
      size: { type: "integer" },
    });
  });

  it("publishes descriptions", () => {
    const schema = deriveInputSchema({ branch: z.string().describe("Branch to update") });
    expect(schema.properties.branch).to.deep.equal({ type: "string", description: "Branch to update" });
  });

  it("derives byte-identical output from the same shape", () => {
    const shape = {
      path: z.string(),
      ref: z.string().optional(),
      depth: z.number().int().default(1),
    };
    expect(JSON.stringify(deriveInputSchema(shape))).to.equal(JSON.stringify(deriveInputSchema(shape)));
    expect(Object.keys(deriveInputSchema(shape).properties)).to.deep.equal(["path", "ref", "depth"]);
  });

  it("applies overrides to both the schema and the validator", () => {
    const shape = { paths: z.string(), legacy: z.boolean() };
    const override = { properties: { paths: z.array(z.string()) }, omit: ["legacy"] };

    expect(deriveInputSchema(shape, override)).to.deep.equal({
      type: "object",
      properties: { paths: { type: "array", items: { type: "string" } } },
      required: ["paths"],
    });

    const validator = buildArgumentValidator(applySchemaOverride(shape, override));
    expect(validator.safeParse({ paths: ["a.ts"] }).success).to.equal(true);
    expect(validator.safeParse({ paths: ["a.ts"], legacy: true }).success).to.equal(false);
  });

  it("converts only JSON-representable defaults", () => {
    expect(toJsonValue({ a: [1, "b", null] })).to.deep.equal({ a: [1, "b", null] });
    expect(toJsonValue(Number.NaN)).to.equal(undefined);
    expect(toJsonValue(new Map())).to.equal(undefined);
    expect(toJsonValue(new (class Point {
      x = 1;
    })())).to.equal(undefined);
    expect(toJsonValue({ nested: new Set([1]) })).to.equal(undefined);
    expect(toJsonValue(Object.assign(Object.create(null), { a: 1 }))).to.deep.equal({ a: 1 });
  });

  it("publishes date defaults as ISO strings", () => {
    const schema = deriveInputSchema({
      since: z.date().default(new Date("2026-01-02T03:04:05.000Z")),
      until: z.date().default(new Date(Number.NaN)),
    });
    expect(schema.properties).to.deep.equal({
      since: { type: "string", default: "2026-01-02T03:04:05.000Z" },
      until: { type: "string" },
    });
    expect(schema.required).to.deep.equal([]);
  });
});
