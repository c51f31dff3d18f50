import { describe, it } from "mocha";
import { expect } from "chai";
import { z } from "zod";

import { buildArgumentValidator, deriveInputSchema } from "../src/schema/derive.js";
import { MAX_REPORTED_ISSUES, describeArgumentProblems, validateArguments } from "../src/schema/validate.js";

describe("argument validation", () => {
  const shape = { value: z.number().int(), label: z.string().optional() };
  const validator = buildArgumentValidator(shape);

  it("returns the parsed data for valid arguments", () => {
    expect(validateArguments(validator, { value: 3 })).to.deep.equal({ valid: true, errors: [], data: { value: 3 } });
  });

  it("rejects unknown arguments", () => {
    expect(validateArguments(validator, { value: 3, extra: 1 })).to.deep.equal({
      valid: false,
      errors: [{ path: "extra", code: "unknown_argument", message: 'Unknown argument "extra"' }],
    });
  });

  it("reports missing required arguments", () => {
    expect(validateArguments(validator, {})).to.deep.equal({
      valid: false,
      errors: [{ path: "value", code: "missing_argument", message: 'Missing required argument "value"' }],
    });
  });

  it("reports type mismatches with the zod issue code", () => {
    const check = validateArguments(validator, { value: "3" });
    expect(check.valid).to.equal(false);
    if (!check.valid) {
      expect(check.errors).to.have.length(1);
      expect(check.errors[0]?.path).to.equal("value");
      expect(check.errors[0]?.code).to.equal("invalid_type");
    }
  });

  it("caps the number of reported issues", () => {
    const wide: z.ZodRawShape = {};
    for (let index = 0; index < 60; index += 1) {
      wide[`field_${index}`] = z.string();
    }
    const check = validateArguments(buildArgumentValidator(wide), {});
    expect(check.valid).to.equal(false);
    if (!check.valid) {
      expect(check.errors).to.have.length(MAX_REPORTED_ISSUES);
    }
  });

  it("lists unknown, missing and expected argument names", () => {
    expect(describeArgumentProblems(deriveInputSchema(shape), { valeu: 1 })).to.deep.equal({
      unknown_args: ["valeu"],
      missing_args: ["value"],
      expected_args: ["value", "label"],
    });
  });
});
