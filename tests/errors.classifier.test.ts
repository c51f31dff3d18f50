import { describe, it } from "mocha";
import { expect } from "chai";
import { z } from "zod";

import { classifyError, inferOrigin } from "../src/errors/classifier.js";
import { ToolTimeoutError, UpstreamError, WriteNotAllowedError } from "../src/errors/taxonomy.js";

describe("error classifier", () => {
  it("keeps the category and code of typed errors", () => {
    expect(classifyError(new ToolTimeoutError("run_tests", 50))).to.deep.equal({
      category: "timeout",
      origin: "internal",
      code: "E-TOOL-TIMEOUT",
      message: 'Tool "run_tests" timed out after 50ms',
    });
    expect(classifyError(new WriteNotAllowedError("create_commit", "denied")).code).to.equal("write_not_allowed");
    expect(classifyError(new UpstreamError("remote failed", { status: 502 })).category).to.equal("upstream");
  });

  it("maps zod failures to validation", () => {
    const parsed = z.string().safeParse(1);
    expect(parsed.success).to.equal(false);
    if (!parsed.success) {
      const classification = classifyError(parsed.error);
      expect(classification.category).to.equal("validation");
      expect(classification.code).to.equal("E-TOOL-VALIDATION");
    }
  });

  it("recognises errno codes and HTTP statuses", () => {
    expect(classifyError(Object.assign(new Error("socket closed"), { code: "ECONNRESET" })).category).to.equal("upstream");
    expect(classifyError(Object.assign(new Error("slow"), { code: "ETIMEDOUT" })).category).to.equal("timeout");
    expect(classifyError(Object.assign(new Error("boom"), { status: 503 })).category).to.equal("upstream");
    expect(classifyError(Object.assign(new Error("boom"), { status: 504 })).category).to.equal("timeout");
  });

  it("falls back on message wording", () => {
    expect(classifyError(new Error("permission denied for repository")).category).to.equal("authorization");
    expect(classifyError(new Error("API rate limit exceeded")).category).to.equal("upstream");
    expect(classifyError(new Error("value is required")).category).to.equal("validation");
  });

  it("classifies anything else as unknown", () => {
    expect(classifyError("weird")).to.deep.equal({
      category: "unknown",
      origin: "internal",
      code: "E-TOOL-INTERNAL",
      message: "weird",
    });
  });

  it("detects calls blocked by the hosting platform", () => {
    expect(inferOrigin("Request was blocked by the platform")).to.equal("external_platform");
    expect(classifyError(new Error("Request was blocked by the platform")).origin).to.equal("external_platform");
    expect(inferOrigin("disk full")).to.equal("internal");
  });

  it("collapses messages to one line", () => {
    expect(classifyError(new Error("line one\n   line two")).message).to.equal("line one line two");
    expect(classifyError(new Error("")).message).to.equal("Error");
  });
});
