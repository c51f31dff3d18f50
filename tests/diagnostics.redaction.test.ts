import { describe, it } from "mocha";
import { expect } from "chai";

import { isSensitiveKey, redactText, redactValue } from "../src/monitor/redaction.js";

describe("redaction", () => {
  it("scrubs authorization headers", () => {
    expect(redactText("Authorization: Basic dXNlcjpwYXNz")).to.equal("Authorization: Basic [REDACTED]");
    expect(redactText("curl -H 'Authorization: Bearer abc.def'")).to.equal("curl -H 'Authorization: Bearer [REDACTED]'");
  });

  it("scrubs GitHub-shaped tokens, e-mail and IPv4 addresses", () => {
    const token = `ghp_${"x".repeat(24)}`;
    expect(redactText(`using ${token} now`)).to.equal("using [REDACTED_GITHUB_TOKEN] now");
    expect(redactText("contact dev@example.org")).to.equal("contact [REDACTED_EMAIL]");
    expect(redactText("host 192.168.1.20 down")).to.equal("host [REDACTED_IP] down");
  });

  it("leaves ordinary text alone", () => {
    expect(redactText("updated 3 files on feature/x")).to.equal("updated 3 files on feature/x");
  });

  it("replaces sensitive keys at any depth without mutating the input", () => {
    const input = { headers: { Authorization: "test-secret", accept: "json" }, items: [{ password: "test-secret" }] };
    expect(redactValue(input)).to.deep.equal({
      headers: { Authorization: "[REDACTED]", accept: "json" },
      items: [{ password: "[REDACTED]" }],
    });
    expect(input.headers.Authorization).to.equal("test-secret");
    expect(isSensitiveKey("X-API-Key")).to.equal(true);
  });

  it("marks reference cycles and keeps repeated siblings", () => {
    const shared = ["x"];
    const details: Record<string, unknown> = { name: "loop", token: "test-secret", left: shared, right: shared };
    details.self = details;

    expect(redactValue(details)).to.deep.equal({
      name: "loop",
      token: "[REDACTED]",
      left: ["x"],
      right: ["x"],
      self: "[Circular]",
    });
  });
});
