import { describe, it } from "mocha";
import { expect } from "chai";
import { mkdtemp, readdir, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { runWithCallContext } from "../src/infra/callContext.js";
import { StructuredLogger, parseRedactionDirectives, type LogEntry } from "../src/logger.js";

const FIXED_NOW = () => new Date("2026-01-02T03:04:05.000Z");

function captureLines(): { lines: string[]; sink: (line: string) => void } {
  const lines: string[] = [];
  return { lines, sink: (line) => lines.push(line) };
}

describe("StructuredLogger", () => {
  it("emits one JSON document per line", () => {
    const { lines, sink } = captureLines();
    const logger = new StructuredLogger({ sink, now: FIXED_NOW, redactDirectives: null });

    logger.info("hello", { count: 1 });

    expect(lines).to.deep.equal([
      '{"timestamp":"2026-01-02T03:04:05.000Z","level":"info","message":"hello","payload":{"count":1}}\n',
    ]);
  });

  it("serialises cyclic payloads", () => {
    const { lines, sink } = captureLines();
    const logger = new StructuredLogger({ sink, now: FIXED_NOW, redactDirectives: null });
    const shared = [1];
    const payload: Record<string, unknown> = { name: "a", left: shared, right: shared };
    payload.self = payload;

    logger.info("loop", payload);

    expect(lines).to.deep.equal([
      '{"timestamp":"2026-01-02T03:04:05.000Z","level":"info","message":"loop","payload":{"name":"a","left":[1],"right":[1],"self":"[Circular]"}}\n',
    ]);
  });

  it("drops entries below the minimum level", () => {
    const { lines, sink } = captureLines();
    const logger = new StructuredLogger({ sink, minLevel: "warn", redactDirectives: null });

    logger.debug("quiet");
    logger.info("quiet");
    logger.warn("loud");
    logger.error("louder");

    expect(lines.map((line) => JSON.parse(line).message)).to.deep.equal(["loud", "louder"]);
  });

  it("tags entries emitted during a tool call with its correlation fields", async () => {
    const entries: LogEntry[] = [];
    const logger = new StructuredLogger({
      sink: () => undefined,
      now: FIXED_NOW,
      redactDirectives: null,
      onEntry: (entry) => entries.push(entry),
    });

    await runWithCallContext({ callId: "call-1", toolName: "echo", startedAt: 0 }, async () => {
      logger.info("inside");
    });
    logger.info("outside");

    expect(entries).to.deep.equal([
      { timestamp: "2026-01-02T03:04:05.000Z", level: "info", message: "inside", call_id: "call-1", tool: "echo" },
      { timestamp: "2026-01-02T03:04:05.000Z", level: "info", message: "outside" },
    ]);
  });

  it("redacts sensitive keys and configured secrets when enabled", () => {
    const entries: LogEntry[] = [];
    const logger = new StructuredLogger({
      sink: () => undefined,
      redactDirectives: "on,test-secret",
      onEntry: (entry) => entries.push(entry),
    });

    logger.warn("request", { token: "abc", nested: { note: "uses test-secret here" }, failure: new Error("test-secret leaked") });

    expect(entries[0]?.payload).to.deep.equal({
      token: "[REDACTED]",
      nested: { note: "uses [REDACTED] here" },
      failure: { name: "Error", message: "[REDACTED] leaked" },
    });
  });

  it("keeps sensitive keys when redaction is disabled", () => {
    const entries: LogEntry[] = [];
    const logger = new StructuredLogger({
      sink: () => undefined,
      redactDirectives: "off",
      onEntry: (entry) => entries.push(entry),
    });

    logger.info("request", { token: "abc", size: 10n });

    expect(entries[0]?.payload).to.deep.equal({ token: "abc", size: "10" });
  });

  it("rotates the log file when the configured size is exceeded", async () => {
    const directory = await mkdtemp(path.join(tmpdir(), "logger-"));
    const logFile = path.join(directory, "toolgate.log");

    try {
      const logger = new StructuredLogger({
        logFile,
        maxFileSizeBytes: 256,
        maxFileCount: 3,
        sink: () => undefined,
        redactDirectives: null,
      });

      for (let index = 0; index < 6; index += 1) {
        logger.info("rotation_test_entry", { index, payload: "x".repeat(120) });
      }
      await logger.flush();

      const files = (await readdir(directory)).sort();
      expect(files).to.deep.equal(["toolgate.log", "toolgate.log.1", "toolgate.log.2"]);
      const active = await readFile(logFile, "utf8");
      expect(JSON.parse(active.trim()).payload.index).to.equal(5);
    } finally {
      await rm(directory, { recursive: true, force: true });
    }
  });

  it("creates no file when mirroring is disabled", async () => {
    const directory = await mkdtemp(path.join(tmpdir(), "logger-"));
    try {
      const logger = new StructuredLogger({ logFile: null, sink: () => undefined, redactDirectives: null });
      logger.warn("no_mirror", { detail: "capture" });
      await logger.flush();

      expect(await readdir(directory)).to.deep.equal([]);
    } finally {
      await rm(directory, { recursive: true, force: true });
    }
  });
});

describe("redaction directives", () => {
  it("parses toggles and custom tokens", () => {
    expect(parseRedactionDirectives(undefined)).to.deep.equal({ enabled: false, tokens: [] });
    expect(parseRedactionDirectives("on")).to.deep.equal({ enabled: true, tokens: [] });
    expect(parseRedactionDirectives("sk-, sk-")).to.deep.equal({ enabled: true, tokens: ["sk-"] });
    expect(parseRedactionDirectives("off,sk-")).to.deep.equal({ enabled: false, tokens: ["sk-"] });
  });
});
