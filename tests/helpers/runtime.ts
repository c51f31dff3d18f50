import { expect } from "chai";

import { loadDispatchSettings, type DispatchSettings } from "../../src/config/settings.js";
import type { ToolCallOutcome, ToolFailure } from "../../src/dispatch/dispatcher.js";
import { createToolRuntime, type ToolRuntime } from "../../src/runtime.js";

/** Instant every harness clock starts from. */
export const HARNESS_EPOCH = Date.parse("2026-03-01T10:00:00.000Z");

export interface RuntimeHarness {
  runtime: ToolRuntime;
  /** Serialised log lines, in emission order. */
  lines: string[];
  /** Moves the injected clock forward. */
  advance(ms: number): void;
}

export interface HarnessOptions {
  settings?: Partial<DispatchSettings>;
  credentialsPresent?: boolean;
  introspection?: boolean;
}

/**
 * Runtime wired with a manual clock, sequential call ids (`call-1`,
 * `call-2`, …) and an in-memory log sink. Nothing reads the process
 * environment.
 */
export function createRuntimeHarness(options: HarnessOptions = {}): RuntimeHarness {
  let now = HARNESS_EPOCH;
  let sequence = 0;
  const lines: string[] = [];
  const settings = loadDispatchSettings({}, { logLevel: "debug", ...options.settings });
  const runtime = createToolRuntime(settings, {
    clock: () => now,
    idGenerator: () => {
      sequence += 1;
      return `call-${sequence}`;
    },
    credentialProbe: () => options.credentialsPresent ?? true,
    logSink: (line) => lines.push(line),
    ...(options.introspection !== undefined ? { introspection: options.introspection } : {}),
  });
  return {
    runtime,
    lines,
    advance: (ms) => {
      now += ms;
    },
  };
}

/** Narrows an outcome to a failure, failing the test otherwise. */
export function expectFailure(outcome: ToolCallOutcome): ToolFailure {
  if (outcome.status !== "business_error") {
    return expect.fail(`expected a business_error outcome, got ${outcome.status}`);
  }
  return outcome.error;
}
