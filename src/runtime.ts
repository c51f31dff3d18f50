import { hasConfiguredCredential, loadDispatchSettings, type DispatchSettings } from "./config/settings.js";
import { ToolDispatcher } from "./dispatch/dispatcher.js";
import { WriteGate } from "./gate/writeGate.js";
import { DedupCache } from "./infra/dedup.js";
import { MetricsRegistry } from "./infra/metrics.js";
import { OutboundLimiter } from "./infra/outbound.js";
import { StructuredLogger } from "./logger.js";
import { ToolRegistry } from "./mcp/registry.js";
import { DiagnosticsHub } from "./monitor/diagnostics.js";
import type { SchemaOverrideTable } from "./schema/derive.js";
import { registerIntrospectionTools } from "./tools/introspection.js";

/** Every component of a running tool server. */
export interface ToolRuntime {
  readonly settings: DispatchSettings;
  readonly logger: StructuredLogger;
  readonly registry: ToolRegistry;
  readonly writeGate: WriteGate;
  readonly dedup: DedupCache<unknown>;
  readonly diagnostics: DiagnosticsHub;
  readonly metrics: MetricsRegistry;
  readonly outbound: OutboundLimiter;
  readonly dispatcher: ToolDispatcher;
}

export interface ToolRuntimeOptions {
  /** Schema patches keyed by tool name. */
  overrides?: SchemaOverrideTable;
  clock?: () => number;
  idGenerator?: () => string;
  credentialProbe?: () => boolean;
  /** Destination of serialised log lines (stderr by default). */
  logSink?: (line: string) => void;
  /** Set to false to leave the introspection tools out. */
  introspection?: boolean;
}

/**
 * Assembles the registry, the write-gate, the caches and the dispatcher from
 * validated settings. Log entries are mirrored into the diagnostics buffer.
 */
export function createToolRuntime(
  settings: DispatchSettings = loadDispatchSettings(),
  options: ToolRuntimeOptions = {},
): ToolRuntime {
  const clock = options.clock ?? (() => Date.now());
  const diagnostics = new DiagnosticsHub({
    events: settings.eventsCapacity,
    logs: settings.logsCapacity,
    errors: settings.errorsCapacity,
  });
  const logger = new StructuredLogger({
    logFile: settings.logFile,
    minLevel: settings.logLevel,
    redactDirectives: settings.logRedact,
    now: () => new Date(clock()),
    onEntry: (entry) => diagnostics.recordLogEntry(entry),
    ...(options.logSink ? { sink: options.logSink } : {}),
  });
  const metrics = new MetricsRegistry();
  const outbound = new OutboundLimiter({ concurrency: settings.outboundConcurrency, metrics });
  const registry = new ToolRegistry({ logger, ...(options.overrides ? { overrides: options.overrides } : {}) });
  const writeGate = new WriteGate({
    allowed: settings.writeAllowed,
    protectedRef: settings.protectedRef,
    policy: settings.writeGatePolicy,
  });
  const dedup = new DedupCache<unknown>({ clock, defaultTtlMs: settings.dedupTtlMs });
  const dispatcher = new ToolDispatcher({
    registry,
    writeGate,
    dedup,
    diagnostics,
    metrics,
    outbound,
    logger,
    clock,
    credentialProbe: options.credentialProbe ?? (() => hasConfiguredCredential()),
    validateArguments: settings.validateArguments,
    dedupTtlMs: settings.dedupTtlMs,
    callTimeoutMs: settings.callTimeoutMs,
    ...(options.idGenerator ? { idGenerator: options.idGenerator } : {}),
  });

  if (options.introspection !== false) {
    registerIntrospectionTools(registry, { registry, writeGate, diagnostics, metrics, logger });
  }

  return { settings, logger, registry, writeGate, dedup, diagnostics, metrics, outbound, dispatcher };
}
