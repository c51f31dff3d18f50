import { z } from "zod";

import { UnknownToolError } from "../errors/taxonomy.js";
import type { WriteGate } from "../gate/writeGate.js";
import type { MetricsRegistry } from "../infra/metrics.js";
import type { StructuredLogger } from "../logger.js";
import { suggestToolNames } from "../mcp/names.js";
import type { RegisteredTool, ToolMatch, ToolRegistry } from "../mcp/registry.js";
import type { DiagnosticsHub } from "../monitor/diagnostics.js";
import { prepareArguments } from "../dispatch/normalise.js";
import { isPlainRecord } from "../utils/object.js";

/** Default number of records returned by the `get_recent_*` tools. */
export const DEFAULT_RECENT_LIMIT = 50;

/** Upper bound accepted for the `limit` argument. */
const MAX_RECENT_LIMIT = 1_000;

const INTROSPECTION_TAGS = ["introspection"] as const;

/** Collaborators read by the introspection tools. */
export interface IntrospectionDependencies {
  readonly registry: ToolRegistry;
  readonly writeGate: WriteGate;
  readonly diagnostics: DiagnosticsHub;
  readonly metrics: MetricsRegistry;
  readonly logger: StructuredLogger;
}

const limitParameter = z
  .number()
  .int()
  .min(1)
  .max(MAX_RECENT_LIMIT)
  .default(DEFAULT_RECENT_LIMIT)
  .describe("Maximum number of records, newest first.");

function readLimit(value: unknown): number {
  return typeof value === "number" ? value : DEFAULT_RECENT_LIMIT;
}

function readString(value: unknown): string {
  return typeof value === "string" ? value : "";
}

function requireTool(registry: ToolRegistry, name: string): { tool: RegisteredTool; matchedBy: ToolMatch } {
  const lookup = registry.resolve(name);
  if (lookup.status === "found") {
    return { tool: lookup.tool, matchedBy: lookup.matchedBy };
  }
  throw new UnknownToolError(name, {
    suggestions: lookup.status === "missing" ? suggestToolNames(name, registry.names()) : [],
    ambiguous: lookup.status === "ambiguous" ? lookup.candidates : [],
  });
}

/** Whether a call to the tool without a target ref would pass the write-gate now. */
function writePermitted(tool: RegisteredTool, writeGate: WriteGate): boolean {
  return !tool.mutating || writeGate.evaluate(null).permitted;
}

/**
 * Registers the tools exposing the registry, the diagnostics buffers, the
 * metrics and the write-gate toggle. None of them is deduplicated: each call
 * reads live state.
 */
export function registerIntrospectionTools(registry: ToolRegistry, deps: IntrospectionDependencies): void {
  const { writeGate, diagnostics, metrics, logger } = deps;

  registry.register({
    name: "list_tools",
    description: "Lists registered tools with their arguments and current write permission.",
    parameters: {
      include_hidden: z.boolean().default(false).describe("Include tools hidden from the catalogue."),
    },
    tags: INTROSPECTION_TAGS,
    dedupe: false,
    handler: (args) => {
      const includeHidden = args.include_hidden === true;
      const tools = registry
        .list()
        .filter((tool) => includeHidden || tool.visibility === "public")
        .map((tool) => ({
          name: tool.name,
          description: tool.description,
          mutating: tool.mutating,
          write_permitted: writePermitted(tool, writeGate),
          tags: [...tool.tags],
          required: [...tool.inputSchema.required],
          properties: Object.keys(tool.inputSchema.properties),
          schema_hash: tool.schemaHash,
        }));
      const gate = writeGate.snapshot();
      return {
        tools,
        total: tools.length,
        write_gate: { allowed: gate.allowed, protected_ref: gate.protectedRef, policy: gate.policy },
      };
    },
  });

  registry.register({
    name: "describe_tool",
    description: "Returns the input schema of one tool.",
    parameters: {
      name: z.string().min(1).describe("Tool name; close spellings are resolved."),
    },
    tags: INTROSPECTION_TAGS,
    dedupe: false,
    handler: (args) => {
      const { tool, matchedBy } = requireTool(registry, readString(args.name));
      return {
        name: tool.name,
        description: tool.description,
        mutating: tool.mutating,
        matched_by: matchedBy,
        input_schema: tool.inputSchema,
        schema_hash: tool.schemaHash,
      };
    },
  });

  registry.register({
    name: "validate_args",
    description: "Checks arguments against a tool's schema without running it.",
    parameters: {
      name: z.string().min(1).describe("Tool to validate against."),
      args: z.record(z.unknown()).default({}).describe("Arguments to check."),
    },
    tags: INTROSPECTION_TAGS,
    dedupe: false,
    handler: (args) => {
      const { tool } = requireTool(registry, readString(args.name));
      const candidate = isPlainRecord(args.args) ? args.args : {};
      const prepared = prepareArguments(tool, candidate);
      if (prepared.ok) {
        return { tool: tool.name, valid: true, errors: [], normalised_args: prepared.args };
      }
      return {
        tool: tool.name,
        valid: false,
        errors: prepared.issues,
        normalised_args: prepared.args,
        ...prepared.guidance,
      };
    },
  });

  registry.register({
    name: "get_recent_events",
    description: "Returns recent tool call lifecycle events, newest first.",
    parameters: {
      limit: limitParameter,
      include_success: z.boolean().default(true).describe("Include start and ok events."),
    },
    tags: INTROSPECTION_TAGS,
    dedupe: false,
    handler: (args) => {
      const stats = diagnostics.stats().events;
      return {
        events: diagnostics.recentEvents(readLimit(args.limit), { includeSuccess: args.include_success !== false }),
        dropped: stats.dropped,
        capacity: stats.capacity,
      };
    },
  });

  registry.register({
    name: "get_recent_errors",
    description: "Returns recent classified tool failures, newest first.",
    parameters: { limit: limitParameter },
    tags: INTROSPECTION_TAGS,
    dedupe: false,
    handler: (args) => {
      const stats = diagnostics.stats().errors;
      return { errors: diagnostics.recentErrors(readLimit(args.limit)), dropped: stats.dropped, capacity: stats.capacity };
    },
  });

  registry.register({
    name: "get_recent_logs",
    description: "Returns recent structured log entries, newest first.",
    parameters: { limit: limitParameter },
    tags: INTROSPECTION_TAGS,
    dedupe: false,
    handler: (args) => {
      const stats = diagnostics.stats().logs;
      return { logs: diagnostics.recentLogs(readLimit(args.limit)), dropped: stats.dropped, capacity: stats.capacity };
    },
  });

  registry.register({
    name: "get_metrics",
    description: "Returns per-tool and per-upstream counters.",
    parameters: {},
    tags: INTROSPECTION_TAGS,
    dedupe: false,
    handler: () => metrics.snapshot(),
  });

  registry.register({
    name: "authorize_mutations",
    description: "Allows or forbids mutations of the protected ref and of calls without a target ref.",
    parameters: {
      allowed: z.boolean().describe("New authorization state."),
    },
    tags: INTROSPECTION_TAGS,
    dedupe: false,
    handler: (args) => {
      const toggle = writeGate.setAllowed(args.allowed === true);
      logger.info("write_gate_toggled", { previous: toggle.previous, allowed: toggle.allowed });
      return {
        allowed: toggle.allowed,
        previous: toggle.previous,
        protected_ref: toggle.protectedRef,
        policy: toggle.policy,
      };
    },
  });
}
