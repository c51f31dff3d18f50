import type { z } from "zod";

import type { StructuredLogger } from "../logger.js";
import type { OutboundLimiter } from "../infra/outbound.js";
import { schemaHash } from "../schema/compare.js";
import {
  applySchemaOverride,
  buildArgumentValidator,
  deriveObjectSchema,
  type ArgumentValidator,
  type ObjectSchema,
  type SchemaOverrideTable,
} from "../schema/derive.js";
import { canonicalToolKey, stripToolNameDecorations } from "./names.js";

/** Arguments handed to a tool handler. */
export type ToolArguments = Readonly<Record<string, unknown>>;

/** Per-call facilities available to tool handlers. */
export interface ToolCallContext {
  readonly callId: string;
  readonly toolName: string;
  /** Aborted when the caller cancels or the call's deadline expires. */
  readonly signal: AbortSignal;
  readonly targetRef: string | null;
  readonly targetPath: string | null;
  readonly startedAt: number;
  readonly logger: StructuredLogger;
  /** Every request to an external collaborator must go through this limiter. */
  readonly outbound: OutboundLimiter;
  readonly credentialsPresent: boolean;
}

export type ToolHandler = (args: ToolArguments, context: ToolCallContext) => unknown;

export type ToolVisibility = "public" | "hidden";

/** Declaration accepted by {@link ToolRegistry.register}. */
export interface ToolDefinition {
  readonly name: string;
  readonly description?: string;
  /** Parameter list of the tool, one zod type per argument. */
  readonly parameters: z.ZodRawShape;
  readonly handler: ToolHandler;
  /** True when the tool causes externally visible side effects. */
  readonly mutating?: boolean;
  readonly tags?: readonly string[];
  readonly visibility?: ToolVisibility;
  /** Alternate tool suggested when this one is blocked or failing upstream. */
  readonly fallbackTool?: string;
  /** Argument carrying the ref the tool mutates, when the default heuristics do not apply. */
  readonly targetRefArgument?: string;
  /** Accepted argument aliases, `alias → canonical name`. */
  readonly aliases?: Readonly<Record<string, string>>;
  /** Coalesce concurrent identical calls. Defaults to true. */
  readonly dedupe?: boolean;
}

/** Immutable descriptor stored by the registry. */
export interface RegisteredTool {
  readonly name: string;
  readonly description: string;
  readonly handler: ToolHandler;
  readonly mutating: boolean;
  readonly tags: readonly string[];
  readonly visibility: ToolVisibility;
  readonly fallbackTool: string | null;
  readonly targetRefArgument: string | null;
  readonly aliases: Readonly<Record<string, string>>;
  readonly dedupe: boolean;
  /** Effective parameter shape (overrides applied). */
  readonly shape: Readonly<z.ZodRawShape>;
  readonly validator: ArgumentValidator;
  readonly inputSchema: ObjectSchema;
  readonly schemaHash: string;
}

export type ToolMatch = "exact" | "case_insensitive" | "canonical";

export type ToolLookup =
  | { status: "found"; tool: RegisteredTool; matchedBy: ToolMatch }
  | { status: "ambiguous"; candidates: string[] }
  | { status: "missing" };

/** Error thrown when a definition cannot be registered. */
export class ToolRegistrationError extends Error {
  readonly code: "E-TOOL-DUPLICATE" | "E-TOOL-INVALID";

  constructor(code: "E-TOOL-DUPLICATE" | "E-TOOL-INVALID", message: string) {
    super(message);
    this.name = "ToolRegistrationError";
    this.code = code;
  }
}

export interface ToolRegistryOptions {
  /** Schema patches keyed by tool name. */
  readonly overrides?: SchemaOverrideTable;
  readonly logger?: StructuredLogger;
}

function deepFreeze<T extends object>(value: T): T {
  for (const entry of Object.values(value)) {
    if (entry && typeof entry === "object" && !Object.isFrozen(entry)) {
      deepFreeze(entry);
    }
  }
  return Object.freeze(value);
}

/**
 * Append-only table of tool descriptors. Registration happens at startup;
 * afterwards the registry is only read.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, RegisteredTool>();
  private readonly canonicalIndex = new Map<string, Set<string>>();
  private readonly overrides: SchemaOverrideTable;
  private readonly logger: StructuredLogger | undefined;

  constructor(options: ToolRegistryOptions = {}) {
    this.overrides = options.overrides ?? new Map();
    this.logger = options.logger;
  }

  get size(): number {
    return this.tools.size;
  }

  register(definition: ToolDefinition): RegisteredTool {
    const name = definition.name.trim();
    if (name.length === 0 || /\s/.test(name) || name !== definition.name) {
      throw new ToolRegistrationError("E-TOOL-INVALID", `invalid tool name "${definition.name}"`);
    }
    if (this.tools.has(name)) {
      throw new ToolRegistrationError("E-TOOL-DUPLICATE", `tool "${name}" is already registered`);
    }

    const override = this.overrides.get(name);
    const shape = Object.freeze(applySchemaOverride(definition.parameters, override));
    const inputSchema = deepFreeze(deriveObjectSchema(shape));
    const tool: RegisteredTool = Object.freeze({
      name,
      description: definition.description ?? "",
      handler: definition.handler,
      mutating: definition.mutating ?? false,
      tags: Object.freeze([...(definition.tags ?? [])]),
      visibility: definition.visibility ?? "public",
      fallbackTool: definition.fallbackTool ?? null,
      targetRefArgument: definition.targetRefArgument ?? null,
      aliases: Object.freeze({ ...(definition.aliases ?? {}) }),
      dedupe: definition.dedupe ?? true,
      shape,
      validator: buildArgumentValidator(shape),
      inputSchema,
      schemaHash: schemaHash(inputSchema),
    });

    this.tools.set(name, tool);
    const key = canonicalToolKey(name);
    const bucket = this.canonicalIndex.get(key) ?? new Set<string>();
    bucket.add(name);
    this.canonicalIndex.set(key, bucket);
    this.logger?.debug("tool_registered", {
      tool: name,
      mutating: tool.mutating,
      schema_hash: tool.schemaHash,
      overridden: override !== undefined,
    });
    return tool;
  }

  /** Exact lookup without any name tolerance. */
  get(name: string): RegisteredTool | undefined {
    return this.tools.get(name);
  }

  /**
   * Resolves a requested name through three layers: exact, case-insensitive
   * and canonical. A layer matching several registered names makes the
   * lookup ambiguous instead of guessing.
   */
  resolve(requested: string): ToolLookup {
    const stripped = stripToolNameDecorations(requested);
    for (const candidate of [requested, stripped]) {
      const tool = this.tools.get(candidate);
      if (tool) {
        return { status: "found", tool, matchedBy: "exact" };
      }
    }

    const lowered = stripped.toLowerCase();
    const caseMatches = Array.from(this.tools.keys()).filter((name) => name.toLowerCase() === lowered);
    const layered = this.fromCandidates(caseMatches, "case_insensitive");
    if (layered) {
      return layered;
    }

    const canonicalMatches = Array.from(this.canonicalIndex.get(canonicalToolKey(stripped)) ?? []);
    return this.fromCandidates(canonicalMatches, "canonical") ?? { status: "missing" };
  }

  /** Returns the tool a requested name unambiguously resolves to. */
  find(requested: string): RegisteredTool | undefined {
    const lookup = this.resolve(requested);
    return lookup.status === "found" ? lookup.tool : undefined;
  }

  /** Name-sorted snapshot of every registered tool. */
  list(): RegisteredTool[] {
    return Array.from(this.tools.values()).sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  }

  names(): string[] {
    return this.list().map((tool) => tool.name);
  }

  private fromCandidates(names: string[], matchedBy: ToolMatch): ToolLookup | undefined {
    if (names.length > 1) {
      return { status: "ambiguous", candidates: names.sort() };
    }
    const [only] = names;
    const tool = only === undefined ? undefined : this.tools.get(only);
    return tool ? { status: "found", tool, matchedBy } : undefined;
  }
}
