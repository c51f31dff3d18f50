import { randomUUID } from "node:crypto";

import { CallCancelledError, describeAbortReason, isCancellation, raceWithSignal } from "../errors/cancellation.js";
import { classifyError } from "../errors/classifier.js";
import { adviseRemediation, type RemediationStep } from "../errors/remediation.js";
import {
  ArgumentValidationError,
  ToolError,
  ToolTimeoutError,
  UnknownToolError,
  type ErrorCategory,
  type ErrorOrigin,
} from "../errors/taxonomy.js";
import { extractCallTarget, type CallTarget, type WriteGate } from "../gate/writeGate.js";
import { runWithCallContext } from "../infra/callContext.js";
import { buildCallFingerprint, type DedupCache } from "../infra/dedup.js";
import type { MetricsRegistry } from "../infra/metrics.js";
import type { OutboundLimiter } from "../infra/outbound.js";
import type { StructuredLogger } from "../logger.js";
import { suggestToolNames } from "../mcp/names.js";
import type { RegisteredTool, ToolCallContext, ToolRegistry } from "../mcp/registry.js";
import type { DiagnosticsHub, EventRecord } from "../monitor/diagnostics.js";
import type { ArgumentIssue } from "../schema/validate.js";
import { canonicalise } from "../utils/canonical.js";
import { isPlainRecord } from "../utils/object.js";
import { prepareArguments } from "./normalise.js";
import { previewArguments } from "./preview.js";
import { buildUserMessage } from "./summary.js";

/** Number of registered names quoted when a requested tool does not exist. */
const AVAILABLE_SAMPLE_SIZE = 20;

/** Issues quoted in the message of a validation failure. */
const QUOTED_ISSUES = 3;

export interface ToolCallRequest {
  name: string;
  arguments?: Readonly<Record<string, unknown>> | null;
  signal?: AbortSignal;
  /** Per-call deadline overriding the dispatcher default. */
  timeoutMs?: number | null;
}

/** Structured failure returned to callers. */
export interface ToolFailure {
  category: ErrorCategory;
  origin: ErrorOrigin;
  code: string;
  message: string;
  tool: string;
  call_id: string;
  remediation_steps: RemediationStep[];
  details?: Record<string, unknown>;
  user_message: string;
}

interface OutcomeBase {
  callId: string;
  tool: string;
  durationMs: number;
}

export type ToolCallOutcome =
  | (OutcomeBase & { status: "success"; result: unknown; deduped: boolean })
  | (OutcomeBase & { status: "business_error"; error: ToolFailure })
  | (OutcomeBase & { status: "cancelled"; reason: string });

export type ToolInvocation = { ok: true; call_id: string; result: unknown } | { ok: false; error: ToolFailure };

export interface ToolDispatcherDependencies {
  registry: ToolRegistry;
  writeGate: WriteGate;
  dedup: DedupCache<unknown>;
  diagnostics: DiagnosticsHub;
  metrics: MetricsRegistry;
  outbound: OutboundLimiter;
  logger: StructuredLogger;
  clock?: () => number;
  idGenerator?: () => string;
  /** Reports whether a remote credential is configured. */
  credentialProbe?: () => boolean;
  /** Disables argument validation; normalization still runs. */
  validateArguments?: boolean;
  dedupTtlMs?: number;
  /** Default deadline of every call, `null` for none. */
  callTimeoutMs?: number | null;
}

/** Facts gathered while a call moves through the pipeline. */
interface CallState {
  readonly callId: string;
  readonly requestedName: string;
  readonly startedAt: number;
  tool: RegisteredTool | undefined;
  target: CallTarget;
  argsPreview: string;
}

/** Acyclic JSON copy of handler-supplied error details. */
function detachDetails(details: Record<string, unknown>): Record<string, unknown> {
  const copy = canonicalise(details);
  return isPlainRecord(copy) ? copy : {};
}

/**
 * Runs tool calls through the invocation pipeline: resolve, normalise,
 * validate, write-gate, dedup, execute, then record exactly once.
 *
 * Failures never escape {@link dispatch}; they come back as a
 * `business_error` outcome. Cancellation is reported as its own outcome and
 * rethrown by {@link invoke}.
 */
export class ToolDispatcher {
  private readonly registry: ToolRegistry;
  private readonly writeGate: WriteGate;
  private readonly dedup: DedupCache<unknown>;
  private readonly diagnostics: DiagnosticsHub;
  private readonly metrics: MetricsRegistry;
  private readonly outbound: OutboundLimiter;
  private readonly logger: StructuredLogger;
  private readonly clock: () => number;
  private readonly idGenerator: () => string;
  private readonly credentialProbe: () => boolean;
  private readonly validateArguments: boolean;
  private readonly dedupTtlMs: number | undefined;
  private readonly callTimeoutMs: number | null;

  constructor(deps: ToolDispatcherDependencies) {
    this.registry = deps.registry;
    this.writeGate = deps.writeGate;
    this.dedup = deps.dedup;
    this.diagnostics = deps.diagnostics;
    this.metrics = deps.metrics;
    this.outbound = deps.outbound;
    this.logger = deps.logger;
    this.clock = deps.clock ?? (() => Date.now());
    this.idGenerator = deps.idGenerator ?? (() => randomUUID());
    this.credentialProbe = deps.credentialProbe ?? (() => false);
    this.validateArguments = deps.validateArguments ?? true;
    this.dedupTtlMs = deps.dedupTtlMs;
    this.callTimeoutMs = deps.callTimeoutMs ?? null;
  }

  async dispatch(request: ToolCallRequest): Promise<ToolCallOutcome> {
    const rawArgs = request.arguments ?? {};
    const lookup = this.registry.resolve(request.name);
    const tool = lookup.status === "found" ? lookup.tool : undefined;
    const state: CallState = {
      callId: this.idGenerator(),
      requestedName: request.name,
      startedAt: this.clock(),
      tool,
      target: this.targetOf(tool, rawArgs),
      argsPreview: previewArguments(rawArgs),
    };
    const context = { callId: state.callId, toolName: tool?.name ?? request.name, startedAt: state.startedAt };

    return runWithCallContext(context, async () => {
      this.diagnostics.recordEvent({ ...this.eventBase(state), status: "start" });

      if (request.signal?.aborted) {
        return this.cancelled(state, describeAbortReason(request.signal));
      }
      if (lookup.status !== "found" || !tool) {
        const ambiguous = lookup.status === "ambiguous" ? lookup.candidates : [];
        return this.failed(
          state,
          new UnknownToolError(request.name, {
            suggestions: ambiguous.length > 0 ? [] : suggestToolNames(request.name, this.registry.names()),
            ambiguous,
            available: this.availableSample(),
          }),
        );
      }

      const prepared = prepareArguments(tool, rawArgs, { validate: this.validateArguments });
      if (!prepared.ok) {
        return this.failed(
          state,
          new ArgumentValidationError(describeIssues(tool.name, prepared.issues), {
            details: { issues: prepared.issues, ...prepared.guidance },
          }),
        );
      }
      const args = prepared.args;
      state.target = this.targetOf(tool, args);

      if (tool.mutating) {
        try {
          this.writeGate.enforce(tool.name, state.target.ref, state.target.conflictingRefKeys);
        } catch (error) {
          return this.failed(state, error);
        }
      }

      return this.execute(state, tool, args, request);
    });
  }

  /**
   * Dispatches the call and unwraps the outcome. Cancellation surfaces as a
   * thrown {@link CallCancelledError}.
   */
  async invoke(request: ToolCallRequest): Promise<ToolInvocation> {
    const outcome = await this.dispatch(request);
    switch (outcome.status) {
      case "success":
        return { ok: true, call_id: outcome.callId, result: outcome.result };
      case "business_error":
        return { ok: false, error: outcome.error };
      case "cancelled":
        throw new CallCancelledError(outcome.reason);
    }
  }

  private async execute(
    state: CallState,
    tool: RegisteredTool,
    args: Record<string, unknown>,
    request: ToolCallRequest,
  ): Promise<ToolCallOutcome> {
    const controller = new AbortController();
    const forwardAbort = () => controller.abort(request.signal?.reason);
    request.signal?.addEventListener("abort", forwardAbort, { once: true });

    const timeoutMs = request.timeoutMs ?? this.callTimeoutMs;
    let timedOut = false;
    const timer =
      timeoutMs !== null && timeoutMs > 0
        ? setTimeout(() => {
            timedOut = true;
            controller.abort(new ToolTimeoutError(tool.name, timeoutMs));
          }, timeoutMs)
        : undefined;

    const credentialsPresent = this.credentialProbe();
    const runHandler = (signal: AbortSignal): Promise<unknown> => {
      const context: ToolCallContext = {
        callId: state.callId,
        toolName: tool.name,
        signal,
        targetRef: state.target.ref,
        targetPath: state.target.path,
        startedAt: state.startedAt,
        logger: this.logger,
        outbound: this.outbound,
        credentialsPresent,
      };
      return new Promise<unknown>((resolve) => resolve(tool.handler(args, context)));
    };

    try {
      if (tool.dedupe) {
        // Mutations coalesce while in flight but are never replayed once settled.
        const ttlMs = tool.mutating ? 0 : this.dedupTtlMs;
        const { value, shared } = await this.dedup.run(buildCallFingerprint(tool.name, args), runHandler, {
          signal: controller.signal,
          ...(ttlMs !== undefined ? { ttlMs } : {}),
        });
        return this.succeeded(state, value, shared);
      }
      const value = await raceWithSignal(runHandler(controller.signal), controller.signal);
      return this.succeeded(state, value, false);
    } catch (error) {
      if (timedOut && timeoutMs !== null) {
        return this.failed(state, new ToolTimeoutError(tool.name, timeoutMs));
      }
      if (isCancellation(error)) {
        const reason = request.signal?.aborted ? describeAbortReason(request.signal) : describeThrownCancellation(error);
        return this.cancelled(state, reason);
      }
      return this.failed(state, error);
    } finally {
      if (timer) {
        clearTimeout(timer);
      }
      request.signal?.removeEventListener("abort", forwardAbort);
    }
  }

  private succeeded(state: CallState, result: unknown, deduped: boolean): ToolCallOutcome {
    const durationMs = this.elapsed(state);
    const toolName = this.toolName(state);
    this.diagnostics.recordEvent({ ...this.eventBase(state), status: "ok", duration_ms: durationMs, deduped });
    this.recordMetrics(state, durationMs, false);
    this.logger.debug("tool_call_completed", { duration_ms: durationMs, deduped });
    return { status: "success", callId: state.callId, tool: toolName, durationMs, result, deduped };
  }

  private failed(state: CallState, error: unknown): ToolCallOutcome {
    const durationMs = this.elapsed(state);
    const toolName = this.toolName(state);
    const classification = classifyError(error);
    const remediation = adviseRemediation(classification.category, classification.origin, toolName, {
      fallbackTool: state.tool?.fallbackTool ?? null,
      credentialsPresent: this.credentialProbe(),
      protectedRef: this.writeGate.snapshot().protectedRef,
    });
    const details = error instanceof ToolError && error.details !== undefined ? detachDetails(error.details) : undefined;
    const failure: ToolFailure = {
      category: classification.category,
      origin: classification.origin,
      code: classification.code,
      message: classification.message,
      tool: toolName,
      call_id: state.callId,
      remediation_steps: remediation,
      ...(details !== undefined ? { details } : {}),
      user_message: buildUserMessage({
        category: classification.category,
        tool: toolName,
        message: classification.message,
        remediation_steps: remediation,
      }),
    };

    this.diagnostics.recordEvent({
      ...this.eventBase(state),
      status: "error",
      duration_ms: durationMs,
      message: classification.message,
    });
    this.diagnostics.recordError({
      call_id: state.callId,
      tool_name: toolName,
      timestamp: this.timestamp(),
      status: "error",
      category: classification.category,
      origin: classification.origin,
      code: classification.code,
      message: classification.message,
      ...(details !== undefined ? { details } : {}),
    });
    this.recordMetrics(state, durationMs, true);

    const payload = {
      category: classification.category,
      origin: classification.origin,
      code: classification.code,
      message: classification.message,
      duration_ms: durationMs,
    };
    if (classification.category === "validation" || classification.category === "authorization") {
      this.logger.warn("tool_call_failed", payload);
    } else {
      this.logger.error("tool_call_failed", payload);
    }
    return { status: "business_error", callId: state.callId, tool: toolName, durationMs, error: failure };
  }

  private cancelled(state: CallState, reason: string): ToolCallOutcome {
    const durationMs = this.elapsed(state);
    this.diagnostics.recordEvent({ ...this.eventBase(state), status: "cancelled", duration_ms: durationMs, message: reason });
    this.recordMetrics(state, durationMs, false);
    this.logger.info("tool_call_cancelled", { reason, duration_ms: durationMs });
    return { status: "cancelled", callId: state.callId, tool: this.toolName(state), durationMs, reason };
  }

  private recordMetrics(state: CallState, durationMs: number, errored: boolean): void {
    if (!state.tool) {
      return;
    }
    this.metrics.recordToolCall({ tool: state.tool.name, mutating: state.tool.mutating, durationMs, errored });
  }

  /** Unknown tools have no declared arguments, so every conventional key is read for the record. */
  private targetOf(tool: RegisteredTool | undefined, args: Readonly<Record<string, unknown>>): CallTarget {
    return tool
      ? extractCallTarget(args, { declaredKeys: Object.keys(tool.shape), explicitKey: tool.targetRefArgument })
      : extractCallTarget(args);
  }

  private eventBase(state: CallState): Omit<EventRecord, "status"> {
    return {
      call_id: state.callId,
      tool_name: this.toolName(state),
      timestamp: this.timestamp(),
      write_action: state.tool?.mutating ?? false,
      target_ref: state.target.ref,
      args_preview: state.argsPreview,
    };
  }

  private availableSample(): string[] {
    return this.registry
      .list()
      .filter((tool) => tool.visibility === "public")
      .slice(0, AVAILABLE_SAMPLE_SIZE)
      .map((tool) => tool.name);
  }

  private toolName(state: CallState): string {
    return state.tool?.name ?? state.requestedName;
  }

  private elapsed(state: CallState): number {
    return Math.max(0, this.clock() - state.startedAt);
  }

  private timestamp(): string {
    return new Date(this.clock()).toISOString();
  }
}

function describeIssues(toolName: string, issues: readonly ArgumentIssue[]): string {
  const quoted = issues.slice(0, QUOTED_ISSUES).map((issue) => `${issue.path}: ${issue.message}`);
  const more = issues.length > QUOTED_ISSUES ? ` (+${issues.length - QUOTED_ISSUES} more)` : "";
  return `Invalid arguments for "${toolName}": ${quoted.join("; ")}${more}`;
}

function describeThrownCancellation(error: unknown): string {
  if (error instanceof CallCancelledError) {
    return error.reason;
  }
  return error instanceof Error && error.message.length > 0 ? error.message : "call cancelled";
}
