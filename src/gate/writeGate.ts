import { WriteNotAllowedError } from "../errors/taxonomy.js";
import type { WRITE_GATE_POLICIES } from "../config/settings.js";

export type WriteGatePolicy = (typeof WRITE_GATE_POLICIES)[number];

export interface WriteGateOptions {
  allowed: boolean;
  protectedRef: string;
  policy: WriteGatePolicy;
}

export interface WriteGateSnapshot {
  readonly allowed: boolean;
  readonly protectedRef: string;
  readonly policy: WriteGatePolicy;
}

export type WriteDecisionReason =
  | "authorized"
  | "policy_open"
  | "unprotected_target"
  | "protected_target"
  | "unknown_target"
  | "ambiguous_target";

export interface WriteDecision {
  readonly permitted: boolean;
  readonly reason: WriteDecisionReason;
  /** Normalised target ref, `null` when the call names none. */
  readonly targetRef: string | null;
}

export interface WriteGateToggle {
  readonly previous: boolean;
  readonly allowed: boolean;
  readonly protectedRef: string;
  readonly policy: WriteGatePolicy;
}

/** Refs and paths a call appears to act on. */
export interface CallTarget {
  readonly ref: string | null;
  readonly path: string | null;
  /** Declared ref arguments naming different refs; `ref` is then `null`. */
  readonly conflictingRefKeys: readonly string[];
}

export interface TargetScope {
  /** Arguments the tool declares. When given, no other argument is read. */
  readonly declaredKeys?: readonly string[];
  /** The descriptor's `targetRefArgument`. */
  readonly explicitKey?: string | null;
}

const REF_ARGUMENT_KEYS = ["target_ref", "ref", "branch", "head", "target_branch"] as const;
const PATH_ARGUMENT_KEYS = ["target_path", "path", "file_path"] as const;

/** Drops the `refs/heads/` prefix and surrounding whitespace. */
export function normaliseRef(ref: string): string {
  const trimmed = ref.trim();
  return trimmed.startsWith("refs/heads/") ? trimmed.slice("refs/heads/".length) : trimmed;
}

function readString(args: Readonly<Record<string, unknown>>, key: string): string | null {
  const value = args[key];
  return typeof value === "string" && value.trim().length > 0 ? value.trim() : null;
}

/**
 * Reads the ref and path a call targets. The descriptor's explicit argument
 * is authoritative. Otherwise the conventional ref arguments the tool
 * declares are read, and when they name different refs the target is left
 * unknown rather than picked by argument order.
 */
export function extractCallTarget(args: Readonly<Record<string, unknown>>, scope: TargetScope = {}): CallTarget {
  const declared = scope.declaredKeys ? new Set(scope.declaredKeys) : null;
  const readable = (keys: readonly string[]) => (declared === null ? keys : keys.filter((key) => declared.has(key)));

  let path: string | null = null;
  for (const key of readable(PATH_ARGUMENT_KEYS)) {
    path = readString(args, key);
    if (path !== null) {
      break;
    }
  }

  if (scope.explicitKey) {
    const explicit = readString(args, scope.explicitKey);
    return { ref: explicit === null ? null : normaliseRef(explicit), path, conflictingRefKeys: [] };
  }

  const named: Array<{ key: string; ref: string }> = [];
  for (const key of readable(REF_ARGUMENT_KEYS)) {
    const value = readString(args, key);
    if (value !== null) {
      named.push({ key, ref: normaliseRef(value) });
    }
  }
  if (new Set(named.map((entry) => entry.ref)).size > 1) {
    return { ref: null, path, conflictingRefKeys: named.map((entry) => entry.key) };
  }
  return { ref: named[0]?.ref ?? null, path, conflictingRefKeys: [] };
}

/**
 * Process-wide mutation authorization state.
 *
 * Reads and writes are plain field accesses: a toggle is visible to every
 * call dispatched after it returns, while calls already past the gate keep
 * the decision they were given.
 */
export class WriteGate {
  private allowed: boolean;
  private readonly protectedRef: string;
  private readonly policy: WriteGatePolicy;

  constructor(options: WriteGateOptions) {
    this.allowed = options.allowed;
    this.protectedRef = normaliseRef(options.protectedRef);
    this.policy = options.policy;
  }

  isAllowed(): boolean {
    return this.allowed;
  }

  /** Sets the authorization flag; calling it twice with the same value is harmless. */
  setAllowed(allowed: boolean): WriteGateToggle {
    const previous = this.allowed;
    this.allowed = allowed;
    return { previous, allowed, protectedRef: this.protectedRef, policy: this.policy };
  }

  snapshot(): WriteGateSnapshot {
    return { allowed: this.allowed, protectedRef: this.protectedRef, policy: this.policy };
  }

  /**
   * `conflictingRefKeys` lists ref arguments that disagree; such a call is
   * treated like one without a target.
   */
  evaluate(targetRef: string | null | undefined, conflictingRefKeys: readonly string[] = []): WriteDecision {
    const ref = targetRef ? normaliseRef(targetRef) : null;
    const normalised = ref && ref.length > 0 && conflictingRefKeys.length === 0 ? ref : null;
    if (this.policy === "always_allow") {
      return { permitted: true, reason: "policy_open", targetRef: normalised };
    }
    if (normalised !== null && normalised !== this.protectedRef) {
      return { permitted: true, reason: "unprotected_target", targetRef: normalised };
    }
    if (this.allowed) {
      return { permitted: true, reason: "authorized", targetRef: normalised };
    }
    if (conflictingRefKeys.length > 0) {
      return { permitted: false, reason: "ambiguous_target", targetRef: null };
    }
    return {
      permitted: false,
      reason: normalised === null ? "unknown_target" : "protected_target",
      targetRef: normalised,
    };
  }

  /** Throws {@link WriteNotAllowedError} when the call may not mutate its target. */
  enforce(
    toolName: string,
    targetRef: string | null | undefined,
    conflictingRefKeys: readonly string[] = [],
  ): WriteDecision {
    const decision = this.evaluate(targetRef, conflictingRefKeys);
    if (decision.permitted) {
      return decision;
    }
    let message: string;
    switch (decision.reason) {
      case "protected_target":
        message = `Tool "${toolName}" may not modify protected ref "${this.protectedRef}" until mutations are authorized`;
        break;
      case "ambiguous_target":
        message = `Tool "${toolName}" names conflicting target refs (${conflictingRefKeys.join(", ")}); mutations must be authorized first`;
        break;
      default:
        message = `Tool "${toolName}" names no target ref; mutations must be authorized first`;
    }
    throw new WriteNotAllowedError(toolName, message, {
      reason: decision.reason,
      target_ref: decision.targetRef,
      protected_ref: this.protectedRef,
      policy: this.policy,
      ...(decision.reason === "ambiguous_target" ? { conflicting_keys: [...conflictingRefKeys] } : {}),
    });
  }
}
