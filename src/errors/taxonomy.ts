/**
 * Failure categories recognised by the dispatcher together with the default
 * code and hint attached to each of them.
 */
export const TOOL_ERROR_TAXONOMY = {
  validation: { code: "E-TOOL-VALIDATION", hint: "fix_arguments" },
  authorization: { code: "E-TOOL-FORBIDDEN", hint: "authorize_mutations" },
  timeout: { code: "E-TOOL-TIMEOUT", hint: "retry_with_longer_timeout" },
  upstream: { code: "E-TOOL-UPSTREAM", hint: "retry_later" },
  unknown: { code: "E-TOOL-INTERNAL", hint: "inspect_recent_errors" },
} as const;

export type ErrorCategory = keyof typeof TOOL_ERROR_TAXONOMY;

/** Categories in taxonomy order, handy for exhaustive tables and tests. */
export const ERROR_CATEGORIES: readonly ErrorCategory[] = ["validation", "authorization", "timeout", "upstream", "unknown"];

/**
 * Where a failure happened: before the call reached this process (the hosting
 * platform or connector refused it) or inside the tool pipeline.
 */
export type ErrorOrigin = "external_platform" | "internal";

export interface ToolErrorOptions {
  code?: string;
  hint?: string;
  origin?: ErrorOrigin;
  details?: Record<string, unknown>;
  cause?: unknown;
}

/**
 * Base class of every typed failure raised by the pipeline or by tool
 * handlers. Subclasses pin the category.
 */
export class ToolError extends Error {
  readonly category: ErrorCategory;
  readonly code: string;
  readonly hint: string;
  readonly origin: ErrorOrigin | undefined;
  readonly details: Record<string, unknown> | undefined;

  constructor(category: ErrorCategory, message: string, options: ToolErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "ToolError";
    this.category = category;
    this.code = options.code ?? TOOL_ERROR_TAXONOMY[category].code;
    this.hint = options.hint ?? TOOL_ERROR_TAXONOMY[category].hint;
    this.origin = options.origin;
    this.details = options.details;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Arguments failed validation before the handler ran. */
export class ArgumentValidationError extends ToolError {
  constructor(message: string, options: ToolErrorOptions = {}) {
    super("validation", message, options);
    this.name = "ArgumentValidationError";
  }
}

/** The requested tool name did not resolve to a registered tool. */
export class UnknownToolError extends ToolError {
  readonly requestedName: string;

  constructor(requestedName: string, options: { suggestions?: string[]; ambiguous?: string[]; available?: string[] } = {}) {
    const ambiguous = options.ambiguous ?? [];
    const message =
      ambiguous.length > 0
        ? `Tool name "${requestedName}" is ambiguous between ${ambiguous.join(", ")}`
        : `Unknown tool "${requestedName}"`;
    super("validation", message, {
      code: "E-TOOL-UNKNOWN",
      hint: "list_tools",
      details: {
        requested: requestedName,
        suggestions: options.suggestions ?? [],
        ...(ambiguous.length > 0 ? { ambiguous } : {}),
        ...(options.available ? { available_sample: options.available } : {}),
      },
    });
    this.name = "UnknownToolError";
    this.requestedName = requestedName;
  }
}

/** A mutating call was refused by the write-gate. */
export class WriteNotAllowedError extends ToolError {
  constructor(toolName: string, message: string, details: Record<string, unknown> = {}) {
    super("authorization", message, {
      code: "write_not_allowed",
      hint: "Set WRITE_ALLOWED=true or call authorize_mutations with allowed=true.",
      details: { tool: toolName, ...details },
    });
    this.name = "WriteNotAllowedError";
  }
}

/** The call outlived its deadline. */
export class ToolTimeoutError extends ToolError {
  readonly timeoutMs: number;

  constructor(toolName: string, timeoutMs: number) {
    super("timeout", `Tool "${toolName}" timed out after ${timeoutMs}ms`, { details: { timeout_ms: timeoutMs } });
    this.name = "ToolTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export interface UpstreamErrorOptions extends ToolErrorOptions {
  /** HTTP status reported by the collaborator, when any. */
  status?: number;
  /** Upstream dependency bucket (e.g. "github", "workspace"). */
  bucket?: string;
}

/** A collaborator (remote API, workspace executor) reported a failure. */
export class UpstreamError extends ToolError {
  readonly status: number | undefined;
  readonly bucket: string | undefined;

  constructor(message: string, options: UpstreamErrorOptions = {}) {
    super("upstream", message, {
      ...options,
      details: {
        ...(options.details ?? {}),
        ...(options.status !== undefined ? { status: options.status } : {}),
        ...(options.bucket !== undefined ? { bucket: options.bucket } : {}),
      },
    });
    this.name = "UpstreamError";
    this.status = options.status;
    this.bucket = options.bucket;
  }
}
