import { ZodError } from "zod";

import { normaliseErrorMessage, describeThrown } from "../utils/text.js";
import { ToolError, TOOL_ERROR_TAXONOMY, type ErrorCategory, type ErrorOrigin } from "./taxonomy.js";

/** Result of {@link classifyError}. */
export interface Classification {
  category: ErrorCategory;
  origin: ErrorOrigin;
  code: string;
  message: string;
}

/** Errno codes raised by Node sockets when a dependency cannot be reached. */
const NETWORK_ERRNO_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ECONNABORTED",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EPIPE",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "UND_ERR_SOCKET",
  "UND_ERR_CONNECT_TIMEOUT",
]);

const TIMEOUT_ERRNO_CODES = new Set(["ETIMEDOUT", "ESOCKETTIMEDOUT", "UND_ERR_HEADERS_TIMEOUT", "UND_ERR_BODY_TIMEOUT"]);

const TIMEOUT_PATTERN = /\btimed?[\s_-]?out\b|\btimeout\b|deadline exceeded/i;
const UPSTREAM_PATTERN =
  /rate[\s_-]?limit|too many requests|\b(?:429|500|502|503|504)\b|bad gateway|service unavailable|gateway timeout|upstream|fetch failed|socket hang up|network error/i;
const AUTHORIZATION_PATTERN = /not allowed|forbidden|permission denied|unauthori[sz]ed|write access|access denied/i;
const VALIDATION_PATTERN = /invalid (?:argument|parameter|input|value)|missing required|is required|must be (?:a|an|one of|in)|expected .+ received/i;

/**
 * Phrases emitted when the hosting platform or connector refused the call
 * before it reached this process.
 */
const EXTERNAL_PLATFORM_PATTERN =
  /blocked by (?:the )?(?:platform|connector|client|host|policy)|rejected by (?:the )?(?:platform|connector|client|host)|tool call (?:was )?(?:blocked|rejected|denied)|connector (?:error|failure|unavailable)|user (?:declined|denied|cancelled) (?:the )?(?:tool|action)|safety (?:check|filter|system)|content polic/i;

function readStringProperty(error: unknown, key: string): string | undefined {
  if (typeof error !== "object" || error === null || !(key in error)) {
    return undefined;
  }
  const value: unknown = Reflect.get(error, key);
  return typeof value === "string" ? value : undefined;
}

function readNumberProperty(error: unknown, key: string): number | undefined {
  if (typeof error !== "object" || error === null || !(key in error)) {
    return undefined;
  }
  const value: unknown = Reflect.get(error, key);
  return typeof value === "number" ? value : undefined;
}

/** Infers the origin of a failure from its message. */
export function inferOrigin(message: string): ErrorOrigin {
  return EXTERNAL_PLATFORM_PATTERN.test(message) ? "external_platform" : "internal";
}

function categoryFromStatus(status: number | undefined): ErrorCategory | undefined {
  if (status === undefined) {
    return undefined;
  }
  if (status === 408 || status === 504) {
    return "timeout";
  }
  if (status === 429 || status >= 500) {
    return "upstream";
  }
  return undefined;
}

function categoryFromMessage(message: string): ErrorCategory {
  if (TIMEOUT_PATTERN.test(message)) {
    return "timeout";
  }
  if (UPSTREAM_PATTERN.test(message)) {
    return "upstream";
  }
  if (AUTHORIZATION_PATTERN.test(message)) {
    return "authorization";
  }
  if (VALIDATION_PATTERN.test(message)) {
    return "validation";
  }
  return "unknown";
}

/**
 * Maps a thrown value onto the failure taxonomy. Typed errors keep their
 * category; anything else is inspected for well-known error names, errno
 * codes, HTTP statuses and message wording. Callers must filter cancellation
 * out beforehand: it is not a failure.
 */
export function classifyError(error: unknown): Classification {
  const message = normaliseErrorMessage(describeThrown(error));

  if (error instanceof ToolError) {
    return { category: error.category, origin: error.origin ?? inferOrigin(message), code: error.code, message };
  }

  let category: ErrorCategory;
  if (error instanceof ZodError) {
    category = "validation";
  } else {
    const name = error instanceof Error ? error.name : undefined;
    const errno = readStringProperty(error, "code");
    const status = readNumberProperty(error, "status") ?? readNumberProperty(error, "statusCode");
    if (name === "TimeoutError" || (errno !== undefined && TIMEOUT_ERRNO_CODES.has(errno))) {
      category = "timeout";
    } else if (errno !== undefined && NETWORK_ERRNO_CODES.has(errno)) {
      category = "upstream";
    } else {
      category = categoryFromStatus(status) ?? categoryFromMessage(message);
    }
  }

  return { category, origin: inferOrigin(message), code: TOOL_ERROR_TAXONOMY[category].code, message };
}
