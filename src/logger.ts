import { appendFile, mkdir, rename, rm, stat } from "node:fs/promises";
import { dirname } from "node:path";

import { getActiveCallContext } from "./infra/callContext.js";
import { REDACTION_TOKEN, isSensitiveKey } from "./monitor/redaction.js";

/** Accepted directives enabling payload redaction. */
const REDACTION_ENABLE_TOKENS = new Set(["on", "true", "yes", "1", "enable", "enabled"]);

/** Directives explicitly disabling payload redaction. */
const REDACTION_DISABLE_TOKENS = new Set(["off", "false", "no", "0", "disable", "disabled"]);

/** Default size (bytes) of the mirrored log file before it is rotated. */
const DEFAULT_MAX_FILE_SIZE = 5 * 1024 * 1024;

/** Default number of files kept by the rotation (including the active one). */
const DEFAULT_MAX_FILE_COUNT = 5;

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_WEIGHT: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  call_id?: string;
  tool?: string;
  payload?: unknown;
}

export interface LoggerOptions {
  /** Optional file mirroring every emitted line. */
  readonly logFile?: string | null;
  /** Size in bytes that triggers a rotation of {@link logFile}. */
  readonly maxFileSizeBytes?: number;
  /** Number of files retained by the rotation, the active one included. */
  readonly maxFileCount?: number;
  /** Entries below this level are discarded. */
  readonly minLevel?: LogLevel;
  /** `LOG_REDACT` style directives. Defaults to the process environment. */
  readonly redactDirectives?: string | null;
  /** Substrings or patterns scrubbed from string payload values. */
  readonly redactSecrets?: ReadonlyArray<string | RegExp>;
  /**
   * Explicit toggle for key-based payload redaction. Defaults to the outcome
   * of {@link parseRedactionDirectives} applied to {@link redactDirectives}.
   */
  readonly redactionEnabled?: boolean;
  /** Receives every serialised line. Defaults to stderr so stdio transports stay clean. */
  readonly sink?: (line: string) => void;
  /** Listener invoked with a copy of every emitted entry. */
  readonly onEntry?: (entry: LogEntry) => void;
  /** Clock used for timestamps. */
  readonly now?: () => Date;
}

/**
 * Parses `LOG_REDACT` directives such as `"on,sk-"` or `"off"`. Custom
 * tokens enable redaction unless an explicit toggle says otherwise.
 */
export function parseRedactionDirectives(raw: string | null | undefined): {
  enabled: boolean;
  tokens: string[];
} {
  if (!raw) {
    return { enabled: false, tokens: [] };
  }
  let enabled: boolean | undefined;
  const tokens: string[] = [];
  for (const directive of raw.split(",").map((value) => value.trim())) {
    if (directive.length === 0) {
      continue;
    }
    const lower = directive.toLowerCase();
    if (REDACTION_DISABLE_TOKENS.has(lower)) {
      enabled = false;
    } else if (REDACTION_ENABLE_TOKENS.has(lower)) {
      enabled = true;
    } else {
      tokens.push(directive);
    }
  }
  return { enabled: enabled ?? tokens.length > 0, tokens: Array.from(new Set(tokens)) };
}

function isErrnoCode(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}

/**
 * Structured logger emitting one JSON document per line. File writes are
 * queued so the mirror preserves emission order.
 */
export class StructuredLogger {
  private readonly logFile: string | null;
  private readonly maxFileSizeBytes: number;
  private readonly maxFileCount: number;
  private readonly minLevel: LogLevel;
  private readonly redactSecrets: Array<string | RegExp>;
  private readonly redactionEnabled: boolean;
  private readonly sink: (line: string) => void;
  private readonly entryListener?: (entry: LogEntry) => void;
  private readonly now: () => Date;
  private writeQueue: Promise<void> = Promise.resolve();
  private logDirectoryReady = false;

  constructor(options: LoggerOptions = {}) {
    const directives = parseRedactionDirectives(
      options.redactDirectives !== undefined ? options.redactDirectives : process.env.LOG_REDACT,
    );
    this.logFile = options.logFile ?? null;
    this.maxFileSizeBytes = options.maxFileSizeBytes ?? DEFAULT_MAX_FILE_SIZE;
    this.maxFileCount = Math.max(1, options.maxFileCount ?? DEFAULT_MAX_FILE_COUNT);
    this.minLevel = options.minLevel ?? "debug";
    this.redactSecrets = Array.from(new Set([...directives.tokens, ...(options.redactSecrets ?? [])]));
    this.redactionEnabled = options.redactionEnabled ?? directives.enabled;
    this.sink = options.sink ?? ((line) => process.stderr.write(line));
    this.entryListener = options.onEntry;
    this.now = options.now ?? (() => new Date());
  }

  info(message: string, payload?: unknown): void {
    this.log("info", message, payload);
  }

  warn(message: string, payload?: unknown): void {
    this.log("warn", message, payload);
  }

  error(message: string, payload?: unknown): void {
    this.log("error", message, payload);
  }

  debug(message: string, payload?: unknown): void {
    this.log("debug", message, payload);
  }

  /** Waits until every queued file write has been attempted. */
  async flush(): Promise<void> {
    await this.writeQueue;
  }

  protected log(level: LogLevel, message: string, payload?: unknown): void {
    if (LEVEL_WEIGHT[level] < LEVEL_WEIGHT[this.minLevel]) {
      return;
    }
    const call = getActiveCallContext();
    const entry: LogEntry = {
      timestamp: this.now().toISOString(),
      level,
      message,
      ...(call ? { call_id: call.callId, tool: call.toolName } : {}),
      ...(payload !== undefined ? { payload: this.sanitise(payload) } : {}),
    };
    const line = `${JSON.stringify(entry)}\n`;
    this.sink(line);
    this.entryListener?.(structuredClone(entry));
    const target = this.logFile;
    if (target) {
      this.writeQueue = this.writeQueue.then(() => this.appendToFile(target, line));
    }
  }

  private async appendToFile(target: string, line: string): Promise<void> {
    try {
      if (!this.logDirectoryReady) {
        await mkdir(dirname(target), { recursive: true });
        this.logDirectoryReady = true;
      }
      await this.rotateIfNeeded(target, Buffer.byteLength(line, "utf8"));
      await appendFile(target, line, "utf8");
    } catch (error) {
      // The mirror is best effort: report on stderr and retry directory creation next time.
      this.logDirectoryReady = false;
      const failure: LogEntry = {
        timestamp: this.now().toISOString(),
        level: "error",
        message: "log_file_write_failed",
        payload: { message: error instanceof Error ? error.message : String(error) },
      };
      process.stderr.write(`${JSON.stringify(failure)}\n`);
    }
  }

  /**
   * Shifts `file.N-1 → file.N … file → file.1` when the pending line would
   * push the active file over the size limit.
   */
  private async rotateIfNeeded(target: string, pendingBytes: number): Promise<void> {
    let currentSize: number;
    try {
      currentSize = (await stat(target)).size;
    } catch (error) {
      if (isErrnoCode(error, "ENOENT")) {
        return;
      }
      throw error;
    }
    if (currentSize + pendingBytes <= this.maxFileSizeBytes) {
      return;
    }
    if (this.maxFileCount === 1) {
      await rm(target, { force: true });
      return;
    }
    await rm(`${target}.${this.maxFileCount - 1}`, { force: true });
    for (let index = this.maxFileCount - 2; index >= 0; index -= 1) {
      const source = index === 0 ? target : `${target}.${index}`;
      try {
        await rename(source, `${target}.${index + 1}`);
      } catch (error) {
        if (!isErrnoCode(error, "ENOENT")) {
          throw error;
        }
      }
    }
  }

  private sanitise(value: unknown, seen: WeakSet<object> = new WeakSet()): unknown {
    if (typeof value === "string") {
      return this.scrubString(value);
    }
    if (typeof value === "bigint") {
      return value.toString();
    }
    if (typeof value === "function" || typeof value === "symbol") {
      return `[${typeof value}]`;
    }
    if (value instanceof Error) {
      return { name: value.name, message: this.scrubString(value.message) };
    }
    if (value === null || typeof value !== "object") {
      return value;
    }
    if (seen.has(value)) {
      return "[Circular]";
    }
    seen.add(value);
    try {
      if (Array.isArray(value)) {
        return value.map((item: unknown) => this.sanitise(item, seen));
      }
      const result: Record<string, unknown> = {};
      for (const [key, entry] of Object.entries(value)) {
        result[key] = this.redactionEnabled && isSensitiveKey(key) ? REDACTION_TOKEN : this.sanitise(entry, seen);
      }
      return result;
    } finally {
      seen.delete(value);
    }
  }

  private scrubString(value: string): string {
    let scrubbed = value;
    for (const pattern of this.redactSecrets) {
      if (typeof pattern === "string") {
        if (pattern.length > 0) {
          scrubbed = scrubbed.split(pattern).join(REDACTION_TOKEN);
        }
      } else {
        scrubbed = scrubbed.replace(pattern, REDACTION_TOKEN);
      }
    }
    return scrubbed;
  }
}
