import type { ErrorCategory, ErrorOrigin } from "../errors/taxonomy.js";
import type { LogEntry, LogLevel } from "../logger.js";
import { RingBuffer, type RingBufferStats } from "./ringBuffer.js";
import { redactText, redactValue } from "./redaction.js";

export type CallStatus = "start" | "ok" | "error" | "cancelled";

/** Fields shared by every diagnostic record. */
interface DiagnosticRecordBase {
  call_id: string | null;
  tool_name: string | null;
  timestamp: string;
}

/** Lifecycle event of one tool call. */
export interface EventRecord extends DiagnosticRecordBase {
  call_id: string;
  tool_name: string;
  status: CallStatus;
  write_action: boolean;
  duration_ms?: number;
  deduped?: boolean;
  target_ref?: string | null;
  args_preview?: string;
  message?: string;
}

/** Copy of a structured log line. */
export interface LogRecord extends DiagnosticRecordBase {
  status: LogLevel;
  message: string;
  payload?: unknown;
}

/** Classified failure of one tool call. */
export interface ErrorRecord extends DiagnosticRecordBase {
  call_id: string;
  tool_name: string;
  status: "error";
  category: ErrorCategory;
  origin: ErrorOrigin;
  code: string;
  message: string;
  details?: unknown;
}

export type DiagnosticRecord = EventRecord | LogRecord | ErrorRecord;

export interface DiagnosticsCapacities {
  events: number;
  logs: number;
  errors: number;
}

export interface DiagnosticsStats {
  events: RingBufferStats;
  logs: RingBufferStats;
  errors: RingBufferStats;
}

function redactEvent(record: EventRecord): EventRecord {
  return {
    ...record,
    ...(record.args_preview !== undefined ? { args_preview: redactText(record.args_preview) } : {}),
    ...(record.message !== undefined ? { message: redactText(record.message) } : {}),
    ...(typeof record.target_ref === "string" ? { target_ref: redactText(record.target_ref) } : {}),
  };
}

/**
 * Bounded in-memory stores backing the introspection tools. Every record is
 * scrubbed of credential-shaped substrings before it is stored.
 */
export class DiagnosticsHub {
  private readonly events: RingBuffer<EventRecord>;
  private readonly logs: RingBuffer<LogRecord>;
  private readonly errors: RingBuffer<ErrorRecord>;

  constructor(capacities: DiagnosticsCapacities) {
    this.events = new RingBuffer(capacities.events);
    this.logs = new RingBuffer(capacities.logs);
    this.errors = new RingBuffer(capacities.errors);
  }

  recordEvent(record: EventRecord): void {
    this.events.append(redactEvent(record));
  }

  recordError(record: ErrorRecord): void {
    this.errors.append({
      ...record,
      message: redactText(record.message),
      ...(record.details !== undefined ? { details: redactValue(record.details) } : {}),
    });
  }

  recordLog(record: LogRecord): void {
    this.logs.append({
      ...record,
      message: redactText(record.message),
      ...(record.payload !== undefined ? { payload: redactValue(record.payload) } : {}),
    });
  }

  /** Adapter plugged into the logger's `onEntry` hook. */
  recordLogEntry(entry: LogEntry): void {
    this.recordLog({
      call_id: entry.call_id ?? null,
      tool_name: entry.tool ?? null,
      timestamp: entry.timestamp,
      status: entry.level,
      message: entry.message,
      ...(entry.payload !== undefined ? { payload: entry.payload } : {}),
    });
  }

  /**
   * Most recent call events, newest first. With `includeSuccess` false only
   * error and cancelled events are returned.
   */
  recentEvents(limit: number, options: { includeSuccess?: boolean } = {}): EventRecord[] {
    if (options.includeSuccess === false) {
      return this.events
        .snapshot()
        .filter((event) => event.status === "error" || event.status === "cancelled")
        .slice(0, Math.max(0, limit));
    }
    return this.events.snapshot(limit);
  }

  recentErrors(limit: number): ErrorRecord[] {
    return this.errors.snapshot(limit);
  }

  recentLogs(limit: number): LogRecord[] {
    return this.logs.snapshot(limit);
  }

  stats(): DiagnosticsStats {
    return { events: this.events.stats(), logs: this.logs.stats(), errors: this.errors.stats() };
  }
}
