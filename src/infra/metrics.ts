/** Counters tracked for every registered tool. */
export interface ToolMetricsSnapshot {
  readonly calls_total: number;
  readonly errors_total: number;
  readonly mutating_calls_total: number;
  readonly latency_sum_ms: number;
}

/** Counters tracked for every upstream dependency bucket. */
export interface UpstreamMetricsSnapshot {
  readonly requests_total: number;
  readonly errors_total: number;
  readonly rate_limited_total: number;
  readonly timeouts_total: number;
}

export interface MetricsSnapshot {
  readonly tools: Readonly<Record<string, ToolMetricsSnapshot>>;
  readonly upstreams: Readonly<Record<string, UpstreamMetricsSnapshot>>;
}

export interface ToolCallSample {
  tool: string;
  mutating: boolean;
  durationMs: number;
  errored: boolean;
}

export interface UpstreamRequestSample {
  bucket: string;
  errored?: boolean;
  rateLimited?: boolean;
  timedOut?: boolean;
}

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

function freezeSorted<T extends object>(source: Map<string, T>): Readonly<Record<string, T>> {
  const result: Record<string, T> = {};
  for (const key of Array.from(source.keys()).sort()) {
    const value = source.get(key);
    if (value) {
      result[key] = Object.freeze({ ...value });
    }
  }
  return Object.freeze(result);
}

/**
 * In-process counters. Every increment is monotonic; readers only ever see
 * frozen copies produced by {@link snapshot}.
 */
export class MetricsRegistry {
  private readonly tools = new Map<string, Mutable<ToolMetricsSnapshot>>();
  private readonly upstreams = new Map<string, Mutable<UpstreamMetricsSnapshot>>();

  recordToolCall(sample: ToolCallSample): void {
    let bucket = this.tools.get(sample.tool);
    if (!bucket) {
      bucket = { calls_total: 0, errors_total: 0, mutating_calls_total: 0, latency_sum_ms: 0 };
      this.tools.set(sample.tool, bucket);
    }
    bucket.calls_total += 1;
    if (sample.mutating) {
      bucket.mutating_calls_total += 1;
    }
    if (sample.errored) {
      bucket.errors_total += 1;
    }
    if (Number.isFinite(sample.durationMs)) {
      bucket.latency_sum_ms += Math.max(0, Math.round(sample.durationMs));
    }
  }

  recordUpstreamRequest(sample: UpstreamRequestSample): void {
    let bucket = this.upstreams.get(sample.bucket);
    if (!bucket) {
      bucket = { requests_total: 0, errors_total: 0, rate_limited_total: 0, timeouts_total: 0 };
      this.upstreams.set(sample.bucket, bucket);
    }
    bucket.requests_total += 1;
    if (sample.errored) {
      bucket.errors_total += 1;
    }
    if (sample.rateLimited) {
      bucket.rate_limited_total += 1;
    }
    if (sample.timedOut) {
      bucket.timeouts_total += 1;
    }
  }

  snapshot(): MetricsSnapshot {
    return Object.freeze({ tools: freezeSorted(this.tools), upstreams: freezeSorted(this.upstreams) });
  }

  /** Text exposition of the current counters, one `name{label} value` per line. */
  render(): string {
    const snapshot = this.snapshot();
    const lines: string[] = ["# tool metrics"];
    for (const [tool, counters] of Object.entries(snapshot.tools)) {
      for (const [name, value] of Object.entries(counters)) {
        lines.push(`tool_${name}{tool="${tool}"} ${value}`);
      }
    }
    lines.push("# upstream metrics");
    for (const [bucket, counters] of Object.entries(snapshot.upstreams)) {
      for (const [name, value] of Object.entries(counters)) {
        lines.push(`upstream_${name}{bucket="${bucket}"} ${value}`);
      }
    }
    return `${lines.join("\n")}\n`;
  }
}
