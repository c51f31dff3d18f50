import pLimit from "p-limit";

import { classifyError } from "../errors/classifier.js";
import { UpstreamError } from "../errors/taxonomy.js";
import { isCancellation, raceWithSignal, throwIfCancelled } from "../errors/cancellation.js";
import type { MetricsRegistry } from "./metrics.js";

/** Convenience alias describing the limiter returned by `p-limit`. */
type Limit = ReturnType<typeof pLimit>;

/** Response facts a collaborator can report so rate limiting is counted. */
export interface UpstreamResponseInfo {
  status?: number;
  /** Value of an `X-RateLimit-Remaining` style header. */
  rateLimitRemaining?: number | null;
}

export interface OutboundRunOptions<T> {
  signal?: AbortSignal;
  /** Extracts response facts from a successful result. */
  inspect?: (value: T) => UpstreamResponseInfo;
}

function isRateLimited(info: UpstreamResponseInfo | undefined): boolean {
  if (!info) {
    return false;
  }
  if (typeof info.rateLimitRemaining === "number" && info.rateLimitRemaining <= 0) {
    return true;
  }
  return info.status === 429;
}

/**
 * Counting semaphore guarding calls to external collaborators. However many
 * tool calls are in flight, at most `concurrency` outbound requests run at
 * once; every request that actually started is counted per bucket.
 */
export class OutboundLimiter {
  private readonly limit: Limit;
  private readonly metrics: MetricsRegistry;

  constructor(options: { concurrency: number; metrics: MetricsRegistry }) {
    this.limit = pLimit(Math.max(1, Math.floor(options.concurrency)));
    this.metrics = options.metrics;
  }

  /** Requests currently holding a slot. */
  get activeCount(): number {
    return this.limit.activeCount;
  }

  /** Requests waiting for a slot. */
  get pendingCount(): number {
    return this.limit.pendingCount;
  }

  /**
   * Runs `task` once a slot is free. A caller whose signal aborts while it
   * waits gives up its place without the task ever starting.
   */
  run<T>(bucket: string, task: (signal?: AbortSignal) => Promise<T>, options: OutboundRunOptions<T> = {}): Promise<T> {
    const { signal } = options;
    throwIfCancelled(signal);
    const queued = this.limit(async () => {
      throwIfCancelled(signal);
      try {
        const value = await task(signal);
        this.metrics.recordUpstreamRequest({ bucket, rateLimited: isRateLimited(options.inspect?.(value)) });
        return value;
      } catch (error) {
        this.recordFailure(bucket, error);
        throw error;
      }
    });
    return raceWithSignal(queued, signal);
  }

  private recordFailure(bucket: string, error: unknown): void {
    if (isCancellation(error)) {
      this.metrics.recordUpstreamRequest({ bucket });
      return;
    }
    const status = error instanceof UpstreamError ? error.status : undefined;
    this.metrics.recordUpstreamRequest({
      bucket,
      errored: true,
      rateLimited: status === 429,
      timedOut: classifyError(error).category === "timeout",
    });
  }
}
