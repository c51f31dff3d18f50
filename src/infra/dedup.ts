import { threadId } from "node:worker_threads";

import { CallCancelledError, describeAbortReason, raceWithSignal, throwIfCancelled } from "../errors/cancellation.js";
import { hashCanonical } from "../utils/canonical.js";

/** Default TTL applied to successful results when callers do not override it. */
const DEFAULT_TTL_MS = 5_000;

/** Options accepted when instantiating the cache. */
export interface DedupCacheOptions {
  /** TTL (milliseconds) of successful results. `0` evicts on settlement. */
  defaultTtlMs?: number;
  /** Optional clock used for testing (defaults to {@link Date.now}). */
  clock?: () => number;
  /** Identifies the event loop owning the entries. Defaults to the worker thread id. */
  schedulerId?: () => string;
}

export interface DedupRunOptions {
  ttlMs?: number;
  /** Caller signal. When the owner aborts, the entry is dropped and attached callers restart. */
  signal?: AbortSignal;
}

export interface DedupResult<T> {
  value: T;
  /** `true` when the value came from a computation started by another caller. */
  shared: boolean;
}

/** Diagnostic view of one entry. */
export interface DedupEntrySnapshot {
  readonly state: "pending" | "settled";
  readonly createdAt: number;
  readonly expiresAt: number | null;
  /** Callers served by the entry, the owner included. */
  readonly hits: number;
}

interface DedupEntry<T> {
  readonly promise: Promise<T>;
  readonly createdAt: number;
  expiresAt: number | null;
  hits: number;
}

/** Rejection reason seen by attached callers when the owner gave up. */
class DedupOwnerCancelledError extends Error {
  constructor() {
    super("deduplicated computation cancelled by its owner");
    this.name = "DedupOwnerCancelledError";
  }
}

/** Fingerprint of a logical call: tool name plus the hash of its canonical arguments. */
export function buildCallFingerprint(toolName: string, args: unknown): string {
  return `${toolName}:${hashCanonical(args)}`;
}

/**
 * Coalesces concurrent identical computations. The first caller for a
 * fingerprint owns the computation; later callers attach to the same promise
 * while it is pending and replay its value until the TTL elapses. Failed or
 * cancelled computations are never kept.
 *
 * Entries are keyed by scheduler as well as fingerprint, and a cache instance
 * must only be used from the event loop that created it.
 */
export class DedupCache<T> {
  private readonly entries = new Map<string, DedupEntry<T>>();
  private readonly clock: () => number;
  private readonly defaultTtlMs: number;
  private readonly schedulerId: () => string;
  private nextSweepAt = 0;

  constructor(options: DedupCacheOptions = {}) {
    this.clock = options.clock ?? (() => Date.now());
    this.defaultTtlMs = Math.max(0, options.defaultTtlMs ?? DEFAULT_TTL_MS);
    this.schedulerId = options.schedulerId ?? (() => String(threadId));
  }

  /** Number of entries currently tracked, expired ones included until the next sweep. */
  size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }

  peek(fingerprint: string): DedupEntrySnapshot | null {
    const key = this.keyFor(fingerprint);
    const entry = this.entries.get(key);
    if (!entry) {
      return null;
    }
    if (!this.isLive(entry, this.clock())) {
      this.entries.delete(key);
      return null;
    }
    return {
      state: entry.expiresAt === null ? "pending" : "settled",
      createdAt: entry.createdAt,
      expiresAt: entry.expiresAt,
      hits: entry.hits,
    };
  }

  pruneExpired(now: number = this.clock()): void {
    for (const [key, entry] of this.entries) {
      if (!this.isLive(entry, now)) {
        this.entries.delete(key);
      }
    }
  }

  /**
   * Runs `work` unless a live entry already exists for the fingerprint, in
   * which case its result is shared. `work` receives a signal aborted when the
   * owning caller cancels.
   */
  async run(
    fingerprint: string,
    work: (signal: AbortSignal) => T | Promise<T>,
    options: DedupRunOptions = {},
  ): Promise<DedupResult<T>> {
    const key = this.keyFor(fingerprint);
    const ttlMs = Math.max(0, options.ttlMs ?? this.defaultTtlMs);
    this.sweep();

    for (;;) {
      throwIfCancelled(options.signal);
      const existing = this.entries.get(key);
      if (existing && this.isLive(existing, this.clock())) {
        existing.hits += 1;
        try {
          const value = await raceWithSignal(existing.promise, options.signal);
          return { value, shared: true };
        } catch (error) {
          if (error instanceof DedupOwnerCancelledError) {
            // The owner left before producing a value: compute it ourselves.
            continue;
          }
          throw error;
        }
      }
      if (existing) {
        this.entries.delete(key);
      }
      return this.execute(key, work, ttlMs, options.signal);
    }
  }

  private async execute(
    key: string,
    work: (signal: AbortSignal) => T | Promise<T>,
    ttlMs: number,
    signal: AbortSignal | undefined,
  ): Promise<DedupResult<T>> {
    const controller = new AbortController();
    const release = () => {
      if (this.entries.get(key) === entry) {
        this.entries.delete(key);
      }
    };

    let onOwnerAbort: (() => void) | undefined;
    const promise = new Promise<T>((resolve, reject) => {
      onOwnerAbort = () => {
        release();
        controller.abort(signal?.reason);
        reject(new DedupOwnerCancelledError());
      };
      signal?.addEventListener("abort", onOwnerAbort, { once: true });

      // Published before `work` starts so synchronous re-entry attaches.
      queueMicrotask(() => {
        new Promise<T>((inner) => inner(work(controller.signal))).then(
          (value) => {
            if (onOwnerAbort) {
              signal?.removeEventListener("abort", onOwnerAbort);
            }
            if (!controller.signal.aborted) {
              if (ttlMs > 0) {
                entry.expiresAt = this.clock() + ttlMs;
              } else {
                release();
              }
            }
            resolve(value);
          },
          (error: unknown) => {
            if (onOwnerAbort) {
              signal?.removeEventListener("abort", onOwnerAbort);
            }
            release();
            reject(error);
          },
        );
      });
    });

    const entry: DedupEntry<T> = { promise, createdAt: this.clock(), expiresAt: null, hits: 1 };
    this.entries.set(key, entry);

    try {
      return { value: await promise, shared: false };
    } catch (error) {
      if (error instanceof DedupOwnerCancelledError && signal) {
        throw new CallCancelledError(describeAbortReason(signal));
      }
      throw error;
    }
  }

  /** Prunes expired entries at most once per default TTL. */
  private sweep(): void {
    const now = this.clock();
    if (now < this.nextSweepAt) {
      return;
    }
    this.pruneExpired(now);
    this.nextSweepAt = now + Math.max(1, this.defaultTtlMs);
  }

  private isLive(entry: DedupEntry<T>, now: number): boolean {
    return entry.expiresAt === null || now < entry.expiresAt;
  }

  private keyFor(fingerprint: string): string {
    return `${this.schedulerId()}\u0000${fingerprint}`;
  }
}
