/**
 * Raised when a caller gave up on a call. Cancellation is a control signal,
 * not a failure: it is never classified and always propagates unconverted.
 */
export class CallCancelledError extends Error {
  readonly code = "E-CALL-CANCELLED";
  readonly reason: string;

  constructor(reason = "call cancelled") {
    super(reason);
    this.name = "CallCancelledError";
    this.reason = reason;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Describes the abort reason carried by a signal. */
export function describeAbortReason(signal: AbortSignal): string {
  const reason: unknown = signal.reason;
  if (reason instanceof Error) {
    return reason.message;
  }
  if (typeof reason === "string" && reason.length > 0) {
    return reason;
  }
  return "call cancelled";
}

/** Throws {@link CallCancelledError} when the signal already fired. */
export function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new CallCancelledError(describeAbortReason(signal));
  }
}

/** Returns true for errors produced by an aborted signal or an abortable API. */
export function isCancellation(error: unknown): boolean {
  return error instanceof CallCancelledError || (error instanceof Error && error.name === "AbortError");
}

/**
 * Settles with the promise unless the signal aborts first, in which case the
 * returned promise rejects with {@link CallCancelledError}. The underlying
 * promise keeps running; its eventual rejection is observed and dropped.
 */
export function raceWithSignal<T>(promise: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
  if (!signal) {
    return promise;
  }
  return new Promise<T>((resolve, reject) => {
    if (signal.aborted) {
      promise.then(
        () => undefined,
        () => undefined,
      );
      reject(new CallCancelledError(describeAbortReason(signal)));
      return;
    }
    const onAbort = () => {
      reject(new CallCancelledError(describeAbortReason(signal)));
    };
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}
