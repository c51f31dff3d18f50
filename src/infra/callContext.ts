import { AsyncLocalStorage } from "node:async_hooks";

/** Correlation fields attached to everything that happens during one tool call. */
export interface ActiveCallContext {
  readonly callId: string;
  readonly toolName: string;
  readonly startedAt: number;
}

const storage = new AsyncLocalStorage<ActiveCallContext>();

/**
 * Runs the callback with the provided call context. Nested asynchronous work
 * (handlers, collaborators, log statements) observes the same context.
 */
export function runWithCallContext<T>(context: ActiveCallContext, callback: () => Promise<T>): Promise<T> {
  return storage.run(context, callback);
}

/** Returns the context of the call currently executing, if any. */
export function getActiveCallContext(): ActiveCallContext | undefined {
  return storage.getStore();
}
