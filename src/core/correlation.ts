/**
 * Run correlation context using AsyncLocalStorage.
 * Propagates the batch runId through every worker of a run.
 */
import { AsyncLocalStorage } from "node:async_hooks";

export interface RunContext {
  runId: string;
  command?: string;
}

const runContext = new AsyncLocalStorage<RunContext>();

export function withContext<T>(
  ctx: RunContext,
  fn: () => Promise<T>
): Promise<T> {
  return runContext.run(ctx, fn);
}

export function getCurrentContext(): RunContext | undefined {
  return runContext.getStore();
}
