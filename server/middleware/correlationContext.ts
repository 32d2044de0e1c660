import { AsyncLocalStorage } from "async_hooks";

export interface CorrelationContext {
  traceId: string;
  startTime: number;
}

const asyncLocalStorage = new AsyncLocalStorage<CorrelationContext>();

export function getContext(): CorrelationContext | undefined {
  return asyncLocalStorage.getStore();
}

export function getTraceId(): string | undefined {
  return asyncLocalStorage.getStore()?.traceId;
}

export function runWithContext<T>(context: CorrelationContext, fn: () => T): T {
  return asyncLocalStorage.run(context, fn);
}
