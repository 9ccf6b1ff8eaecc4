import { AsyncLocalStorage } from 'node:async_hooks';

/**
 * Per-request values picked up by the log format.
 */
export interface RequestLogContext {
  requestId: string;
}

export const logContext = new AsyncLocalStorage<RequestLogContext>();

export function withRequestId<T>(requestId: string, task: () => T): T {
  return logContext.run({ requestId }, task);
}
