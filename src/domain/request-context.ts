/**
 * Per-command request context
 * Carries the requestId through async calls via AsyncLocalStorage, so the HTTP
 * client can tag upstream calls without threading ids through every signature
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

export interface RequestContext {
  requestId: string;
  commandName?: string;
  startTime?: number;
}

const asyncLocalStorage = new AsyncLocalStorage<RequestContext>();

export function runWithContext<T>(context: RequestContext, fn: () => Promise<T>): Promise<T> {
  return asyncLocalStorage.run(context, fn);
}

/**
 * Get the current requestId
 * Returns undefined outside of a command invocation
 */
export function getRequestId(): string | undefined {
  return asyncLocalStorage.getStore()?.requestId;
}

export function generateRequestId(): string {
  return randomUUID();
}
