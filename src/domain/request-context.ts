/**
 * Request context carried through async calls with AsyncLocalStorage
 *
 * A tool call opens a context with its request id; the scope runner nests a
 * context per output unit so upstream calls and issues log the unit code.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

export interface RequestContext {
  requestId: string;
  toolName?: string;
  startTime?: number;
  /** Code of the output unit being converted */
  unitCode?: string;
}

const storage = new AsyncLocalStorage<RequestContext>();

export function runWithContext<T>(context: RequestContext, fn: () => T): T {
  return storage.run(context, fn);
}

/**
 * Run fn inside the current context with the unit code set. Outside a tool
 * call a fresh request id is used.
 */
export function runWithUnit<T>(unitCode: string, fn: () => T): T {
  const parent = storage.getStore();
  return storage.run({ ...(parent ?? { requestId: generateRequestId() }), unitCode }, fn);
}

export function getContext(): RequestContext | undefined {
  return storage.getStore();
}

export function getRequestId(): string | undefined {
  return getContext()?.requestId;
}

export function generateRequestId(): string {
  return randomUUID();
}
