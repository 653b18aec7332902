import { randomUUID } from 'crypto';
import { AsyncLocalStorage } from 'async_hooks';
import type { LogContext } from './types.js';

const logContextStorage = new AsyncLocalStorage<LogContext>();

/** Run `fn` with `context` merged over any context already active. */
export function withLogContext<T>(context: LogContext, fn: () => T): T {
  const parent = logContextStorage.getStore() ?? {};
  return logContextStorage.run({ ...parent, ...context }, fn);
}

export function getLogContext(): LogContext {
  return logContextStorage.getStore() ?? {};
}

function shortId(prefix: string): string {
  return `${prefix}_${randomUUID().replace(/-/g, '').slice(0, 12)}`;
}

export function createRequestId(prefix = 'req'): string {
  return shortId(prefix);
}

/** Identifier for one analysis run, attached to every log line of the batch. */
export function createRunId(prefix = 'run'): string {
  return shortId(prefix);
}
