import { randomUUID } from 'crypto';
import { AsyncLocalStorage } from 'async_hooks';
import type { LogContext } from './types.js';

const logContextStorage = new AsyncLocalStorage<LogContext>();

function shortId(prefix: string): string {
  return `${prefix}_${randomUUID().replace(/-/g, '').slice(0, 12)}`;
}

export function withLogContext<T>(context: LogContext, fn: () => T): T {
  const parent = logContextStorage.getStore() ?? {};
  return logContextStorage.run({ ...parent, ...context }, fn);
}

export function getLogContext(): LogContext {
  return logContextStorage.getStore() ?? {};
}

/** Id for one externally triggered call (an intent execution, a manual sync). */
export function createRequestId(prefix = 'req'): string {
  return shortId(prefix);
}

/** Id for one background unit of work (a sync tick, a trash sweep). */
export function createRunId(prefix = 'run'): string {
  return shortId(prefix);
}
