import { AsyncLocalStorage } from "node:async_hooks";

export type LogContext = {
  requestId?: string;
  operation?: string;
  actorId?: string;
};

const storage = new AsyncLocalStorage<LogContext>();

export function getLogContext(): LogContext | undefined {
  return storage.getStore();
}

/** Run `fn` with `context` merged over whatever context is already active. */
export function runWithLogContext<T>(context: LogContext, fn: () => T): T {
  return storage.run({ ...storage.getStore(), ...context }, fn);
}
