import { AsyncLocalStorage } from "node:async_hooks";

export type LogContext = {
  requestId?: string;
  coachNo?: string;
};

const storage = new AsyncLocalStorage<LogContext>();

export function setLogContext(context: LogContext): void {
  storage.enterWith(context);
}

/** Adds fields to the current request's context without dropping the request id. */
export function extendLogContext(fields: LogContext): void {
  storage.enterWith({ ...storage.getStore(), ...fields });
}

export function getLogContext(): LogContext | undefined {
  return storage.getStore();
}
