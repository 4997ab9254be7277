import { AsyncLocalStorage } from "node:async_hooks";

/**
 * Correlation details attached to every request handled by the core host. The
 * logger reads them to stamp entries emitted deep inside coordinators without
 * threading identifiers through every call.
 */
export interface RequestContext {
  readonly requestId: string;
  readonly sessionId: string;
  /** Fully qualified `capability.method` pair being served. */
  readonly method: string;
}

const storage = new AsyncLocalStorage<RequestContext>();

/**
 * Executes the callback while exposing the supplied context. When no context
 * is provided the callback runs directly.
 */
export function runWithRequestContext<T>(context: RequestContext | undefined, callback: () => T): T {
  if (!context) {
    return callback();
  }
  return storage.run(context, callback);
}

/** Retrieves the request context associated with the current async execution. */
export function getRequestContext(): RequestContext | undefined {
  return storage.getStore();
}
