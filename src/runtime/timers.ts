/**
 * Runtime-aware timer helpers. The functions resolve `globalThis.setTimeout`
 * at call time instead of capturing the Node.js implementation on import, so
 * Sinon fake timers installed by a test keep full control over every wait
 * performed by the coordinators.
 */
export type TimeoutHandle = ReturnType<typeof setTimeout>;

/** Schedule a timeout using the currently active timer implementation. */
export function runtimeSetTimeout(callback: () => void, delayMs: number): TimeoutHandle {
  return globalThis.setTimeout(callback, delayMs);
}

/** Cancel a timeout using the runtime-aware implementation. */
export function runtimeClearTimeout(handle: TimeoutHandle): void {
  globalThis.clearTimeout(handle);
}

/** Wall clock used for deadlines, routed through `Date.now` so fake timers apply. */
export function runtimeNow(): number {
  return Date.now();
}

/** Error raised when a wait is interrupted through its {@link AbortSignal}. */
export class OperationAbortedError extends Error {
  readonly code = "E-ABORTED";

  constructor(readonly operation: string, readonly reason?: unknown) {
    super(`${operation} aborted`);
    this.name = "OperationAbortedError";
  }
}

/** Throws {@link OperationAbortedError} when the signal has already fired. */
export function throwIfAborted(signal: AbortSignal | undefined, operation: string): void {
  if (signal?.aborted) {
    throw new OperationAbortedError(operation, signal.reason);
  }
}

/**
 * Resolves after {@link delayMs}. Rejects with {@link OperationAbortedError}
 * as soon as the signal fires; the pending timer is cleared in that case.
 */
export function sleep(delayMs: number, signal?: AbortSignal, operation = "sleep"): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new OperationAbortedError(operation, signal.reason));
      return;
    }
    const onAbort = () => {
      runtimeClearTimeout(handle);
      reject(new OperationAbortedError(operation, signal?.reason));
    };
    const handle = runtimeSetTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, Math.max(0, delayMs));
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export interface PollOptions {
  /** Interval between two probes. */
  readonly intervalMs: number;
  /** Maximum time spent polling before giving up. */
  readonly timeoutMs: number;
  readonly signal?: AbortSignal;
  /** Label used in abort errors. */
  readonly operation?: string;
}

/**
 * Evaluates {@link probe} until it returns `true` or the deadline elapses.
 * The probe runs once immediately and once more at the deadline, so a
 * condition that becomes true during the last interval is still observed.
 * Returns whether the condition was met.
 */
export async function pollUntil(
  probe: () => boolean | Promise<boolean>,
  options: PollOptions,
): Promise<boolean> {
  const operation = options.operation ?? "poll";
  const deadline = runtimeNow() + options.timeoutMs;
  for (;;) {
    throwIfAborted(options.signal, operation);
    if (await probe()) {
      return true;
    }
    const remaining = deadline - runtimeNow();
    if (remaining <= 0) {
      return false;
    }
    await sleep(Math.min(options.intervalMs, remaining), options.signal, operation);
  }
}
