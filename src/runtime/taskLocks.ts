import pLimit from "p-limit";

import { throwIfAborted } from "./timers.js";

type Limit = ReturnType<typeof pLimit>;

interface LockEntry {
  readonly limit: Limit;
  /** Callers currently holding or waiting for the lock. */
  holders: number;
}

/**
 * Keyed mutual exclusion built from one single-slot `p-limit` queue per key.
 * Entries are dropped once nobody holds or waits for them, so the map only
 * grows with the number of tasks being worked on concurrently.
 */
export class KeyedLocks {
  private readonly entries = new Map<string, LockEntry>();

  /**
   * Runs {@link operation} once every earlier caller for {@link key} settled.
   * When {@link signal} fires while the caller is still queued, the operation
   * is skipped and the returned promise rejects with the abort error.
   */
  async run<T>(key: string, operation: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    let entry = this.entries.get(key);
    if (!entry) {
      entry = { limit: pLimit(1), holders: 0 };
      this.entries.set(key, entry);
    }
    const held = entry;
    held.holders += 1;
    try {
      return await held.limit(async () => {
        throwIfAborted(signal, `lock ${key}`);
        return operation();
      });
    } finally {
      held.holders -= 1;
      if (held.holders === 0 && this.entries.get(key) === held) {
        this.entries.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return (this.entries.get(key)?.holders ?? 0) > 0;
  }

  /** Number of keys currently held or awaited. */
  size(): number {
    return this.entries.size;
  }
}

/**
 * Single process-wide lock. Used by the in-memory automation service to
 * serialise merges across tasks.
 */
export class ProcessLock {
  private readonly locks = new KeyedLocks();

  run<T>(operation: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    return this.locks.run("process", operation, signal);
  }

  isLocked(): boolean {
    return this.locks.isLocked("process");
  }
}
