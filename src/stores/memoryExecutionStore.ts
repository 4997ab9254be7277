import { randomUUID } from "node:crypto";

import type { ExecutionPatch, ExecutionStore } from "../ports.js";
import type { ExecutionLogEntry, ExecutionRecord } from "../types.js";
import { RecordNotFoundError, TransientStoreError } from "./errors.js";

export interface InMemoryExecutionStoreOptions {
  readonly clock?: () => Date;
  readonly idFactory?: () => string;
}

/**
 * Execution history kept in memory. Besides the {@link ExecutionStore} port
 * it exposes the writes an agent launcher performs (`startExecution`,
 * `appendLog`). Once {@link close} was called every read raises
 * {@link TransientStoreError}, the way a store does while shutting down.
 */
export class InMemoryExecutionStore implements ExecutionStore {
  private readonly executions = new Map<string, ExecutionRecord>();
  private readonly logs = new Map<string, ExecutionLogEntry[]>();
  /** Insertion order doubles as "started later" when timestamps tie. */
  private readonly order: string[] = [];
  private readonly clock: () => Date;
  private readonly idFactory: () => string;
  private closed = false;

  constructor(options: InMemoryExecutionStoreOptions = {}) {
    this.clock = options.clock ?? (() => new Date());
    this.idFactory = options.idFactory ?? (() => randomUUID());
  }

  startExecution(taskId: string, executionId: string = this.idFactory()): ExecutionRecord {
    const record: ExecutionRecord = {
      id: executionId,
      taskId,
      status: "RUNNING",
      startedAt: this.clock().toISOString(),
      completedAt: null,
      error: null,
    };
    this.executions.set(record.id, record);
    this.order.push(record.id);
    return { ...record };
  }

  appendLog(executionId: string, logs: string): void {
    if (!this.executions.has(executionId)) {
      throw new RecordNotFoundError("execution", executionId);
    }
    const entries = this.logs.get(executionId) ?? [];
    entries.push({ executionId, logs, createdAt: this.clock().toISOString() });
    this.logs.set(executionId, entries);
  }

  close(): void {
    this.closed = true;
  }

  async getExecution(executionId: string): Promise<ExecutionRecord | null> {
    this.assertOpen();
    const record = this.executions.get(executionId);
    return record ? { ...record } : null;
  }

  async getLatestExecutionForTask(taskId: string): Promise<ExecutionRecord | null> {
    this.assertOpen();
    const latest = this.latestFor(taskId, () => true);
    return latest ? { ...latest } : null;
  }

  async getExecutionLogEntries(executionId: string): Promise<ExecutionLogEntry[]> {
    this.assertOpen();
    return (this.logs.get(executionId) ?? []).map((entry) => ({ ...entry }));
  }

  async updateExecution(executionId: string, patch: ExecutionPatch): Promise<ExecutionRecord | null> {
    this.assertOpen();
    const current = this.executions.get(executionId);
    if (!current) {
      return null;
    }
    const next: ExecutionRecord = {
      ...current,
      ...(patch.status !== undefined ? { status: patch.status } : {}),
      ...(patch.completedAt !== undefined ? { completedAt: patch.completedAt } : {}),
      ...(patch.error !== undefined ? { error: patch.error } : {}),
    };
    this.executions.set(executionId, next);
    return { ...next };
  }

  async getLatestRunningExecutionsForTasks(taskIds: readonly string[]): Promise<Map<string, string>> {
    this.assertOpen();
    const result = new Map<string, string>();
    for (const taskId of new Set(taskIds)) {
      const latest = this.latestFor(taskId, (record) => record.status === "RUNNING");
      if (latest) {
        result.set(taskId, latest.id);
      }
    }
    return result;
  }

  private latestFor(taskId: string, accept: (record: ExecutionRecord) => boolean): ExecutionRecord | undefined {
    for (let index = this.order.length - 1; index >= 0; index -= 1) {
      const record = this.executions.get(this.order[index]);
      if (record && record.taskId === taskId && accept(record)) {
        return record;
      }
    }
    return undefined;
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new TransientStoreError("execution store is closing");
    }
  }
}
