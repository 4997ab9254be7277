import { randomUUID } from "node:crypto";
import pLimit from "p-limit";

import type { EventPublisher } from "../ports.js";
import type { StructuredLogger } from "../logger.js";
import { OperationAbortedError, pollUntil } from "../runtime/timers.js";

export const JOB_ACTIONS = ["merge", "recover_output", "start_agent", "stop_agent"] as const;
export type JobAction = (typeof JOB_ACTIONS)[number];

export const JOB_STATUSES = ["queued", "running", "succeeded", "failed", "cancelled"] as const;
export type JobStatus = (typeof JOB_STATUSES)[number];

const TERMINAL_STATUSES: ReadonlySet<JobStatus> = new Set(["succeeded", "failed", "cancelled"]);

export function isTerminalJobStatus(status: JobStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

export function isJobAction(value: string): value is JobAction {
  return JOB_ACTIONS.some((action) => action === value);
}

/** Outcome reported by an action executor. `success` decides the terminal status. */
export interface JobActionResult {
  success: boolean;
  message: string;
  code: string;
  data?: Record<string, unknown>;
}

export type JobExecutor = (
  action: JobAction,
  taskId: string,
  params: Record<string, unknown>,
  signal: AbortSignal,
) => Promise<JobActionResult>;

export interface JobRecord {
  jobId: string;
  taskId: string;
  action: JobAction;
  status: JobStatus;
  params: Record<string, unknown>;
  createdAt: string;
  updatedAt: string;
  message: string | null;
  code: string | null;
  result: JobActionResult | null;
}

export interface JobEvent {
  jobId: string;
  taskId: string;
  status: JobStatus;
  timestamp: string;
  message: string | null;
  code: string | null;
}

export interface JobWaitResult {
  job: JobRecord;
  /** `true` when the deadline elapsed before the job reached a terminal status. */
  timedOut: boolean;
}

export interface JobServiceOptions {
  executor: JobExecutor;
  events?: EventPublisher;
  logger?: StructuredLogger;
  /** Upper bound applied to every `wait`. */
  waitMaxMs?: number;
  pollMs?: number;
  /** Jobs executing at the same time; the rest stay queued. */
  concurrency?: number;
  /** Finished jobs kept for lookups; older ones are forgotten first. Defaults to 200. */
  retainFinished?: number;
  idFactory?: () => string;
  now?: () => Date;
}

interface JobSlot {
  record: JobRecord;
  history: JobEvent[];
  controller: AbortController;
  done?: Promise<void>;
}

const CANCELLED_RESULT: JobActionResult = { success: false, message: "Job cancelled", code: "JOB_CANCELLED" };

/**
 * Asynchronous runner for task-owned actions. A job belongs to the task it
 * was submitted for: lookups carrying another task id behave as if the job
 * did not exist.
 */
export class JobService {
  private readonly jobs = new Map<string, JobSlot>();
  private readonly executor: JobExecutor;
  private readonly eventPublisher?: EventPublisher;
  private readonly logger?: StructuredLogger;
  private readonly waitMaxMs: number;
  private readonly pollMs: number;
  private readonly limit: ReturnType<typeof pLimit>;
  private readonly retainFinished: number;
  private readonly idFactory: () => string;
  private readonly now: () => Date;

  constructor(options: JobServiceOptions) {
    this.executor = options.executor;
    this.eventPublisher = options.events;
    this.logger = options.logger;
    this.waitMaxMs = options.waitMaxMs ?? 30_000;
    this.pollMs = options.pollMs ?? 50;
    this.limit = pLimit(Math.max(1, options.concurrency ?? 4));
    this.retainFinished = Math.max(1, options.retainFinished ?? 200);
    this.idFactory = options.idFactory ?? (() => randomUUID());
    this.now = options.now ?? (() => new Date());
  }

  submit(taskId: string, action: JobAction, params: Record<string, unknown> = {}): JobRecord {
    const stamp = this.now().toISOString();
    const record: JobRecord = {
      jobId: this.idFactory(),
      taskId,
      action,
      status: "queued",
      params: { ...params },
      createdAt: stamp,
      updatedAt: stamp,
      message: "Job queued",
      code: "JOB_QUEUED",
      result: null,
    };
    const slot: JobSlot = { record, history: [], controller: new AbortController() };
    this.jobs.set(record.jobId, slot);
    this.recordEvent(slot);
    slot.done = this.limit(() => this.execute(slot));
    return cloneRecord(record);
  }

  /** Owner of the job, used to scope job calls that only carry a job id. */
  ownerOf(jobId: string): string | null {
    return this.jobs.get(jobId)?.record.taskId ?? null;
  }

  get(jobId: string, taskId: string): JobRecord | null {
    const slot = this.lookup(jobId, taskId);
    return slot ? cloneRecord(slot.record) : null;
  }

  events(jobId: string, taskId: string): JobEvent[] | null {
    const slot = this.lookup(jobId, taskId);
    return slot ? slot.history.map((event) => ({ ...event })) : null;
  }

  /**
   * Waits for the job to settle, bounded by `timeoutMs` (capped at the
   * configured maximum). A job still in flight at the deadline is returned
   * with `timedOut: true`.
   */
  async wait(jobId: string, taskId: string, options: { timeoutMs?: number; signal?: AbortSignal } = {}): Promise<JobWaitResult | null> {
    const slot = this.lookup(jobId, taskId);
    if (!slot) {
      return null;
    }
    const timeoutMs = Math.min(Math.max(0, options.timeoutMs ?? this.waitMaxMs), this.waitMaxMs);
    const settled = await pollUntil(() => isTerminalJobStatus(slot.record.status), {
      intervalMs: this.pollMs,
      timeoutMs,
      signal: options.signal,
      operation: `wait for job ${jobId}`,
    });
    return { job: cloneRecord(slot.record), timedOut: !settled };
  }

  /** Cancels a queued or running job. Terminal jobs are returned unchanged. */
  cancel(jobId: string, taskId: string): JobRecord | null {
    const slot = this.lookup(jobId, taskId);
    if (!slot) {
      return null;
    }
    if (!isTerminalJobStatus(slot.record.status)) {
      this.complete(slot, "cancelled", CANCELLED_RESULT);
      slot.controller.abort(new OperationAbortedError(`job ${jobId}`, "cancelled"));
    }
    return cloneRecord(slot.record);
  }

  /** Cancels every job still in flight and waits for their runners to return. */
  async shutdown(): Promise<void> {
    const pending: Promise<void>[] = [];
    for (const slot of this.jobs.values()) {
      if (!isTerminalJobStatus(slot.record.status)) {
        this.cancel(slot.record.jobId, slot.record.taskId);
      }
      if (slot.done) {
        pending.push(slot.done);
      }
    }
    await Promise.all(pending);
  }

  private lookup(jobId: string, taskId: string): JobSlot | null {
    const slot = this.jobs.get(jobId);
    return slot && slot.record.taskId === taskId ? slot : null;
  }

  private async execute(slot: JobSlot): Promise<void> {
    if (isTerminalJobStatus(slot.record.status)) {
      return;
    }
    this.transition(slot, "running", "Job running", "JOB_RUNNING");
    const { jobId, taskId, action, params } = slot.record;
    try {
      const result = await this.executor(action, taskId, params, slot.controller.signal);
      if (slot.record.status === "running") {
        this.complete(slot, result.success ? "succeeded" : "failed", result);
      }
    } catch (error) {
      if (slot.record.status !== "running") {
        return;
      }
      if (error instanceof OperationAbortedError) {
        this.complete(slot, "cancelled", CANCELLED_RESULT);
        return;
      }
      const message = error instanceof Error ? error.message : String(error);
      this.logger?.error("job_execution_failed", { job_id: jobId, task_id: taskId, action, message });
      this.complete(slot, "failed", { success: false, message, code: "JOB_EXECUTION_ERROR" });
    }
  }

  private complete(slot: JobSlot, status: JobStatus, result: JobActionResult): void {
    slot.record.result = { ...result };
    this.transition(slot, status, result.message, result.code);
    this.evictFinished();
  }

  /** Forgets the oldest finished jobs beyond {@link JobServiceOptions.retainFinished}. */
  private evictFinished(): void {
    const finished = [...this.jobs.values()].filter((slot) => isTerminalJobStatus(slot.record.status));
    for (const slot of finished.slice(0, Math.max(0, finished.length - this.retainFinished))) {
      this.jobs.delete(slot.record.jobId);
    }
  }

  private transition(slot: JobSlot, status: JobStatus, message: string, code: string): void {
    slot.record.status = status;
    slot.record.message = message;
    slot.record.code = code;
    slot.record.updatedAt = this.now().toISOString();
    this.recordEvent(slot);
  }

  private recordEvent(slot: JobSlot): void {
    const { jobId, taskId, status, message, code, updatedAt } = slot.record;
    slot.history.push({ jobId, taskId, status, timestamp: updatedAt, message, code });
    this.eventPublisher?.publish({
      cat: "job",
      kind: `JOB_${status}`,
      level: status === "failed" ? "warn" : "info",
      taskId,
      jobId,
      msg: message ?? undefined,
      data: { action: slot.record.action, code },
    });
  }
}

function cloneRecord(record: JobRecord): JobRecord {
  return {
    ...record,
    params: { ...record.params },
    result: record.result ? { ...record.result } : null,
  };
}
