import { z } from "zod";

import type { ProtocolCall } from "../auth/profiles.js";
import type { CoreSettings } from "../config/settings.js";
import type { EventBus } from "../events/bus.js";
import { type JobRecord, type JobService, isTerminalJobStatus } from "../jobs/jobService.js";
import type { StructuredLogger } from "../logger.js";
import type { MergeCoordinator } from "../merge/coordinator.js";
import type { AutomationService, ExecutionStore, SessionService, TaskStore } from "../ports.js";
import { InvalidParamsError, fromZodError } from "../rpc/errors.js";
import {
  AuditListShape,
  EmptyShape,
  JobLookupShape,
  JobsSubmitShape,
  JobsWaitShape,
  ReviewRebaseShape,
  ReviewRejectShape,
  TaskIdShape,
  TasksCreateShape,
  TasksListShape,
  TasksLogsShape,
  TasksMoveShape,
  TasksUpdateScratchpadShape,
  TasksUpdateShape,
} from "../rpc/schemas.js";
import type { AutoOutputCoordinator, AutoOutputReadiness } from "../runtime/autoOutput.js";
import type { RuntimeRegistry } from "../runtime/registry.js";
import type { Task } from "../types.js";
import type { AuditTrail } from "./audit.js";
import type { ReviewApprovals } from "./reviewState.js";

/** Collaborators reachable from the handlers. */
export interface HostServices {
  tasks: TaskStore;
  executions: ExecutionStore;
  registry: RuntimeRegistry;
  autoOutput: AutoOutputCoordinator;
  merges: MergeCoordinator;
  automation: AutomationService;
  sessions: SessionService;
  jobs: JobService;
  audit: AuditTrail;
  reviews: ReviewApprovals;
  events: EventBus;
  settings: CoreSettings;
  logger?: StructuredLogger;
}

export interface DispatchContext {
  sessionId: string;
  /** Task a `task:` session is scoped to, `null` for every other namespace. */
  scopedTaskId: string | null;
  signal?: AbortSignal;
}

export interface DispatchHandler {
  readonly call: ProtocolCall;
  readonly description: string;
  readonly shape: z.ZodRawShape;
  /** Mutating handlers take part in idempotent replay. */
  readonly mutating: boolean;
  run(params: Record<string, unknown>, context: DispatchContext): Promise<Record<string, unknown>>;
}

type Result = Record<string, unknown>;

interface HandlerDefinition<Shape extends z.ZodRawShape> {
  call: ProtocolCall;
  description: string;
  shape: Shape;
  mutating: boolean;
}

function defineHandler<Shape extends z.ZodRawShape>(
  definition: HandlerDefinition<Shape>,
  run: (params: z.output<z.ZodObject<Shape, "strict">>, context: DispatchContext) => Promise<Result>,
): DispatchHandler {
  const schema = z.object(definition.shape).strict();
  return {
    call: definition.call,
    description: definition.description,
    shape: definition.shape,
    mutating: definition.mutating,
    async run(params, context) {
      const parsed = schema.safeParse(params);
      if (!parsed.success) {
        throw fromZodError(parsed.error, definition.call);
      }
      return run(parsed.data, context);
    },
  };
}

export function serialiseTask(task: Task): Result {
  return {
    id: task.id,
    title: task.title,
    description: task.description,
    status: task.status,
    task_type: task.taskType,
    base_branch: task.baseBranch,
    created_at: task.createdAt,
    updated_at: task.updatedAt,
  };
}

function serialiseReadiness(readiness: AutoOutputReadiness): Result {
  return {
    output_mode: readiness.outputMode,
    can_open_output: readiness.canOpenOutput,
    execution_id: readiness.executionId,
    running_agent: readiness.runningAgent?.agentId ?? null,
    is_running: readiness.isRunning,
    recovered_stale_execution: readiness.recoveredStaleExecution,
    message: readiness.message,
  };
}

function serialiseJob(job: JobRecord): Result {
  return {
    job_id: job.jobId,
    task_id: job.taskId,
    action: job.action,
    status: job.status,
    created_at: job.createdAt,
    updated_at: job.updatedAt,
    message: job.message,
    code: job.code,
    result: job.result,
  };
}

function taskNotFound(taskId: string): Result {
  return { success: false, task_id: taskId, code: "TASK_NOT_FOUND", message: `Task ${taskId} not found` };
}

function jobNotFound(jobId: string, taskId: string): Result {
  return { success: false, job_id: jobId, task_id: taskId, code: "JOB_NOT_FOUND", message: "Job not found" };
}

function reviewNotReady(task: Task): Result {
  return {
    success: false,
    task_id: task.id,
    code: "REVIEW_NOT_READY",
    message: `Task ${task.id} is in ${task.status}, expected REVIEW`,
  };
}

/** Explicit `task_id` wins; a `task:` session falls back to its own task. */
function jobTaskId(params: { task_id?: string }, context: DispatchContext): string {
  const taskId = params.task_id ?? context.scopedTaskId;
  if (taskId === null) {
    throw new InvalidParamsError("task_id is required");
  }
  return taskId;
}

/**
 * Builds the `capability.method` -> handler table served by the host.
 * Handlers report operational failures as `success: false` results; only
 * malformed params and programming errors raise.
 */
export function createDispatchMap(services: HostServices): ReadonlyMap<string, DispatchHandler> {
  const { tasks, events, reviews } = services;

  const handlers: DispatchHandler[] = [
    defineHandler(
      { call: "tasks.get", description: "Read one task.", shape: TaskIdShape, mutating: false },
      async (params) => {
        const task = await tasks.get(params.task_id);
        return task ? { success: true, task: serialiseTask(task) } : taskNotFound(params.task_id);
      },
    ),
    defineHandler(
      { call: "tasks.list", description: "List tasks, optionally by status.", shape: TasksListShape, mutating: false },
      async (params) => {
        const list = await tasks.list(params.status ? { status: params.status } : {});
        return { success: true, count: list.length, tasks: list.map(serialiseTask) };
      },
    ),
    defineHandler(
      {
        call: "tasks.output",
        description: "Decide how the agent output of an AUTO task can be shown.",
        shape: TaskIdShape,
        mutating: false,
      },
      async (params, context) => {
        const task = await tasks.get(params.task_id);
        if (!task) {
          return taskNotFound(params.task_id);
        }
        const readiness = await services.autoOutput.prepareAutoOutput(task, context.signal);
        return { success: true, task_id: task.id, ...serialiseReadiness(readiness) };
      },
    ),
    defineHandler(
      {
        call: "tasks.recover_output",
        description: "Kill a stale RUNNING execution and start a fresh agent run.",
        shape: TaskIdShape,
        mutating: true,
      },
      async (params, context) => {
        const task = await tasks.get(params.task_id);
        if (!task) {
          return taskNotFound(params.task_id);
        }
        const outcome = await services.autoOutput.recoverStaleAutoOutput(task, context.signal);
        return { ...outcome, task_id: task.id };
      },
    ),
    defineHandler(
      { call: "tasks.logs", description: "Log entries of the latest execution.", shape: TasksLogsShape, mutating: false },
      async (params) => {
        const task = await tasks.get(params.task_id);
        if (!task) {
          return taskNotFound(params.task_id);
        }
        const execution = await services.executions.getLatestExecutionForTask(task.id);
        if (!execution) {
          return { success: true, task_id: task.id, execution_id: null, execution_status: null, logs: [] };
        }
        const entries = await services.executions.getExecutionLogEntries(execution.id);
        const kept = params.limit !== undefined ? entries.slice(-params.limit) : entries;
        return {
          success: true,
          task_id: task.id,
          execution_id: execution.id,
          execution_status: execution.status,
          logs: kept.map((entry) => ({ created_at: entry.createdAt, logs: entry.logs })),
        };
      },
    ),
    defineHandler(
      { call: "tasks.scratchpad", description: "Read the task scratchpad.", shape: TaskIdShape, mutating: false },
      async (params) => {
        if (!(await tasks.get(params.task_id))) {
          return taskNotFound(params.task_id);
        }
        return { success: true, task_id: params.task_id, content: await tasks.getScratchpad(params.task_id) };
      },
    ),
    defineHandler(
      {
        call: "tasks.update_scratchpad",
        description: "Replace the task scratchpad.",
        shape: TasksUpdateScratchpadShape,
        mutating: true,
      },
      async (params) => {
        if (!(await tasks.get(params.task_id))) {
          return taskNotFound(params.task_id);
        }
        await tasks.updateScratchpad(params.task_id, params.content);
        return { success: true, task_id: params.task_id };
      },
    ),
    defineHandler(
      { call: "tasks.create", description: "Create a task in BACKLOG.", shape: TasksCreateShape, mutating: true },
      async (params) => {
        const task = await tasks.create({
          title: params.title,
          description: params.description,
          taskType: params.task_type,
          baseBranch: params.base_branch ?? null,
        });
        events.publish({ cat: "task", kind: "TASK_CREATED", taskId: task.id });
        return { success: true, task: serialiseTask(task) };
      },
    ),
    defineHandler(
      { call: "tasks.update", description: "Edit task fields.", shape: TasksUpdateShape, mutating: true },
      async (params) => {
        const task = await tasks.updateFields(params.task_id, {
          title: params.title,
          description: params.description,
          taskType: params.task_type,
          baseBranch: params.base_branch,
        });
        if (!task) {
          return taskNotFound(params.task_id);
        }
        events.publish({ cat: "task", kind: "TASK_UPDATED", taskId: task.id });
        return { success: true, task: serialiseTask(task) };
      },
    ),
    defineHandler(
      { call: "tasks.move", description: "Move a task to another status.", shape: TasksMoveShape, mutating: true },
      async (params) => {
        const task = await tasks.updateFields(params.task_id, { status: params.status });
        if (!task) {
          return taskNotFound(params.task_id);
        }
        events.publish({ cat: "task", kind: "TASK_MOVED", taskId: task.id, data: { status: task.status } });
        return { success: true, task: serialiseTask(task) };
      },
    ),
    defineHandler(
      {
        call: "tasks.delete",
        description: "Delete a task with its agent, session and worktree.",
        shape: TaskIdShape,
        mutating: true,
      },
      async (params) => {
        const task = await tasks.get(params.task_id);
        if (!task) {
          return taskNotFound(params.task_id);
        }
        const outcome = await services.merges.deleteTask(task);
        if (outcome.success) {
          reviews.clear(task.id);
          services.registry.markEnded(task.id);
          events.publish({ cat: "task", kind: "TASK_DELETED", taskId: task.id });
        }
        return { ...outcome, task_id: task.id };
      },
    ),
    defineHandler(
      { call: "review.request", description: "Move an IN_PROGRESS task to REVIEW.", shape: TaskIdShape, mutating: true },
      async (params) => {
        const task = await tasks.get(params.task_id);
        if (!task) {
          return taskNotFound(params.task_id);
        }
        if (task.status !== "IN_PROGRESS") {
          return {
            success: false,
            task_id: task.id,
            code: "INVALID_STATE",
            message: `Task ${task.id} is in ${task.status}, expected IN_PROGRESS`,
          };
        }
        const updated = await tasks.updateFields(task.id, { status: "REVIEW" });
        reviews.requested(task.id);
        events.publish({ cat: "review", kind: "REVIEW_REQUESTED", taskId: task.id });
        return { success: true, code: "REVIEW_REQUESTED", task: updated ? serialiseTask(updated) : null };
      },
    ),
    defineHandler(
      { call: "review.approve", description: "Approve a task in REVIEW.", shape: TaskIdShape, mutating: true },
      async (params, context) => {
        const task = await tasks.get(params.task_id);
        if (!task) {
          return taskNotFound(params.task_id);
        }
        if (task.status !== "REVIEW") {
          return reviewNotReady(task);
        }
        const record = reviews.approve(task.id, context.sessionId);
        events.publish({ cat: "review", kind: "REVIEW_APPROVED", taskId: task.id });
        return { success: true, code: "APPROVED", task_id: task.id, approved_at: record.approvedAt };
      },
    ),
    defineHandler(
      {
        call: "review.reject",
        description: "Reject a task in REVIEW and record the feedback.",
        shape: ReviewRejectShape,
        mutating: true,
      },
      async (params) => {
        const task = await tasks.get(params.task_id);
        if (!task) {
          return taskNotFound(params.task_id);
        }
        if (task.status !== "REVIEW") {
          return reviewNotReady(task);
        }
        const updated = await services.merges.applyRejectionFeedback(task, params.feedback ?? null, params.action);
        reviews.clear(task.id);
        events.publish({ cat: "review", kind: "REVIEW_REJECTED", taskId: task.id, data: { action: params.action } });
        return { success: true, code: "REJECTED", task: serialiseTask(updated) };
      },
    ),
    defineHandler(
      { call: "review.merge", description: "Merge the task branch into its base branch.", shape: TaskIdShape, mutating: true },
      async (params, context) => {
        const task = await tasks.get(params.task_id);
        if (!task) {
          return taskNotFound(params.task_id);
        }
        if (task.status !== "REVIEW") {
          return reviewNotReady(task);
        }
        if (services.settings.requireReviewApproval && !reviews.isApproved(task.id)) {
          return {
            success: false,
            task_id: task.id,
            code: "REVIEW_NOT_APPROVED",
            message: "Task review must be approved before merge",
          };
        }
        const outcome = await services.merges.mergeTask(task, context.signal);
        if (outcome.success) {
          reviews.clear(task.id);
        }
        return { ...outcome, task_id: task.id, code: outcome.success ? "MERGED" : "MERGE_FAILED" };
      },
    ),
    defineHandler(
      { call: "review.rebase", description: "Rebase the task branch onto its base.", shape: ReviewRebaseShape, mutating: true },
      async (params) => {
        const task = await tasks.get(params.task_id);
        if (!task) {
          return taskNotFound(params.task_id);
        }
        const outcome = await services.merges.rebaseTask(task, params.base_branch ?? null);
        const code = outcome.success ? "REBASED" : outcome.conflictFiles.length > 0 ? "REBASE_CONFLICT" : "REBASE_FAILED";
        return {
          success: outcome.success,
          task_id: task.id,
          code,
          message: outcome.message,
          conflict_files: outcome.conflictFiles,
        };
      },
    ),
    defineHandler(
      { call: "jobs.submit", description: "Queue an asynchronous action for a task.", shape: JobsSubmitShape, mutating: true },
      async (params) => {
        if (!(await tasks.get(params.task_id))) {
          return taskNotFound(params.task_id);
        }
        const job = services.jobs.submit(params.task_id, params.action, params.params ?? {});
        return { success: true, job: serialiseJob(job) };
      },
    ),
    defineHandler(
      { call: "jobs.get", description: "Read the state of a job.", shape: JobLookupShape, mutating: false },
      async (params, context) => {
        const taskId = jobTaskId(params, context);
        const job = services.jobs.get(params.job_id, taskId);
        return job ? { success: true, job: serialiseJob(job) } : jobNotFound(params.job_id, taskId);
      },
    ),
    defineHandler(
      { call: "jobs.wait", description: "Wait, bounded, for a job to settle.", shape: JobsWaitShape, mutating: false },
      async (params, context) => {
        const taskId = jobTaskId(params, context);
        const outcome = await services.jobs.wait(params.job_id, taskId, {
          timeoutMs: params.timeout_ms,
          signal: context.signal,
        });
        if (!outcome) {
          return jobNotFound(params.job_id, taskId);
        }
        const timedOut = outcome.timedOut && !isTerminalJobStatus(outcome.job.status);
        return {
          success: true,
          timed_out: timedOut,
          job: { ...serialiseJob(outcome.job), code: timedOut ? "JOB_TIMEOUT" : outcome.job.code },
        };
      },
    ),
    defineHandler(
      { call: "jobs.events", description: "Status history of a job.", shape: JobLookupShape, mutating: false },
      async (params, context) => {
        const taskId = jobTaskId(params, context);
        const history = services.jobs.events(params.job_id, taskId);
        if (!history) {
          return jobNotFound(params.job_id, taskId);
        }
        return {
          success: true,
          job_id: params.job_id,
          events: history.map((event) => ({
            status: event.status,
            timestamp: event.timestamp,
            message: event.message,
            code: event.code,
          })),
        };
      },
    ),
    defineHandler(
      { call: "jobs.cancel", description: "Cancel a queued or running job.", shape: JobLookupShape, mutating: true },
      async (params, context) => {
        const taskId = jobTaskId(params, context);
        const job = services.jobs.cancel(params.job_id, taskId);
        return job ? { success: true, job: serialiseJob(job) } : jobNotFound(params.job_id, taskId);
      },
    ),
    defineHandler(
      { call: "sessions.exists", description: "Whether the task has a terminal session.", shape: TaskIdShape, mutating: false },
      async (params) => ({
        success: true,
        task_id: params.task_id,
        exists: await services.sessions.exists(params.task_id),
      }),
    ),
    defineHandler(
      { call: "sessions.kill", description: "Kill the terminal session of the task.", shape: TaskIdShape, mutating: true },
      async (params) => {
        await services.sessions.killSession(params.task_id);
        return { success: true, task_id: params.task_id };
      },
    ),
    defineHandler(
      { call: "audit.list", description: "Recent audited requests.", shape: AuditListShape, mutating: false },
      async (params) => {
        const entries = services.audit.list({ limit: params.limit ?? 50, sessionId: params.session_id });
        return {
          success: true,
          entries: entries.map((entry) => ({
            seq: entry.seq,
            ts: entry.ts,
            request_id: entry.requestId,
            session_id: entry.sessionId,
            profile: entry.profile,
            origin: entry.origin,
            call: `${entry.capability}.${entry.method}`,
            ok: entry.ok,
            error_code: entry.errorCode,
          })),
        };
      },
    ),
    defineHandler(
      { call: "settings.get", description: "Effective core settings.", shape: EmptyShape, mutating: false },
      async () => ({ success: true, settings: { ...services.settings } }),
    ),
  ];

  return new Map(handlers.map((handler) => [handler.call, handler]));
}
