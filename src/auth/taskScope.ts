import { CoreError } from "../rpc/errors.js";
import type { ProtocolCall } from "./profiles.js";
import { protocolCall } from "./profiles.js";
import type { SessionBinding } from "./sessionBinding.js";

/** Methods that act on a single task and are therefore fenced for `task:` sessions. */
export const TASK_SCOPED_CALLS: ReadonlySet<string> = new Set<ProtocolCall>([
  "jobs.submit",
  "jobs.get",
  "jobs.wait",
  "jobs.events",
  "jobs.cancel",
  "tasks.update_scratchpad",
  "tasks.recover_output",
  "tasks.update",
  "tasks.move",
  "tasks.delete",
  "review.request",
  "review.approve",
  "review.reject",
  "review.merge",
  "review.rebase",
  "sessions.exists",
  "sessions.kill",
]);

export interface TaskScopeRequest {
  sessionId: string;
  capability: string;
  method: string;
  params: Record<string, unknown>;
}

export interface TaskScopeOptions {
  /** Resolves the owning task of a job, for job calls that only carry `job_id`. */
  resolveJobOwner?: (jobId: string) => string | null;
}

function nonEmptyString(value: unknown): string | null {
  return typeof value === "string" && value.trim().length > 0 ? value : null;
}

/**
 * Ensures a session scoped to one task only touches that task. Sessions in
 * other namespaces, and calls outside {@link TASK_SCOPED_CALLS}, pass through.
 */
export function enforceTaskScope(request: TaskScopeRequest, binding: SessionBinding, options: TaskScopeOptions = {}): void {
  if (binding.namespace !== "task" || !TASK_SCOPED_CALLS.has(protocolCall(request.capability, request.method))) {
    return;
  }

  let taskId = nonEmptyString(request.params.task_id);
  if (taskId === null && request.capability === "jobs") {
    const jobId = nonEmptyString(request.params.job_id);
    taskId = jobId !== null ? options.resolveJobOwner?.(jobId) ?? null : null;
  }
  if (taskId === null) {
    throw new CoreError(
      "INVALID_PARAMS",
      `Task-scoped session '${request.sessionId}' requires a non-empty task_id parameter`,
    );
  }
  if (taskId !== binding.scopeId) {
    throw new CoreError(
      "SESSION_SCOPE_DENIED",
      `Session '${request.sessionId}' is scoped to task '${binding.scopeId}' and cannot mutate task '${taskId}'`,
    );
  }
}
