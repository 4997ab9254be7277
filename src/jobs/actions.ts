import type { MergeCoordinator } from "../merge/coordinator.js";
import type { AutomationService, TaskStore } from "../ports.js";
import type { AutoOutputCoordinator } from "../runtime/autoOutput.js";
import { type RuntimeRegistry, isViewBlocked, isViewPending } from "../runtime/registry.js";
import type { JobActionResult, JobExecutor } from "./jobService.js";

export interface JobActionDependencies {
  tasks: Pick<TaskStore, "get">;
  registry: RuntimeRegistry;
  automation: AutomationService;
  merges: Pick<MergeCoordinator, "mergeTask">;
  autoOutput: Pick<AutoOutputCoordinator, "recoverStaleAutoOutput">;
}

/** Runtime summary attached to agent start/stop results. */
function runtimeSummary(registry: RuntimeRegistry, automation: AutomationService, taskId: string): Record<string, unknown> {
  const view = registry.get(taskId);
  return {
    is_running: automation.isRunning(taskId),
    is_reviewing: automation.isReviewing(taskId),
    is_blocked: isViewBlocked(view),
    is_pending: isViewPending(view),
    blocked_reason: view?.blockedReason ?? null,
    pending_reason: view?.pendingReason ?? null,
    execution_id: view?.executionId ?? null,
  };
}

/**
 * Builds the executor used by the job service. Every action loads the task
 * first; a task deleted between submit and execution fails the job with
 * `TASK_NOT_FOUND`.
 */
export function createJobActionExecutor(deps: JobActionDependencies): JobExecutor {
  return async (action, taskId, _params, signal): Promise<JobActionResult> => {
    const task = await deps.tasks.get(taskId);
    if (!task) {
      return { success: false, message: `Task ${taskId} not found`, code: "TASK_NOT_FOUND" };
    }

    switch (action) {
      case "merge": {
        const outcome = await deps.merges.mergeTask(task, signal);
        return { ...outcome, code: outcome.success ? "MERGED" : "MERGE_FAILED" };
      }
      case "recover_output": {
        const outcome = await deps.autoOutput.recoverStaleAutoOutput(task, signal);
        return { ...outcome, code: outcome.success ? "RECOVERED" : "NOT_RECOVERED" };
      }
      case "start_agent": {
        if (task.taskType !== "AUTO") {
          return { success: false, message: "Only AUTO tasks can start agents", code: "TASK_TYPE_MISMATCH" };
        }
        const started = await deps.automation.spawnForTask(task);
        const runtime = runtimeSummary(deps.registry, deps.automation, taskId);
        const view = deps.registry.get(taskId);
        if (deps.automation.isRunning(taskId)) {
          return { success: true, message: "Agent running", code: "STARTED", data: { runtime } };
        }
        if (isViewBlocked(view)) {
          return {
            success: true,
            message: view?.blockedReason ?? "Agent start is conflict-blocked and queued for auto-resume",
            code: "START_BLOCKED",
            data: { runtime },
          };
        }
        if (isViewPending(view)) {
          return {
            success: true,
            message: view?.pendingReason ?? "Agent start queued for scheduler admission",
            code: "START_PENDING",
            data: { runtime },
          };
        }
        if (started) {
          return { success: true, message: "Agent start queued", code: "START_QUEUED", data: { runtime } };
        }
        return { success: false, message: "Agent was not started", code: "NOT_STARTED", data: { runtime } };
      }
      case "stop_agent": {
        const stopped = await deps.automation.stopTask(taskId);
        return {
          success: stopped,
          message: stopped ? "Agent stop queued" : "No running agent for this task",
          code: stopped ? "STOP_QUEUED" : "NOT_RUNNING",
          data: { runtime: runtimeSummary(deps.registry, deps.automation, taskId) },
        };
      }
    }
  };
}
