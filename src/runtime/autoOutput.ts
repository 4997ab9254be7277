import type { StructuredLogger } from "../logger.js";
import type { AutomationService, ExecutionStore } from "../ports.js";
import type { AgentHandle, Task } from "../types.js";
import { type RuntimeRegistry, isViewBlocked, isViewPending, isViewRunning } from "./registry.js";
import type { KeyedLocks } from "./taskLocks.js";
import { OperationAbortedError } from "./timers.js";

export type AutoOutputMode = "live" | "backfill" | "waiting" | "unavailable";

/** Decision returned to the output panel before it opens a stream. */
export interface AutoOutputReadiness {
  outputMode: AutoOutputMode;
  canOpenOutput: boolean;
  executionId: string | null;
  runningAgent: AgentHandle | null;
  isRunning: boolean;
  recoveredStaleExecution: boolean;
  message: string | null;
}

export interface AutoOutputRecoveryResult {
  success: boolean;
  message: string;
}

/** User facing messages. Clients match on some of them, keep them stable. */
export const AUTO_OUTPUT_MESSAGES = {
  NO_LOGS: "No agent logs available for this task",
  NON_AUTO: "Output stream is only available for AUTO tasks",
  RUNNING_WITHOUT_AGENT: "Agent is starting. Opening output while live stream attaches.",
  STALE_RECOVERY_READY: "Stale running execution detected. Recover output to restart the agent.",
  STALE_RECOVERY_NOT_REQUIRED: "Stale AUTO output recovery is not required.",
  STALE_RECOVERY_ERROR: "Recovered stale running execution without live agent",
  STALE_RECOVERED: "Recovered stale execution; starting a fresh agent run.",
  STALE_SPAWN_FAILED: "Recovered stale execution, but failed to start a fresh agent run.",
  STALE_NO_AUTOMATION: "Recovered stale execution, but automation service is unavailable.",
  STALE_NO_LIVE_RUNTIME: "Recovered stale execution, but no live agent stream is available yet.",
  RECOVERY_ABORTED: "Stale output recovery was cancelled.",
} as const;

export interface AutoOutputCoordinatorOptions {
  registry: RuntimeRegistry;
  executions: ExecutionStore;
  locks: KeyedLocks;
  /** Resolves the automation service lazily; `null` when none is wired. */
  resolveAutomation?: () => AutomationService | null;
  logger?: StructuredLogger;
  /** Grace period granted to a respawned agent to attach. */
  attachTimeoutMs?: number;
  now?: () => Date;
}

interface ReadinessInput {
  outputMode: AutoOutputMode;
  executionId?: string | null;
  runningAgent?: AgentHandle | null;
  isRunning?: boolean;
  message?: string | null;
}

/** Waiting only opens the panel when an agent is actually expected to stream. */
function readiness(input: ReadinessInput): AutoOutputReadiness {
  const isRunning = input.isRunning ?? false;
  const canOpenOutput =
    input.outputMode === "live" || input.outputMode === "backfill" || (input.outputMode === "waiting" && isRunning);
  return {
    outputMode: input.outputMode,
    canOpenOutput,
    executionId: input.executionId ?? null,
    runningAgent: input.runningAgent ?? null,
    isRunning,
    recoveredStaleExecution: false,
    message: input.message ?? null,
  };
}

function lockKey(taskId: string): string {
  return `output:${taskId}`;
}

/**
 * Decides how the output of an AUTO task can be shown and recovers
 * executions persisted as RUNNING that lost their agent (for instance after
 * the host crashed). Both operations serialise per task.
 */
export class AutoOutputCoordinator {
  private readonly registry: RuntimeRegistry;
  private readonly executions: ExecutionStore;
  private readonly locks: KeyedLocks;
  private readonly resolveAutomation: () => AutomationService | null;
  private readonly logger?: StructuredLogger;
  private readonly attachTimeoutMs: number;
  private readonly now: () => Date;

  constructor(options: AutoOutputCoordinatorOptions) {
    this.registry = options.registry;
    this.executions = options.executions;
    this.locks = options.locks;
    this.resolveAutomation = options.resolveAutomation ?? (() => null);
    this.logger = options.logger;
    this.attachTimeoutMs = options.attachTimeoutMs ?? 2_000;
    this.now = options.now ?? (() => new Date());
  }

  async prepareAutoOutput(task: Task, signal?: AbortSignal): Promise<AutoOutputReadiness> {
    if (task.taskType !== "AUTO") {
      return readiness({ outputMode: "unavailable", message: AUTO_OUTPUT_MESSAGES.NON_AUTO });
    }
    return this.locks.run(lockKey(task.id), () => this.resolveReadiness(task), signal);
  }

  private async resolveReadiness(task: Task): Promise<AutoOutputReadiness> {
    let view = this.registry.get(task.id);
    const blockedMessage = isViewBlocked(view) ? view?.blockedReason ?? null : null;
    const pendingMessage = isViewPending(view) ? view?.pendingReason ?? null : null;

    if (view && isViewRunning(view) && view.runningAgent !== null) {
      return readiness({
        outputMode: "live",
        executionId: view.executionId,
        runningAgent: view.runningAgent,
        isRunning: true,
      });
    }

    if (view && isViewRunning(view) && view.executionId !== null) {
      const executionId = view.executionId;
      const execution = await this.executions.getExecution(executionId);
      if (execution === null || execution.status !== "RUNNING") {
        this.registry.markEnded(task.id);
        view = this.registry.get(task.id);
      } else if (await this.hasPersistedLogs(executionId)) {
        return readiness({ outputMode: "backfill", executionId, isRunning: false, message: blockedMessage });
      } else {
        return readiness({
          outputMode: "waiting",
          executionId,
          isRunning: true,
          message: AUTO_OUTPUT_MESSAGES.RUNNING_WITHOUT_AGENT,
        });
      }
    }

    if (view && isViewRunning(view)) {
      return readiness({
        outputMode: "waiting",
        executionId: view.executionId,
        isRunning: true,
        message: AUTO_OUTPUT_MESSAGES.RUNNING_WITHOUT_AGENT,
      });
    }

    const unavailableMessage = blockedMessage ?? pendingMessage ?? AUTO_OUTPUT_MESSAGES.NO_LOGS;
    const latest = await this.executions.getLatestExecutionForTask(task.id);
    if (latest === null) {
      return readiness({ outputMode: "unavailable", message: unavailableMessage });
    }
    if (await this.hasPersistedLogs(latest.id)) {
      return readiness({ outputMode: "backfill", executionId: latest.id, message: blockedMessage ?? pendingMessage });
    }
    if (latest.status === "RUNNING") {
      return readiness({
        outputMode: "waiting",
        executionId: latest.id,
        message: AUTO_OUTPUT_MESSAGES.STALE_RECOVERY_READY,
      });
    }
    return readiness({ outputMode: "unavailable", message: unavailableMessage });
  }

  /**
   * Marks a stale RUNNING execution as KILLED and asks the automation service
   * for a fresh run. Never throws: every outcome, cancellation included, is
   * reported through the result.
   */
  async recoverStaleAutoOutput(task: Task, signal?: AbortSignal): Promise<AutoOutputRecoveryResult> {
    if (task.taskType !== "AUTO") {
      return { success: false, message: AUTO_OUTPUT_MESSAGES.NON_AUTO };
    }
    try {
      return await this.locks.run(lockKey(task.id), () => this.recoverLocked(task, signal), signal);
    } catch (error) {
      if (error instanceof OperationAbortedError) {
        this.logger?.info("auto_output_recovery_aborted", { task_id: task.id });
        return { success: false, message: AUTO_OUTPUT_MESSAGES.RECOVERY_ABORTED };
      }
      const message = error instanceof Error ? error.message : String(error);
      this.logger?.error("auto_output_recovery_failed", { task_id: task.id, message });
      return { success: false, message: `Stale output recovery failed: ${message}` };
    }
  }

  private async recoverLocked(task: Task, signal: AbortSignal | undefined): Promise<AutoOutputRecoveryResult> {
    if (isViewRunning(this.registry.get(task.id))) {
      return { success: false, message: AUTO_OUTPUT_MESSAGES.STALE_RECOVERY_NOT_REQUIRED };
    }

    const latest = await this.executions.getLatestExecutionForTask(task.id);
    if (latest === null || latest.status !== "RUNNING" || (await this.hasPersistedLogs(latest.id))) {
      return { success: false, message: AUTO_OUTPUT_MESSAGES.STALE_RECOVERY_NOT_REQUIRED };
    }

    await this.executions.updateExecution(latest.id, {
      status: "KILLED",
      completedAt: this.now().toISOString(),
      error: AUTO_OUTPUT_MESSAGES.STALE_RECOVERY_ERROR,
    });
    this.logger?.warn("auto_output_stale_execution_killed", { task_id: task.id, execution_id: latest.id });

    const automation = this.safeResolveAutomation();
    if (automation === null) {
      return { success: false, message: AUTO_OUTPUT_MESSAGES.STALE_NO_AUTOMATION };
    }

    let spawned = false;
    try {
      spawned = await automation.spawnForTask(task);
    } catch (error) {
      this.logger?.warn("auto_output_respawn_failed", {
        task_id: task.id,
        message: error instanceof Error ? error.message : String(error),
      });
    }
    if (!spawned) {
      return { success: false, message: AUTO_OUTPUT_MESSAGES.STALE_SPAWN_FAILED };
    }

    await automation.waitForRunningAgent(task.id, { timeoutMs: this.attachTimeoutMs, signal });

    if (isViewRunning(this.registry.get(task.id))) {
      return { success: true, message: AUTO_OUTPUT_MESSAGES.STALE_RECOVERED };
    }
    return { success: false, message: AUTO_OUTPUT_MESSAGES.STALE_NO_LIVE_RUNTIME };
  }

  private safeResolveAutomation(): AutomationService | null {
    try {
      return this.resolveAutomation();
    } catch (error) {
      this.logger?.warn("automation_resolve_failed", {
        message: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }

  private async hasPersistedLogs(executionId: string): Promise<boolean> {
    const entries = await this.executions.getExecutionLogEntries(executionId);
    return entries.some((entry) => entry.logs.length > 0);
  }
}
