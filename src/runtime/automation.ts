import type { StructuredLogger } from "../logger.js";
import type { AutomationService, WaitForAgentOptions } from "../ports.js";
import type { AgentHandle, Task } from "../types.js";
import type { RuntimeRegistry } from "./registry.js";
import { ProcessLock } from "./taskLocks.js";
import { pollUntil } from "./timers.js";

/** Callbacks handed to a launcher so it can report the agent it started. */
export interface AgentLaunchHooks {
  attach(handle: AgentHandle): void;
  /** Reports that the agent exited on its own. */
  exited(): void;
}

/**
 * Process-management boundary. Implementations spawn and stop the actual
 * agent processes; the registry only ever sees the handles they report.
 */
export interface AgentLauncher {
  /** Resolves `false` when the launch is refused (no capacity, missing agent binary...). */
  start(task: Task, hooks: AgentLaunchHooks): Promise<boolean>;
  stop(handle: AgentHandle): Promise<void>;
}

export interface RegistryAutomationOptions {
  registry: RuntimeRegistry;
  launcher: AgentLauncher;
  logger?: StructuredLogger;
  /** Interval used while waiting for an agent to attach. */
  attachPollMs?: number;
}

/**
 * Automation service deriving every answer from the runtime registry. Agent
 * processes are delegated to the {@link AgentLauncher}; merges across tasks
 * share one process-wide lock.
 */
export class RegistryAutomationService implements AutomationService {
  private readonly registry: RuntimeRegistry;
  private readonly launcher: AgentLauncher;
  private readonly logger?: StructuredLogger;
  private readonly attachPollMs: number;
  private readonly mergeLock = new ProcessLock();

  constructor(options: RegistryAutomationOptions) {
    this.registry = options.registry;
    this.launcher = options.launcher;
    this.logger = options.logger;
    this.attachPollMs = options.attachPollMs ?? 50;
  }

  isRunning(taskId: string): boolean {
    return this.registry.get(taskId)?.phase === "running";
  }

  isReviewing(taskId: string): boolean {
    return this.registry.get(taskId)?.phase === "reviewing";
  }

  async stopTask(taskId: string): Promise<boolean> {
    const view = this.registry.get(taskId);
    if (!view || view.phase === "idle") {
      return false;
    }
    const handles = [view.runningAgent, view.reviewAgent].filter((handle): handle is AgentHandle => handle !== null);
    for (const handle of handles) {
      await this.launcher.stop(handle);
    }
    this.registry.markEnded(taskId);
    this.logger?.info("agent_stopped", { task_id: taskId, agents: handles.map((handle) => handle.agentId) });
    return true;
  }

  async spawnForTask(task: Task): Promise<boolean> {
    const accepted = await this.launcher.start(task, {
      attach: (handle) => this.registry.attachRunningAgent(task.id, handle),
      exited: () => this.registry.markEnded(task.id),
    });
    if (!accepted) {
      this.logger?.warn("agent_spawn_refused", { task_id: task.id });
      return false;
    }
    const view = this.registry.get(task.id);
    if (view?.runningAgent == null) {
      this.registry.markStarted(task.id);
    }
    this.logger?.info("agent_spawned", { task_id: task.id });
    return true;
  }

  /**
   * Waits until the task reports a running agent. Gives up early when the
   * task was seen running and then stopped before any agent attached.
   */
  async waitForRunningAgent(taskId: string, options: WaitForAgentOptions): Promise<AgentHandle | null> {
    let seenRunning = false;
    let stoppedEarly = false;
    await pollUntil(
      () => {
        const view = this.registry.get(taskId);
        if (view?.runningAgent) {
          return true;
        }
        const running = view !== undefined && view.phase !== "idle";
        if (running) {
          seenRunning = true;
        } else if (seenRunning) {
          stoppedEarly = true;
          return true;
        }
        return false;
      },
      {
        intervalMs: this.attachPollMs,
        timeoutMs: options.timeoutMs,
        signal: options.signal,
        operation: `wait for agent of ${taskId}`,
      },
    );
    return stoppedEarly ? null : this.registry.get(taskId)?.runningAgent ?? null;
  }

  withMergeLock<T>(operation: () => Promise<T>): Promise<T> {
    return this.mergeLock.run(operation);
  }
}
