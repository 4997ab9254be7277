import type { StructuredLogger } from "../logger.js";
import type { ExecutionStore } from "../ports.js";
import { TransientStoreError } from "../stores/errors.js";
import type { AgentHandle } from "../types.js";

export type RuntimeTaskPhase = "idle" | "running" | "reviewing";

interface MutableRuntimeTaskView {
  taskId: string;
  phase: RuntimeTaskPhase;
  executionId: string | null;
  runCount: number;
  runningAgent: AgentHandle | null;
  reviewAgent: AgentHandle | null;
  blockedReason: string | null;
  blockedByTaskIds: readonly string[];
  overlapHints: readonly string[];
  blockedAt: string | null;
  pendingReason: string | null;
  pendingAt: string | null;
}

/** Frozen projection of the live runtime state of one task. */
export type RuntimeTaskView = Readonly<MutableRuntimeTaskView>;

export interface BlockedDetails {
  reason: string;
  blockedByTaskIds?: readonly string[];
  overlapHints?: readonly string[];
}

export interface RuntimeRegistryOptions {
  /** Store consulted by {@link RuntimeRegistry.reconcileRunningTasks}. */
  executions?: Pick<ExecutionStore, "getLatestRunningExecutionsForTasks">;
  logger?: StructuredLogger;
  now?: () => Date;
}

/** A task counts as running while an agent is working or reviewing it. */
export function isViewRunning(view: RuntimeTaskView | undefined): boolean {
  return view !== undefined && view.phase !== "idle";
}

export function isViewBlocked(view: RuntimeTaskView | undefined): boolean {
  return view?.blockedReason != null;
}

export function isViewPending(view: RuntimeTaskView | undefined): boolean {
  return view?.pendingReason != null;
}

function hasNoAgents(view: MutableRuntimeTaskView): boolean {
  return view.runningAgent === null && view.reviewAgent === null;
}

/**
 * Owner of the per-task runtime views. Every transition goes through the
 * methods below; callers only ever see frozen copies.
 *
 * A view that is idle, has no execution, no agent handle and is neither
 * blocked nor pending carries no information and is evicted, so `get`
 * returning `undefined` and "fully idle" are the same thing.
 */
export class RuntimeRegistry {
  private readonly views = new Map<string, MutableRuntimeTaskView>();
  private readonly executions?: Pick<ExecutionStore, "getLatestRunningExecutionsForTasks">;
  private readonly logger?: StructuredLogger;
  private readonly now: () => Date;

  constructor(options: RuntimeRegistryOptions = {}) {
    this.executions = options.executions;
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
  }

  get(taskId: string): RuntimeTaskView | undefined {
    const view = this.views.get(taskId);
    return view ? freezeView(view) : undefined;
  }

  /** Identifiers of the tasks whose phase is not idle. */
  runningTasks(): Set<string> {
    const running = new Set<string>();
    for (const [taskId, view] of this.views) {
      if (view.phase !== "idle") {
        running.add(taskId);
      }
    }
    return running;
  }

  /** All views ordered by task id. */
  snapshot(): RuntimeTaskView[] {
    return [...this.views.values()]
      .sort((left, right) => left.taskId.localeCompare(right.taskId))
      .map((view) => freezeView(view));
  }

  markStarted(taskId: string): void {
    const view = this.getOrCreate(taskId);
    view.phase = "running";
    clearBlockedFields(view);
    clearPendingFields(view);
  }

  setExecution(taskId: string, executionId: string | null, runCount: number): void {
    const view = this.getOrCreate(taskId);
    view.executionId = executionId;
    view.runCount = runCount;
  }

  attachRunningAgent(taskId: string, agent: AgentHandle): void {
    const view = this.getOrCreate(taskId);
    view.runningAgent = agent;
    if (view.phase === "idle") {
      view.phase = "running";
    }
    clearBlockedFields(view);
    clearPendingFields(view);
  }

  attachReviewAgent(taskId: string, agent: AgentHandle): void {
    const view = this.getOrCreate(taskId);
    view.reviewAgent = agent;
    view.phase = "reviewing";
    clearBlockedFields(view);
    clearPendingFields(view);
  }

  clearReviewAgent(taskId: string): void {
    const view = this.views.get(taskId);
    if (!view) {
      return;
    }
    view.reviewAgent = null;
    if (view.runningAgent !== null) {
      view.phase = "running";
    }
  }

  markBlocked(taskId: string, details: BlockedDetails): void {
    const view = this.getOrCreate(taskId);
    view.phase = "idle";
    view.runningAgent = null;
    view.reviewAgent = null;
    view.blockedReason = details.reason;
    view.blockedByTaskIds = [...(details.blockedByTaskIds ?? [])];
    view.overlapHints = [...(details.overlapHints ?? [])];
    view.blockedAt = this.now().toISOString();
    clearPendingFields(view);
  }

  /** Records why the task waits. A running task keeps its phase. */
  markPending(taskId: string, reason: string): void {
    const view = this.getOrCreate(taskId);
    view.pendingReason = reason;
    view.pendingAt = this.now().toISOString();
  }

  clearPending(taskId: string): void {
    const view = this.views.get(taskId);
    if (!view) {
      return;
    }
    clearPendingFields(view);
    this.evictIfEmpty(view);
  }

  clearBlocked(taskId: string): void {
    const view = this.views.get(taskId);
    if (!view) {
      return;
    }
    clearBlockedFields(view);
    this.evictIfEmpty(view);
  }

  markEnded(taskId: string): void {
    this.views.delete(taskId);
  }

  /**
   * Aligns the views of the listed tasks with the executions persisted as
   * RUNNING. Tasks with such an execution get a running view (blocked views
   * keep their idle phase); views left over from a run that is no longer
   * persisted as running are evicted unless an agent handle, a blocked reason
   * or a pending reason still anchors them. Transient store failures skip the
   * cycle.
   */
  async reconcileRunningTasks(taskIds: readonly string[]): Promise<void> {
    const uniqueTaskIds = [...new Set(taskIds)];
    if (uniqueTaskIds.length === 0 || !this.executions) {
      return;
    }

    let latestRunning: Map<string, string>;
    try {
      latestRunning = await this.executions.getLatestRunningExecutionsForTasks(uniqueTaskIds);
    } catch (error) {
      if (error instanceof TransientStoreError) {
        this.logger?.debug("runtime_reconcile_skipped", { reason: error.message, tasks: uniqueTaskIds.length });
        return;
      }
      throw error;
    }

    for (const [taskId, executionId] of latestRunning) {
      if (!uniqueTaskIds.includes(taskId)) {
        continue;
      }
      const view = this.getOrCreate(taskId);
      if (view.blockedReason === null) {
        view.phase = view.phase === "reviewing" ? "reviewing" : "running";
      }
      if (view.executionId === null) {
        view.executionId = executionId;
      }
    }

    for (const taskId of uniqueTaskIds) {
      if (latestRunning.has(taskId)) {
        continue;
      }
      const view = this.views.get(taskId);
      if (!view) {
        continue;
      }
      if (view.executionId !== null && hasNoAgents(view) && view.blockedReason === null && view.pendingReason === null) {
        this.views.delete(taskId);
      }
    }
  }

  private getOrCreate(taskId: string): MutableRuntimeTaskView {
    let view = this.views.get(taskId);
    if (!view) {
      view = {
        taskId,
        phase: "idle",
        executionId: null,
        runCount: 0,
        runningAgent: null,
        reviewAgent: null,
        blockedReason: null,
        blockedByTaskIds: [],
        overlapHints: [],
        blockedAt: null,
        pendingReason: null,
        pendingAt: null,
      };
      this.views.set(taskId, view);
    }
    return view;
  }

  private evictIfEmpty(view: MutableRuntimeTaskView): void {
    if (
      view.phase === "idle" &&
      view.executionId === null &&
      hasNoAgents(view) &&
      view.blockedReason === null &&
      view.pendingReason === null
    ) {
      this.views.delete(view.taskId);
    }
  }
}

function clearBlockedFields(view: MutableRuntimeTaskView): void {
  view.blockedReason = null;
  view.blockedByTaskIds = [];
  view.overlapHints = [];
  view.blockedAt = null;
}

function clearPendingFields(view: MutableRuntimeTaskView): void {
  view.pendingReason = null;
  view.pendingAt = null;
}

function freezeView(view: MutableRuntimeTaskView): RuntimeTaskView {
  return Object.freeze({
    ...view,
    blockedByTaskIds: Object.freeze([...view.blockedByTaskIds]),
    overlapHints: Object.freeze([...view.overlapHints]),
  });
}
