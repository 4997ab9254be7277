import type { CoreSettings, MergeStrategy } from "../config/settings.js";
import { MERGE_EVENT_KINDS } from "../events/bus.js";
import type { StructuredLogger } from "../logger.js";
import type {
  AutomationService,
  EventPublisher,
  GitAdapter,
  MergeLedger,
  SessionService,
  TaskStore,
  WorkspaceService,
} from "../ports.js";
import { InvalidParamsError } from "../rpc/errors.js";
import type { KeyedLocks } from "../runtime/taskLocks.js";
import { pollUntil } from "../runtime/timers.js";
import type { RebaseOutcome, Task, WorkspaceRepo } from "../types.js";
import { RebaseHints } from "./rebaseHints.js";
import { type MergeRisk, assessMergeRisk, isHighRisk } from "./risk.js";
import { shouldRetryAfterRebase, summarizeMergeFailures, truncateMergeMessage } from "./summary.js";
import type { MergeOutcome, MergeRecord, MergeResult } from "./types.js";

export const QUIESCENCE_TIMEOUT_MESSAGE =
  "Task runtime is still active; wait for agent shutdown and retry merge.";

export const MERGE_SUCCESS_MESSAGES = {
  PLAIN: "Merged all repos",
  AFTER_PREMERGE_REBASE: "Merged all repos (after pre-merge rebase)",
  AFTER_AUTO_REBASE: "Merged all repos (after auto-rebase)",
  PULL_REQUESTS: "Opened pull requests for all repos",
} as const;

export type MergeCoordinatorSettings = Pick<
  CoreSettings,
  "defaultBaseBranch" | "serializeMerges" | "mergeStrategy" | "mergeQuiesceTimeoutMs" | "mergeQuiescePollMs"
>;

export interface MergeCoordinatorOptions {
  tasks: TaskStore;
  workspaces: WorkspaceService;
  sessions: SessionService;
  automation: AutomationService;
  locks: KeyedLocks;
  settings: MergeCoordinatorSettings;
  /** Required by the per-repo operations only. */
  events?: EventPublisher;
  /** Required by the per-repo operations only. */
  git?: GitAdapter;
  ledger?: MergeLedger;
  logger?: StructuredLogger;
  now?: () => Date;
}

export interface MergeRepoOptions {
  strategy?: MergeStrategy;
  prTitle?: string | null;
  prBody?: string | null;
  commitMessage?: string | null;
  draft?: boolean;
}

export interface MergeAllOptions {
  strategy?: MergeStrategy;
  skipUnchanged?: boolean;
  commitMessage?: string | null;
  prTitle?: string | null;
  prBody?: string | null;
}

export type RejectionAction = "backlog" | "reopen";

/** Prefix of the task id before the first dash, or its first eight characters. */
export function shortTaskId(taskId: string): string {
  return taskId.includes("-") ? taskId.split("-")[0] : taskId.slice(0, 8);
}

export function buildCommitMessage(task: Pick<Task, "id" | "title" | "description">): string {
  let message = `${task.title} (task ${shortTaskId(task.id)})`;
  if (task.description.trim().length > 0) {
    message += `\n\n${task.description}`;
  }
  return message;
}

function isRemoteTarget(targetBranch: string): boolean {
  return targetBranch.startsWith("origin/") || targetBranch.startsWith("refs/remotes/");
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function emptyResult(repo: Pick<WorkspaceRepo, "repoId" | "repoName">, strategy: MergeStrategy): MergeResult {
  return {
    repoId: repo.repoId,
    repoName: repo.repoName,
    strategy,
    success: false,
    message: "",
    prUrl: null,
    commitSha: null,
    conflictOp: null,
    conflictFiles: [],
  };
}

/**
 * Brings the isolated branch of a reviewed task back into its base branch.
 *
 * A merge only starts once the task runtime is quiescent, scores the risk of
 * the attempt, rebases first when the risk is high or recent merges on the
 * same base needed one, and retries exactly once after an automatic rebase
 * when every repo reported "rebase required".
 */
export class MergeCoordinator {
  private readonly tasks: TaskStore;
  private readonly workspaces: WorkspaceService;
  private readonly sessions: SessionService;
  private readonly automation: AutomationService;
  private readonly locks: KeyedLocks;
  private readonly settings: MergeCoordinatorSettings;
  private readonly events?: EventPublisher;
  private readonly git?: GitAdapter;
  private readonly ledger?: MergeLedger;
  private readonly logger?: StructuredLogger;
  private readonly now: () => Date;
  readonly rebaseHints = new RebaseHints();

  constructor(options: MergeCoordinatorOptions) {
    this.tasks = options.tasks;
    this.workspaces = options.workspaces;
    this.sessions = options.sessions;
    this.automation = options.automation;
    this.locks = options.locks;
    this.settings = options.settings;
    this.events = options.events;
    this.git = options.git;
    this.ledger = options.ledger;
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
  }

  async mergeTask(task: Task, signal?: AbortSignal): Promise<MergeOutcome> {
    return this.locks.run(
      `merge:${task.id}`,
      () => (this.settings.serializeMerges ? this.automation.withMergeLock(() => this.doMerge(task, signal)) : this.doMerge(task, signal)),
      signal,
    );
  }

  private async doMerge(task: Task, signal: AbortSignal | undefined): Promise<MergeOutcome> {
    const idle = await this.ensureTaskIdle(task.id, signal);
    if (!idle) {
      this.logger?.warn("merge_blocked", { task_id: task.id, reason: "runtime_active" });
      return { success: false, message: `Merge blocked: ${QUIESCENCE_TIMEOUT_MESSAGE}` };
    }

    const workspaceId = await this.latestWorkspaceId(task.id);
    if (workspaceId === null) {
      return { success: false, message: `Workspace not found for task ${task.id}` };
    }

    const repos = await this.workspaces.getWorkspaceRepos(workspaceId);
    const baseBranch = this.resolveBaseBranch(task, repos);
    const strategy = this.settings.mergeStrategy;
    const mergeOptions: MergeAllOptions = {
      strategy,
      commitMessage: buildCommitMessage(task),
      prTitle: task.title,
      prBody: task.description,
    };
    const skipUnchanged = await this.hasNoChanges(task);
    const risk = await this.assessRisk(task.id, repos, baseBranch);
    this.logger?.info("merge_risk_assessed", {
      task_id: task.id,
      base_branch: baseBranch,
      score: risk.score,
      overlap_files: risk.overlapFiles,
      rebase_hint: this.rebaseHints.get(baseBranch),
    });

    let usedPremergeRebase = false;
    if (this.rebaseHints.shouldRebaseFirst(baseBranch) || isHighRisk(risk)) {
      const rebase = await this.rebaseForMerge(task.id, baseBranch);
      if (!rebase.success) {
        return { success: false, message: truncateMergeMessage(`Merge blocked: ${rebase.message}`) };
      }
      usedPremergeRebase = true;
    }

    let results = await this.mergeAll(workspaceId, { ...mergeOptions, skipUnchanged });
    let failures = results.filter((result) => !result.success);
    let usedAutoRebase = false;

    if (shouldRetryAfterRebase(failures)) {
      const rebase = await this.rebaseForMerge(task.id, baseBranch);
      if (!rebase.success) {
        return { success: false, message: truncateMergeMessage(`Merge blocked: ${rebase.message}`) };
      }
      usedAutoRebase = true;
      results = await this.mergeAll(workspaceId, { ...mergeOptions, skipUnchanged });
      failures = results.filter((result) => !result.success);
    }

    if (failures.length > 0) {
      const message = summarizeMergeFailures(failures, risk.overlapFiles);
      this.logger?.warn("merge_failed", { task_id: task.id, failures: failures.length, message });
      return { success: false, message };
    }

    await this.workspaces.release(workspaceId, { cleanup: false, reason: "merged" });
    await this.sessions.killSession(task.id);
    await this.tasks.updateFields(task.id, { status: "DONE" });
    if (usedPremergeRebase || usedAutoRebase) {
      this.rebaseHints.note(baseBranch);
    } else {
      this.rebaseHints.cooldown(baseBranch);
    }
    this.logger?.info("merge_completed", {
      task_id: task.id,
      base_branch: baseBranch,
      strategy,
      premerge_rebase: usedPremergeRebase,
      auto_rebase: usedAutoRebase,
    });

    if (strategy === "pull_request") {
      return { success: true, message: MERGE_SUCCESS_MESSAGES.PULL_REQUESTS };
    }
    if (usedAutoRebase) {
      return { success: true, message: MERGE_SUCCESS_MESSAGES.AFTER_AUTO_REBASE };
    }
    if (usedPremergeRebase) {
      return { success: true, message: MERGE_SUCCESS_MESSAGES.AFTER_PREMERGE_REBASE };
    }
    return { success: true, message: MERGE_SUCCESS_MESSAGES.PLAIN };
  }

  private isRuntimeActive(taskId: string): boolean {
    return this.automation.isRunning(taskId) || this.automation.isReviewing(taskId);
  }

  /** Stops the agent of the task and waits, bounded, until its runtime is idle. */
  private async ensureTaskIdle(taskId: string, signal: AbortSignal | undefined): Promise<boolean> {
    if (!this.isRuntimeActive(taskId)) {
      return true;
    }
    try {
      await this.automation.stopTask(taskId);
    } catch (error) {
      this.logger?.warn("merge_stop_agent_failed", { task_id: taskId, message: errorMessage(error) });
    }
    return pollUntil(() => !this.isRuntimeActive(taskId), {
      intervalMs: this.settings.mergeQuiescePollMs,
      timeoutMs: this.settings.mergeQuiesceTimeoutMs,
      signal,
      operation: `merge quiescence for ${taskId}`,
    });
  }

  private async latestWorkspaceId(taskId: string): Promise<string | null> {
    const workspaces = await this.workspaces.listWorkspaces(taskId);
    return workspaces[0]?.id ?? null;
  }

  /** Task override, then the target branch of the first repo, then the configured default. */
  resolveBaseBranch(task: Pick<Task, "baseBranch">, repos: readonly WorkspaceRepo[]): string {
    return task.baseBranch ?? repos[0]?.targetBranch ?? this.settings.defaultBaseBranch;
  }

  async assessRisk(taskId: string, repos: readonly WorkspaceRepo[], baseBranch: string): Promise<MergeRisk> {
    const [commits, changedFiles, baseChangedFiles] = await Promise.all([
      this.workspaces.getCommitLog(taskId, baseBranch),
      this.workspaces.getFilesChanged(taskId, baseBranch),
      this.workspaces.getFilesChangedOnBase(taskId, baseBranch),
    ]);
    return assessMergeRisk({
      changedRepoCount: repos.filter((repo) => repo.hasChanges).length,
      commits,
      changedFiles,
      baseChangedFiles,
    });
  }

  private async rebaseForMerge(taskId: string, baseBranch: string): Promise<RebaseOutcome> {
    const outcome = await this.workspaces.rebaseOntoBase(taskId, baseBranch);
    if (!outcome.success) {
      this.logger?.warn("merge_rebase_failed", {
        task_id: taskId,
        base_branch: baseBranch,
        conflict_files: outcome.conflictFiles,
      });
      await this.abortRebaseQuietly(taskId);
    }
    return outcome;
  }

  private async abortRebaseQuietly(taskId: string): Promise<void> {
    try {
      await this.workspaces.abortRebase(taskId);
    } catch (error) {
      this.logger?.warn("merge_rebase_abort_failed", { task_id: taskId, message: errorMessage(error) });
    }
  }

  /** Review rebase requested by a user; conflicts are left for the user to resolve. */
  async rebaseTask(task: Task, baseBranch?: string | null): Promise<RebaseOutcome> {
    return this.locks.run(`merge:${task.id}`, async () => {
      const workspaceId = await this.latestWorkspaceId(task.id);
      const repos = workspaceId ? await this.workspaces.getWorkspaceRepos(workspaceId) : [];
      const target = baseBranch ?? this.resolveBaseBranch(task, repos);
      const outcome = await this.workspaces.rebaseOntoBase(task.id, target);
      this.logger?.info("review_rebase", { task_id: task.id, base_branch: target, success: outcome.success });
      return { ...outcome, message: truncateMergeMessage(outcome.message) };
    });
  }

  /** True when no repo reports changes and the branch has no commit ahead of its base. */
  async hasNoChanges(task: Task): Promise<boolean> {
    const workspaceId = await this.latestWorkspaceId(task.id);
    if (workspaceId === null) {
      return true;
    }
    const repos = await this.workspaces.getWorkspaceRepos(workspaceId);
    if (repos.some((repo) => repo.hasChanges)) {
      return false;
    }
    const commits = await this.workspaces.getCommitLog(task.id, this.resolveBaseBranch(task, repos));
    return commits.length === 0;
  }

  async mergeAll(workspaceId: string, options: MergeAllOptions = {}): Promise<MergeResult[]> {
    const strategy = options.strategy ?? "direct";
    const skipUnchanged = options.skipUnchanged ?? true;
    const repos = await this.workspaces.getWorkspaceRepos(workspaceId);
    const results: MergeResult[] = [];
    for (const repo of repos) {
      if (skipUnchanged && !repo.hasChanges) {
        results.push({ ...emptyResult(repo, strategy), success: true, message: "Skipped (no changes)" });
        continue;
      }
      results.push(
        await this.mergeRepo(workspaceId, repo.repoId, {
          strategy,
          commitMessage: options.commitMessage,
          prTitle: options.prTitle,
          prBody: options.prBody,
        }),
      );
    }
    return results;
  }

  /**
   * Merges one repo of the workspace: commits leftover agent changes, pushes
   * the task branch, then opens a pull request or squash-merges locally.
   * Git failures are reported in the result and published as
   * `MERGE_FAILED`; an unknown repo raises.
   */
  async mergeRepo(workspaceId: string, repoId: string, options: MergeRepoOptions = {}): Promise<MergeResult> {
    const events = this.events;
    const git = this.git;
    if (!events || !git) {
      throw new Error("Merge coordinator missing dependencies for per-repo operations");
    }
    const strategy = options.strategy ?? "direct";

    const workspace = await this.workspaces.getWorkspace(workspaceId);
    const repo = workspace ? (await this.workspaces.getWorkspaceRepos(workspaceId)).find((entry) => entry.repoId === repoId) : undefined;
    if (!workspace || !repo) {
      throw new InvalidParamsError(`Repo ${repoId} not found in workspace ${workspaceId}`);
    }
    const worktreePath = repo.worktreePath;
    if (!worktreePath) {
      throw new InvalidParamsError(`Repo ${repoId} has no worktree for workspace ${workspaceId}`);
    }

    const result = emptyResult(repo, strategy);
    const fail = (message: string, conflict: { op: string; files: string[] } | null = null): MergeResult => {
      result.success = false;
      result.message = message;
      result.conflictOp = conflict?.op ?? null;
      result.conflictFiles = conflict?.files ?? [];
      events.publish({
        cat: "merge",
        kind: MERGE_EVENT_KINDS.FAILED,
        level: "warn",
        taskId: workspace.taskId,
        workspaceId,
        repoId,
        msg: message,
        data: { conflict_op: result.conflictOp, conflict_files: result.conflictFiles },
      });
      return result;
    };

    try {
      if (await git.hasUncommittedChanges(worktreePath)) {
        const shortId = workspace.taskId ? workspace.taskId.slice(0, 8) : "unknown";
        await git.commitAll(worktreePath, `chore: adding uncommitted agent changes (${shortId})`);
        this.logger?.info("merge_autocommit", { repo: repo.repoName, workspace_id: workspaceId });
      }
      await git.push(worktreePath, workspace.branchName);
    } catch (error) {
      await this.recordMerge(workspaceId, repo, strategy, fail(errorMessage(error)));
      return result;
    }

    if (strategy === "pull_request") {
      try {
        const prUrl = await git.createPullRequest({
          repoPath: repo.repoPath,
          branch: workspace.branchName,
          target: repo.targetBranch,
          title: options.prTitle ?? `Merge ${workspace.branchName}`,
          body: options.prBody ?? "",
          draft: options.draft ?? false,
        });
        if (prUrl.length === 0) {
          fail("PR creation failed");
        } else {
          result.success = true;
          result.message = `PR created: ${prUrl}`;
          result.prUrl = prUrl;
          events.publish({
            cat: "merge",
            kind: MERGE_EVENT_KINDS.PR_CREATED,
            taskId: workspace.taskId,
            workspaceId,
            repoId,
            msg: result.message,
            data: { pr_url: prUrl },
          });
        }
      } catch (error) {
        fail(`Failed to create PR: ${errorMessage(error)}`);
      }
    } else if (isRemoteTarget(repo.targetBranch)) {
      fail(`Direct merge blocked for remote target ${repo.targetBranch}`);
    } else {
      try {
        const outcome = await git.mergeSquash({
          repoPath: repo.repoPath,
          sourceBranch: workspace.branchName,
          targetBranch: repo.targetBranch,
          commitMessage: options.commitMessage ?? null,
        });
        if (outcome.success) {
          result.success = true;
          result.message = outcome.message;
          result.commitSha = outcome.commitSha;
          if (outcome.commitSha) {
            events.publish({
              cat: "merge",
              kind: MERGE_EVENT_KINDS.COMPLETED,
              taskId: workspace.taskId,
              workspaceId,
              repoId,
              msg: outcome.message,
              data: { target_branch: repo.targetBranch, commit_sha: outcome.commitSha },
            });
          }
        } else {
          fail(outcome.message, outcome.conflict);
        }
      } catch (error) {
        fail(errorMessage(error));
      }
    }

    await this.recordMerge(workspaceId, repo, strategy, result);
    return result;
  }

  async createPr(
    workspaceId: string,
    repoId: string,
    options: { title: string; body: string; draft?: boolean },
  ): Promise<string> {
    const result = await this.mergeRepo(workspaceId, repoId, {
      strategy: "pull_request",
      prTitle: options.title,
      prBody: options.body,
      draft: options.draft,
    });
    if (!result.prUrl) {
      throw new Error("PR creation failed");
    }
    return result.prUrl;
  }

  private async recordMerge(
    workspaceId: string,
    repo: WorkspaceRepo,
    strategy: MergeStrategy,
    result: MergeResult,
  ): Promise<void> {
    if (!this.ledger) {
      return;
    }
    const isPr = strategy === "pull_request";
    const entry: MergeRecord = {
      workspaceId,
      repoId: repo.repoId,
      mergeType: isPr ? "pr" : "direct",
      targetBranch: repo.targetBranch,
      mergeCommit: isPr ? null : result.commitSha,
      prUrl: isPr ? result.prUrl : null,
      status: !result.success ? "closed" : isPr ? "open" : "merged",
      recordedAt: this.now().toISOString(),
    };
    await this.ledger.record(entry);
  }

  /** Closes a task that produced nothing worth merging. */
  async closeExploratory(task: Task): Promise<MergeOutcome> {
    if (this.automation.isRunning(task.id)) {
      await this.automation.stopTask(task.id);
    }
    await this.sessions.killSession(task.id);
    const workspaceId = await this.latestWorkspaceId(task.id);
    if (workspaceId !== null) {
      await this.workspaces.release(workspaceId, { cleanup: false, reason: "no_changes" });
    }
    await this.tasks.updateFields(task.id, { status: "DONE" });
    return { success: true, message: "Closed with no changes" };
  }

  /**
   * Moves a rejected task out of REVIEW (`backlog` -> BACKLOG, `reopen` ->
   * IN_PROGRESS) and appends the reviewer feedback to its description.
   */
  async applyRejectionFeedback(task: Task, feedback: string | null, action: RejectionAction = "backlog"): Promise<Task> {
    const status = action === "backlog" ? "BACKLOG" : "IN_PROGRESS";
    const patch: { status: typeof status; description?: string } = { status };
    if (feedback) {
      const stamp = this.now().toISOString().slice(0, 16).replace("T", " ");
      patch.description = `${task.description}\n\n---\n**Review Feedback (${stamp}):**\n${feedback}`;
    }
    const updated = await this.tasks.updateFields(task.id, patch);
    if (!updated) {
      throw new InvalidParamsError(`Task ${task.id} not found`);
    }
    return updated;
  }

  /**
   * Deletes the task together with its agent, session and worktree. Steps run
   * in order; a failure reports the steps that already completed.
   */
  async deleteTask(task: Task): Promise<MergeOutcome> {
    const steps: string[] = [];
    try {
      if (this.automation.isRunning(task.id)) {
        await this.automation.stopTask(task.id);
      }
      steps.push("agent_stopped");
      await this.sessions.killSession(task.id);
      steps.push("session_killed");
      if (await this.workspaces.getPath(task.id)) {
        await this.workspaces.delete(task.id, { deleteBranch: true });
      }
      steps.push("worktree_deleted");
      await this.tasks.delete(task.id);
      steps.push("record_deleted");
      this.logger?.debug("task_deleted", { task_id: task.id, steps });
      return { success: true, message: "Deleted successfully" };
    } catch (error) {
      this.logger?.error("task_delete_failed", { task_id: task.id, steps, message: errorMessage(error) });
      return { success: false, message: `Delete failed: ${errorMessage(error)}` };
    }
  }
}
