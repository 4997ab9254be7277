import type { EventBus } from "./events/bus.js";
import type { MergeRecord } from "./merge/types.js";
import type {
  AgentHandle,
  ExecutionLogEntry,
  ExecutionRecord,
  ExecutionStatus,
  GitMergeOutcome,
  RebaseOutcome,
  Task,
  TaskStatus,
  TaskType,
  Workspace,
  WorkspaceRepo,
} from "./types.js";

/**
 * Collaborators consumed by the core. Persistence, git plumbing and agent
 * process management live behind these interfaces; the in-memory stores under
 * `src/stores/` implement the persistence ones.
 */

export interface NewTask {
  title: string;
  description?: string;
  taskType?: TaskType;
  status?: TaskStatus;
  baseBranch?: string | null;
}

export type TaskPatch = Partial<Pick<Task, "title" | "description" | "status" | "taskType" | "baseBranch">>;

export interface TaskStore {
  get(taskId: string): Promise<Task | null>;
  list(filter?: { status?: TaskStatus }): Promise<Task[]>;
  create(input: NewTask): Promise<Task>;
  updateFields(taskId: string, patch: TaskPatch): Promise<Task | null>;
  delete(taskId: string): Promise<boolean>;
  getScratchpad(taskId: string): Promise<string>;
  updateScratchpad(taskId: string, content: string): Promise<void>;
}

export interface ExecutionPatch {
  status?: ExecutionStatus;
  completedAt?: string | null;
  error?: string | null;
}

export interface ExecutionStore {
  getExecution(executionId: string): Promise<ExecutionRecord | null>;
  getLatestExecutionForTask(taskId: string): Promise<ExecutionRecord | null>;
  getExecutionLogEntries(executionId: string): Promise<ExecutionLogEntry[]>;
  updateExecution(executionId: string, patch: ExecutionPatch): Promise<ExecutionRecord | null>;
  /** Latest RUNNING execution id per task, for the listed tasks only. */
  getLatestRunningExecutionsForTasks(taskIds: readonly string[]): Promise<Map<string, string>>;
}

export interface ReleaseOptions {
  cleanup: boolean;
  reason: string;
}

export interface WorkspaceService {
  /** Workspaces of the task, newest first. */
  listWorkspaces(taskId: string): Promise<Workspace[]>;
  getWorkspaceRepos(workspaceId: string): Promise<WorkspaceRepo[]>;
  getWorkspace(workspaceId: string): Promise<Workspace | null>;
  getCommitLog(taskId: string, baseBranch: string): Promise<string[]>;
  getFilesChanged(taskId: string, baseBranch: string): Promise<string[]>;
  getFilesChangedOnBase(taskId: string, baseBranch: string): Promise<string[]>;
  rebaseOntoBase(taskId: string, baseBranch: string): Promise<RebaseOutcome>;
  abortRebase(taskId: string): Promise<void>;
  release(workspaceId: string, options: ReleaseOptions): Promise<void>;
  getPath(taskId: string): Promise<string | null>;
  delete(taskId: string, options: { deleteBranch: boolean }): Promise<void>;
}

export interface SquashMergeRequest {
  repoPath: string;
  sourceBranch: string;
  targetBranch: string;
  commitMessage: string | null;
}

export interface PullRequestRequest {
  repoPath: string;
  branch: string;
  target: string;
  title: string;
  body: string;
  draft: boolean;
}

export interface GitAdapter {
  hasUncommittedChanges(worktreePath: string): Promise<boolean>;
  commitAll(worktreePath: string, message: string): Promise<void>;
  push(worktreePath: string, branch: string): Promise<void>;
  mergeSquash(request: SquashMergeRequest): Promise<GitMergeOutcome>;
  /** Returns the URL of the opened pull request, or an empty string when none was produced. */
  createPullRequest(request: PullRequestRequest): Promise<string>;
}

export interface WaitForAgentOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface AutomationService {
  isRunning(taskId: string): boolean;
  isReviewing(taskId: string): boolean;
  /** Requests the agent of the task to stop; resolves once the request is sent. */
  stopTask(taskId: string): Promise<boolean>;
  /** Starts a fresh agent run. Resolves `false` when the run was refused. */
  spawnForTask(task: Task): Promise<boolean>;
  waitForRunningAgent(taskId: string, options: WaitForAgentOptions): Promise<AgentHandle | null>;
  /** Runs the operation while holding the process-wide merge lock. */
  withMergeLock<T>(operation: () => Promise<T>): Promise<T>;
}

export interface SessionService {
  exists(taskId: string): Promise<boolean>;
  killSession(taskId: string): Promise<void>;
}

export type EventPublisher = Pick<EventBus, "publish">;

/** Append-only history of per-repo merge attempts. */
export interface MergeLedger {
  record(entry: MergeRecord): Promise<void>;
  list(workspaceId?: string): Promise<MergeRecord[]>;
}
