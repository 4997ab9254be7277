/**
 * Domain records shared across the core. String unions are backed by `as
 * const` tuples so zod schemas and runtime checks reuse the same literals.
 */

export const TASK_STATUSES = ["BACKLOG", "IN_PROGRESS", "REVIEW", "DONE"] as const;
export type TaskStatus = (typeof TASK_STATUSES)[number];

export const TASK_TYPES = ["AUTO", "PAIR"] as const;
/** AUTO tasks run a headless agent; PAIR tasks are driven from a terminal session. */
export type TaskType = (typeof TASK_TYPES)[number];

export interface Task {
  id: string;
  title: string;
  description: string;
  status: TaskStatus;
  taskType: TaskType;
  /** Branch override used as merge target; falls back to the repo target branch. */
  baseBranch: string | null;
  createdAt: string;
  updatedAt: string;
}

export const EXECUTION_STATUSES = ["RUNNING", "COMPLETED", "FAILED", "KILLED"] as const;
export type ExecutionStatus = (typeof EXECUTION_STATUSES)[number];

/** Persisted agent run. */
export interface ExecutionRecord {
  id: string;
  taskId: string;
  status: ExecutionStatus;
  startedAt: string;
  completedAt: string | null;
  error: string | null;
}

export interface ExecutionLogEntry {
  executionId: string;
  /** Raw chunk streamed by the agent; empty chunks do not count as output. */
  logs: string;
  createdAt: string;
}

/**
 * Opaque reference to a live agent process. The core never owns the process:
 * it stores and compares handles, nothing else.
 */
export interface AgentHandle {
  readonly agentId: string;
}

export interface Workspace {
  id: string;
  taskId: string;
  branchName: string;
  status: "ACTIVE" | "RELEASED";
  createdAt: string;
}

export interface WorkspaceRepo {
  repoId: string;
  repoName: string;
  repoPath: string;
  /** Absent when the worktree was never materialised or already cleaned up. */
  worktreePath: string | null;
  targetBranch: string;
  hasChanges: boolean;
}

export interface RebaseOutcome {
  success: boolean;
  message: string;
  conflictFiles: string[];
}

export interface GitMergeOutcome {
  success: boolean;
  message: string;
  commitSha: string | null;
  conflict: { op: string; files: string[] } | null;
}
