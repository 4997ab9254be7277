import type { MergeStrategy } from "../config/settings.js";

export interface MergeResult {
  repoId: string;
  repoName: string;
  strategy: MergeStrategy;
  success: boolean;
  message: string;
  prUrl: string | null;
  commitSha: string | null;
  conflictOp: string | null;
  conflictFiles: string[];
}

/** Outcome of a task level operation. */
export interface MergeOutcome {
  success: boolean;
  message: string;
}

/** Persisted trace of one per-repo merge attempt. */
export interface MergeRecord {
  workspaceId: string;
  repoId: string;
  mergeType: "direct" | "pr";
  targetBranch: string;
  mergeCommit: string | null;
  prUrl: string | null;
  status: "open" | "merged" | "closed";
  recordedAt: string;
}
