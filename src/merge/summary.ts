import type { MergeResult } from "./types.js";

/** Maximum length of any merge failure message returned to callers. */
export const MERGE_MESSAGE_LIMIT = 500;

export const CONFLICT_TIP = "Tip: run review rebase, resolve conflicts, then merge again";

const OVERLAP_PREVIEW = 3;

export function truncateMergeMessage(message: string): string {
  return message.slice(0, MERGE_MESSAGE_LIMIT);
}

function hasConflict(result: MergeResult): boolean {
  return result.conflictFiles.length > 0 || result.message.toLowerCase().includes("conflict");
}

/**
 * Joins the failed repo messages and appends the hints that help the user
 * recover: a rebase tip on conflicts and a preview of files also changed on
 * the base branch.
 */
export function summarizeMergeFailures(failures: readonly MergeResult[], overlapFiles: readonly string[] = []): string {
  let message = failures.map((result) => `${result.repoName}: ${result.message}`).join("; ");
  const hints: string[] = [];
  if (failures.some(hasConflict)) {
    hints.push(CONFLICT_TIP);
  }
  if (overlapFiles.length > 0) {
    const preview = overlapFiles.slice(0, OVERLAP_PREVIEW).join(", ");
    const suffix = overlapFiles.length > OVERLAP_PREVIEW ? "..." : "";
    hints.push(`Potential overlap with base changes: ${preview}${suffix}`);
  }
  if (hints.length > 0) {
    message = `${message}. ${hints.join(" ")}`;
  }
  return truncateMergeMessage(message);
}

/** Only failures that all ask for a rebase justify the automatic retry. */
export function shouldRetryAfterRebase(failures: readonly MergeResult[]): boolean {
  return failures.length > 0 && failures.every((result) => result.message.toLowerCase().includes("rebase required"));
}
