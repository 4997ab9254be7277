/** Risk estimate computed before every merge attempt. */
export interface MergeRisk {
  readonly score: number;
  /** Files changed both by the task and on the base branch, sorted and unique. */
  readonly overlapFiles: readonly string[];
  readonly commitCount: number;
  readonly changedRepoCount: number;
  readonly changedFileCount: number;
}

export interface MergeRiskInputs {
  changedRepoCount: number;
  commits: readonly string[];
  changedFiles: readonly string[];
  baseChangedFiles: readonly string[];
}

/** Thresholds at which a single dimension starts to count against a merge. */
export const MERGE_RISK_THRESHOLDS = {
  commits: 6,
  files: 12,
} as const;

/** Overlap weighs twice as much as any other signal. */
const OVERLAP_WEIGHT = 2;

export function assessMergeRisk(inputs: MergeRiskInputs): MergeRisk {
  const baseFiles = new Set(inputs.baseChangedFiles);
  const overlapFiles = [...new Set(inputs.changedFiles)].filter((file) => baseFiles.has(file)).sort();

  let score = 0;
  if (inputs.changedRepoCount > 1) {
    score += 1;
  }
  if (inputs.commits.length >= MERGE_RISK_THRESHOLDS.commits) {
    score += 1;
  }
  if (inputs.changedFiles.length >= MERGE_RISK_THRESHOLDS.files) {
    score += 1;
  }
  if (overlapFiles.length > 0) {
    score += OVERLAP_WEIGHT;
  }

  return Object.freeze({
    score,
    overlapFiles: Object.freeze(overlapFiles),
    commitCount: inputs.commits.length,
    changedRepoCount: inputs.changedRepoCount,
    changedFileCount: inputs.changedFiles.length,
  });
}

export function isHighRisk(risk: MergeRisk): boolean {
  return risk.score >= 2 || risk.overlapFiles.length > 0;
}
