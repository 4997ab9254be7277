import { describe, it } from "mocha";
import { expect } from "chai";

import {
  CONFLICT_TIP,
  MERGE_MESSAGE_LIMIT,
  shouldRetryAfterRebase,
  summarizeMergeFailures,
} from "../src/merge/summary.js";
import type { MergeResult } from "../src/merge/types.js";

function failure(overrides: Partial<MergeResult> = {}): MergeResult {
  return {
    repoId: "repo-1",
    repoName: "app",
    strategy: "direct",
    success: false,
    message: "push rejected",
    prUrl: null,
    commitSha: null,
    conflictOp: null,
    conflictFiles: [],
    ...overrides,
  };
}

describe("merge failure summaries", () => {
  it("joins repo messages with semicolons", () => {
    const message = summarizeMergeFailures([
      failure(),
      failure({ repoId: "repo-2", repoName: "api", message: "hook failed" }),
    ]);
    expect(message).to.equal("app: push rejected; api: hook failed");
  });

  it("appends the rebase tip when a repo conflicted", () => {
    const message = summarizeMergeFailures([failure({ message: "Merge conflict", conflictFiles: ["src/a.ts"] })]);
    expect(message).to.equal(`app: Merge conflict. ${CONFLICT_TIP}`);
  });

  it("detects conflicts from the message alone", () => {
    const message = summarizeMergeFailures([failure({ message: "CONFLICT (content) in src/a.ts" })]);
    expect(message.endsWith(CONFLICT_TIP)).to.equal(true);
  });

  it("previews at most three overlapping files", () => {
    const message = summarizeMergeFailures([failure()], ["a.ts", "b.ts", "c.ts", "d.ts"]);
    expect(message).to.equal("app: push rejected. Potential overlap with base changes: a.ts, b.ts, c.ts...");
  });

  it("lists short overlaps without an ellipsis", () => {
    const message = summarizeMergeFailures([failure({ message: "conflict" })], ["a.ts"]);
    expect(message).to.equal(`app: conflict. ${CONFLICT_TIP} Potential overlap with base changes: a.ts`);
  });

  it("caps the summary length", () => {
    const message = summarizeMergeFailures([failure({ message: "x".repeat(800) })]);
    expect(message.length).to.equal(MERGE_MESSAGE_LIMIT);
    expect(message.startsWith("app: xxx")).to.equal(true);
  });
});

describe("automatic rebase retry", () => {
  it("retries only when every failure asks for a rebase", () => {
    expect(shouldRetryAfterRebase([failure({ message: "Rebase required before merge" })])).to.equal(true);
    expect(
      shouldRetryAfterRebase([
        failure({ message: "rebase required" }),
        failure({ repoName: "api", message: "push rejected" }),
      ]),
    ).to.equal(false);
    expect(shouldRetryAfterRebase([])).to.equal(false);
  });
});
