import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { after, describe, it } from "mocha";
import { expect } from "chai";

import {
  readBool,
  readInt,
  readOptionalBool,
  readOptionalEnum,
  readOptionalInt,
  readString,
} from "../src/config/env.js";
import { CORE_VERSION, loadSettingsFromEnv, readSettingsFile, resolveSettings } from "../src/config/settings.js";
import { InvalidParamsError } from "../src/rpc/errors.js";

const workdir = mkdtempSync(join(tmpdir(), "lanekeeper-settings-"));

after(() => {
  rmSync(workdir, { recursive: true, force: true });
});

function writeYaml(name: string, body: string): string {
  const path = join(workdir, name);
  writeFileSync(path, body, "utf8");
  return path;
}

function captureError(run: () => unknown): unknown {
  try {
    run();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe("environment readers", () => {
  it("parse boolean literals and ignore the rest", () => {
    expect(readOptionalBool("FLAG", { FLAG: " YES " })).to.equal(true);
    expect(readOptionalBool("FLAG", { FLAG: "off" })).to.equal(false);
    expect(readOptionalBool("FLAG", { FLAG: "maybe" })).to.equal(undefined);
    expect(readBool("FLAG", true, { FLAG: "" })).to.equal(true);
  });

  it("parse bounded integers", () => {
    expect(readOptionalInt("N", undefined, { N: "250" })).to.equal(250);
    expect(readOptionalInt("N", undefined, { N: "2.5" })).to.equal(undefined);
    expect(readOptionalInt("N", { min: 1 }, { N: "0" })).to.equal(undefined);
    expect(readInt("N", 7, { max: 10 }, { N: "11" })).to.equal(7);
  });

  it("read strings and enums", () => {
    expect(readString("BRANCH", "main", { BRANCH: "  develop " })).to.equal("develop");
    expect(readString("BRANCH", "main", {})).to.equal("main");
    expect(readOptionalEnum("MODE", ["direct", "pull_request"], { MODE: "PULL_REQUEST" })).to.equal("pull_request");
    expect(readOptionalEnum("MODE", ["direct", "pull_request"], { MODE: "rebase" })).to.equal(undefined);
  });
});

describe("core settings", () => {
  it("fills every default", () => {
    expect(resolveSettings()).to.deep.equal({
      defaultBaseBranch: "main",
      serializeMerges: true,
      requireReviewApproval: false,
      mergeStrategy: "direct",
      mergeQuiesceTimeoutMs: 5_000,
      mergeQuiescePollMs: 100,
      outputAttachTimeoutMs: 2_000,
      jobWaitMaxMs: 30_000,
      jobPollMs: 50,
      idempotencyTtlMs: 600_000,
      auditLimit: 500,
      coreVersion: CORE_VERSION,
      logFile: null,
    });
  });

  it("rejects invalid values", () => {
    const negative = captureError(() => resolveSettings({ mergeQuiescePollMs: -1 }));

    expect(negative).to.be.instanceOf(InvalidParamsError);
    expect(negative).to.have.property(
      "message",
      "Invalid params for settings (mergeQuiescePollMs: Number must be greater than 0)",
    );
  });

  it("reads a YAML file without applying defaults", () => {
    const path = writeYaml("partial.yaml", "defaultBaseBranch: develop\nserializeMerges: false\n");

    expect(readSettingsFile(path)).to.deep.equal({ defaultBaseBranch: "develop", serializeMerges: false });
    expect(readSettingsFile(writeYaml("empty.yaml", ""))).to.deep.equal({});
  });

  it("overlays environment variables on the settings file", () => {
    const path = writeYaml("base.yaml", "defaultBaseBranch: develop\nmergeQuiesceTimeoutMs: 8000\nauditLimit: 20\n");

    const settings = loadSettingsFromEnv({
      LANEKEEPER_CONFIG_FILE: path,
      LANEKEEPER_DEFAULT_BASE_BRANCH: "trunk",
      LANEKEEPER_REQUIRE_REVIEW_APPROVAL: "true",
      LANEKEEPER_MERGE_STRATEGY: "pull_request",
      LANEKEEPER_MERGE_QUIESCE_POLL_MS: "250",
      LANEKEEPER_JOB_WAIT_MAX_MS: "not-a-number",
      LANEKEEPER_LOG_FILE: "/var/log/lanekeeper/core.log",
    });

    expect(settings).to.include({
      defaultBaseBranch: "trunk",
      requireReviewApproval: true,
      mergeStrategy: "pull_request",
      mergeQuiesceTimeoutMs: 8_000,
      mergeQuiescePollMs: 250,
      jobWaitMaxMs: 30_000,
      auditLimit: 20,
      logFile: "/var/log/lanekeeper/core.log",
    });
  });

  it("refuses a poll interval longer than the quiescence timeout", () => {
    const error = captureError(() =>
      loadSettingsFromEnv({ LANEKEEPER_MERGE_QUIESCE_TIMEOUT_MS: "100", LANEKEEPER_MERGE_QUIESCE_POLL_MS: "500" }),
    );

    expect(error).to.be.instanceOf(InvalidParamsError);
    expect(error).to.have.property(
      "message",
      "LANEKEEPER_MERGE_QUIESCE_POLL_MS must not exceed the quiescence timeout",
    );
  });

  it("reports the file path when the YAML holds unknown keys", () => {
    const path = writeYaml("bad.yaml", "mergeTimeout: 3\n");

    const error = captureError(() => readSettingsFile(path));

    expect(error).to.have.property(
      "message",
      `Invalid params for settings file ${path} (params: Unrecognized key(s) in object: 'mergeTimeout')`,
    );
  });
});
