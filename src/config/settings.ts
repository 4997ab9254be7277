import { readFileSync } from "node:fs";
import YAML from "yaml";
import { z } from "zod";

import {
  type EnvSource,
  readBool,
  readInt,
  readOptionalEnum,
  readOptionalString,
  readString,
} from "./env.js";
import { InvalidParamsError, fromZodError } from "../rpc/errors.js";

/** Version reported by the core; embedded MCP clients must match it exactly. */
export const CORE_VERSION = "0.1.0";

export const MERGE_STRATEGIES = ["direct", "pull_request"] as const;
export type MergeStrategy = (typeof MERGE_STRATEGIES)[number];

/**
 * Runtime knobs of the core host. Durations are milliseconds. The defaults
 * reproduce the historical behaviour: a five second quiescence window polled
 * every 100 ms and a two second grace period for a recovered agent to attach.
 */
export const CoreSettingsSchema = z
  .object({
    defaultBaseBranch: z.string().min(1).default("main"),
    serializeMerges: z.boolean().default(true),
    /** When set, `review.merge` refuses tasks whose review was not approved. */
    requireReviewApproval: z.boolean().default(false),
    mergeStrategy: z.enum(MERGE_STRATEGIES).default("direct"),
    mergeQuiesceTimeoutMs: z.number().int().positive().default(5_000),
    mergeQuiescePollMs: z.number().int().positive().default(100),
    outputAttachTimeoutMs: z.number().int().positive().default(2_000),
    jobWaitMaxMs: z.number().int().positive().default(30_000),
    jobPollMs: z.number().int().positive().default(50),
    idempotencyTtlMs: z.number().int().positive().default(600_000),
    auditLimit: z.number().int().positive().default(500),
    coreVersion: z.string().min(1).default(CORE_VERSION),
    logFile: z.string().min(1).nullable().default(null),
  })
  .strict();

export type CoreSettings = z.infer<typeof CoreSettingsSchema>;
export type CoreSettingsInput = z.input<typeof CoreSettingsSchema>;

/** Returns the defaults merged with the provided overrides. */
export function resolveSettings(overrides: CoreSettingsInput = {}): CoreSettings {
  const parsed = CoreSettingsSchema.safeParse(overrides);
  if (!parsed.success) {
    throw fromZodError(parsed.error, "settings");
  }
  return parsed.data;
}

/**
 * Reads the optional YAML settings file. Keys use the same camelCase names as
 * {@link CoreSettings}; unknown keys are rejected by the schema.
 */
export function readSettingsFile(path: string): CoreSettingsInput {
  const raw: unknown = YAML.parse(readFileSync(path, "utf8"));
  if (raw === null || raw === undefined) {
    return {};
  }
  const parsed = CoreSettingsSchema.partial().safeParse(raw);
  if (!parsed.success) {
    throw fromZodError(parsed.error, `settings file ${path}`);
  }
  return parsed.data;
}

/**
 * Builds the settings from `LANEKEEPER_CONFIG_FILE` (YAML) overlaid by the
 * individual `LANEKEEPER_*` variables.
 */
export function loadSettingsFromEnv(env: EnvSource = process.env): CoreSettings {
  const filePath = readOptionalString("LANEKEEPER_CONFIG_FILE", env);
  const fromFile = filePath ? readSettingsFile(filePath) : {};
  const base = resolveSettings(fromFile);

  const settings: CoreSettings = {
    ...base,
    defaultBaseBranch: readString("LANEKEEPER_DEFAULT_BASE_BRANCH", base.defaultBaseBranch, env),
    serializeMerges: readBool("LANEKEEPER_SERIALIZE_MERGES", base.serializeMerges, env),
    requireReviewApproval: readBool("LANEKEEPER_REQUIRE_REVIEW_APPROVAL", base.requireReviewApproval, env),
    mergeStrategy: readOptionalEnum("LANEKEEPER_MERGE_STRATEGY", MERGE_STRATEGIES, env) ?? base.mergeStrategy,
    mergeQuiesceTimeoutMs: readInt("LANEKEEPER_MERGE_QUIESCE_TIMEOUT_MS", base.mergeQuiesceTimeoutMs, { min: 1 }, env),
    mergeQuiescePollMs: readInt("LANEKEEPER_MERGE_QUIESCE_POLL_MS", base.mergeQuiescePollMs, { min: 1 }, env),
    outputAttachTimeoutMs: readInt("LANEKEEPER_OUTPUT_ATTACH_TIMEOUT_MS", base.outputAttachTimeoutMs, { min: 1 }, env),
    jobWaitMaxMs: readInt("LANEKEEPER_JOB_WAIT_MAX_MS", base.jobWaitMaxMs, { min: 1 }, env),
    idempotencyTtlMs: readInt("LANEKEEPER_IDEMPOTENCY_TTL_MS", base.idempotencyTtlMs, { min: 1 }, env),
    coreVersion: readString("LANEKEEPER_RUNTIME_VERSION", base.coreVersion, env),
    logFile: readOptionalString("LANEKEEPER_LOG_FILE", env) ?? base.logFile,
  };

  if (settings.mergeQuiescePollMs > settings.mergeQuiesceTimeoutMs) {
    throw new InvalidParamsError("LANEKEEPER_MERGE_QUIESCE_POLL_MS must not exceed the quiescence timeout", {
      meta: { poll: settings.mergeQuiescePollMs, timeout: settings.mergeQuiesceTimeoutMs },
    });
  }
  return settings;
}
