import { z } from "zod";

import { JOB_ACTIONS } from "../jobs/jobService.js";
import { TASK_STATUSES, TASK_TYPES } from "../types.js";

/**
 * Parameter shapes of the dispatch map. The host parses them as strict zod
 * objects and the MCP bridge registers the same shapes as tool input
 * schemas, so both surfaces reject the same payloads.
 */

const TaskIdField = z.string().trim().min(1, "task_id must be a non-empty string");
const JobIdField = z.string().trim().min(1, "job_id must be a non-empty string");

export const TaskIdShape = { task_id: TaskIdField } as const;

export const TasksListShape = {
  status: z.enum(TASK_STATUSES).optional(),
} as const;

export const TasksLogsShape = {
  task_id: TaskIdField,
  /** Keeps the last N entries of the latest execution. */
  limit: z.number().int().min(1).max(1_000).optional(),
} as const;

export const TasksUpdateScratchpadShape = {
  task_id: TaskIdField,
  content: z.string().max(200_000),
} as const;

export const TasksCreateShape = {
  title: z.string().trim().min(1).max(200),
  description: z.string().max(20_000).optional(),
  task_type: z.enum(TASK_TYPES).optional(),
  base_branch: z.string().trim().min(1).nullable().optional(),
} as const;

export const TasksUpdateShape = {
  task_id: TaskIdField,
  title: z.string().trim().min(1).max(200).optional(),
  description: z.string().max(20_000).optional(),
  task_type: z.enum(TASK_TYPES).optional(),
  base_branch: z.string().trim().min(1).nullable().optional(),
} as const;

export const TasksMoveShape = {
  task_id: TaskIdField,
  status: z.enum(TASK_STATUSES),
} as const;

export const ReviewRejectShape = {
  task_id: TaskIdField,
  feedback: z.string().max(20_000).optional(),
  action: z.enum(["backlog", "reopen"]).default("backlog"),
} as const;

export const ReviewRebaseShape = {
  task_id: TaskIdField,
  base_branch: z.string().trim().min(1).optional(),
} as const;

export const JobsSubmitShape = {
  task_id: TaskIdField,
  action: z.enum(JOB_ACTIONS),
  params: z.record(z.unknown()).optional(),
} as const;

/** `task_id` is optional: task-scoped sessions resolve it from the job owner. */
export const JobLookupShape = {
  job_id: JobIdField,
  task_id: TaskIdField.optional(),
} as const;

export const JobsWaitShape = {
  ...JobLookupShape,
  timeout_ms: z.number().int().min(0).optional(),
} as const;

export const AuditListShape = {
  limit: z.number().int().min(1).max(500).optional(),
  session_id: z.string().trim().min(1).optional(),
} as const;

export const EmptyShape = {} as const;
