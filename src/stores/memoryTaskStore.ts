import { randomUUID } from "node:crypto";

import type { NewTask, TaskPatch, TaskStore } from "../ports.js";
import type { Task } from "../types.js";

export interface InMemoryTaskStoreOptions {
  readonly clock?: () => Date;
  readonly idFactory?: () => string;
}

const cloneTask = (task: Task): Task => ({ ...task });

/**
 * Task store kept in a map. Every read returns a copy so callers can never
 * mutate the stored record behind the store's back.
 */
export class InMemoryTaskStore implements TaskStore {
  private readonly tasks = new Map<string, Task>();
  private readonly scratchpads = new Map<string, string>();
  private readonly clock: () => Date;
  private readonly idFactory: () => string;

  constructor(options: InMemoryTaskStoreOptions = {}) {
    this.clock = options.clock ?? (() => new Date());
    this.idFactory = options.idFactory ?? (() => randomUUID());
  }

  async get(taskId: string): Promise<Task | null> {
    const task = this.tasks.get(taskId);
    return task ? cloneTask(task) : null;
  }

  /** Tasks ordered by creation time, then id. */
  async list(filter: { status?: Task["status"] } = {}): Promise<Task[]> {
    return [...this.tasks.values()]
      .filter((task) => filter.status === undefined || task.status === filter.status)
      .sort((left, right) => left.createdAt.localeCompare(right.createdAt) || left.id.localeCompare(right.id))
      .map(cloneTask);
  }

  async create(input: NewTask): Promise<Task> {
    const stamp = this.clock().toISOString();
    const task: Task = {
      id: this.idFactory(),
      title: input.title,
      description: input.description ?? "",
      status: input.status ?? "BACKLOG",
      taskType: input.taskType ?? "PAIR",
      baseBranch: input.baseBranch ?? null,
      createdAt: stamp,
      updatedAt: stamp,
    };
    this.tasks.set(task.id, task);
    return cloneTask(task);
  }

  async updateFields(taskId: string, patch: TaskPatch): Promise<Task | null> {
    const current = this.tasks.get(taskId);
    if (!current) {
      return null;
    }
    const next: Task = { ...current };
    if (patch.title !== undefined) next.title = patch.title;
    if (patch.description !== undefined) next.description = patch.description;
    if (patch.status !== undefined) next.status = patch.status;
    if (patch.taskType !== undefined) next.taskType = patch.taskType;
    if (patch.baseBranch !== undefined) next.baseBranch = patch.baseBranch;
    next.updatedAt = this.clock().toISOString();
    this.tasks.set(taskId, next);
    return cloneTask(next);
  }

  async delete(taskId: string): Promise<boolean> {
    this.scratchpads.delete(taskId);
    return this.tasks.delete(taskId);
  }

  async getScratchpad(taskId: string): Promise<string> {
    return this.scratchpads.get(taskId) ?? "";
  }

  async updateScratchpad(taskId: string, content: string): Promise<void> {
    this.scratchpads.set(taskId, content);
  }
}
