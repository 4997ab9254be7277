import { EventEmitter } from "node:events";

export type EventCategory = "task" | "runtime" | "merge" | "review" | "job" | "auth";

/** Same names as the logger levels, minus `debug`. */
export type EventLevel = "info" | "warn" | "error";

/**
 * Published event. Absent correlation ids are `null` rather than missing so
 * two envelopes compare equal whatever the publisher left out.
 */
export interface EventEnvelope {
  seq: number;
  /** Milliseconds since the epoch. */
  ts: number;
  cat: EventCategory;
  level: EventLevel;
  taskId: string | null;
  workspaceId: string | null;
  repoId: string | null;
  jobId: string | null;
  /** Upper-case identifier such as `MERGE_COMPLETED`. */
  kind: string;
  msg: string;
  data?: unknown;
}

export interface EventInput {
  cat: EventCategory;
  /** Any casing; stored upper-cased. */
  kind: string;
  level?: EventLevel;
  taskId?: string | null;
  workspaceId?: string | null;
  repoId?: string | null;
  jobId?: string | null;
  /** Defaults to the lower-cased kind. */
  msg?: string;
  data?: unknown;
  ts?: number;
}

/** Empty arrays and missing fields match everything. */
export interface EventFilter {
  cats?: EventCategory[];
  levels?: EventLevel[];
  kinds?: string[];
  taskId?: string;
  workspaceId?: string;
  jobId?: string;
  afterSeq?: number;
  /** Keeps the newest matches. */
  limit?: number;
}

export interface EventBusOptions {
  historyLimit?: number;
  now?: () => number;
  /** Events a subscriber may have pending before the oldest info event is dropped. */
  streamBufferSize?: number;
}

export const MERGE_EVENT_KINDS = {
  COMPLETED: "MERGE_COMPLETED",
  FAILED: "MERGE_FAILED",
  PR_CREATED: "PR_CREATED",
} as const;

export const EVENT_CATEGORIES: readonly EventCategory[] = ["task", "runtime", "merge", "review", "job", "auth"];

const PUBLISHED = "published";

type Predicate = (event: EventEnvelope) => boolean;

/** Removes one event once `events` outgrew `limit`, preferring the oldest `info` one. */
function trimOverflow(events: EventEnvelope[], limit: number): void {
  if (events.length <= limit) {
    return;
  }
  const oldestInfo = events.findIndex((event) => event.level === "info");
  events.splice(Math.max(oldestInfo, 0), 1);
}

function tag(value: string | null | undefined): string | null {
  const trimmed = value?.trim() ?? "";
  return trimmed.length > 0 ? trimmed : null;
}

function compileFilter(filter: EventFilter): Predicate {
  const checks: Predicate[] = [];
  if (filter.cats && filter.cats.length > 0) {
    const cats = new Set(filter.cats);
    checks.push((event) => cats.has(event.cat));
  }
  if (filter.levels && filter.levels.length > 0) {
    const levels = new Set(filter.levels);
    checks.push((event) => levels.has(event.level));
  }
  if (filter.kinds && filter.kinds.length > 0) {
    const kinds = new Set(filter.kinds.map((kind) => kind.trim().toUpperCase()));
    checks.push((event) => kinds.has(event.kind));
  }
  const { taskId, workspaceId, jobId, afterSeq } = filter;
  if (taskId) {
    checks.push((event) => event.taskId === taskId);
  }
  if (workspaceId) {
    checks.push((event) => event.workspaceId === workspaceId);
  }
  if (jobId) {
    checks.push((event) => event.jobId === jobId);
  }
  if (afterSeq !== undefined) {
    checks.push((event) => event.seq > afterSeq);
  }
  return (event) => checks.every((check) => check(event));
}

/**
 * Live subscription: yields the matching backlog first, then every matching
 * event published afterwards, until {@link close} or `return()`.
 */
export class EventStream implements AsyncIterableIterator<EventEnvelope> {
  private readonly pending: EventEnvelope[] = [];
  private waiting: ((result: IteratorResult<EventEnvelope>) => void) | null = null;
  private ended = false;
  private readonly onPublished = (event: EventEnvelope): void => {
    if (this.ended || !this.accepts(event)) {
      return;
    }
    const waiting = this.waiting;
    if (waiting) {
      this.waiting = null;
      waiting({ value: event, done: false });
    } else {
      this.push(event);
    }
  };

  constructor(
    private readonly source: EventEmitter,
    private readonly accepts: Predicate,
    backlog: readonly EventEnvelope[],
    private readonly capacity: number,
  ) {
    backlog.forEach((event) => this.push(event));
    source.on(PUBLISHED, this.onPublished);
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<EventEnvelope> {
    return this;
  }

  next(): Promise<IteratorResult<EventEnvelope>> {
    const event = this.pending.shift();
    if (event) {
      return Promise.resolve({ value: event, done: false });
    }
    if (this.ended) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => {
      this.waiting = resolve;
    });
  }

  async return(): Promise<IteratorResult<EventEnvelope>> {
    this.close();
    return { value: undefined, done: true };
  }

  close(): void {
    if (this.ended) {
      return;
    }
    this.ended = true;
    this.pending.length = 0;
    this.source.off(PUBLISHED, this.onPublished);
    const waiting = this.waiting;
    this.waiting = null;
    waiting?.({ value: undefined, done: true });
  }

  private push(event: EventEnvelope): void {
    this.pending.push(event);
    trimOverflow(this.pending, this.capacity);
  }
}

/**
 * Process-local event history with filtered reads and live subscriptions.
 * Once the history is full the oldest `info` event goes first, so warnings
 * and errors outlive routine traffic.
 */
export class EventBus {
  private readonly emitter = new EventEmitter();
  private readonly history: EventEnvelope[] = [];
  private readonly historyLimit: number;
  private readonly streamBufferSize: number;
  private readonly now: () => number;
  private seq = 0;

  constructor(options: EventBusOptions = {}) {
    this.historyLimit = Math.max(1, options.historyLimit ?? 1_000);
    this.streamBufferSize = Math.max(1, options.streamBufferSize ?? 256);
    this.now = options.now ?? (() => Date.now());
    this.emitter.setMaxListeners(0);
  }

  publish(input: EventInput): EventEnvelope {
    if (!EVENT_CATEGORIES.includes(input.cat)) {
      throw new TypeError(`unknown event category: ${input.cat}`);
    }
    const kind = input.kind.trim().toUpperCase();
    if (kind.length === 0) {
      throw new TypeError("event kind must be non-empty");
    }

    const event: EventEnvelope = {
      seq: ++this.seq,
      ts: input.ts ?? this.now(),
      cat: input.cat,
      level: input.level ?? "info",
      taskId: tag(input.taskId),
      workspaceId: tag(input.workspaceId),
      repoId: tag(input.repoId),
      jobId: tag(input.jobId),
      kind,
      msg: tag(input.msg) ?? kind.toLowerCase(),
      data: input.data,
    };
    this.history.push(event);
    trimOverflow(this.history, this.historyLimit);
    this.emitter.emit(PUBLISHED, event);
    return event;
  }

  list(filter: EventFilter = {}): EventEnvelope[] {
    const matching = this.history.filter(compileFilter(filter));
    const limit = filter.limit !== undefined && filter.limit > 0 ? filter.limit : matching.length;
    return matching.slice(Math.max(0, matching.length - limit));
  }

  subscribe(filter: EventFilter = {}): EventStream {
    return new EventStream(this.emitter, compileFilter(filter), this.list(filter), this.streamBufferSize);
  }
}
