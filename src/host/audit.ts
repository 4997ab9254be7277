import type { StructuredLogger } from "../logger.js";
import type { CoreErrorCode } from "../rpc/errors.js";

export interface AuditEntry {
  seq: number;
  ts: string;
  requestId: string;
  sessionId: string;
  /** Bound profile, `null` when binding itself failed. */
  profile: string | null;
  origin: string | null;
  capability: string;
  method: string;
  ok: boolean;
  errorCode: CoreErrorCode | null;
  durationMs: number;
}

export type AuditInput = Omit<AuditEntry, "seq" | "ts">;

export interface AuditTrailOptions {
  limit?: number;
  logger?: StructuredLogger;
  now?: () => Date;
}

/**
 * Bounded in-memory trail of every handled request, denials included. The
 * oldest entries are dropped once the limit is reached.
 */
export class AuditTrail {
  private readonly entries: AuditEntry[] = [];
  private readonly limit: number;
  private readonly logger?: StructuredLogger;
  private readonly now: () => Date;
  private seq = 0;

  constructor(options: AuditTrailOptions = {}) {
    this.limit = Math.max(1, options.limit ?? 500);
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
  }

  record(input: AuditInput): AuditEntry {
    const entry: AuditEntry = { ...input, seq: ++this.seq, ts: this.now().toISOString() };
    this.entries.push(entry);
    if (this.entries.length > this.limit) {
      this.entries.splice(0, this.entries.length - this.limit);
    }
    this.logger?.[entry.ok ? "info" : "warn"]("request_audit", {
      request_id: entry.requestId,
      session_id: entry.sessionId,
      profile: entry.profile,
      origin: entry.origin,
      call: `${entry.capability}.${entry.method}`,
      ok: entry.ok,
      error_code: entry.errorCode,
      duration_ms: entry.durationMs,
    });
    return { ...entry };
  }

  /** Newest entries last; `limit` keeps the tail. */
  list(filter: { limit?: number; sessionId?: string } = {}): AuditEntry[] {
    const matching = this.entries.filter((entry) => filter.sessionId === undefined || entry.sessionId === filter.sessionId);
    const tail = filter.limit !== undefined ? matching.slice(-filter.limit) : matching;
    return tail.map((entry) => ({ ...entry }));
  }

  size(): number {
    return this.entries.length;
  }
}
