import { createHash } from "node:crypto";

import { InvalidParamsError } from "../rpc/errors.js";

/**
 * In-memory registry replaying the outcome of mutating requests retried with
 * the same idempotency key. Every entry keeps a fingerprint of the request
 * payload: a retry carrying a different payload under the same key is
 * rejected instead of silently replaying an unrelated result.
 */
export interface IdempotencyEntry<T> {
  readonly key: string;
  readonly fingerprint: string;
  readonly value: T;
  readonly storedAt: number;
  readonly expiresAt: number;
  /** Number of times callers observed the value (first call counts as 1). */
  readonly hits: number;
}

export interface IdempotencyRegistryOptions {
  /** Default TTL (milliseconds) applied when callers do not override it. */
  defaultTtlMs?: number;
  clock?: () => number;
}

export interface IdempotencyHit<T> {
  value: T;
  /** `true` when the value was replayed from an earlier call. */
  idempotent: boolean;
}

interface MutableEntry<T> {
  key: string;
  fingerprint: string;
  value: T;
  storedAt: number;
  expiresAt: number;
  hits: number;
}

/** Default TTL (~10 minutes) offering a generous window for retries. */
const DEFAULT_TTL_MS = 600_000;

export class IdempotencyRegistry<T> {
  private readonly entries = new Map<string, MutableEntry<T>>();
  private readonly pending = new Map<string, { fingerprint: string; promise: Promise<MutableEntry<T>> }>();
  private readonly clock: () => number;
  private readonly defaultTtlMs: number;

  constructor(options: IdempotencyRegistryOptions = {}) {
    this.clock = options.clock ?? (() => Date.now());
    const ttl = options.defaultTtlMs ?? DEFAULT_TTL_MS;
    this.defaultTtlMs = ttl > 0 ? ttl : DEFAULT_TTL_MS;
  }

  size(): number {
    return this.entries.size;
  }

  peek(key: string): IdempotencyEntry<T> | null {
    const entry = this.entries.get(key);
    if (!entry) {
      return null;
    }
    if (this.clock() >= entry.expiresAt) {
      this.entries.delete(key);
      return null;
    }
    return { ...entry, value: clone(entry.value) };
  }

  /**
   * Runs {@link factory} at most once per live key. Concurrent callers with
   * the same key await the same execution; a factory that throws stores
   * nothing so the caller may retry.
   */
  async remember(key: string, fingerprint: string, factory: () => Promise<T>, ttlMs?: number): Promise<IdempotencyHit<T>> {
    const now = this.clock();
    this.pruneExpired(now);
    const existing = this.entries.get(key);
    if (existing && now < existing.expiresAt) {
      assertSameFingerprint(key, existing.fingerprint, fingerprint);
      existing.hits += 1;
      return { value: clone(existing.value), idempotent: true };
    }

    const inFlight = this.pending.get(key);
    if (inFlight) {
      assertSameFingerprint(key, inFlight.fingerprint, fingerprint);
      const stored = await inFlight.promise;
      return { value: clone(stored.value), idempotent: true };
    }

    const promise = (async () => {
      const value = await factory();
      return this.store(key, fingerprint, value, ttlMs);
    })();
    this.pending.set(key, { fingerprint, promise });
    try {
      const stored = await promise;
      return { value: clone(stored.value), idempotent: false };
    } finally {
      this.pending.delete(key);
    }
  }

  pruneExpired(now: number = this.clock()): void {
    for (const [key, entry] of this.entries) {
      if (now >= entry.expiresAt) {
        this.entries.delete(key);
      }
    }
  }

  private store(key: string, fingerprint: string, value: T, ttlOverride?: number): MutableEntry<T> {
    const now = this.clock();
    const ttl = ttlOverride !== undefined && Number.isFinite(ttlOverride) ? Math.max(1, ttlOverride) : this.defaultTtlMs;
    const entry: MutableEntry<T> = { key, fingerprint, value: clone(value), storedAt: now, expiresAt: now + ttl, hits: 1 };
    this.entries.set(key, entry);
    return entry;
  }
}

function assertSameFingerprint(key: string, stored: string, received: string): void {
  if (stored !== received) {
    throw new InvalidParamsError(`Idempotency key '${key}' was already used with a different payload`, {
      hint: "Use a fresh idempotency key for a different request.",
    });
  }
}

function clone<T>(value: T): T {
  return structuredClone(value);
}

/**
 * Fingerprint of a request: method plus a hash of the parameters serialised
 * with sorted keys, so property order does not matter.
 */
export function fingerprintRequest(method: string, params: unknown): string {
  const json = JSON.stringify(canonicalise(params, new WeakSet()));
  return `${method.trim().toLowerCase()}:${createHash("sha256").update(json).digest("hex")}`;
}

function canonicalise(value: unknown, seen: WeakSet<object>): unknown {
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (value === null || typeof value !== "object") {
    return value;
  }
  if (seen.has(value)) {
    return "[Circular]";
  }
  seen.add(value);
  try {
    if (Array.isArray(value)) {
      return value.map((entry) => canonicalise(entry, seen));
    }
    const normalised: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value).sort(([left], [right]) => left.localeCompare(right))) {
      if (entry !== undefined) {
        normalised[key] = canonicalise(entry, seen);
      }
    }
    return normalised;
  } finally {
    seen.delete(value);
  }
}
