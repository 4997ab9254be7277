import { randomUUID } from "node:crypto";

import { protocolCall } from "../auth/profiles.js";
import { type SessionBinding, SessionBindings, originRequiresVersionCheck } from "../auth/sessionBinding.js";
import { enforceTaskScope } from "../auth/taskScope.js";
import { type CoreSettings, type CoreSettingsInput, resolveSettings } from "../config/settings.js";
import { EventBus } from "../events/bus.js";
import { IdempotencyRegistry, fingerprintRequest } from "../infra/idempotency.js";
import { runWithRequestContext } from "../infra/requestContext.js";
import { createJobActionExecutor } from "../jobs/actions.js";
import { JobService } from "../jobs/jobService.js";
import { StructuredLogger } from "../logger.js";
import { MergeCoordinator } from "../merge/coordinator.js";
import type { ExecutionStore, GitAdapter, MergeLedger, SessionService, TaskStore, WorkspaceService } from "../ports.js";
import { type CoreRequest, CoreRequestSchema, type CoreResponse } from "../rpc/contracts.js";
import { CoreError, type CoreErrorPayload, fromZodError, toCoreErrorPayload } from "../rpc/errors.js";
import { AutoOutputCoordinator } from "../runtime/autoOutput.js";
import { type AgentLauncher, RegistryAutomationService } from "../runtime/automation.js";
import { RuntimeRegistry } from "../runtime/registry.js";
import { KeyedLocks } from "../runtime/taskLocks.js";
import { OperationAbortedError } from "../runtime/timers.js";
import { InMemoryExecutionStore } from "../stores/memoryExecutionStore.js";
import { InMemoryMergeLedger } from "../stores/memoryMergeLedger.js";
import { InMemoryTaskStore } from "../stores/memoryTaskStore.js";
import { AuditTrail } from "./audit.js";
import { type DispatchHandler, type HostServices, createDispatchMap } from "./dispatchMap.js";
import { ReviewApprovals } from "./reviewState.js";

/** Response body without the request id, as stored for idempotent replay. */
interface DispatchOutcome {
  ok: boolean;
  result?: unknown;
  error?: CoreErrorPayload;
}

export interface CoreHostOptions {
  bindings?: SessionBindings;
  /** Monotonic clock in milliseconds, used for request durations and idempotency TTLs. */
  clock?: () => number;
}

export interface HandleRequestOptions {
  signal?: AbortSignal;
}

function versionMismatch(clientVersion: string | undefined, coreVersion: string): CoreError | null {
  const reported = clientVersion?.trim() ?? "";
  if (reported.length === 0) {
    return new CoreError(
      "MCP_OUTDATED",
      "MCP client did not report its version. Restart the MCP client/session to load the latest lanekeeper package.",
    );
  }
  if (reported !== coreVersion) {
    return new CoreError(
      "MCP_OUTDATED",
      `MCP client version '${reported}' does not match core version '${coreVersion}'. Restart the MCP client/session.`,
    );
  }
  return null;
}

/**
 * Request boundary of the core. Every request is bound to its session,
 * authorized, fenced to the session task, version-checked for agent lanes,
 * dispatched (with idempotent replay for mutating calls) and audited,
 * denials included.
 */
export class CoreHost {
  readonly services: HostServices;
  private readonly bindings: SessionBindings;
  private readonly handlers: ReadonlyMap<string, DispatchHandler>;
  private readonly idempotency: IdempotencyRegistry<DispatchOutcome>;
  private readonly clock: () => number;

  constructor(services: HostServices, options: CoreHostOptions = {}) {
    this.services = services;
    this.bindings = options.bindings ?? new SessionBindings();
    this.handlers = createDispatchMap(services);
    this.clock = options.clock ?? (() => Date.now());
    this.idempotency = new IdempotencyRegistry<DispatchOutcome>({
      defaultTtlMs: services.settings.idempotencyTtlMs,
      clock: this.clock,
    });
  }

  registerSession(sessionId: string, profile: string): SessionBinding {
    return this.bindings.register(sessionId, profile);
  }

  unregisterSession(sessionId: string): void {
    this.bindings.unregister(sessionId);
  }

  listHandlers(): DispatchHandler[] {
    return [...this.handlers.values()];
  }

  /** Re-derives the runtime views from the executions persisted as RUNNING. */
  async reconcileRuntime(): Promise<void> {
    const tasks = await this.services.tasks.list();
    await this.services.registry.reconcileRunningTasks(tasks.map((task) => task.id));
  }

  async handleRequest(input: unknown, options: HandleRequestOptions = {}): Promise<CoreResponse> {
    const startedAt = this.clock();
    const parsed = CoreRequestSchema.safeParse(input);
    if (!parsed.success) {
      const error = toCoreErrorPayload(fromZodError(parsed.error, "request"));
      this.services.logger?.warn("request_rejected", { code: error.code, message: error.message });
      return { requestId: randomUUID(), ok: false, error };
    }

    const request = parsed.data;
    const requestId = request.requestId ?? randomUUID();
    let binding: SessionBinding | null = null;
    let outcome: DispatchOutcome;
    try {
      binding = this.bindings.resolve(request);
      const bound = binding;
      bound.policy.enforce(request.capability, request.method);
      enforceTaskScope(request, bound, { resolveJobOwner: (jobId) => this.services.jobs.ownerOf(jobId) });
      if (originRequiresVersionCheck(bound.origin)) {
        const mismatch = versionMismatch(request.clientVersion, this.services.settings.coreVersion);
        if (mismatch) {
          throw mismatch;
        }
      }
      const call = protocolCall(request.capability, request.method);
      const handler = this.handlers.get(call);
      if (!handler) {
        throw new CoreError("UNKNOWN_METHOD", `Unknown method ${call}`);
      }
      outcome = await runWithRequestContext({ requestId, sessionId: request.sessionId, method: call }, () =>
        this.dispatch(handler, request, bound, options.signal),
      );
    } catch (error) {
      outcome = { ok: false, error: toCoreErrorPayload(error) };
      if (error instanceof CoreError && error.code === "AUTHORIZATION_DENIED") {
        this.services.events.publish({
          cat: "auth",
          kind: "AUTHORIZATION_DENIED",
          level: "warn",
          msg: error.message,
          data: { session_id: request.sessionId, call: protocolCall(request.capability, request.method) },
        });
      }
    }

    this.services.audit.record({
      requestId,
      sessionId: request.sessionId,
      profile: binding?.policy.profile ?? null,
      origin: binding?.origin ?? null,
      capability: request.capability,
      method: request.method,
      ok: outcome.ok,
      errorCode: outcome.error?.code ?? null,
      durationMs: Math.max(0, this.clock() - startedAt),
    });
    return { requestId, ...outcome };
  }

  private async dispatch(
    handler: DispatchHandler,
    request: CoreRequest,
    binding: SessionBinding,
    signal: AbortSignal | undefined,
  ): Promise<DispatchOutcome> {
    const invoke = () => this.invoke(handler, request, binding, signal);
    if (!handler.mutating || request.idempotencyKey === undefined) {
      return invoke();
    }
    const key = `${request.sessionId}:${request.idempotencyKey}`;
    const fingerprint = fingerprintRequest(handler.call, request.params);
    const hit = await this.idempotency.remember(key, fingerprint, invoke);
    if (hit.idempotent) {
      this.services.logger?.info("request_replayed", { session_id: request.sessionId, call: handler.call });
    }
    return hit.value;
  }

  /**
   * Handler failures are folded into the outcome so replay returns them too.
   * Cancellations are rethrown instead: a retry under the same idempotency
   * key must run again.
   */
  private async invoke(
    handler: DispatchHandler,
    request: CoreRequest,
    binding: SessionBinding,
    signal: AbortSignal | undefined,
  ): Promise<DispatchOutcome> {
    try {
      const result = await handler.run(request.params, {
        sessionId: request.sessionId,
        scopedTaskId: binding.namespace === "task" ? binding.scopeId : null,
        signal,
      });
      return { ok: true, result };
    } catch (error) {
      if (error instanceof OperationAbortedError) {
        this.services.logger?.info("request_cancelled", {
          session_id: request.sessionId,
          call: handler.call,
          message: error.message,
        });
        throw new CoreError("REQUEST_CANCELLED", error.message, { cause: error });
      }
      const payload = toCoreErrorPayload(error);
      if (payload.code === "INTERNAL_ERROR") {
        this.services.logger?.error("request_failed", {
          session_id: request.sessionId,
          call: handler.call,
          message: payload.message,
        });
      }
      return { ok: false, error: payload };
    }
  }
}

export interface CreateCoreHostOptions {
  settings?: CoreSettings | CoreSettingsInput;
  workspaces: WorkspaceService;
  sessions: SessionService;
  launcher: AgentLauncher;
  git?: GitAdapter;
  tasks?: TaskStore;
  executions?: ExecutionStore;
  ledger?: MergeLedger;
  logger?: StructuredLogger;
  events?: EventBus;
  bindings?: SessionBindings;
  now?: () => Date;
  clock?: () => number;
}

/**
 * Wires the default collaborators around the supplied boundaries. Stores
 * default to the in-memory implementations.
 */
export function createCoreHost(options: CreateCoreHostOptions): CoreHost {
  const settings = resolveSettings(options.settings ?? {});
  const logger = options.logger ?? new StructuredLogger({ logFile: settings.logFile });
  const events = options.events ?? new EventBus();
  const now = options.now ?? (() => new Date());
  const tasks = options.tasks ?? new InMemoryTaskStore({ clock: now });
  const executions = options.executions ?? new InMemoryExecutionStore({ clock: now });
  const locks = new KeyedLocks();
  const registry = new RuntimeRegistry({ executions, logger, now });
  const automation = new RegistryAutomationService({ registry, launcher: options.launcher, logger });
  const autoOutput = new AutoOutputCoordinator({
    registry,
    executions,
    locks,
    resolveAutomation: () => automation,
    logger,
    attachTimeoutMs: settings.outputAttachTimeoutMs,
    now,
  });
  const merges = new MergeCoordinator({
    tasks,
    workspaces: options.workspaces,
    sessions: options.sessions,
    automation,
    locks,
    settings,
    events,
    git: options.git,
    ledger: options.ledger ?? new InMemoryMergeLedger(),
    logger,
    now,
  });
  const jobs = new JobService({
    executor: createJobActionExecutor({ tasks, registry, automation, merges, autoOutput }),
    events,
    logger,
    waitMaxMs: settings.jobWaitMaxMs,
    pollMs: settings.jobPollMs,
    now,
  });

  return new CoreHost(
    {
      tasks,
      executions,
      registry,
      autoOutput,
      merges,
      automation,
      sessions: options.sessions,
      jobs,
      audit: new AuditTrail({ limit: settings.auditLimit, logger, now }),
      reviews: new ReviewApprovals(now),
      events,
      settings,
      logger,
    },
    { bindings: options.bindings, clock: options.clock },
  );
}
