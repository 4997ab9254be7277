import type { CoreSettingsInput } from "../../src/config/settings.js";
import { EventBus } from "../../src/events/bus.js";
import { type CoreHost, createCoreHost } from "../../src/host/coreHost.js";
import type { CoreRequestInput, CoreResponse } from "../../src/rpc/contracts.js";
import { InMemoryExecutionStore } from "../../src/stores/memoryExecutionStore.js";
import { InMemoryTaskStore } from "../../src/stores/memoryTaskStore.js";
import { assertPlainObject } from "./assertions.js";
import {
  FIXED_NOW,
  FakeGitAdapter,
  FakeLauncher,
  FakeSessionService,
  FakeWorkspaceService,
  fixedClock,
} from "./fakes.js";
import { type RecordingLogger, createRecordingLogger } from "./recordingLogger.js";

export interface HostHarness {
  host: CoreHost;
  tasks: InMemoryTaskStore;
  executions: InMemoryExecutionStore;
  workspaces: FakeWorkspaceService;
  sessions: FakeSessionService;
  git: FakeGitAdapter;
  launcher: FakeLauncher;
  events: EventBus;
  recording: RecordingLogger;
  /** Sends a request on the `laptop` maintainer session unless `extra` overrides it. */
  call(
    capability: string,
    method: string,
    params?: Record<string, unknown>,
    extra?: Partial<CoreRequestInput>,
  ): Promise<CoreResponse>;
}

/**
 * Host wired to in-memory stores and fakes. Task ids are `T-1`, `T-2`, ...
 * and every wall-clock read returns {@link FIXED_NOW}.
 */
export function createHostHarness(settings: CoreSettingsInput = {}): HostHarness {
  let counter = 0;
  const tasks = new InMemoryTaskStore({ clock: fixedClock, idFactory: () => `T-${++counter}` });
  const executions = new InMemoryExecutionStore({ clock: fixedClock });
  const workspaces = new FakeWorkspaceService();
  const sessions = new FakeSessionService();
  const git = new FakeGitAdapter();
  const launcher = new FakeLauncher();
  const events = new EventBus({ now: () => FIXED_NOW.getTime() });
  const recording = createRecordingLogger();

  const host = createCoreHost({
    settings: {
      serializeMerges: false,
      mergeQuiesceTimeoutMs: 30,
      mergeQuiescePollMs: 5,
      outputAttachTimeoutMs: 20,
      jobPollMs: 2,
      jobWaitMaxMs: 1_000,
      ...settings,
    },
    workspaces,
    sessions,
    launcher,
    git,
    tasks,
    executions,
    logger: recording.logger,
    events,
    now: fixedClock,
    clock: () => FIXED_NOW.getTime(),
  });

  return {
    host,
    tasks,
    executions,
    workspaces,
    sessions,
    git,
    launcher,
    events,
    recording,
    call: (capability, method, params = {}, extra = {}) =>
      host.handleRequest({ sessionId: "laptop", sessionProfile: "maintainer", capability, method, params, ...extra }),
  };
}

/** Result body of a successful response. */
export function resultOf(response: CoreResponse): Record<string, unknown> {
  if (!response.ok) {
    throw new Error(`expected ok response, got ${response.error?.code ?? "no error"}: ${response.error?.message ?? ""}`);
  }
  assertPlainObject(response.result, "response result");
  return response.result;
}
