import { describe, it } from "mocha";
import { expect } from "chai";
import sinon from "sinon";

import type { AutomationService } from "../src/ports.js";
import { AUTO_OUTPUT_MESSAGES, AutoOutputCoordinator } from "../src/runtime/autoOutput.js";
import { RegistryAutomationService } from "../src/runtime/automation.js";
import { RuntimeRegistry } from "../src/runtime/registry.js";
import { KeyedLocks } from "../src/runtime/taskLocks.js";
import { InMemoryExecutionStore } from "../src/stores/memoryExecutionStore.js";
import { FakeLauncher, fixedClock, makeTask } from "./helpers/fakes.js";
import { createRecordingLogger } from "./helpers/recordingLogger.js";

function setup(resolveAutomation?: (registry: RuntimeRegistry, launcher: FakeLauncher) => () => AutomationService | null) {
  const registry = new RuntimeRegistry();
  const executions = new InMemoryExecutionStore();
  const launcher = new FakeLauncher();
  const recording = createRecordingLogger();
  const automation = new RegistryAutomationService({ registry, launcher });
  const coordinator = new AutoOutputCoordinator({
    registry,
    executions,
    locks: new KeyedLocks(),
    resolveAutomation: resolveAutomation ? resolveAutomation(registry, launcher) : () => automation,
    logger: recording.logger,
    attachTimeoutMs: 20,
    now: fixedClock,
  });
  return { registry, executions, launcher, coordinator, recording };
}

function stubAutomation(overrides: Partial<AutomationService>): AutomationService {
  return {
    isRunning: () => false,
    isReviewing: () => false,
    stopTask: async () => false,
    spawnForTask: async () => true,
    waitForRunningAgent: async () => null,
    withMergeLock: (operation) => operation(),
    ...overrides,
  };
}

describe("stale auto output recovery", () => {
  it("refuses PAIR tasks", async () => {
    const { coordinator } = setup();
    const result = await coordinator.recoverStaleAutoOutput(makeTask({ taskType: "PAIR" }));
    expect(result).to.deep.equal({ success: false, message: AUTO_OUTPUT_MESSAGES.NON_AUTO });
  });

  it("is not required while the task is running", async () => {
    const { registry, executions, coordinator } = setup();
    executions.startExecution("T-1", "exec-1");
    registry.markStarted("T-1");

    const result = await coordinator.recoverStaleAutoOutput(makeTask());

    expect(result).to.deep.equal({ success: false, message: AUTO_OUTPUT_MESSAGES.STALE_RECOVERY_NOT_REQUIRED });
    expect((await executions.getExecution("exec-1"))?.status).to.equal("RUNNING");
  });

  it("is not required without a persisted execution", async () => {
    const { coordinator } = setup();
    const result = await coordinator.recoverStaleAutoOutput(makeTask());
    expect(result.message).to.equal(AUTO_OUTPUT_MESSAGES.STALE_RECOVERY_NOT_REQUIRED);
  });

  it("is not required when the RUNNING execution already has logs", async () => {
    const { executions, coordinator } = setup();
    executions.startExecution("T-1", "exec-1");
    executions.appendLog("exec-1", "step 1\n");

    const result = await coordinator.recoverStaleAutoOutput(makeTask());

    expect(result.message).to.equal(AUTO_OUTPUT_MESSAGES.STALE_RECOVERY_NOT_REQUIRED);
    expect((await executions.getExecution("exec-1"))?.status).to.equal("RUNNING");
  });

  it("kills the stale execution and starts a fresh agent", async () => {
    const { registry, executions, launcher, coordinator, recording } = setup();
    executions.startExecution("T-1", "exec-1");

    const result = await coordinator.recoverStaleAutoOutput(makeTask());

    expect(result).to.deep.equal({ success: true, message: AUTO_OUTPUT_MESSAGES.STALE_RECOVERED });
    expect(await executions.getExecution("exec-1")).to.deep.include({
      status: "KILLED",
      completedAt: "2026-03-01T12:00:00.000Z",
      error: AUTO_OUTPUT_MESSAGES.STALE_RECOVERY_ERROR,
    });
    expect(launcher.started).to.deep.equal(["T-1"]);
    expect(registry.get("T-1")?.runningAgent).to.deep.equal({ agentId: "agent-1" });
    expect(recording.messages()).to.include("auto_output_stale_execution_killed");
  });

  it("reports a refused respawn", async () => {
    const { executions, launcher, coordinator } = setup();
    executions.startExecution("T-1", "exec-1");
    launcher.mode = "refuse";

    const result = await coordinator.recoverStaleAutoOutput(makeTask());

    expect(result).to.deep.equal({ success: false, message: AUTO_OUTPUT_MESSAGES.STALE_SPAWN_FAILED });
    expect((await executions.getExecution("exec-1"))?.status).to.equal("KILLED");
  });

  it("reports a respawn that throws", async () => {
    const { executions, coordinator, recording } = setup(() => () =>
      stubAutomation({ spawnForTask: sinon.stub().rejects(new Error("agent binary missing")) }),
    );
    executions.startExecution("T-1", "exec-1");

    const result = await coordinator.recoverStaleAutoOutput(makeTask());

    expect(result.message).to.equal(AUTO_OUTPUT_MESSAGES.STALE_SPAWN_FAILED);
    expect(recording.find("auto_output_respawn_failed")?.payload).to.deep.equal({
      task_id: "T-1",
      message: "agent binary missing",
    });
  });

  it("reports a missing automation service", async () => {
    const { executions, coordinator } = setup(() => () => null);
    executions.startExecution("T-1", "exec-1");

    const result = await coordinator.recoverStaleAutoOutput(makeTask());

    expect(result).to.deep.equal({ success: false, message: AUTO_OUTPUT_MESSAGES.STALE_NO_AUTOMATION });
  });

  it("treats a failing automation resolver as missing", async () => {
    const { executions, coordinator, recording } = setup(() => () => {
      throw new Error("not wired yet");
    });
    executions.startExecution("T-1", "exec-1");

    const result = await coordinator.recoverStaleAutoOutput(makeTask());

    expect(result.message).to.equal(AUTO_OUTPUT_MESSAGES.STALE_NO_AUTOMATION);
    expect(recording.messages()).to.include("automation_resolve_failed");
  });

  it("reports a respawn that never produced a live runtime", async () => {
    const waitForRunningAgent = sinon.stub().resolves(null);
    const { executions, coordinator } = setup(() => () => stubAutomation({ waitForRunningAgent }));
    executions.startExecution("T-1", "exec-1");

    const result = await coordinator.recoverStaleAutoOutput(makeTask());

    expect(result).to.deep.equal({ success: false, message: AUTO_OUTPUT_MESSAGES.STALE_NO_LIVE_RUNTIME });
    sinon.assert.calledOnce(waitForRunningAgent);
    expect(waitForRunningAgent.firstCall.args[0]).to.equal("T-1");
    expect(waitForRunningAgent.firstCall.args[1]).to.deep.include({ timeoutMs: 20 });
  });

  it("returns the cancellation message instead of throwing when aborted", async () => {
    const { executions, coordinator } = setup();
    executions.startExecution("T-1", "exec-1");
    const controller = new AbortController();
    controller.abort();

    const result = await coordinator.recoverStaleAutoOutput(makeTask(), controller.signal);

    expect(result).to.deep.equal({ success: false, message: AUTO_OUTPUT_MESSAGES.RECOVERY_ABORTED });
    expect((await executions.getExecution("exec-1"))?.status).to.equal("RUNNING");
  });

  it("returns a failure result when the store throws", async () => {
    const { executions, coordinator, recording } = setup();
    executions.startExecution("T-1", "exec-1");
    executions.close();

    const result = await coordinator.recoverStaleAutoOutput(makeTask());

    expect(result).to.deep.equal({
      success: false,
      message: "Stale output recovery failed: execution store is closing",
    });
    expect(recording.messages()).to.include("auto_output_recovery_failed");
  });
});
