import { describe, it } from "mocha";
import { expect } from "chai";

import { assertPlainObject, assertString } from "./helpers/assertions.js";
import { createHostHarness, resultOf } from "./helpers/hostHarness.js";

describe("core host request pipeline", () => {
  it("rejects malformed envelopes before binding a session", async () => {
    const harness = createHostHarness();

    const response = await harness.host.handleRequest({ capability: "tasks", method: "list" });

    expect(response.ok).to.equal(false);
    expect(response.requestId).to.be.a("string").and.not.equal("");
    expect(response.error?.code).to.equal("INVALID_PARAMS");
    expect(response.error?.message).to.equal("Invalid params for request (sessionId: Required)");
    expect(harness.host.services.audit.size()).to.equal(0);
    expect(harness.recording.find("request_rejected")?.payload).to.deep.equal({
      code: "INVALID_PARAMS",
      message: "Invalid params for request (sessionId: Required)",
    });
  });

  it("binds unknown sessions as viewers and audits the denial", async () => {
    const harness = createHostHarness();

    const response = await harness.host.handleRequest({
      requestId: "req-1",
      sessionId: "kiosk",
      capability: "tasks",
      method: "create",
      params: { title: "Add login form" },
    });

    expect(response).to.deep.equal({
      requestId: "req-1",
      ok: false,
      error: { code: "AUTHORIZATION_DENIED", message: "Profile 'viewer' is not authorized for tasks.create" },
    });
    const [entry] = harness.host.services.audit.list();
    expect(entry).to.include({
      requestId: "req-1",
      sessionId: "kiosk",
      profile: "viewer",
      origin: "legacy",
      ok: false,
      errorCode: "AUTHORIZATION_DENIED",
      durationMs: 0,
    });
    const [denied] = harness.events.list({ cats: ["auth"] });
    expect(denied).to.include({ kind: "AUTHORIZATION_DENIED", level: "warn" });
    expect(denied.data).to.deep.equal({ session_id: "kiosk", call: "tasks.create" });
    expect(await harness.tasks.list()).to.deep.equal([]);
  });

  it("audits binding failures without a profile", async () => {
    const harness = createHostHarness();

    const response = await harness.call("tasks", "list", {}, { sessionOrigin: "kagan_admin" });

    expect(response.error?.code).to.equal("SESSION_NAMESPACE_DENIED");
    const [entry] = harness.host.services.audit.list();
    expect(entry).to.include({ profile: null, origin: null, ok: false, errorCode: "SESSION_NAMESPACE_DENIED" });
  });

  it("requires agent lanes to report the core version", async () => {
    const harness = createHostHarness();
    const agent = { sessionId: "task:T-1", sessionProfile: "pair_worker", sessionOrigin: "kagan" };

    const missing = await harness.call("tasks", "get", { task_id: "T-1" }, agent);
    const stale = await harness.call("tasks", "get", { task_id: "T-1" }, { ...agent, clientVersion: "0.0.9" });
    const current = await harness.call("tasks", "get", { task_id: "T-1" }, { ...agent, clientVersion: "0.1.0" });

    expect(missing.error).to.deep.equal({
      code: "MCP_OUTDATED",
      message:
        "MCP client did not report its version. Restart the MCP client/session to load the latest lanekeeper package.",
    });
    expect(stale.error).to.deep.equal({
      code: "MCP_OUTDATED",
      message: "MCP client version '0.0.9' does not match core version '0.1.0'. Restart the MCP client/session.",
    });
    expect(resultOf(current).code).to.equal("TASK_NOT_FOUND");
    expect(harness.host.services.audit.list()[0]).to.include({ profile: "pair_worker", origin: "kagan" });
  });

  it("skips the version check on the legacy lane", async () => {
    const harness = createHostHarness();

    const response = await harness.call("tasks", "list");

    expect(response.ok).to.equal(true);
  });

  it("fences task sessions to their own task", async () => {
    const harness = createHostHarness();
    await harness.call("tasks", "create", { title: "Add login form", task_type: "AUTO" });
    await harness.call("tasks", "create", { title: "Add signup form" });
    const agent = { sessionId: "task:T-1", sessionProfile: "pair_worker" };

    const foreign = await harness.call("tasks", "update_scratchpad", { task_id: "T-2", content: "x" }, agent);
    expect(foreign.error).to.deep.equal({
      code: "SESSION_SCOPE_DENIED",
      message: "Session 'task:T-1' is scoped to task 'T-1' and cannot mutate task 'T-2'",
    });

    const own = await harness.call("tasks", "update_scratchpad", { task_id: "T-1", content: "plan" }, agent);
    expect(resultOf(own)).to.deep.equal({ success: true, task_id: "T-1" });
  });

  it("keeps task sessions away from the terminal sessions of other tasks", async () => {
    const harness = createHostHarness();
    await harness.call("tasks", "create", { title: "Add login form" });
    await harness.call("tasks", "create", { title: "Add signup form" });
    const agent = { sessionId: "task:T-1", sessionProfile: "pair_worker", sessionOrigin: "kagan", clientVersion: "0.1.0" };

    const kill = await harness.call("sessions", "kill", { task_id: "T-2" }, agent);
    const exists = await harness.call("sessions", "exists", { task_id: "T-2" }, agent);

    expect(kill.error).to.deep.equal({
      code: "SESSION_SCOPE_DENIED",
      message: "Session 'task:T-1' is scoped to task 'T-1' and cannot mutate task 'T-2'",
    });
    expect(exists.error?.code).to.equal("SESSION_SCOPE_DENIED");
    expect(harness.sessions.killed).to.deep.equal([]);

    const own = await harness.call("sessions", "kill", { task_id: "T-1" }, agent);
    expect(resultOf(own)).to.deep.equal({ success: true, task_id: "T-1" });
    expect(harness.sessions.killed).to.deep.equal(["T-1"]);
  });

  it("resolves job calls of task sessions through the job owner", async () => {
    const harness = createHostHarness();
    await harness.call("tasks", "create", { title: "Add login form", task_type: "AUTO" });
    await harness.call("tasks", "create", { title: "Add signup form" });
    const agent = { sessionId: "task:T-1", sessionProfile: "pair_worker" };

    const submitted = resultOf(await harness.call("jobs", "submit", { task_id: "T-1", action: "start_agent" }, agent));
    assertPlainObject(submitted.job, "submitted job");
    const jobId = submitted.job.job_id;
    assertString(jobId, "job id");

    const waited = resultOf(await harness.call("jobs", "wait", { job_id: jobId, timeout_ms: 500 }, agent));
    assertPlainObject(waited.job, "waited job");
    expect(waited.job).to.include({ task_id: "T-1", status: "succeeded" });

    const other = resultOf(await harness.call("jobs", "submit", { task_id: "T-2", action: "stop_agent" }));
    assertPlainObject(other.job, "foreign job");
    const otherId = other.job.job_id;
    assertString(otherId, "foreign job id");
    expect((await harness.call("jobs", "get", { job_id: otherId }, agent)).error?.code).to.equal("SESSION_SCOPE_DENIED");
  });

  it("reports cancelled requests without storing them for replay", async () => {
    const harness = createHostHarness();
    await harness.call("tasks", "create", { title: "Add login form" });
    await harness.call("tasks", "move", { task_id: "T-1", status: "REVIEW" });
    const request = {
      sessionId: "laptop",
      sessionProfile: "maintainer",
      capability: "review",
      method: "merge",
      params: { task_id: "T-1" },
      idempotencyKey: "merge-1",
    };
    const controller = new AbortController();
    controller.abort();

    const cancelled = await harness.host.handleRequest(request, { signal: controller.signal });

    expect(cancelled.error).to.deep.equal({ code: "REQUEST_CANCELLED", message: "lock merge:T-1 aborted" });
    expect(harness.recording.find("request_cancelled")).to.include({ level: "info" });
    expect(harness.recording.find("request_failed")).to.equal(undefined);
    expect(harness.host.services.audit.list({ limit: 1 })[0]).to.include({ ok: false, errorCode: "REQUEST_CANCELLED" });

    const retried = await harness.host.handleRequest(request);
    expect(resultOf(retried)).to.deep.equal({
      success: false,
      message: "Workspace not found for task T-1",
      task_id: "T-1",
      code: "MERGE_FAILED",
    });
  });

  it("reports unexpected handler failures as internal errors", async () => {
    const harness = createHostHarness();
    await harness.call("tasks", "create", { title: "Add login form" });
    harness.executions.close();

    const response = await harness.call("tasks", "logs", { task_id: "T-1" });

    expect(response.error).to.deep.equal({ code: "INTERNAL_ERROR", message: "execution store is closing" });
    expect(harness.recording.find("request_failed")?.payload).to.deep.equal({
      session_id: "laptop",
      call: "tasks.logs",
      message: "execution store is closing",
    });
  });

  it("binds pre-registered sessions to their profile", async () => {
    const harness = createHostHarness();
    harness.host.registerSession("ci", "operator");

    const created = await harness.host.handleRequest({
      sessionId: "ci",
      capability: "tasks",
      method: "create",
      params: { title: "Add login form" },
    });
    const merge = await harness.host.handleRequest({
      sessionId: "ci",
      capability: "review",
      method: "merge",
      params: { task_id: "T-1" },
    });

    expect(created.ok).to.equal(true);
    expect(merge.error?.code).to.equal("AUTHORIZATION_DENIED");

    harness.host.unregisterSession("ci");
    const rebound = await harness.host.handleRequest({ sessionId: "ci", capability: "tasks", method: "list" });
    expect(rebound.ok).to.equal(true);
    expect(harness.host.services.audit.list({ limit: 1 })[0].profile).to.equal("viewer");
  });

  it("rebuilds runtime views from executions persisted as running", async () => {
    const harness = createHostHarness();
    await harness.call("tasks", "create", { title: "Add login form", task_type: "AUTO" });
    harness.executions.startExecution("T-1", "exec-1");

    await harness.host.reconcileRuntime();

    expect(harness.host.services.registry.get("T-1")).to.include({ phase: "running", executionId: "exec-1" });
  });
});
