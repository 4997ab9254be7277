import { describe, it } from "mocha";
import { expect } from "chai";

import { EventBus } from "../src/events/bus.js";
import { type JobActionResult, type JobExecutor, JobService } from "../src/jobs/jobService.js";
import { fixedClock } from "./helpers/fakes.js";
import { createRecordingLogger } from "./helpers/recordingLogger.js";

function sequentialIds(): () => string {
  let counter = 0;
  return () => `job-${++counter}`;
}

/** Executor whose runs stay pending until the test settles them. */
function controllableExecutor(): {
  executor: JobExecutor;
  settle(result: JobActionResult): void;
  signals: AbortSignal[];
} {
  const pending: Array<(result: JobActionResult) => void> = [];
  const signals: AbortSignal[] = [];
  return {
    signals,
    executor: (_action, _taskId, _params, signal) => {
      signals.push(signal);
      return new Promise<JobActionResult>((resolve) => {
        pending.push(resolve);
      });
    },
    settle(result) {
      pending.shift()?.(result);
    },
  };
}

describe("job service", () => {
  it("runs a job to success and records every transition", async () => {
    const events = new EventBus({ now: () => 0 });
    const jobs = new JobService({
      executor: async () => ({ success: true, message: "Merged all repos", code: "MERGED" }),
      events,
      idFactory: sequentialIds(),
      now: fixedClock,
      pollMs: 1,
    });

    const queued = jobs.submit("T-1", "merge", { note: "x" });
    expect(queued).to.include({ jobId: "job-1", status: "queued", message: "Job queued", code: "JOB_QUEUED" });

    const outcome = await jobs.wait("job-1", "T-1", { timeoutMs: 200 });

    expect(outcome?.timedOut).to.equal(false);
    expect(outcome?.job.status).to.equal("succeeded");
    expect(outcome?.job.result).to.deep.equal({ success: true, message: "Merged all repos", code: "MERGED" });
    expect(outcome?.job.params).to.deep.equal({ note: "x" });
    expect(jobs.events("job-1", "T-1")?.map((event) => event.code)).to.deep.equal(["JOB_QUEUED", "JOB_RUNNING", "MERGED"]);
    expect(events.list({ cats: ["job"] }).map((event) => event.kind)).to.deep.equal([
      "JOB_QUEUED",
      "JOB_RUNNING",
      "JOB_SUCCEEDED",
    ]);
  });

  it("marks unsuccessful results as failed", async () => {
    const events = new EventBus({ now: () => 0 });
    const jobs = new JobService({
      executor: async () => ({ success: false, message: "No running agent for this task", code: "NOT_RUNNING" }),
      events,
      idFactory: sequentialIds(),
      pollMs: 1,
    });

    jobs.submit("T-1", "stop_agent");
    const outcome = await jobs.wait("job-1", "T-1", { timeoutMs: 200 });

    expect(outcome?.job).to.include({ status: "failed", code: "NOT_RUNNING" });
    expect(events.list({ kinds: ["JOB_FAILED"] })[0].level).to.equal("warn");
  });

  it("turns executor exceptions into failed jobs", async () => {
    const recording = createRecordingLogger();
    const jobs = new JobService({
      executor: async () => {
        throw new Error("launcher crashed");
      },
      logger: recording.logger,
      idFactory: sequentialIds(),
      pollMs: 1,
    });

    jobs.submit("T-1", "start_agent");
    const outcome = await jobs.wait("job-1", "T-1", { timeoutMs: 200 });

    expect(outcome?.job.result).to.deep.equal({
      success: false,
      message: "launcher crashed",
      code: "JOB_EXECUTION_ERROR",
    });
    expect(recording.find("job_execution_failed")?.payload).to.deep.equal({
      job_id: "job-1",
      task_id: "T-1",
      action: "start_agent",
      message: "launcher crashed",
    });
  });

  it("cancels a running job and aborts its signal", async () => {
    const control = controllableExecutor();
    const jobs = new JobService({ executor: control.executor, idFactory: sequentialIds(), pollMs: 1 });

    jobs.submit("T-1", "merge");
    await jobs.wait("job-1", "T-1", { timeoutMs: 5 });
    const cancelled = jobs.cancel("job-1", "T-1");
    control.settle({ success: true, message: "Merged all repos", code: "MERGED" });
    await jobs.shutdown();

    expect(cancelled?.status).to.equal("cancelled");
    expect(cancelled?.result).to.deep.equal({ success: false, message: "Job cancelled", code: "JOB_CANCELLED" });
    expect(control.signals[0].aborted).to.equal(true);
    expect(jobs.get("job-1", "T-1")?.status).to.equal("cancelled");
  });

  it("never starts a job cancelled while queued", async () => {
    const control = controllableExecutor();
    const jobs = new JobService({ executor: control.executor, idFactory: sequentialIds(), concurrency: 1, pollMs: 1 });

    jobs.submit("T-1", "merge");
    jobs.submit("T-2", "merge");
    jobs.cancel("job-2", "T-2");
    await jobs.wait("job-1", "T-1", { timeoutMs: 5 });
    control.settle({ success: true, message: "Merged all repos", code: "MERGED" });
    await jobs.wait("job-1", "T-1", { timeoutMs: 200 });
    await jobs.shutdown();

    expect(control.signals).to.have.length(1);
    expect(jobs.events("job-2", "T-2")?.map((event) => event.status)).to.deep.equal(["queued", "cancelled"]);
  });

  it("reports a timed out wait with the job still in flight", async () => {
    const control = controllableExecutor();
    const jobs = new JobService({ executor: control.executor, idFactory: sequentialIds(), pollMs: 1 });

    jobs.submit("T-1", "merge");
    const outcome = await jobs.wait("job-1", "T-1", { timeoutMs: 10 });

    expect(outcome?.timedOut).to.equal(true);
    expect(outcome?.job.status).to.equal("running");
    control.settle({ success: true, message: "ok", code: "OK" });
    await jobs.shutdown();
  });

  it("caps waits at the configured maximum", async () => {
    const control = controllableExecutor();
    const jobs = new JobService({ executor: control.executor, idFactory: sequentialIds(), pollMs: 1, waitMaxMs: 10 });

    jobs.submit("T-1", "merge");
    const startedAt = Date.now();
    const outcome = await jobs.wait("job-1", "T-1", { timeoutMs: 60_000 });

    expect(outcome?.timedOut).to.equal(true);
    expect(Date.now() - startedAt).to.be.lessThan(1_000);
    control.settle({ success: true, message: "ok", code: "OK" });
    await jobs.shutdown();
  });

  it("forgets the oldest finished jobs beyond the retention limit", async () => {
    const control = controllableExecutor();
    const jobs = new JobService({ executor: control.executor, idFactory: sequentialIds(), pollMs: 1, retainFinished: 2 });

    jobs.submit("T-1", "merge");
    jobs.submit("T-2", "merge");
    jobs.submit("T-3", "merge");
    jobs.submit("T-4", "merge");
    await jobs.wait("job-4", "T-4", { timeoutMs: 5 });
    for (let index = 0; index < 3; index += 1) {
      control.settle({ success: true, message: "Merged all repos", code: "MERGED" });
    }
    await jobs.wait("job-3", "T-3", { timeoutMs: 200 });

    expect(jobs.get("job-1", "T-1")).to.equal(null);
    expect(jobs.ownerOf("job-1")).to.equal(null);
    expect(jobs.get("job-2", "T-2")?.status).to.equal("succeeded");
    expect(jobs.get("job-3", "T-3")?.status).to.equal("succeeded");
    expect(jobs.get("job-4", "T-4")?.status).to.equal("running");
  });

  it("scopes every lookup to the owning task", async () => {
    const jobs = new JobService({
      executor: async () => ({ success: true, message: "ok", code: "OK" }),
      idFactory: sequentialIds(),
    });

    jobs.submit("T-1", "merge");

    expect(jobs.ownerOf("job-1")).to.equal("T-1");
    expect(jobs.ownerOf("job-9")).to.equal(null);
    expect(jobs.get("job-1", "T-2")).to.equal(null);
    expect(jobs.events("job-1", "T-2")).to.equal(null);
    expect(jobs.cancel("job-1", "T-2")).to.equal(null);
    expect(await jobs.wait("job-1", "T-2")).to.equal(null);
    await jobs.shutdown();
  });

  it("returns copies that callers cannot mutate", () => {
    const jobs = new JobService({
      executor: async () => ({ success: true, message: "ok", code: "OK" }),
      idFactory: sequentialIds(),
    });

    const record = jobs.submit("T-1", "merge", { force: false });
    record.params.force = true;

    expect(jobs.get("job-1", "T-1")?.params).to.deep.equal({ force: false });
  });
});
