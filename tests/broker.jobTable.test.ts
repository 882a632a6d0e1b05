import { describe, it } from "mocha";
import { expect } from "chai";

import { JobTable, isTerminalState, type NewJob } from "../src/broker/jobTable.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";

function job(overrides: Partial<NewJob> = {}): NewJob {
  return {
    capability: { kind: "tool", name: "run_code" },
    payload: {},
    task: () => null,
    timeoutMs: 1_000,
    ...overrides,
  };
}

/** Table with a manual clock and sequential identifiers. */
function createTable(capacity: number, logger?: RecordingLogger) {
  let clock = 1_000;
  let counter = 0;
  const table = new JobTable({
    capacity,
    logger,
    now: () => clock,
    idFactory: () => `job-${++counter}`,
  });
  return {
    table,
    advance(ms: number) {
      clock += ms;
    },
  };
}

describe("job table", () => {
  it("rejects a non-positive capacity", () => {
    expect(() => new JobTable({ capacity: 0 })).to.throw(RangeError);
  });

  it("admits pending jobs with a deadline derived from the timeout", () => {
    const { table } = createTable(3);
    const { jobId, record, evicted } = table.admit(job({ timeoutMs: 250, correlationId: "req-1" }));

    expect(jobId).to.equal("job-1");
    expect(evicted).to.equal(null);
    expect(record.state).to.equal("pending");
    expect(record.deadline).to.equal(1_250);
    expect(record.correlationId).to.equal("req-1");
    expect(record.sessionId).to.equal(null);
    expect(table.size).to.equal(1);
  });

  it("evicts the oldest live job when the table is full", async () => {
    const logger = new RecordingLogger();
    const { table, advance } = createTable(2, logger);
    const first = table.admit(job());
    advance(5);
    table.admit(job());
    advance(5);

    const third = table.admit(job());

    expect(third.evicted?.id).to.equal(first.jobId);
    expect(table.get(first.jobId)).to.equal(undefined);
    expect(table.size).to.equal(2);
    expect(await first.record.completion).to.deep.equal({ state: "cancelled", reason: "evicted" });
    expect(logger.named("job_evicted")).to.have.length(1);
    expect(table.stats().evicted).to.equal(1);
  });

  it("breaks eviction ties on admission order", async () => {
    const { table } = createTable(2);
    const first = table.admit(job());
    const second = table.admit(job());

    table.admit(job());

    expect(table.get(first.jobId)).to.equal(undefined);
    expect(table.get(second.jobId)?.state).to.equal("pending");
    expect((await first.record.completion).state).to.equal("cancelled");
  });

  it("applies the first terminal transition and rejects later ones", async () => {
    const logger = new RecordingLogger();
    const { table } = createTable(2, logger);
    const { jobId, record } = table.admit(job());

    expect(table.transition(jobId, { state: "running" }).applied).to.equal(true);
    expect(table.transition(jobId, { state: "timed_out", timeoutMs: 1_000 }).applied).to.equal(true);
    const late = table.transition(jobId, { state: "completed", output: "late", value: null });

    expect(late).to.deep.include({ applied: false, reason: "already_terminal" });
    expect(await record.completion).to.deep.equal({ state: "timed_out", timeoutMs: 1_000 });
    expect(table.get(jobId)?.state).to.equal("timed_out");
    expect(table.stats().rejectedTransitions).to.equal(1);
    expect(logger.named("job_transition_rejected")).to.have.length(1);
  });

  it("refuses to complete a job that never started running", () => {
    const { table } = createTable(1);
    const { jobId } = table.admit(job());

    const result = table.transition(jobId, { state: "completed", output: "", value: null });

    expect(result).to.deep.include({ applied: false, reason: "invalid_transition" });
    expect(table.get(jobId)?.state).to.equal("pending");
  });

  it("reports transitions on unknown jobs", () => {
    const { table } = createTable(1);
    expect(table.transition("missing", { state: "running" })).to.deep.include({
      applied: false,
      reason: "unknown_job",
    });
  });

  it("lists pending jobs by deadline and skips expired ones", () => {
    const { table, advance } = createTable(5);
    const slow = table.admit(job({ timeoutMs: 500 }));
    const fast = table.admit(job({ timeoutMs: 100 }));
    const expired = table.admit(job({ timeoutMs: 10 }));
    advance(20);

    const due = table.pendingByDeadline().map((record) => record.id);

    expect(due).to.deep.equal([fast.jobId, slow.jobId]);
    expect(due).to.not.include(expired.jobId);
  });

  it("cancels live jobs before removing them", async () => {
    const { table } = createTable(2);
    const { jobId, record } = table.admit(job());

    expect(table.remove(jobId)).to.equal(true);
    expect(await record.completion).to.deep.equal({ state: "cancelled", reason: "removed" });
    expect(table.remove(jobId)).to.equal(false);
  });

  it("cancels matching jobs only", () => {
    const { table } = createTable(3);
    const a = table.admit(job({ sessionId: "s1" }));
    table.admit(job({ sessionId: "s2" }));
    const c = table.admit(job({ sessionId: "s1" }));

    const cancelled = table.cancelWhere((record) => record.sessionId === "s1", "client_disconnected");

    expect(cancelled).to.deep.equal([a.jobId, c.jobId]);
    expect(table.size).to.equal(1);
  });

  it("sweeps every record and releases live waiters as orphaned", async () => {
    const logger = new RecordingLogger();
    const { table } = createTable(3, logger);
    const live = table.admit(job());
    const done = table.admit(job());
    table.transition(done.jobId, { state: "cancelled", reason: "client_cancelled" });

    expect(table.sweep()).to.equal(2);
    expect(table.stats().tracked).to.equal(0);
    expect(await live.record.completion).to.deep.equal({ state: "cancelled", reason: "orphaned" });
    expect(logger.named("job_table_swept")[0]?.payload).to.deep.equal({ count: 2, reason: "orphaned" });
  });

  it("classifies terminal states", () => {
    expect(isTerminalState("pending")).to.equal(false);
    expect(isTerminalState("running")).to.equal(false);
    expect(isTerminalState("failed")).to.equal(true);
    expect(isTerminalState("cancelled")).to.equal(true);
  });
});
