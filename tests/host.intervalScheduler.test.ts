import { afterEach, beforeEach, describe, it } from "mocha";
import { expect } from "chai";
import sinon from "sinon";

import { ExecutionLoop, type LoopTickContext } from "../src/executor/loop.js";
import { IntervalTickScheduler } from "../src/host/intervalScheduler.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";

describe("execution loop", () => {
  let clock: sinon.SinonFakeTimers;

  beforeEach(() => {
    clock = sinon.useFakeTimers({ toFake: ["setInterval", "clearInterval", "Date"] });
  });

  afterEach(() => {
    clock.restore();
  });

  it("ticks on its cadence with increasing indexes", () => {
    const contexts: LoopTickContext[] = [];
    const loop = new ExecutionLoop({ intervalMs: 50, budgetMs: 10, tick: (context) => contexts.push(context) });

    loop.start();
    clock.tick(160);
    loop.stop();
    clock.tick(100);

    expect(contexts.map((context) => context.tickIndex)).to.deep.equal([0, 1, 2]);
    expect(contexts.map((context) => context.startedAt)).to.deep.equal([50, 100, 150]);
    expect(contexts[0]?.budgetMs).to.equal(10);
    expect(loop.tickCount).to.equal(3);
  });

  it("refuses to start twice", () => {
    const loop = new ExecutionLoop({ intervalMs: 10, tick: () => undefined });
    loop.start();

    expect(() => loop.start()).to.throw("ExecutionLoop already started");
    loop.stop();
  });

  it("reports tick failures to the error hook and keeps ticking", () => {
    const errors: unknown[] = [];
    let ticks = 0;
    const loop = new ExecutionLoop({
      intervalMs: 10,
      tick: () => {
        ticks += 1;
        throw new Error(`tick ${ticks}`);
      },
      onError: (error) => errors.push(error),
    });

    loop.start();
    clock.tick(20);
    loop.stop();

    expect(errors.map((error) => (error instanceof Error ? error.message : error))).to.deep.equal([
      "tick 1",
      "tick 2",
    ]);
  });
});

describe("interval tick scheduler", () => {
  let clock: sinon.SinonFakeTimers;

  beforeEach(() => {
    clock = sinon.useFakeTimers({ toFake: ["setInterval", "clearInterval"] });
  });

  afterEach(() => {
    clock.restore();
  });

  it("only calls the handler on ticks that were requested", () => {
    const scheduler = new IntervalTickScheduler({ intervalMs: 50, budgetMs: 20 });
    const budgets: number[] = [];
    const detach = scheduler.attach((budgetMs) => budgets.push(budgetMs));

    clock.tick(100);
    expect(budgets).to.deep.equal([]);

    scheduler.requestTick();
    scheduler.requestTick();
    clock.tick(100);

    expect(budgets).to.deep.equal([20]);
    expect(scheduler.tickCount).to.equal(4);
    detach();
  });

  it("stops ticking once detached", () => {
    const scheduler = new IntervalTickScheduler({ intervalMs: 50, budgetMs: 20 });
    let calls = 0;
    const detach = scheduler.attach(() => {
      calls += 1;
    });

    scheduler.requestTick();
    detach();
    clock.tick(200);

    expect(calls).to.equal(0);
    expect(scheduler.tickCount).to.equal(0);
  });

  it("accepts a single handler at a time", () => {
    const scheduler = new IntervalTickScheduler({ intervalMs: 50, budgetMs: 20 });
    const detach = scheduler.attach(() => undefined);

    expect(() => scheduler.attach(() => undefined)).to.throw("a tick handler is already attached");
    detach();
  });

  it("logs handler failures", () => {
    const logger = new RecordingLogger();
    const scheduler = new IntervalTickScheduler({ intervalMs: 10, budgetMs: 5, logger });
    const detach = scheduler.attach(() => {
      throw new Error("handler broke");
    });

    scheduler.requestTick();
    clock.tick(10);
    detach();

    expect(logger.named("host_tick_failed")[0]?.payload).to.deep.equal({ message: "handler broke" });
  });
});
