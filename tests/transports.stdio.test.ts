import { describe, it } from "mocha";
import { expect } from "chai";
import { PassThrough, Writable } from "node:stream";

import { AuthGate } from "../src/http/auth.js";
import { StdioBridge } from "../src/transports/stdio.js";
import { createEchoStack } from "./helpers/brokerStack.js";
import { flushMicrotasks } from "./helpers/tickScheduler.js";

/** Writable keeping each decoded response line. */
function lineCollector() {
  const lines: unknown[] = [];
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      for (const line of chunk.toString().split("\n")) {
        if (line) {
          lines.push(JSON.parse(line));
        }
      }
      callback();
    },
  });
  return { lines, stream };
}

function createBridge(options: { token?: string; presented?: string } = {}) {
  const stack = createEchoStack();
  const input = new PassThrough();
  const output = lineCollector();
  const bridge = new StdioBridge({
    router: stack.router,
    broker: stack.broker,
    auth: new AuthGate({ token: options.token ?? null }),
    token: options.presented,
    input,
    output: output.stream,
    logger: stack.logger,
    sessionId: "stdio-test",
  });
  return { ...stack, input, output, bridge };
}

describe("stdio bridge", () => {
  it("answers requests in order and keeps going after malformed lines", async () => {
    const { bridge, input, output } = createBridge();
    expect(await bridge.start()).to.equal(true);

    input.write('{"jsonrpc":"2.0","id":1,"method":"ping"}\n');
    input.write("not json\n");
    input.write('{"foo":1}\n');
    input.write('{"jsonrpc":"2.0","method":"notifications/initialized"}\n');
    input.end('{"jsonrpc":"2.0","id":2,"method":"ping"}\n');
    await bridge.closedSignal();

    expect(output.lines).to.have.length(4);
    expect(output.lines[0]).to.deep.equal({ jsonrpc: "2.0", id: 1, result: {} });
    expect(output.lines[1]).to.deep.nested.include({ id: null, "error.code": -32700, "error.message": "Parse error" });
    expect(output.lines[2]).to.deep.nested.include({
      id: null,
      "error.code": -32600,
      "error.data.hint": "not a JSON-RPC 2.0 message",
    });
    expect(output.lines[3]).to.deep.equal({ jsonrpc: "2.0", id: 2, result: {} });
    expect(bridge.isOpen).to.equal(false);
  });

  it("runs tools through the broker", async () => {
    const { bridge, input, output, scheduler } = createBridge();
    await bridge.start();

    input.write('{"jsonrpc":"2.0","id":"a","method":"tools/call","params":{"name":"echo","arguments":{"text":"hello"}}}\n');
    await flushMicrotasks();
    scheduler.runTick();
    await bridge.idle();

    expect(output.lines).to.deep.equal([
      { jsonrpc: "2.0", id: "a", result: { content: [{ type: "text", text: "hello\n" }], isError: false } },
    ]);
    bridge.close();
  });

  it("writes one error line and closes when the start token is refused", async () => {
    const { bridge, output, logger } = createBridge({ token: "test-secret" });

    expect(await bridge.start()).to.equal(false);

    expect(output.lines).to.deep.equal([
      {
        jsonrpc: "2.0",
        id: null,
        error: {
          code: -32001,
          message: "Authentication required",
          data: { category: "AUTH_REQUIRED", hint: "missing_token", status: 401 },
        },
      },
    ]);
    expect(bridge.isOpen).to.equal(false);
    expect(logger.named("stdio_bridge_closed")[0]?.payload).to.deep.include({ reason: "auth_rejected" });
  });

  it("accepts the configured token", async () => {
    const { bridge } = createBridge({ token: "test-secret", presented: "test-secret" });

    expect(await bridge.start()).to.equal(true);
    expect(bridge.isOpen).to.equal(true);
    bridge.close();
  });

  it("cancels the jobs it owns when it closes", async () => {
    const { bridge, input, output, broker, logger } = createBridge();
    await bridge.start();

    input.write('{"jsonrpc":"2.0","id":3,"method":"tools/call","params":{"name":"echo","arguments":{"text":"x"}}}\n');
    await flushMicrotasks();
    expect(broker.stats().live).to.equal(1);

    bridge.close("test");
    await bridge.idle();

    expect(broker.stats().live).to.equal(0);
    expect(output.lines).to.deep.equal([]);
    expect(logger.named("stdio_bridge_closed")[0]?.payload).to.deep.equal({
      session_id: "stdio-test",
      reason: "test",
      cancelled_jobs: 1,
    });
  });

  it("refuses to start twice", async () => {
    const { bridge } = createBridge();
    await bridge.start();

    let failure: unknown = null;
    try {
      await bridge.start();
    } catch (error) {
      failure = error;
    }
    expect(failure).to.be.instanceOf(Error);
    bridge.close();
  });
});
