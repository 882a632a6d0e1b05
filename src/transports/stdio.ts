import { randomUUID } from "node:crypto";
import type { Readable, Writable } from "node:stream";

import { ReadBuffer } from "@modelcontextprotocol/sdk/shared/stdio.js";

import type { ExecutionBroker } from "../broker/executionBroker.js";
import type { AuthGate } from "../http/auth.js";
import type { StructuredLogger } from "../logger.js";
import type { ProtocolRouter } from "../router/protocolRouter.js";
import { AuthError, InvalidRequestError, ParseError, toJsonRpc, type JsonRpcError } from "../rpc/errors.js";
import type { JsonRpcResponse } from "../rpc/types.js";

export interface StdioBridgeOptions {
  readonly router: Pick<ProtocolRouter, "dispatch">;
  readonly broker: Pick<ExecutionBroker, "cancelSession">;
  readonly auth: AuthGate;
  /** Token the bridge presents when it starts. */
  readonly token?: string;
  readonly input: Readable;
  readonly output: Writable;
  readonly logger: Pick<StructuredLogger, "debug" | "info" | "warn" | "error">;
  readonly sessionId?: string;
}

type DecodedLine = { readonly ok: true; readonly message: unknown } | { readonly ok: false; readonly error: JsonRpcError };

/**
 * Line-delimited JSON-RPC over a pair of pipes. Messages are answered strictly
 * in arrival order; a malformed line gets an error response and the pipe stays
 * open. Jobs started through the bridge belong to its session and are
 * cancelled when the bridge closes.
 */
export class StdioBridge {
  readonly sessionId: string;
  private readonly options: StdioBridgeOptions;
  private readonly readBuffer = new ReadBuffer();
  private readonly controller = new AbortController();
  private pending: Promise<void> = Promise.resolve();
  private started = false;
  private closed = false;
  private closedWaiters: Array<() => void> = [];

  private readonly onData = (chunk: Buffer | string): void => {
    this.readBuffer.append(typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk);
    for (let decoded = this.nextLine(); decoded; decoded = this.nextLine()) {
      const line = decoded;
      this.pending = this.pending.then(() => this.handle(line));
    }
  };

  private readonly onEnd = (): void => {
    this.pending = this.pending.then(() => this.close("input_closed"));
  };

  private readonly onInputError = (error: Error): void => {
    this.options.logger.error("stdio_input_failed", { session_id: this.sessionId, message: error.message });
    this.close("input_error");
  };

  constructor(options: StdioBridgeOptions) {
    this.options = options;
    this.sessionId = options.sessionId ?? `stdio-${randomUUID()}`;
  }

  get isOpen(): boolean {
    return this.started && !this.closed;
  }

  /**
   * Verifies the start token and begins reading. Returns `false` when the gate
   * refused the token, after writing one error line and closing.
   */
  async start(): Promise<boolean> {
    if (this.started) {
      throw new Error("stdio bridge already started");
    }
    this.started = true;
    const decision = this.options.auth.verify(this.options.token);
    if (!decision.ok) {
      this.options.logger.warn("stdio_auth_rejected", { session_id: this.sessionId, reason: decision.reason });
      await this.write(toJsonRpc(null, new AuthError("Authentication required", { hint: decision.reason })));
      this.close("auth_rejected");
      return false;
    }
    this.options.input.on("data", this.onData);
    this.options.input.on("end", this.onEnd);
    this.options.input.on("error", this.onInputError);
    this.options.logger.info("stdio_bridge_started", { session_id: this.sessionId });
    return true;
  }

  /** Resolves once every line read so far has been answered. */
  idle(): Promise<void> {
    return this.pending;
  }

  /** Resolves when the bridge is closed. */
  closedSignal(): Promise<void> {
    if (this.closed) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.closedWaiters.push(resolve);
    });
  }

  close(reason = "closed"): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.options.input.off("data", this.onData);
    this.options.input.off("end", this.onEnd);
    this.options.input.off("error", this.onInputError);
    this.readBuffer.clear();
    const cancelled = this.options.broker.cancelSession(this.sessionId);
    this.controller.abort();
    this.options.logger.info("stdio_bridge_closed", { session_id: this.sessionId, reason, cancelled_jobs: cancelled });
    const waiters = this.closedWaiters;
    this.closedWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }

  private nextLine(): DecodedLine | null {
    try {
      const message = this.readBuffer.readMessage();
      return message === null ? null : { ok: true, message };
    } catch (error) {
      if (error instanceof SyntaxError) {
        return { ok: false, error: new ParseError("Parse error", { requestId: null, hint: error.message }) };
      }
      return {
        ok: false,
        error: new InvalidRequestError("Invalid Request", { requestId: null, hint: "not a JSON-RPC 2.0 message" }),
      };
    }
  }

  private async handle(line: DecodedLine): Promise<void> {
    if (this.closed) {
      return;
    }
    if (!line.ok) {
      this.options.logger.warn("stdio_malformed_line", { session_id: this.sessionId, code: line.error.code });
      await this.write(toJsonRpc(null, line.error));
      return;
    }
    try {
      const response = await this.options.router.dispatch(line.message, {
        transport: "stdio",
        sessionId: this.sessionId,
        signal: this.controller.signal,
      });
      if (response && !this.closed) {
        await this.write(response);
      }
    } catch (error) {
      this.options.logger.error("stdio_dispatch_failed", {
        session_id: this.sessionId,
        message: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private write(response: JsonRpcResponse): Promise<void> {
    const { output } = this.options;
    return new Promise((resolve) => {
      output.write(`${JSON.stringify(response)}\n`, (error) => {
        if (error) {
          this.options.logger.error("stdio_write_failed", { session_id: this.sessionId, message: error.message });
        }
        resolve();
      });
    });
  }
}
