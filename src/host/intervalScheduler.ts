import { ExecutionLoop, type LoopTickContext } from "../executor/loop.js";
import type { StructuredLogger } from "../logger.js";
import type { HostTickHandler, HostTickScheduler } from "./types.js";

export interface IntervalTickSchedulerOptions {
  /** Cadence of the host ticks. */
  readonly intervalMs: number;
  /** Budget advertised to the tick handler. */
  readonly budgetMs: number;
  readonly logger?: Pick<StructuredLogger, "error">;
  /** Injection points forwarded to the {@link ExecutionLoop}. */
  readonly setIntervalFn?: (handler: () => void, interval: number) => NodeJS.Timeout;
  readonly clearIntervalFn?: (handle: NodeJS.Timeout) => void;
}

/**
 * Host scheduler emulation backed by the {@link ExecutionLoop}. Ticks are
 * granted on a fixed cadence and only reach the attached handler after a tick
 * has been requested, mirroring a host timer registered "for the next pass".
 */
export class IntervalTickScheduler implements HostTickScheduler {
  private readonly loop: ExecutionLoop;
  private readonly logger?: Pick<StructuredLogger, "error">;
  private handler: HostTickHandler | null = null;
  private requested = false;

  constructor(options: IntervalTickSchedulerOptions) {
    this.logger = options.logger;
    this.loop = new ExecutionLoop({
      intervalMs: options.intervalMs,
      budgetMs: options.budgetMs,
      tick: (context) => this.onTick(context),
      onError: (error) => {
        this.logger?.error("host_tick_failed", {
          message: error instanceof Error ? error.message : String(error),
        });
      },
      setIntervalFn: options.setIntervalFn,
      clearIntervalFn: options.clearIntervalFn,
    });
  }

  /** Number of ticks the underlying loop has fired. */
  get tickCount(): number {
    return this.loop.tickCount;
  }

  attach(handler: HostTickHandler): () => void {
    if (this.handler) {
      throw new Error("a tick handler is already attached");
    }
    this.handler = handler;
    this.loop.start();
    return () => {
      if (this.handler === handler) {
        this.handler = null;
        this.requested = false;
        this.loop.stop();
      }
    };
  }

  requestTick(): void {
    this.requested = true;
  }

  private onTick(context: LoopTickContext): void {
    const handler = this.handler;
    if (!handler || !this.requested) {
      return;
    }
    this.requested = false;
    handler(context.budgetMs);
  }
}
