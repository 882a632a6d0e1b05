/**
 * Context made available to every tick executed by the {@link ExecutionLoop}.
 * Ticks run synchronously: the loop models a cooperative host scheduler whose
 * callbacks must return promptly instead of awaiting.
 */
export interface LoopTickContext {
  /** Timestamp at which the tick started, according to {@link now}. */
  readonly startedAt: number;
  /** Clock provided to the loop (defaults to {@link Date.now}). */
  readonly now: () => number;
  /** Progressive number identifying the tick order (0-based). */
  readonly tickIndex: number;
  /** Budget (in ms) the tick should stay within. */
  readonly budgetMs: number;
}

/** Options accepted by the {@link ExecutionLoop} constructor. */
export interface ExecutionLoopOptions {
  /** Interval between two ticks, in milliseconds. */
  readonly intervalMs: number;
  /** Function executed at every tick. */
  readonly tick: (context: LoopTickContext) => void;
  /** Per-tick time budget advertised to the tick function. */
  readonly budgetMs?: number;
  /** Custom clock used for diagnostics (defaults to {@link Date.now}). */
  readonly now?: () => number;
  /** Error hook invoked when a tick throws. */
  readonly onError?: (error: unknown) => void;
  /** Injection points easing deterministic tests. */
  readonly setIntervalFn?: (handler: () => void, interval: number) => NodeJS.Timeout;
  readonly clearIntervalFn?: (handle: NodeJS.Timeout) => void;
}

/** Possible states of the execution loop. */
type LoopState = "idle" | "running";

/** Budget granted to a tick when the caller does not configure one. */
const DEFAULT_BUDGET_MS = 25;

/**
 * Periodic execution loop based on {@link setInterval}. The loop keeps track
 * of the executed tick count for diagnostics. A tick never overlaps another one because the tick function is
 * synchronous.
 */
export class ExecutionLoop {
  private readonly intervalMs: number;
  private readonly tick: (context: LoopTickContext) => void;
  private readonly now: () => number;
  private readonly budgetMs: number;
  private readonly setIntervalFn: (handler: () => void, interval: number) => NodeJS.Timeout;
  private readonly clearIntervalFn: (handle: NodeJS.Timeout) => void;
  private readonly onError?: (error: unknown) => void;

  private state: LoopState = "idle";
  private timer: NodeJS.Timeout | null = null;
  private tickCountInternal = 0;

  constructor(options: ExecutionLoopOptions) {
    this.intervalMs = Math.max(0, options.intervalMs);
    this.tick = options.tick;
    this.now = options.now ?? Date.now;
    this.budgetMs = Math.max(0, options.budgetMs ?? DEFAULT_BUDGET_MS);
    this.onError = options.onError;
    // Globals are resolved at call time so fake timers installed by tests apply.
    this.setIntervalFn = options.setIntervalFn ?? ((handler, interval) => setInterval(handler, interval));
    this.clearIntervalFn = options.clearIntervalFn ?? ((handle) => clearInterval(handle));
  }

  /** Total number of ticks executed so far. */
  get tickCount(): number {
    return this.tickCountInternal;
  }

  /** Starts the loop. Throws if already running. */
  start(): void {
    if (this.state !== "idle") {
      throw new Error("ExecutionLoop already started");
    }
    this.state = "running";
    this.arm();
  }

  /** Stops the loop. Safe to call repeatedly. */
  stop(): void {
    this.disarm();
    this.state = "idle";
  }

  private arm(): void {
    this.timer = this.setIntervalFn(() => {
      this.runTick();
    }, this.intervalMs);
    // The host loop must not keep the process alive on its own.
    this.timer.unref?.();
  }

  private disarm(): void {
    if (this.timer) {
      this.clearIntervalFn(this.timer);
      this.timer = null;
    }
  }

  private runTick(): void {
    if (this.state !== "running") {
      return;
    }
    const context: LoopTickContext = {
      startedAt: this.now(),
      now: this.now,
      tickIndex: this.tickCountInternal,
      budgetMs: this.budgetMs,
    };
    this.tickCountInternal += 1;

    try {
      this.tick(context);
    } catch (error) {
      if (this.onError) {
        this.onError(error);
      } else {
        queueMicrotask(() => {
          throw error instanceof Error ? error : new Error(String(error));
        });
      }
    }
  }
}
