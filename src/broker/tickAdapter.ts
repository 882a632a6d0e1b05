import { inspect } from "node:util";

import type { StructuredLogger } from "../logger.js";
import type { HostExecutionContext, HostTickScheduler } from "../host/types.js";
import type { ExecutionFailure, JobRecord, JobTable } from "./jobTable.js";

/** Default cap on the captured output of a single job (2 MiB). */
export const DEFAULT_OUTPUT_LIMIT_BYTES = 2 * 1024 * 1024;

/** Summary of one {@link TickAdapter.pollOnce} pass. */
export interface TickReport {
  readonly executed: number;
  readonly completed: number;
  readonly failed: number;
  /** Due jobs left for a later tick because the budget ran out. */
  readonly deferred: number;
  readonly durationMs: number;
}

export interface TickAdapterOptions {
  readonly table: JobTable;
  readonly outputLimitBytes?: number;
  readonly logger?: Pick<StructuredLogger, "debug" | "info" | "warn">;
  readonly now?: () => number;
}

/**
 * Describes a thrown value as `{name, message}`. Values thrown from a
 * `node:vm` context come from another realm, so the check is structural.
 */
export function describeError(error: unknown): ExecutionFailure {
  if (typeof error === "object" && error !== null) {
    const name = "name" in error && typeof error.name === "string" ? error.name : "Error";
    const message = "message" in error && typeof error.message === "string" ? error.message : String(error);
    return { name, message };
  }
  return { name: "Error", message: String(error) };
}

/** Converts a task return value into something JSON can carry. `undefined` becomes `null`. */
export function toJsonValue(value: unknown): unknown {
  if (value === undefined) {
    return null;
  }
  try {
    const text = JSON.stringify(value);
    return text === undefined ? String(value) : JSON.parse(text);
  } catch {
    return String(value);
  }
}

/** Renders printed values the way a console would, one line per call. */
export function formatPrinted(values: readonly unknown[]): string {
  return `${values.map((value) => (typeof value === "string" ? value : inspect(value, { depth: 4 }))).join(" ")}\n`;
}

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    (typeof value === "object" || typeof value === "function") &&
    value !== null &&
    "then" in value &&
    typeof value.then === "function"
  );
}

/**
 * Accumulates printed output up to a byte limit and appends a truncation
 * notice when the limit was exceeded.
 */
export class OutputCapture {
  private readonly chunks: string[] = [];
  private keptBytes = 0;
  private totalBytes = 0;

  constructor(private readonly limitBytes: number = DEFAULT_OUTPUT_LIMIT_BYTES) {}

  write(text: string): void {
    const size = Buffer.byteLength(text, "utf8");
    this.totalBytes += size;
    if (this.keptBytes >= this.limitBytes) {
      return;
    }
    this.chunks.push(text);
    this.keptBytes += size;
  }

  get truncated(): boolean {
    return this.totalBytes > this.limitBytes;
  }

  text(): string {
    const joined = this.chunks.join("");
    if (!this.truncated) {
      return joined;
    }
    const head = Buffer.from(joined, "utf8").subarray(0, this.limitBytes).toString("utf8").replace(/\uFFFD$/u, "");
    return (
      `${head}\n\n[OUTPUT TRUNCATED]\n` +
      `Original size: ${this.totalBytes} bytes\n` +
      `Limit: ${this.limitBytes} bytes\n` +
      `Truncated: ${this.totalBytes - this.limitBytes} bytes\n`
    );
  }
}

/**
 * Single integration point with the host scheduler. Each granted tick drains
 * due pending jobs in deadline order and executes them synchronously on the
 * host context. The adapter never suspends and never imposes its own timeout:
 * deadlines are enforced by the broker.
 */
export class TickAdapter {
  private readonly table: JobTable;
  private readonly outputLimitBytes: number;
  private readonly logger?: Pick<StructuredLogger, "debug" | "info" | "warn">;
  private readonly now: () => number;
  private scheduler: HostTickScheduler | null = null;
  private detachScheduler: (() => void) | null = null;
  private polling = false;

  constructor(options: TickAdapterOptions) {
    this.table = options.table;
    this.outputLimitBytes = options.outputLimitBytes ?? DEFAULT_OUTPUT_LIMIT_BYTES;
    this.logger = options.logger;
    this.now = options.now ?? Date.now;
  }

  get attached(): boolean {
    return this.scheduler !== null;
  }

  /** Registers {@link pollOnce} as the scheduler's tick handler. */
  attach(scheduler: HostTickScheduler): () => void {
    if (this.scheduler) {
      throw new Error("tick adapter is already attached to a scheduler");
    }
    this.detachScheduler = scheduler.attach((budgetMs) => {
      this.pollOnce(budgetMs);
    });
    this.scheduler = scheduler;
    if (this.table.pendingByDeadline(this.now()).length > 0) {
      scheduler.requestTick();
    }
    return () => this.detach();
  }

  detach(): void {
    this.detachScheduler?.();
    this.detachScheduler = null;
    this.scheduler = null;
  }

  /** Asks the host for a tick. A no-op while detached; {@link attach} catches up. */
  requestTick(): void {
    this.scheduler?.requestTick();
  }

  /**
   * Runs one scan-and-execute pass. At least one due job executes per call;
   * once `budgetMs` has elapsed the remaining due jobs wait for the next tick,
   * which is requested before returning.
   */
  pollOnce(budgetMs: number): TickReport {
    if (this.polling) {
      throw new Error("pollOnce must not be re-entered from a running task");
    }
    this.polling = true;
    const startedAt = this.now();
    let executed = 0;
    let completed = 0;
    let failed = 0;
    let deferred = 0;
    try {
      const due = this.table.pendingByDeadline(startedAt);
      for (const [index, job] of due.entries()) {
        if (executed > 0 && this.now() - startedAt >= budgetMs) {
          deferred = due.length - index;
          break;
        }
        const outcome = this.execute(job);
        if (outcome === "skipped") {
          continue;
        }
        executed += 1;
        if (outcome === "completed") {
          completed += 1;
        } else {
          failed += 1;
        }
      }
    } finally {
      this.polling = false;
    }

    if (deferred > 0) {
      this.requestTick();
    }
    const report: TickReport = { executed, completed, failed, deferred, durationMs: this.now() - startedAt };
    if (executed > 0 || deferred > 0) {
      this.logger?.debug("tick_completed", { ...report, budget_ms: budgetMs });
    }
    return report;
  }

  private execute(job: JobRecord): "completed" | "failed" | "skipped" {
    if (!this.table.transition(job.id, { state: "running" }).applied) {
      return "skipped";
    }

    const capture = new OutputCapture(this.outputLimitBytes);
    const context: HostExecutionContext = {
      jobId: job.id,
      capability: job.capability,
      print: (...values) => capture.write(formatPrinted(values)),
    };
    const startedAt = this.now();

    let value: unknown;
    try {
      value = job.task(context);
    } catch (error) {
      return this.fail(job, capture, describeError(error), startedAt);
    }

    if (isPromiseLike(value)) {
      value.then(undefined, (error: unknown) => {
        this.logger?.warn("job_async_result_discarded", { job_id: job.id, error: describeError(error).message });
      });
      return this.fail(
        job,
        capture,
        { name: "ExecutionError", message: "host tasks must complete synchronously but returned a promise" },
        startedAt,
      );
    }

    const result = this.table.transition(job.id, {
      state: "completed",
      output: capture.text(),
      value: toJsonValue(value),
    });
    this.logger?.info("job_executed", {
      job_id: job.id,
      state: "completed",
      applied: result.applied,
      duration_ms: this.now() - startedAt,
      truncated: capture.truncated,
    });
    return "completed";
  }

  private fail(job: JobRecord, capture: OutputCapture, error: ExecutionFailure, startedAt: number): "failed" {
    const result = this.table.transition(job.id, { state: "failed", output: capture.text(), error });
    this.logger?.info("job_executed", {
      job_id: job.id,
      state: "failed",
      applied: result.applied,
      error: `${error.name}: ${error.message}`,
      duration_ms: this.now() - startedAt,
    });
    return "failed";
  }
}
