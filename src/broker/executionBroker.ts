import type { z } from "zod";

import type { StructuredLogger } from "../logger.js";
import type { CapabilityRef } from "../host/types.js";
import type { CapabilityRegistry } from "../registry/capabilityRegistry.js";
import { formatIssues } from "../registry/capabilities.js";
import {
  isTerminalState,
  type CancellationReason,
  type JobOutcome,
  type JobRecord,
  type JobTable,
  type JobTableStats,
} from "./jobTable.js";

/** Default deadline applied to every job (five minutes). */
export const DEFAULT_JOB_TIMEOUT_MS = 300_000;
/** Longest delay `setTimeout` honours; larger values fire after 1 ms. */
export const MAX_JOB_TIMEOUT_MS = 2_147_483_647;

export type InvocationErrorKind = "UnknownCapability" | "InvalidPayload" | "ExecutionError" | "Timeout" | "Cancelled";

export interface InvocationError {
  readonly kind: InvocationErrorKind;
  readonly message: string;
  readonly issues?: readonly z.ZodIssue[];
}

export interface InvocationOutput {
  /** Text printed while the job ran. */
  readonly text: string;
  /** JSON-safe return value of the task (`null` when it returned nothing). */
  readonly value: unknown;
}

export type InvocationResult =
  | {
      readonly ok: true;
      readonly jobId: string;
      readonly correlationId: string | null;
      readonly output: InvocationOutput;
    }
  | {
      readonly ok: false;
      /** `null` when the request was refused before a job existed. */
      readonly jobId: string | null;
      readonly correlationId: string | null;
      readonly error: InvocationError;
      /** Output captured before an execution error. */
      readonly output?: InvocationOutput;
    };

export interface InvokeOptions {
  readonly timeoutMs?: number;
  readonly correlationId?: string | null;
  /** Streaming session owning the request, cancelled as a whole on disconnect. */
  readonly sessionId?: string | null;
  /** Aborts the wait (client disconnect). A running task is not interrupted. */
  readonly signal?: AbortSignal;
}

export interface ExecutionBrokerOptions {
  readonly registry: CapabilityRegistry;
  readonly table: JobTable;
  /** Receives a tick request every time a job is admitted. */
  readonly scheduler: { requestTick(): void };
  readonly defaultTimeoutMs?: number;
  readonly logger?: Pick<StructuredLogger, "debug" | "info" | "warn">;
}

const CANCELLATION_MESSAGES: Readonly<Record<CancellationReason, string>> = {
  evicted: "job evicted to admit a newer job",
  client_disconnected: "client disconnected before the job completed",
  client_cancelled: "job cancelled by the client",
  server_stopping: "server is stopping",
  orphaned: "job orphaned by a previous run",
  removed: "job removed before completion",
};

/**
 * Accepts invocations from the transports, turns them into jobs and waits for
 * their outcome. Timeout, eviction and cancellation all go through
 * {@link JobTable.transition}; the caller always receives the outcome carried
 * by the job's completion signal, whichever path wrote it first.
 */
export class ExecutionBroker {
  private readonly registry: CapabilityRegistry;
  private readonly table: JobTable;
  private readonly scheduler: { requestTick(): void };
  private readonly defaultTimeoutMs: number;
  private readonly logger?: Pick<StructuredLogger, "debug" | "info" | "warn">;

  constructor(options: ExecutionBrokerOptions) {
    this.registry = options.registry;
    this.table = options.table;
    this.scheduler = options.scheduler;
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_JOB_TIMEOUT_MS;
    this.logger = options.logger;
  }

  async invoke(ref: CapabilityRef, payload: unknown, options: InvokeOptions = {}): Promise<InvocationResult> {
    const correlationId = options.correlationId ?? null;
    const descriptor = this.registry.get(ref.kind, ref.name);
    if (!descriptor) {
      return {
        ok: false,
        jobId: null,
        correlationId,
        error: { kind: "UnknownCapability", message: `Unknown ${ref.kind} '${ref.name}'` },
      };
    }

    const bound = descriptor.bind(payload);
    if (!bound.ok) {
      return {
        ok: false,
        jobId: null,
        correlationId,
        error: { kind: "InvalidPayload", message: formatIssues(bound.issues), issues: bound.issues },
      };
    }

    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;
    if (!Number.isInteger(timeoutMs) || timeoutMs < 1 || timeoutMs > MAX_JOB_TIMEOUT_MS) {
      return {
        ok: false,
        jobId: null,
        correlationId,
        error: { kind: "InvalidPayload", message: `timeout must be 1-${MAX_JOB_TIMEOUT_MS} ms, got ${timeoutMs}` },
      };
    }

    if (options.signal?.aborted) {
      return {
        ok: false,
        jobId: null,
        correlationId,
        error: { kind: "Cancelled", message: CANCELLATION_MESSAGES.client_disconnected },
      };
    }

    const { jobId, record } = this.table.admit({
      capability: { kind: ref.kind, name: ref.name },
      payload,
      task: bound.task,
      timeoutMs,
      correlationId,
      sessionId: options.sessionId ?? null,
    });
    this.scheduler.requestTick();

    const timer = setTimeout(() => this.expire(jobId), timeoutMs);
    timer.unref();
    const onAbort = (): void => {
      this.cancel(jobId, "client_disconnected");
    };
    options.signal?.addEventListener("abort", onAbort, { once: true });

    try {
      const outcome = await record.completion;
      this.logger?.debug("job_delivered", { job_id: jobId, state: outcome.state, correlation_id: correlationId });
      return this.toResult(record, outcome);
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener("abort", onAbort);
      this.table.remove(jobId);
    }
  }

  /** Cancels one job. Returns `false` when it already reached a terminal state. */
  cancel(jobId: string, reason: CancellationReason = "client_cancelled"): boolean {
    const record = this.table.get(jobId);
    if (!record || isTerminalState(record.state)) {
      return false;
    }
    const previous = record.state;
    const applied = this.table.transition(jobId, { state: "cancelled", reason }).applied;
    if (applied) {
      this.logger?.info("job_cancelled", { job_id: jobId, reason, previous_state: previous });
    }
    return applied;
  }

  /** Cancels the live jobs started for a correlation id, optionally within one session. */
  cancelByCorrelation(correlationId: string, sessionId?: string | null): number {
    const cancelled = this.table.cancelWhere(
      (record) =>
        record.correlationId === correlationId && (sessionId === undefined || record.sessionId === sessionId),
      "client_cancelled",
    );
    if (cancelled.length > 0) {
      this.logger?.info("job_cancelled", { correlation_id: correlationId, reason: "client_cancelled", jobs: cancelled });
    }
    return cancelled.length;
  }

  /** Cancels every live job owned by a streaming session. */
  cancelSession(sessionId: string): number {
    const cancelled = this.table.cancelWhere((record) => record.sessionId === sessionId, "client_disconnected");
    if (cancelled.length > 0) {
      this.logger?.info("session_jobs_cancelled", { session_id: sessionId, jobs: cancelled });
    }
    return cancelled.length;
  }

  cancelAll(reason: CancellationReason = "server_stopping"): number {
    return this.table.cancelWhere(() => true, reason).length;
  }

  stats(): JobTableStats {
    return this.table.stats();
  }

  private expire(jobId: string): void {
    const record = this.table.get(jobId);
    if (!record) {
      return;
    }
    const previous = record.state;
    const result = this.table.transition(jobId, { state: "timed_out", timeoutMs: record.timeoutMs });
    if (result.applied) {
      this.logger?.warn("job_timed_out", {
        job_id: jobId,
        previous_state: previous,
        timeout_ms: record.timeoutMs,
        correlation_id: record.correlationId,
      });
    }
  }

  private toResult(record: JobRecord, outcome: JobOutcome): InvocationResult {
    const base = { jobId: record.id, correlationId: record.correlationId };
    switch (outcome.state) {
      case "completed":
        return { ok: true, ...base, output: { text: outcome.output, value: outcome.value } };
      case "failed":
        return {
          ok: false,
          ...base,
          error: { kind: "ExecutionError", message: `${outcome.error.name}: ${outcome.error.message}` },
          output: { text: outcome.output, value: null },
        };
      case "timed_out":
        return {
          ok: false,
          ...base,
          error: { kind: "Timeout", message: `job did not complete within ${outcome.timeoutMs} ms` },
        };
      case "cancelled":
        return {
          ok: false,
          ...base,
          error: { kind: "Cancelled", message: CANCELLATION_MESSAGES[outcome.reason] },
        };
    }
  }
}
