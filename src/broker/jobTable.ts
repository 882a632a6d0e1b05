import { randomUUID } from "node:crypto";

import type { StructuredLogger } from "../logger.js";
import type { CapabilityRef, HostTask } from "../host/types.js";

/** Lifecycle states of a job. */
export type JobState = "pending" | "running" | "completed" | "failed" | "timed_out" | "cancelled";

/** States after which a job never changes again. */
export type TerminalJobState = Exclude<JobState, "pending" | "running">;

/** Why a job ended up cancelled. */
export type CancellationReason =
  | "evicted"
  | "client_disconnected"
  | "client_cancelled"
  | "server_stopping"
  | "orphaned"
  | "removed";

/** Structured description of an exception raised by a host task. */
export interface ExecutionFailure {
  readonly name: string;
  readonly message: string;
}

/**
 * Final outcome of a job. Written exactly once, by the first terminal
 * transition accepted by the table.
 */
export type JobOutcome =
  | { readonly state: "completed"; readonly output: string; readonly value: unknown }
  | { readonly state: "failed"; readonly output: string; readonly error: ExecutionFailure }
  | { readonly state: "timed_out"; readonly timeoutMs: number }
  | { readonly state: "cancelled"; readonly reason: CancellationReason };

/** Transition requested on a job: either the start of execution or an outcome. */
export type JobTransition = { readonly state: "running" } | JobOutcome;

/** Read-only view of a job tracked by the {@link JobTable}. */
export interface JobRecord {
  readonly id: string;
  readonly capability: CapabilityRef;
  readonly payload: unknown;
  readonly task: HostTask;
  readonly correlationId: string | null;
  readonly sessionId: string | null;
  readonly createdAt: number;
  readonly deadline: number;
  readonly timeoutMs: number;
  readonly state: JobState;
  readonly outcome: JobOutcome | null;
  /** One-shot signal resolved right after {@link outcome} is written. */
  readonly completion: Promise<JobOutcome>;
}

/** Parameters supplied when admitting a job. */
export interface NewJob {
  readonly capability: CapabilityRef;
  readonly payload: unknown;
  readonly task: HostTask;
  readonly timeoutMs: number;
  readonly correlationId?: string | null;
  readonly sessionId?: string | null;
}

export interface AdmissionResult {
  readonly jobId: string;
  readonly record: JobRecord;
  /** Oldest live job cancelled to make room, when the table was full. */
  readonly evicted: JobRecord | null;
}

export type TransitionRejection = "unknown_job" | "already_terminal" | "invalid_transition";

export type TransitionResult =
  | { readonly applied: true; readonly record: JobRecord }
  | { readonly applied: false; readonly reason: TransitionRejection; readonly current: JobState | null };

export interface JobTableStats {
  readonly live: number;
  readonly tracked: number;
  readonly capacity: number;
  readonly admitted: number;
  readonly evicted: number;
  readonly rejectedTransitions: number;
}

export interface JobTableOptions {
  /** Maximum number of live (pending or running) jobs. */
  readonly capacity: number;
  readonly logger?: Pick<StructuredLogger, "info" | "warn" | "debug">;
  readonly now?: () => number;
  readonly idFactory?: () => string;
}

/** Default number of concurrent in-flight jobs. */
export const DEFAULT_JOB_CAPACITY = 50;

interface JobEntry {
  readonly id: string;
  readonly seq: number;
  readonly capability: CapabilityRef;
  readonly payload: unknown;
  readonly task: HostTask;
  readonly correlationId: string | null;
  readonly sessionId: string | null;
  readonly createdAt: number;
  readonly deadline: number;
  readonly timeoutMs: number;
  state: JobState;
  outcome: JobOutcome | null;
  readonly completion: Promise<JobOutcome>;
  readonly release: (outcome: JobOutcome) => void;
}

const ALLOWED_TRANSITIONS: Readonly<Record<JobState, readonly JobState[]>> = {
  pending: ["running", "timed_out", "cancelled"],
  running: ["completed", "failed", "timed_out", "cancelled"],
  completed: [],
  failed: [],
  timed_out: [],
  cancelled: [],
};

export function isTerminalState(state: JobState): state is TerminalJobState {
  return state !== "pending" && state !== "running";
}

/**
 * Bounded table of jobs shared by the transports and the host tick. Every
 * mutation goes through its methods, which run to completion on the event
 * loop, so each call is atomic with respect to every other caller.
 * {@link transition} is the single point deciding which path (completion,
 * timeout, eviction, cancellation) owns the outcome of a job.
 */
export class JobTable {
  private readonly entries = new Map<string, JobEntry>();
  private readonly capacityInternal: number;
  private readonly logger?: Pick<StructuredLogger, "info" | "warn" | "debug">;
  private readonly now: () => number;
  private readonly idFactory: () => string;
  private sequence = 0;
  private admittedCount = 0;
  private evictedCount = 0;
  private rejectedCount = 0;

  constructor(options: JobTableOptions) {
    if (!Number.isInteger(options.capacity) || options.capacity < 1) {
      throw new RangeError(`job table capacity must be a positive integer (received ${options.capacity})`);
    }
    this.capacityInternal = options.capacity;
    this.logger = options.logger;
    this.now = options.now ?? Date.now;
    this.idFactory = options.idFactory ?? randomUUID;
  }

  get capacity(): number {
    return this.capacityInternal;
  }

  /** Number of live (pending or running) jobs. Never exceeds {@link capacity}. */
  get size(): number {
    let live = 0;
    for (const entry of this.entries.values()) {
      if (!isTerminalState(entry.state)) {
        live += 1;
      }
    }
    return live;
  }

  /**
   * Inserts a new pending job. When the table is full the oldest live job is
   * cancelled with reason `evicted`, its waiter released and its record
   * detached before the new job is inserted. Never blocks.
   */
  admit(job: NewJob): AdmissionResult {
    let evicted: JobRecord | null = null;
    if (this.size >= this.capacityInternal) {
      evicted = this.evictOldest();
    }

    const id = this.idFactory();
    if (this.entries.has(id)) {
      throw new Error(`duplicate job identifier ${id}`);
    }
    const createdAt = this.now();
    let release: (outcome: JobOutcome) => void = () => undefined;
    const completion = new Promise<JobOutcome>((resolve) => {
      release = resolve;
    });
    const entry: JobEntry = {
      id,
      seq: this.sequence++,
      capability: job.capability,
      payload: job.payload,
      task: job.task,
      correlationId: job.correlationId ?? null,
      sessionId: job.sessionId ?? null,
      createdAt,
      deadline: createdAt + job.timeoutMs,
      timeoutMs: job.timeoutMs,
      state: "pending",
      outcome: null,
      completion,
      release,
    };
    this.entries.set(id, entry);
    this.admittedCount += 1;
    this.logger?.debug("job_admitted", {
      job_id: id,
      capability: `${job.capability.kind}:${job.capability.name}`,
      correlation_id: entry.correlationId,
      live: this.size,
    });
    return { jobId: id, record: entry, evicted };
  }

  get(jobId: string): JobRecord | undefined {
    return this.entries.get(jobId);
  }

  /**
   * Applies a transition when the state machine allows it. Terminal
   * transitions write the outcome then resolve the completion signal. Any
   * rejected attempt (unknown job, already terminal, illegal edge) is counted
   * and logged instead of being dropped silently.
   */
  transition(jobId: string, next: JobTransition): TransitionResult {
    const entry = this.entries.get(jobId);
    if (!entry) {
      return this.reject(jobId, next.state, "unknown_job", null);
    }
    if (isTerminalState(entry.state)) {
      return this.reject(jobId, next.state, "already_terminal", entry.state);
    }
    if (!ALLOWED_TRANSITIONS[entry.state].includes(next.state)) {
      return this.reject(jobId, next.state, "invalid_transition", entry.state);
    }

    entry.state = next.state;
    if (next.state !== "running") {
      entry.outcome = next;
      entry.release(next);
    }
    return { applied: true, record: entry };
  }

  /**
   * Drops a job from the table. A live job is cancelled first so its waiter is
   * never left hanging.
   */
  remove(jobId: string): boolean {
    const entry = this.entries.get(jobId);
    if (!entry) {
      return false;
    }
    if (!isTerminalState(entry.state)) {
      this.transition(jobId, { state: "cancelled", reason: "removed" });
    }
    return this.entries.delete(jobId);
  }

  /** Pending jobs whose deadline is still ahead, earliest deadline first. */
  pendingByDeadline(now: number = this.now()): JobRecord[] {
    return [...this.entries.values()]
      .filter((entry) => entry.state === "pending" && entry.deadline > now)
      .sort((left, right) => left.deadline - right.deadline || left.seq - right.seq);
  }

  /** Live jobs in admission order. */
  liveJobs(): JobRecord[] {
    return [...this.entries.values()].filter((entry) => !isTerminalState(entry.state));
  }

  /** Cancels every live job matching the predicate and returns their ids. */
  cancelWhere(predicate: (record: JobRecord) => boolean, reason: CancellationReason): string[] {
    const cancelled: string[] = [];
    for (const entry of this.liveJobs()) {
      if (predicate(entry) && this.transition(entry.id, { state: "cancelled", reason }).applied) {
        cancelled.push(entry.id);
      }
    }
    return cancelled;
  }

  /**
   * Clears every record. Live jobs left over from a previous run have no
   * waiter anymore: they are cancelled and dropped along with terminal ones.
   */
  sweep(reason: CancellationReason = "orphaned"): number {
    const count = this.entries.size;
    for (const entry of this.liveJobs()) {
      this.transition(entry.id, { state: "cancelled", reason });
    }
    this.entries.clear();
    if (count > 0) {
      this.logger?.warn("job_table_swept", { count, reason });
    }
    return count;
  }

  stats(): JobTableStats {
    return {
      live: this.size,
      tracked: this.entries.size,
      capacity: this.capacityInternal,
      admitted: this.admittedCount,
      evicted: this.evictedCount,
      rejectedTransitions: this.rejectedCount,
    };
  }

  private evictOldest(): JobRecord | null {
    let oldest: JobEntry | null = null;
    for (const entry of this.entries.values()) {
      if (isTerminalState(entry.state)) {
        continue;
      }
      if (
        !oldest ||
        entry.createdAt < oldest.createdAt ||
        (entry.createdAt === oldest.createdAt && entry.seq < oldest.seq)
      ) {
        oldest = entry;
      }
    }
    if (!oldest) {
      return null;
    }

    const previousState = oldest.state;
    this.transition(oldest.id, { state: "cancelled", reason: "evicted" });
    this.entries.delete(oldest.id);
    this.evictedCount += 1;
    this.logger?.warn("job_evicted", {
      job_id: oldest.id,
      previous_state: previousState,
      correlation_id: oldest.correlationId,
      capacity: this.capacityInternal,
    });
    return oldest;
  }

  private reject(
    jobId: string,
    requested: JobState,
    reason: TransitionRejection,
    current: JobState | null,
  ): TransitionResult {
    this.rejectedCount += 1;
    this.logger?.warn("job_transition_rejected", { job_id: jobId, from: current, to: requested, reason });
    return { applied: false, reason, current };
  }
}
