/**
 * Contracts binding the broker to the host application. The host owns a single
 * execution context driven by a cooperative scheduler; the broker can only ask
 * for a tick and react when one is granted.
 */

/** Callback run by the host on every tick it grants to the broker. */
export type HostTickHandler = (budgetMs: number) => void;

/**
 * Cooperative, non-preemptive scheduler of the host. Ticks never overlap and
 * the broker cannot force one to run early: {@link requestTick} only asks for a
 * tick "at or after the next opportunity".
 */
export interface HostTickScheduler {
  /** Registers the per-tick handler. Returns a function detaching it. */
  attach(handler: HostTickHandler): () => void;
  /** Asks the host to grant a tick at its next opportunity. */
  requestTick(): void;
}

/** Reference to a capability by kind and name. */
export interface CapabilityRef {
  readonly kind: CapabilityKind;
  readonly name: string;
}

/** Families of capabilities exposed through the protocol. */
export type CapabilityKind = "tool" | "resource" | "prompt";

/**
 * Facilities handed to a task while it runs on the host execution context.
 * Everything printed through {@link print} ends up in the job's captured
 * output.
 */
export interface HostExecutionContext {
  readonly jobId: string;
  readonly capability: CapabilityRef;
  print(...values: unknown[]): void;
}

/**
 * Unit of work executed synchronously inside a host tick. The returned value
 * becomes the structured return value of the job.
 */
export type HostTask = (context: HostExecutionContext) => unknown;
