import { randomUUID } from "node:crypto";

import type { ExecutionBroker } from "../broker/executionBroker.js";
import {
  endpointMessage,
  heartbeatMessage,
  jsonRpcMessage,
  sessionMessage,
  type BrokerSseEvent,
} from "../events/sse.js";
import { SseBuffer, type SseMessage } from "../events/sseBuffer.js";
import type { CapabilityKind } from "../host/types.js";
import type { StructuredLogger } from "../logger.js";
import type { ProtocolRouter } from "../router/protocolRouter.js";
import type { JsonRpcNotification } from "../rpc/types.js";

/** Default interval between heartbeat events (15 seconds). */
export const DEFAULT_SSE_HEARTBEAT_MS = 15_000;

/** Writable end of a stream; resolves once the frame was handed to the socket. */
export interface SseSink {
  write(frame: string): Promise<void>;
  close(): void;
}

export interface SseSessionHubOptions {
  readonly router: ProtocolRouter;
  readonly broker: Pick<ExecutionBroker, "cancelSession">;
  readonly logger: Pick<StructuredLogger, "debug" | "info" | "warn" | "error">;
  readonly heartbeatMs?: number;
  /** Path advertised in the `endpoint` event. */
  readonly endpointPath?: string;
  readonly idFactory?: () => string;
  readonly now?: () => number;
  /** Overrides forwarded to every session buffer. */
  readonly maxBufferedBytes?: number;
}

export type SubmitResult =
  | { readonly accepted: false }
  | { readonly accepted: true; readonly delivered: Promise<void> };

interface SessionState {
  readonly id: string;
  readonly sink: SseSink;
  readonly buffer: SseBuffer<BrokerSseEvent>;
  readonly controller: AbortController;
  readonly httpRequestId: string | null;
  heartbeat: NodeJS.Timeout | null;
  flushing: Promise<void>;
  nextEventId: number;
}

const LIST_CHANGED_METHODS: Readonly<Record<CapabilityKind, string>> = {
  tool: "notifications/tools/list_changed",
  resource: "notifications/resources/list_changed",
  prompt: "notifications/prompts/list_changed",
};

/**
 * Streaming transport sessions. Each session owns an SSE stream: requests are
 * POSTed separately, acknowledged immediately, and their responses pushed as
 * `message` events once the router answers. Closing a session aborts its
 * pending waits and cancels the jobs it owns.
 */
export class SseSessionHub {
  private readonly sessions = new Map<string, SessionState>();
  private readonly router: ProtocolRouter;
  private readonly broker: Pick<ExecutionBroker, "cancelSession">;
  private readonly logger: Pick<StructuredLogger, "debug" | "info" | "warn" | "error">;
  private readonly heartbeatMs: number;
  private readonly endpointPath: string;
  private readonly idFactory: () => string;
  private readonly now: () => number;
  private readonly maxBufferedBytes?: number;

  constructor(options: SseSessionHubOptions) {
    this.router = options.router;
    this.broker = options.broker;
    this.logger = options.logger;
    this.heartbeatMs = options.heartbeatMs ?? DEFAULT_SSE_HEARTBEAT_MS;
    this.endpointPath = options.endpointPath ?? "/sse";
    this.idFactory = options.idFactory ?? randomUUID;
    this.now = options.now ?? Date.now;
    this.maxBufferedBytes = options.maxBufferedBytes;
  }

  get size(): number {
    return this.sessions.size;
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  /**
   * Opens a session on the sink: emits `session` then `endpoint`, and starts
   * the heartbeat. Returns the session id and the flush of those first frames.
   */
  open(sink: SseSink, httpRequestId: string | null = null): { sessionId: string; ready: Promise<void> } {
    const id = this.idFactory();
    const session: SessionState = {
      id,
      sink,
      buffer: new SseBuffer<BrokerSseEvent>({
        clientId: id,
        logger: this.logger,
        maxBufferedBytes: this.maxBufferedBytes,
      }),
      controller: new AbortController(),
      httpRequestId,
      heartbeat: null,
      flushing: Promise.resolve(),
      nextEventId: 0,
    };
    this.sessions.set(id, session);

    if (this.heartbeatMs > 0) {
      session.heartbeat = setInterval(() => {
        this.push(session, heartbeatMessage(this.eventId(session), this.now())).catch((error: unknown) => {
          this.logger.warn("sse_heartbeat_failed", { session_id: id, message: String(error) });
        });
      }, this.heartbeatMs);
      session.heartbeat.unref();
    }

    this.logger.info("sse_session_opened", { session_id: id, sessions: this.sessions.size });
    session.buffer.enqueue([
      sessionMessage(this.eventId(session), id),
      endpointMessage(this.eventId(session), `${this.endpointPath}?sessionId=${encodeURIComponent(id)}`),
    ]);
    return { sessionId: id, ready: this.flush(session) };
  }

  /**
   * Hands a decoded request to the router on behalf of a session. The response
   * is pushed on the stream; `delivered` settles once it was written and never
   * rejects.
   */
  submit(sessionId: string, message: unknown): SubmitResult {
    const session = this.sessions.get(sessionId);
    if (!session) {
      return { accepted: false };
    }
    const delivered = this.router
      .dispatch(message, {
        transport: "sse",
        sessionId,
        httpRequestId: session.httpRequestId,
        signal: session.controller.signal,
      })
      .then(async (response) => {
        if (response && this.sessions.has(sessionId)) {
          await this.push(session, jsonRpcMessage(this.eventId(session), response));
        }
      })
      .catch((error: unknown) => {
        this.logger.error("sse_dispatch_failed", {
          session_id: sessionId,
          message: error instanceof Error ? error.message : String(error),
        });
      });
    return { accepted: true, delivered };
  }

  /** Pushes a server notification to every open session. */
  async broadcast(notification: JsonRpcNotification): Promise<void> {
    await Promise.all(
      [...this.sessions.values()].map((session) => this.push(session, jsonRpcMessage(this.eventId(session), notification))),
    );
  }

  notifyListChanged(kind: CapabilityKind): Promise<void> {
    return this.broadcast({ jsonrpc: "2.0", method: LIST_CHANGED_METHODS[kind] });
  }

  /** Closes one session and cancels the jobs it still owns. */
  close(sessionId: string, reason = "client_disconnected"): boolean {
    const session = this.sessions.get(sessionId);
    if (!session) {
      return false;
    }
    this.sessions.delete(sessionId);
    if (session.heartbeat) {
      clearInterval(session.heartbeat);
    }
    const cancelled = this.broker.cancelSession(sessionId);
    session.controller.abort();
    session.buffer.clear();
    session.sink.close();
    this.logger.info("sse_session_closed", { session_id: sessionId, reason, cancelled_jobs: cancelled });
    return true;
  }

  closeAll(reason = "server_stopping"): void {
    for (const sessionId of [...this.sessions.keys()]) {
      this.close(sessionId, reason);
    }
  }

  private eventId(session: SessionState): string {
    session.nextEventId += 1;
    return String(session.nextEventId);
  }

  private push(session: SessionState, message: SseMessage<BrokerSseEvent>): Promise<void> {
    session.buffer.enqueue([message]);
    return this.flush(session);
  }

  /** Serialises drains so frames reach the socket in order. */
  private flush(session: SessionState): Promise<void> {
    session.flushing = session.flushing.then(() => session.buffer.drain((frame) => session.sink.write(frame)));
    return session.flushing;
  }
}
