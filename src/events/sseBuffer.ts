/**
 * Bounded Server-Sent Events buffering for the streaming transport. Frames are
 * rendered eagerly and queued per session until the socket accepts them, so a
 * slow client can only ever cost a fixed amount of memory.
 */
import { Buffer } from "node:buffer";

import { readInt } from "../config/env.js";
import type { StructuredLogger } from "../logger.js";

/** Total number of bytes retained across frames when callers omit explicit overrides. */
const DEFAULT_MAX_BUFFERED_BYTES = 512 * 1024;

/** Timeout (milliseconds) granted to downstream writers before frames are dropped. */
const DEFAULT_EMIT_TIMEOUT_MS = 5_000;

/** Minimal descriptor for a single SSE frame. */
export interface SseMessage<EventName extends string = string> {
  /** Identifier attached to the frame, echoed by clients when they reconnect. */
  id: string;
  /** Event name surfaced to the `EventSource` listener. */
  event: EventName;
  /** Pre-serialised payload. */
  data: string;
  /**
   * Whether the frame may be discarded when the buffer overflows. Frames
   * carrying a response to a request are never evictable.
   */
  evictable?: boolean;
}

export interface SseBufferOptions {
  /** Session identifier injected in warning logs when frames are dropped. */
  clientId: string;
  logger: Pick<StructuredLogger, "warn">;
  /** Explicit override for the buffered byte capacity (defaults to env or 512KiB). */
  maxBufferedBytes?: number;
  /** Maximum time spent awaiting downstream writers before the frame is discarded. */
  emitTimeoutMs?: number;
}

function resolvePositive(override: number | undefined, variable: string, fallback: number): number {
  if (override && override > 0) {
    return override;
  }
  return readInt(variable, fallback, { min: 1 });
}

/**
 * Renders one frame. Clients join consecutive `data:` lines with a line feed,
 * so the payload is only split where it already contains a line break; JSON
 * serialised by {@link serialiseForSse} always fits on a single line.
 */
export function renderSseMessage<EventName extends string>(message: SseMessage<EventName>): string {
  const payload = message.data
    .split(/\r\n|\r|\n/)
    .map((line) => `data: ${line}\n`)
    .join("");
  return `id: ${message.id}\nevent: ${message.event}\n${payload}\n`;
}

type WriteOutcome = "ok" | "timeout";

/**
 * Bounded buffer guarding SSE emissions for a single session. When the
 * buffered bytes exceed the capacity the oldest evictable frames are discarded
 * and the drop is logged. Responses stay queued even past the capacity.
 */
export class SseBuffer<EventName extends string = string> {
  private readonly maxBufferedBytes: number;
  private readonly emitTimeoutMs: number;
  private readonly options: SseBufferOptions;
  private readonly queue: Array<{ frame: string; bytes: number; evictable: boolean }> = [];
  private droppedFrames = 0;
  private bufferedBytes = 0;

  constructor(options: SseBufferOptions) {
    this.options = options;
    this.maxBufferedBytes = resolvePositive(options.maxBufferedBytes, "MCP_SSE_MAX_BUFFER", DEFAULT_MAX_BUFFERED_BYTES);
    this.emitTimeoutMs = resolvePositive(options.emitTimeoutMs, "MCP_SSE_EMIT_TIMEOUT_MS", DEFAULT_EMIT_TIMEOUT_MS);
  }

  get size(): number {
    return this.queue.length;
  }

  get bufferedSizeBytes(): number {
    return this.bufferedBytes;
  }

  get droppedFrameCount(): number {
    return this.droppedFrames;
  }

  clear(): void {
    this.queue.length = 0;
    this.bufferedBytes = 0;
  }

  enqueue(messages: Array<SseMessage<EventName>>): void {
    for (const message of messages) {
      const frame = renderSseMessage(message);
      const bytes = Buffer.byteLength(frame, "utf8");
      this.queue.push({ frame, bytes, evictable: message.evictable ?? false });
      this.bufferedBytes += bytes;
    }

    let dropped = 0;
    let freedBytes = 0;
    let index = 0;
    while (this.bufferedBytes > this.maxBufferedBytes && index < this.queue.length) {
      const entry = this.queue[index];
      if (!entry?.evictable) {
        index += 1;
        continue;
      }
      this.queue.splice(index, 1);
      this.bufferedBytes -= entry.bytes;
      dropped += 1;
      freedBytes += entry.bytes;
    }
    if (dropped > 0) {
      this.droppedFrames += dropped;
      this.options.logger.warn("sse_buffer_overflow", {
        session_id: this.options.clientId,
        dropped,
        freed_bytes: freedBytes,
        capacity_bytes: this.maxBufferedBytes,
        buffered_bytes: this.bufferedBytes,
      });
    }
  }

  /**
   * Flushes buffered frames sequentially through the writer. A write that does
   * not settle within the emit timeout stops the drain; the frame is counted as
   * dropped.
   */
  async drain(writer: (frame: string) => Promise<void>): Promise<void> {
    for (let payload = this.queue.shift(); payload; payload = this.queue.shift()) {
      this.bufferedBytes = Math.max(0, this.bufferedBytes - payload.bytes);
      const writeResult = writer(payload.frame);
      let timer: NodeJS.Timeout | undefined;
      const timeout = new Promise<WriteOutcome>((resolve) => {
        timer = setTimeout(() => resolve("timeout"), this.emitTimeoutMs);
      });
      try {
        const winner = await Promise.race([writeResult.then((): WriteOutcome => "ok"), timeout]);
        if (winner === "timeout") {
          this.droppedFrames += 1;
          this.options.logger.warn("sse_emit_timeout", {
            session_id: this.options.clientId,
            timeout_ms: this.emitTimeoutMs,
          });
          writeResult.catch((error: unknown) => {
            this.options.logger.warn("sse_emit_failed", {
              session_id: this.options.clientId,
              message: error instanceof Error ? error.message : String(error),
            });
          });
          break;
        }
      } catch (error) {
        this.droppedFrames += 1;
        this.options.logger.warn("sse_emit_failed", {
          session_id: this.options.clientId,
          message: error instanceof Error ? error.message : String(error),
        });
        break;
      } finally {
        clearTimeout(timer);
      }
    }
  }
}
