import type { JsonRpcNotification, JsonRpcResponse } from "../rpc/types.js";
import type { SseMessage } from "./sseBuffer.js";

/** Event names emitted on a broker SSE stream. */
export type BrokerSseEvent = "session" | "endpoint" | "message" | "heartbeat";

/**
 * Serialises a payload so it fits on `data:` lines of an SSE stream. JSON
 * leaves U+2028/U+2029 untouched, which some consumers treat as record
 * delimiters, so they are escaped along with raw carriage returns and line
 * feeds. `JSON.parse` still recovers the original value.
 */
export function serialiseForSse(payload: unknown): string {
  return JSON.stringify(payload)
    .replace(/\r/g, "\\r")
    .replace(/\n/g, "\\n")
    .replace(/\u2028/g, "\\u2028")
    .replace(/\u2029/g, "\\u2029");
}

/** First frame of a stream, announcing the session identifier. */
export function sessionMessage(id: string, sessionId: string): SseMessage<BrokerSseEvent> {
  return { id, event: "session", data: serialiseForSse({ sessionId }) };
}

/** Tells the client where to POST its requests. The data is a bare URL path. */
export function endpointMessage(id: string, endpoint: string): SseMessage<BrokerSseEvent> {
  return { id, event: "endpoint", data: endpoint };
}

/**
 * JSON-RPC response or server notification pushed to the client. Only
 * notifications may be evicted from a full buffer.
 */
export function jsonRpcMessage(id: string, payload: JsonRpcResponse | JsonRpcNotification): SseMessage<BrokerSseEvent> {
  return { id, event: "message", data: serialiseForSse(payload), evictable: "method" in payload };
}

export function heartbeatMessage(id: string, timestamp: number): SseMessage<BrokerSseEvent> {
  return { id, event: "heartbeat", data: serialiseForSse({ ts: timestamp }), evictable: true };
}
