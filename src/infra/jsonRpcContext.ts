import { AsyncLocalStorage } from "node:async_hooks";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

/** Transport that delivered a JSON-RPC request to the router. */
export type TransportKind = "stdio" | "http" | "sse";

/**
 * Routing metadata attached to every request handed to the protocol router.
 * Transports fill what they know; the router and the broker read it to label
 * jobs and log entries.
 */
export interface JsonRpcRouteContext {
  /** Transport that received the request. */
  transport?: TransportKind;
  /** JSON-RPC identifier of the request (null for notifications). */
  requestId?: string | number | null;
  /** Streaming session the response will be pushed to, if any. */
  sessionId?: string | null;
  /** HTTP-level correlation identifier (`x-request-id`). */
  httpRequestId?: string | null;
  /** Signal aborted when the caller goes away before the reply is sent. */
  signal?: AbortSignal;
}

/**
 * AsyncLocalStorage exposing the routing context to downstream helpers. The
 * logger reads it to stamp `request_id` and `transport` on every entry emitted
 * while a request is being served.
 */
const storage = new AsyncLocalStorage<JsonRpcRouteContext | undefined>();

/**
 * Executes the provided callback while exposing the supplied JSON-RPC context
 * via AsyncLocalStorage. When no context is provided the callback is executed
 * directly without incurring the storage cost.
 */
export function runWithJsonRpcContext<T>(
  context: JsonRpcRouteContext | undefined,
  callback: () => T,
): T {
  if (!context) {
    return callback();
  }
  return storage.run(context, callback);
}

/** Retrieves the JSON-RPC context associated with the current async execution. */
export function getJsonRpcContext(): JsonRpcRouteContext | undefined {
  return storage.getStore();
}
