/** Identifier carried by JSON-RPC requests. `null` answers unidentifiable input. */
export type JsonRpcId = string | number | null;

/** Request envelope accepted by the router once framing has been decoded. */
export interface JsonRpcRequest {
  jsonrpc: "2.0";
  id?: string | number;
  method: string;
  params?: unknown;
}

/** Server initiated notification (no identifier, no reply expected). */
export interface JsonRpcNotification {
  jsonrpc: "2.0";
  method: string;
  params?: Record<string, unknown>;
}

export interface JsonRpcErrorObject {
  code: number;
  message: string;
  data?: unknown;
}

/** Response envelope produced by the router and every transport. */
export interface JsonRpcResponse {
  /** JSON-RPC protocol version echoed back to the caller. */
  jsonrpc: "2.0";
  /** Identifier copied from the request (null when it could not be read). */
  id: JsonRpcId;
  /** Structured result produced by the handler when the call succeeds. */
  result?: unknown;
  /** Error payload when the handler throws or rejects. */
  error?: JsonRpcErrorObject;
}
