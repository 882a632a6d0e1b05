import { getJsonRpcContext } from "../infra/jsonRpcContext.js";
import type { JsonRpcId, JsonRpcResponse } from "./types.js";

/**
 * Canonical taxonomy describing the JSON-RPC error categories recognised by the
 * broker. Each entry provides the JSON-RPC error code and the default
 * human-readable message wired to that category.
 */
export const JSON_RPC_ERROR_TAXONOMY = {
  PARSE_ERROR: { code: -32700, message: "Parse error" },
  INVALID_REQUEST: { code: -32600, message: "Invalid Request" },
  METHOD_NOT_FOUND: { code: -32601, message: "Method not found" },
  VALIDATION_ERROR: { code: -32602, message: "Invalid params" },
  AUTH_REQUIRED: { code: -32001, message: "Authentication required" },
  FORBIDDEN: { code: -32002, message: "Forbidden" },
  UNKNOWN_CAPABILITY: { code: -32004, message: "Unknown capability" },
  INTERNAL: { code: -32000, message: "Internal error" },
} as const;

/** Union type describing the supported JSON-RPC error categories. */
export type JsonRpcErrorCategory = keyof typeof JSON_RPC_ERROR_TAXONOMY;

/** Additional metadata propagated alongside JSON-RPC error responses. */
export interface JsonRpcErrorData {
  category: JsonRpcErrorCategory;
  request_id?: JsonRpcId;
  session_id?: string;
  hint?: string;
  issues?: unknown;
  meta?: Record<string, unknown>;
  status?: number;
}

/** Optional knobs allowing callers to enrich {@link JsonRpcErrorData}. */
export interface JsonRpcErrorOptions {
  requestId?: JsonRpcId;
  hint?: string;
  issues?: unknown;
  meta?: Record<string, unknown>;
  /** HTTP status transports should use when the error ends the exchange. */
  status?: number;
}

function createJsonRpcErrorData(
  category: JsonRpcErrorCategory,
  options: JsonRpcErrorOptions,
): JsonRpcErrorData {
  const snapshot: JsonRpcErrorData = { category };
  const context = getJsonRpcContext();
  const requestId = options.requestId !== undefined ? options.requestId : context?.requestId;
  if (requestId !== undefined) {
    snapshot.request_id = requestId;
  }
  if (context?.sessionId) {
    snapshot.session_id = context.sessionId;
  }
  if (options.hint !== undefined) {
    snapshot.hint = options.hint;
  }
  if (options.issues !== undefined) {
    snapshot.issues = options.issues;
  }
  if (options.meta !== undefined) {
    snapshot.meta = options.meta;
  }
  if (options.status !== undefined) {
    snapshot.status = options.status;
  }
  return snapshot;
}

/**
 * Base class for all typed JSON-RPC errors thrown by the router and the
 * transports. Concrete subclasses fix the category while keeping the options
 * bag to attach hints and metadata.
 */
export class JsonRpcError extends Error {
  readonly category: JsonRpcErrorCategory;
  readonly code: number;
  readonly data: JsonRpcErrorData;

  constructor(category: JsonRpcErrorCategory, message?: string, options: JsonRpcErrorOptions = {}) {
    const taxonomy = JSON_RPC_ERROR_TAXONOMY[category];
    super(message ?? taxonomy.message);
    this.name = new.target.name;
    this.category = category;
    this.code = taxonomy.code;
    this.data = createJsonRpcErrorData(category, options);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Malformed framing: the payload is not valid JSON. */
export class ParseError extends JsonRpcError {
  constructor(message?: string, options: JsonRpcErrorOptions = {}) {
    super("PARSE_ERROR", message, options);
  }
}

/** Well-formed JSON that is not a JSON-RPC request. */
export class InvalidRequestError extends JsonRpcError {
  constructor(message?: string, options: JsonRpcErrorOptions = {}) {
    super("INVALID_REQUEST", message, options);
  }
}

export class MethodNotFoundError extends JsonRpcError {
  constructor(message?: string, options: JsonRpcErrorOptions = {}) {
    super("METHOD_NOT_FOUND", message, options);
  }
}

/** Typed error surface dedicated to payload validation failures. */
export class ValidationError extends JsonRpcError {
  constructor(message?: string, options: JsonRpcErrorOptions = {}) {
    super("VALIDATION_ERROR", message, options);
  }
}

/**
 * Error thrown when the caller fails authentication. Timing safe comparisons
 * live in the auth gate; the class strictly captures the failure outcome.
 */
export class AuthError extends JsonRpcError {
  constructor(message?: string, options: JsonRpcErrorOptions = {}) {
    super("AUTH_REQUIRED", message, { status: 401, ...options });
  }
}

/** Peer rejected by the network binding policy. */
export class ForbiddenError extends JsonRpcError {
  constructor(message?: string, options: JsonRpcErrorOptions = {}) {
    super("FORBIDDEN", message, { status: 403, ...options });
  }
}

export class UnknownCapabilityError extends JsonRpcError {
  constructor(message?: string, options: JsonRpcErrorOptions = {}) {
    super("UNKNOWN_CAPABILITY", message, options);
  }
}

/** Catch-all internal failure propagated to clients. */
export class InternalError extends JsonRpcError {
  constructor(message?: string, options: JsonRpcErrorOptions = {}) {
    super("INTERNAL", message, options);
  }
}

/**
 * Formats a {@link JsonRpcError} into a JSON-RPC error response object. Every
 * transport goes through this helper so they all carry the same diagnostic
 * data.
 */
export function toJsonRpc(id: JsonRpcId, error: JsonRpcError): JsonRpcResponse {
  return {
    jsonrpc: "2.0",
    id,
    error: {
      code: error.code,
      message: error.message,
      data: error.data,
    },
  };
}
