import { Buffer } from "node:buffer";
import { createServer as createHttpServer, type IncomingMessage, type Server as NodeHttpServer, type ServerResponse } from "node:http";
import process from "node:process";

import type { ExecutionBroker } from "./broker/executionBroker.js";
import type { AuthGate } from "./http/auth.js";
import type { BindPolicy } from "./http/bindPolicy.js";
import { DEFAULT_MAX_BODY_BYTES, HttpBodyError, readBodyText } from "./http/body.js";
import { applySecurityHeaders, ensureRequestId, readHeader } from "./http/headers.js";
import type { StructuredLogger } from "./logger.js";
import type { ProtocolRouter } from "./router/protocolRouter.js";
import {
  AuthError,
  ForbiddenError,
  InvalidRequestError,
  MethodNotFoundError,
  ParseError,
  toJsonRpc,
  type JsonRpcError,
} from "./rpc/errors.js";
import type { JsonRpcId } from "./rpc/types.js";
import type { SseSessionHub, SseSink } from "./transports/sseSessions.js";

/** Path of the streaming transport. */
export const SSE_PATH = "/sse";
/** Unauthenticated liveness check. */
export const HEALTH_PATH = "/health";

export interface HttpServerHandle {
  close: () => Promise<void>;
  /** Actual port bound by the HTTP server (useful when `0` was requested). */
  port: number;
}

export interface HttpRuntimeOptions {
  readonly host: string;
  readonly port: number;
  /** Path of the synchronous JSON-RPC endpoint. */
  readonly path: string;
  readonly maxBodyBytes?: number;
}

/** Collaborators shared with the other transports. */
export interface HttpServerDeps {
  readonly router: Pick<ProtocolRouter, "dispatch">;
  readonly hub: SseSessionHub;
  readonly broker: Pick<ExecutionBroker, "stats">;
  readonly auth: AuthGate;
  readonly bindPolicy: BindPolicy;
  readonly logger: StructuredLogger;
}

interface RequestMeta {
  readonly requestId: string;
  readonly startedAt: bigint;
}

type ParsedBody = { readonly ok: true; readonly message: unknown } | { readonly ok: false };

/**
 * Starts the HTTP listener serving the synchronous JSON-RPC endpoint, the SSE
 * streaming transport and the health check. Every request goes through the
 * bind policy, then the auth gate, before it reaches the router.
 */
export async function startHttpServer(options: HttpRuntimeOptions, deps: HttpServerDeps): Promise<HttpServerHandle> {
  const { logger } = deps;
  if (!deps.bindPolicy.permitsHost(options.host)) {
    throw new Error(`refusing to bind ${options.host}: remote access is disabled`);
  }

  const httpServer = createHttpServer((req, res) => {
    handleRequest(req, res, options, deps).catch((error: unknown) => {
      logger.error("http_request_failure", { message: error instanceof Error ? error.message : String(error) });
      if (!res.headersSent) {
        res.statusCode = 500;
      }
      res.end();
    });
  });

  httpServer.on("clientError", (error, socket) => {
    logger.warn("http_client_error", { message: error instanceof Error ? error.message : String(error) });
    socket.end("HTTP/1.1 400 Bad Request\r\n\r\n");
  });

  await new Promise<void>((resolve, reject) => {
    const onError = (error: Error): void => {
      reject(error);
    };
    httpServer.once("error", onError);
    httpServer.listen(options.port, options.host, () => {
      httpServer.off("error", onError);
      httpServer.on("error", (error) => {
        logger.error("http_server_error", { message: error.message });
      });
      logger.info("http_listening", {
        host: options.host,
        port: extractListeningPort(httpServer),
        requested_port: options.port,
        path: options.path,
        sse_path: SSE_PATH,
        auth_required: deps.auth.required,
      });
      resolve();
    });
  });

  return {
    close: async () => {
      deps.hub.closeAll("server_stopping");
      await new Promise<void>((resolve, reject) => {
        httpServer.close((error) => {
          if (error) {
            reject(error);
          } else {
            resolve();
          }
        });
        httpServer.closeIdleConnections();
      });
      logger.info("http_closed", { port: extractListeningPort(httpServer) });
    },
    port: extractListeningPort(httpServer),
  };
}

async function handleRequest(
  req: IncomingMessage,
  res: ServerResponse,
  options: HttpRuntimeOptions,
  deps: HttpServerDeps,
): Promise<void> {
  applySecurityHeaders(res);
  const meta: RequestMeta = { requestId: ensureRequestId(req.headers, res), startedAt: process.hrtime.bigint() };
  const url = new URL(req.url ?? "/", "http://localhost");
  const method = req.method ?? "GET";

  const peer = deps.bindPolicy.admits(req.socket.remoteAddress);
  if (!peer.ok) {
    deps.logger.warn("http_peer_rejected", { request_id: meta.requestId, remote: req.socket.remoteAddress ?? null });
    res.setHeader("Connection", "close");
    sendError(res, 403, new ForbiddenError("Forbidden", { requestId: null, hint: peer.reason }), deps.logger, meta);
    return;
  }

  if (url.pathname === HEALTH_PATH && method === "GET") {
    const stats = deps.broker.stats();
    sendJson(res, 200, {
      status: "ok",
      jobs: { live: stats.live, capacity: stats.capacity },
      sse_sessions: deps.hub.size,
    });
    return;
  }

  if (url.pathname !== options.path && url.pathname !== SSE_PATH) {
    sendError(res, 404, new MethodNotFoundError("Not found", { requestId: null, hint: url.pathname }), deps.logger, meta);
    return;
  }

  const decision = deps.auth.verifyHttp(req.headers, url);
  if (!decision.ok) {
    res.setHeader("Connection", "close");
    res.setHeader("WWW-Authenticate", "Bearer");
    sendError(res, 401, new AuthError("Authentication required", { requestId: null, hint: decision.reason }), deps.logger, meta);
    return;
  }

  if (url.pathname === SSE_PATH) {
    if (method === "GET") {
      openSseStream(res, deps, meta);
      return;
    }
    if (method === "POST") {
      await postToSession(req, res, url, options, deps, meta);
      return;
    }
    res.setHeader("Allow", "GET, POST");
    sendError(res, 405, new InvalidRequestError("Method Not Allowed", { requestId: null }), deps.logger, meta);
    return;
  }

  if (method !== "POST") {
    res.setHeader("Allow", "POST");
    sendError(res, 405, new InvalidRequestError("Method Not Allowed", { requestId: null }), deps.logger, meta);
    return;
  }
  await handleJsonRpc(req, res, options, deps, meta);
}

async function handleJsonRpc(
  req: IncomingMessage,
  res: ServerResponse,
  options: HttpRuntimeOptions,
  deps: HttpServerDeps,
  meta: RequestMeta,
): Promise<void> {
  const body = await readJson(req, res, options, deps, meta);
  if (!body.ok) {
    return;
  }

  const controller = new AbortController();
  res.on("close", () => {
    if (!res.writableFinished) {
      controller.abort();
    }
  });

  const response = await deps.router.dispatch(body.message, {
    transport: "http",
    httpRequestId: meta.requestId,
    signal: controller.signal,
  });
  if (controller.signal.aborted) {
    deps.logger.warn("http_client_gone", { request_id: meta.requestId });
    return;
  }
  if (!response) {
    res.statusCode = 202;
    res.end();
    logOutcome(deps.logger, meta, 202, null, null);
    return;
  }
  sendJson(res, 200, response);
  logOutcome(deps.logger, meta, 200, response.id, response.error?.code ?? null);
}

function openSseStream(res: ServerResponse, deps: HttpServerDeps, meta: RequestMeta): void {
  res.statusCode = 200;
  res.setHeader("Content-Type", "text/event-stream");
  res.setHeader("Connection", "keep-alive");
  res.flushHeaders();

  const sink: SseSink = {
    write: (frame) =>
      new Promise<void>((resolve, reject) => {
        res.write(frame, (error) => {
          if (error) {
            reject(error);
          } else {
            resolve();
          }
        });
      }),
    close: () => {
      res.end();
    },
  };
  const { sessionId, ready } = deps.hub.open(sink, meta.requestId);
  res.on("close", () => {
    deps.hub.close(sessionId);
  });
  ready.catch((error: unknown) => {
    deps.logger.warn("sse_open_failed", {
      session_id: sessionId,
      message: error instanceof Error ? error.message : String(error),
    });
  });
}

async function postToSession(
  req: IncomingMessage,
  res: ServerResponse,
  url: URL,
  options: HttpRuntimeOptions,
  deps: HttpServerDeps,
  meta: RequestMeta,
): Promise<void> {
  const sessionId = url.searchParams.get("sessionId") ?? readHeader(req.headers, "x-mcp-session-id");
  if (!sessionId || !deps.hub.has(sessionId)) {
    sendError(
      res,
      404,
      new InvalidRequestError("Unknown session", { requestId: null, meta: { session_id: sessionId ?? null } }),
      deps.logger,
      meta,
    );
    return;
  }
  const body = await readJson(req, res, options, deps, meta);
  if (!body.ok) {
    return;
  }
  const submitted = deps.hub.submit(sessionId, body.message);
  if (!submitted.accepted) {
    sendError(res, 404, new InvalidRequestError("Unknown session", { requestId: null }), deps.logger, meta);
    return;
  }
  res.statusCode = 202;
  res.end();
  deps.logger.debug("sse_request_accepted", { request_id: meta.requestId, session_id: sessionId });
}

/** Reads and decodes a JSON body, answering the request itself on failure. */
async function readJson(
  req: IncomingMessage,
  res: ServerResponse,
  options: HttpRuntimeOptions,
  deps: HttpServerDeps,
  meta: RequestMeta,
): Promise<ParsedBody> {
  let text: string;
  try {
    text = await readBodyText(req, options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES);
  } catch (error) {
    if (error instanceof HttpBodyError) {
      res.setHeader("Connection", "close");
      sendError(res, error.status, new InvalidRequestError(error.message, { requestId: null }), deps.logger, meta);
      return { ok: false };
    }
    throw error;
  }
  try {
    return { ok: true, message: JSON.parse(text) };
  } catch (error) {
    const hint = error instanceof Error ? error.message : String(error);
    sendError(res, 400, new ParseError("Parse error", { requestId: null, hint }), deps.logger, meta);
    return { ok: false };
  }
}

function sendJson(res: ServerResponse, status: number, payload: unknown): number {
  const body = JSON.stringify(payload);
  res.statusCode = status;
  res.setHeader("Content-Type", "application/json");
  res.end(body, "utf8");
  return Buffer.byteLength(body, "utf8");
}

function sendError(
  res: ServerResponse,
  status: number,
  error: JsonRpcError,
  logger: Pick<StructuredLogger, "info" | "warn" | "error">,
  meta: RequestMeta,
): void {
  sendJson(res, status, toJsonRpc(null, error));
  logOutcome(logger, meta, status, null, error.code);
}

function logOutcome(
  logger: Pick<StructuredLogger, "info" | "warn" | "error">,
  meta: RequestMeta,
  status: number,
  jsonrpcId: JsonRpcId | null,
  errorCode: number | null,
): void {
  const payload = {
    request_id: meta.requestId,
    jsonrpc_id: jsonrpcId,
    status,
    duration_ms: Number((process.hrtime.bigint() - meta.startedAt) / 1_000_000n),
    error_code: errorCode,
  };
  if (status >= 500) {
    logger.error("http_jsonrpc_completed", payload);
  } else if (status >= 400) {
    logger.warn("http_jsonrpc_completed", payload);
  } else {
    logger.info("http_jsonrpc_completed", payload);
  }
}

/** Safely retrieves the bound port once the HTTP server is listening. */
function extractListeningPort(server: NodeHttpServer): number {
  const address = server.address();
  if (typeof address === "object" && address && typeof address.port === "number") {
    return address.port;
  }
  return 0;
}
