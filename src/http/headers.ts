import { randomUUID } from "node:crypto";
import type { IncomingHttpHeaders } from "node:http";

/** Response surface the helpers need; satisfied by Node responses and test doubles. */
export interface HeaderSink {
  setHeader(name: string, value: string | number | readonly string[]): unknown;
}

/** Security headers applied to every HTTP response the broker serves. */
export function applySecurityHeaders(res: HeaderSink): void {
  res.setHeader("X-Content-Type-Options", "nosniff");
  res.setHeader("X-Frame-Options", "DENY");
  res.setHeader("Referrer-Policy", "no-referrer");
  res.setHeader("Cache-Control", "no-store");
}

/**
 * Guarantees that the request/response pair carries a correlation id.
 * Identifiers set by a proxy are preserved, otherwise a fresh UUID is minted.
 */
export function ensureRequestId(headers: IncomingHttpHeaders, res: HeaderSink): string {
  const incoming = headers["x-request-id"];
  const requestId = typeof incoming === "string" && incoming.trim() ? incoming.trim() : randomUUID();
  res.setHeader("x-request-id", requestId);
  return requestId;
}

/** Reads a single-valued header, taking the first value of repeated ones. */
export function readHeader(headers: IncomingHttpHeaders, name: string): string | undefined {
  const value = headers[name.toLowerCase()];
  const first = Array.isArray(value) ? value[0] : value;
  const trimmed = first?.trim();
  return trimmed ? trimmed : undefined;
}
