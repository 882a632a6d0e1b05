import { Buffer } from "node:buffer";
import { timingSafeEqual } from "node:crypto";
import type { IncomingHttpHeaders } from "node:http";

const BEARER_PATTERN = /^Bearer\s+(.+)$/i;

/**
 * Normalises a header entry to an array so callers can iterate deterministically
 * regardless of the shape Node.js used to represent the incoming value.
 */
function normaliseHeaderValues(value: string | string[] | undefined): string[] {
  if (value === undefined) {
    return [];
  }
  return Array.isArray(value) ? value : [value];
}

/**
 * Constant-time equality between a presented token and the configured
 * secret. Missing or empty values never match.
 */
export function checkToken(presented: string | undefined, expected: string): boolean {
  if (!presented || expected.length === 0) {
    return false;
  }
  const provided = Buffer.from(presented);
  const reference = Buffer.from(expected);
  if (provided.length !== reference.length) {
    return false;
  }
  return timingSafeEqual(provided, reference);
}

/**
 * Extracts the token presented over HTTP: `Authorization: Bearer …` first,
 * then the `X-MCP-Token` header. Blank values are ignored.
 */
export function resolveHttpAuthToken(headers: IncomingHttpHeaders): string | undefined {
  for (const rawValue of normaliseHeaderValues(headers["authorization"])) {
    const match = BEARER_PATTERN.exec(rawValue.trim());
    const token = match?.[1]?.trim();
    if (token) {
      return token;
    }
  }
  for (const rawValue of normaliseHeaderValues(headers["x-mcp-token"])) {
    const token = rawValue.trim();
    if (token) {
      return token;
    }
  }
  return undefined;
}

/** Why a request was refused by the {@link AuthGate}. */
export type AuthRejection = "missing_token" | "invalid_token" | "query_token_disabled";

export type AuthDecision = { readonly ok: true } | { readonly ok: false; readonly reason: AuthRejection };

export interface AuthGateOptions {
  /** Shared secret. `null` or empty disables authentication. */
  readonly token: string | null;
  /**
   * Accept `?token=` on URLs, for EventSource clients that cannot set headers.
   * Only sensible on loopback: tokens in URLs end up in logs and histories.
   */
  readonly allowQueryToken?: boolean;
}

/**
 * Single authentication gate shared by every transport. Requests are checked
 * before they reach the router; without a configured token everything passes.
 */
export class AuthGate {
  private readonly token: string | null;
  private readonly allowQueryToken: boolean;

  constructor(options: AuthGateOptions) {
    this.token = options.token && options.token.length > 0 ? options.token : null;
    this.allowQueryToken = options.allowQueryToken ?? false;
  }

  get required(): boolean {
    return this.token !== null;
  }

  /** Checks a token presented out of band (the stdio bridge's start token). */
  verify(presented: string | undefined): AuthDecision {
    if (this.token === null) {
      return { ok: true };
    }
    if (!presented) {
      return { ok: false, reason: "missing_token" };
    }
    return checkToken(presented, this.token) ? { ok: true } : { ok: false, reason: "invalid_token" };
  }

  /** Checks the headers, then the `token` query parameter when allowed. */
  verifyHttp(headers: IncomingHttpHeaders, url: URL): AuthDecision {
    if (this.token === null) {
      return { ok: true };
    }
    const headerToken = resolveHttpAuthToken(headers);
    if (headerToken) {
      return this.verify(headerToken);
    }
    const queryToken = url.searchParams.get("token");
    if (queryToken) {
      return this.allowQueryToken ? this.verify(queryToken) : { ok: false, reason: "query_token_disabled" };
    }
    return { ok: false, reason: "missing_token" };
  }
}
