import process from "node:process";

import { DEFAULT_JOB_CAPACITY } from "../broker/jobTable.js";
import { DEFAULT_JOB_TIMEOUT_MS, MAX_JOB_TIMEOUT_MS } from "../broker/executionBroker.js";
import { DEFAULT_OUTPUT_LIMIT_BYTES } from "../broker/tickAdapter.js";
import { isLoopbackAddress } from "../http/bindPolicy.js";
import { parseRedactionDirectives } from "../logger.js";
import { DEFAULT_SSE_HEARTBEAT_MS } from "../transports/sseSessions.js";
import { readBool, readInt, readOptionalString, readString, type EnvSource } from "./env.js";

export const DEFAULT_HTTP_HOST = "127.0.0.1";
export const DEFAULT_HTTP_PORT = 12097;
export const DEFAULT_HTTP_PATH = "/mcp";
export const DEFAULT_TICK_INTERVAL_MS = 50;
export const DEFAULT_TICK_BUDGET_MS = 25;
/** Tokens shorter than this are accepted with a warning. */
export const MIN_RECOMMENDED_TOKEN_LENGTH = 16;

export interface HttpConfig {
  enabled: boolean;
  host: string;
  port: number;
  path: string;
  /** Shared secret; `null` disables authentication. */
  token: string | null;
  allowRemote: boolean;
}

export interface BrokerConfig {
  enableStdio: boolean;
  http: HttpConfig;
  jobs: {
    timeoutMs: number;
    capacity: number;
    outputLimitBytes: number;
  };
  tick: {
    intervalMs: number;
    budgetMs: number;
  };
  sse: {
    heartbeatMs: number;
  };
  log: {
    file: string | null;
    redact: boolean;
  };
}

export interface ConfigReport {
  readonly errors: string[];
  readonly warnings: string[];
}

/** Normalises an HTTP path so it is absolute and non-empty. */
export function normaliseHttpPath(raw: string): string {
  const cleaned = raw.trim();
  if (!cleaned.length) {
    throw new Error("HTTP path cannot be empty");
  }
  return cleaned.startsWith("/") ? cleaned : `/${cleaned}`;
}

/**
 * Builds the broker configuration from `MCP_*` environment variables. Values
 * that fail to parse fall back to their defaults; range checks are left to
 * {@link validateBrokerConfig} so they can be reported.
 */
export function loadBrokerConfig(env: EnvSource = process.env): BrokerConfig {
  return {
    enableStdio: true,
    http: {
      enabled: true,
      host: readString("MCP_HTTP_HOST", DEFAULT_HTTP_HOST, env),
      port: readInt("MCP_HTTP_PORT", DEFAULT_HTTP_PORT, undefined, env),
      path: normaliseHttpPath(readString("MCP_HTTP_PATH", DEFAULT_HTTP_PATH, env)),
      token: readOptionalString("MCP_HTTP_TOKEN", env) ?? null,
      allowRemote: readBool("MCP_HTTP_ALLOW_REMOTE", false, env),
    },
    jobs: {
      timeoutMs: readInt("MCP_JOB_TIMEOUT_MS", DEFAULT_JOB_TIMEOUT_MS, { min: 1 }, env),
      capacity: readInt("MCP_MAX_JOBS", DEFAULT_JOB_CAPACITY, { min: 1 }, env),
      outputLimitBytes: readInt("MCP_OUTPUT_LIMIT_BYTES", DEFAULT_OUTPUT_LIMIT_BYTES, { min: 1 }, env),
    },
    tick: {
      intervalMs: readInt("MCP_TICK_INTERVAL_MS", DEFAULT_TICK_INTERVAL_MS, { min: 1 }, env),
      budgetMs: readInt("MCP_TICK_BUDGET_MS", DEFAULT_TICK_BUDGET_MS, { min: 1 }, env),
    },
    sse: {
      heartbeatMs: readInt("MCP_SSE_HEARTBEAT_MS", DEFAULT_SSE_HEARTBEAT_MS, { min: 0 }, env),
    },
    log: {
      file: readOptionalString("MCP_LOG_FILE", env) ?? null,
      redact: parseRedactionDirectives(env.MCP_LOG_REDACT).enabled,
    },
  };
}

/**
 * Checks a configuration before the server starts. Errors prevent the start;
 * warnings are logged.
 */
export function validateBrokerConfig(config: BrokerConfig): ConfigReport {
  const errors: string[] = [];
  const warnings: string[] = [];
  const { http } = config;

  if (!config.enableStdio && !http.enabled) {
    errors.push("no transport enabled: pass --http or drop --no-stdio");
  }

  if (http.enabled) {
    if (!Number.isInteger(http.port) || http.port < 1024 || http.port > 65535) {
      errors.push(`HTTP port ${http.port} is outside 1024-65535`);
    }
    if (http.allowRemote && !http.token) {
      errors.push("remote access requires MCP_HTTP_TOKEN");
    }
    if (!http.allowRemote && !isLoopbackAddress(http.host)) {
      errors.push(`host ${http.host} is not a loopback address; set MCP_HTTP_ALLOW_REMOTE to bind it`);
    }
    if (!http.token) {
      warnings.push("no auth token configured: any local process can submit code");
    } else if (http.token.length < MIN_RECOMMENDED_TOKEN_LENGTH) {
      warnings.push(`auth token is shorter than ${MIN_RECOMMENDED_TOKEN_LENGTH} characters`);
    }
    if (http.allowRemote) {
      warnings.push("remote access is enabled: the broker accepts non-loopback peers");
    }
  }

  if (config.jobs.timeoutMs > MAX_JOB_TIMEOUT_MS) {
    errors.push(`job timeout ${config.jobs.timeoutMs} ms exceeds ${MAX_JOB_TIMEOUT_MS} ms`);
  }

  if (config.tick.budgetMs > config.tick.intervalMs) {
    warnings.push(`tick budget ${config.tick.budgetMs} ms exceeds the tick interval ${config.tick.intervalMs} ms`);
  }

  return { errors, warnings };
}
