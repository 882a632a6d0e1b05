import { MAX_JOB_TIMEOUT_MS } from "./broker/executionBroker.js";
import { normaliseHttpPath, type BrokerConfig } from "./config/brokerConfig.js";

const FLAG_WITH_VALUE = new Set([
  "--http-port",
  "--http-host",
  "--http-path",
  "--job-timeout-ms",
  "--max-jobs",
  "--tick-interval-ms",
  "--log-file",
]);

/**
 * Ensures a provided numeric string can be converted to a positive integer.
 */
function parsePositiveInteger(value: string, flag: string, max = Number.MAX_SAFE_INTEGER): number {
  const num = Number(value);
  if (!Number.isFinite(num) || !Number.isInteger(num) || num <= 0) {
    throw new Error(`Value ${value} for ${flag} must be a positive integer.`);
  }
  if (num > max) {
    throw new Error(`Value ${value} for ${flag} must not exceed ${max}.`);
  }
  return num;
}

function parseNonEmpty(value: string, flag: string): string {
  const trimmed = value.trim();
  if (!trimmed.length) {
    throw new Error(`Value for ${flag} cannot be empty.`);
  }
  return trimmed;
}

/**
 * Applies command-line flags on top of a configuration loaded from the
 * environment. The function accepts raw `process.argv.slice(2)` content and
 * returns a new configuration; the input is left untouched. Unknown flags are
 * ignored.
 */
export function parseServerOptions(argv: readonly string[], base: BrokerConfig): BrokerConfig {
  const config: BrokerConfig = {
    enableStdio: base.enableStdio,
    http: { ...base.http },
    jobs: { ...base.jobs },
    tick: { ...base.tick },
    sse: { ...base.sse },
    log: { ...base.log },
  };

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (arg === undefined || !arg.startsWith("--")) {
      continue;
    }

    const separator = arg.indexOf("=");
    const flag = separator === -1 ? arg : arg.slice(0, separator);
    let value = separator === -1 ? undefined : arg.slice(separator + 1);

    if (FLAG_WITH_VALUE.has(flag) && (value === undefined || value === "")) {
      const next = argv[index + 1];
      if (next === undefined || next.startsWith("--")) {
        throw new Error(`Flag ${flag} requires a value.`);
      }
      value = next;
      index += 1;
    }

    switch (flag) {
      case "--no-stdio":
        config.enableStdio = false;
        break;
      case "--http":
        config.http.enabled = true;
        break;
      case "--no-http":
        config.http.enabled = false;
        break;
      case "--http-port":
        config.http.port = parsePositiveInteger(value ?? "", flag);
        config.http.enabled = true;
        break;
      case "--http-host":
        config.http.host = parseNonEmpty(value ?? "", flag);
        config.http.enabled = true;
        break;
      case "--http-path":
        config.http.path = normaliseHttpPath(value ?? "");
        config.http.enabled = true;
        break;
      case "--allow-remote":
        config.http.allowRemote = true;
        break;
      case "--job-timeout-ms":
        config.jobs.timeoutMs = parsePositiveInteger(value ?? "", flag, MAX_JOB_TIMEOUT_MS);
        break;
      case "--max-jobs":
        config.jobs.capacity = parsePositiveInteger(value ?? "", flag);
        break;
      case "--tick-interval-ms":
        config.tick.intervalMs = parsePositiveInteger(value ?? "", flag);
        break;
      case "--log-file":
        config.log.file = parseNonEmpty(value ?? "", flag);
        break;
      default:
        break;
    }
  }

  return config;
}
