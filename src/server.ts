#!/usr/bin/env node
import process from "node:process";
import { pathToFileURL } from "node:url";

import { loadBrokerConfig, validateBrokerConfig, type BrokerConfig } from "./config/brokerConfig.js";
import { readOptionalString } from "./config/env.js";
import { StructuredLogger } from "./logger.js";
import { ServerManager } from "./serverManager.js";
import { parseServerOptions } from "./serverOptions.js";

function resolveConfig(argv: readonly string[]): BrokerConfig {
  try {
    return parseServerOptions(argv, loadBrokerConfig());
  } catch (error) {
    process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
    process.exit(2);
  }
}

export async function main(argv: readonly string[] = process.argv.slice(2)): Promise<void> {
  const config = resolveConfig(argv);

  // The stdio bridge owns stdout, so logs move to stderr.
  const logger = new StructuredLogger({
    logFile: config.log.file,
    destination: config.enableStdio ? process.stderr : process.stdout,
    redactionEnabled: config.log.redact,
    redactSecrets: config.http.token ? [config.http.token] : [],
  });

  const report = validateBrokerConfig(config);
  for (const warning of report.warnings) {
    logger.warn("config_warning", { message: warning });
  }
  if (report.errors.length > 0) {
    logger.error("config_invalid", { errors: report.errors });
    await logger.flush();
    process.exit(1);
  }

  const manager = new ServerManager({
    config,
    logger,
    stdio: {
      input: process.stdin,
      output: process.stdout,
      token: readOptionalString("MCP_STDIO_TOKEN") ?? config.http.token ?? undefined,
    },
  });

  try {
    await manager.start();
  } catch (error) {
    logger.error("runtime_start_failed", { message: error instanceof Error ? error.message : String(error) });
    await logger.flush();
    process.exit(1);
  }

  const shutdown = (signal: NodeJS.Signals): void => {
    logger.warn("shutdown_signal", { signal });
    void manager
      .stop()
      .catch((error: unknown) => {
        logger.error("shutdown_failed", { message: error instanceof Error ? error.message : String(error) });
      })
      .finally(() => {
        void logger.flush().then(
          () => process.exit(0),
          () => process.exit(1),
        );
      });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  const bridge = manager.stdioBridge;
  if (bridge && !config.http.enabled) {
    await bridge.closedSignal();
    await manager.stop();
    await logger.flush();
  }
}

const isMain = process.argv[1] ? pathToFileURL(process.argv[1]).href === import.meta.url : false;

if (isMain) {
  main().catch((error: unknown) => {
    process.stderr.write(`${error instanceof Error ? error.stack ?? error.message : String(error)}\n`);
    process.exit(1);
  });
}
