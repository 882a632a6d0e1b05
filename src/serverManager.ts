import type { Readable, Writable } from "node:stream";

import { ExecutionBroker } from "./broker/executionBroker.js";
import { JobTable } from "./broker/jobTable.js";
import { TickAdapter } from "./broker/tickAdapter.js";
import { RUN_CODE_TOOL, createRunCodeTool } from "./capabilities/runCode.js";
import { createScenePrompts } from "./capabilities/scenePrompts.js";
import { createSceneResources } from "./capabilities/sceneResources.js";
import type { BrokerConfig } from "./config/brokerConfig.js";
import { IntervalTickScheduler } from "./host/intervalScheduler.js";
import { SceneHost } from "./host/sceneHost.js";
import type { HostTickScheduler } from "./host/types.js";
import { AuthGate } from "./http/auth.js";
import { BindPolicy } from "./http/bindPolicy.js";
import { startHttpServer, type HttpServerHandle } from "./httpServer.js";
import type { StructuredLogger } from "./logger.js";
import { CapabilityRegistry } from "./registry/capabilityRegistry.js";
import type { CapabilityDescriptor } from "./registry/capabilities.js";
import { ProtocolRouter, type ServerInfo } from "./router/protocolRouter.js";
import { SseSessionHub } from "./transports/sseSessions.js";
import { StdioBridge } from "./transports/stdio.js";

export type ServerState = "stopped" | "starting" | "running" | "stopping";

export interface StdioStreams {
  readonly input: Readable;
  readonly output: Writable;
  /** Token presented by the bridge when it starts. */
  readonly token?: string;
}

export interface ServerManagerOptions {
  readonly config: BrokerConfig;
  readonly logger: StructuredLogger;
  /** Host scheduler; defaults to an {@link IntervalTickScheduler} driven by `config.tick`. */
  readonly scheduler?: HostTickScheduler;
  readonly host?: SceneHost;
  /** Job table to reuse, e.g. one surviving a previous run. */
  readonly table?: JobTable;
  /** Pipes served by the stdio bridge when `config.enableStdio` is set. */
  readonly stdio?: StdioStreams;
  readonly serverInfo?: ServerInfo;
}

/**
 * Composition root and lifecycle owner of one broker instance. Everything the
 * transports share is created here and handed down explicitly.
 */
export class ServerManager {
  readonly registry: CapabilityRegistry;
  readonly table: JobTable;
  readonly broker: ExecutionBroker;
  readonly router: ProtocolRouter;
  readonly hub: SseSessionHub;
  readonly host: SceneHost;

  private readonly config: BrokerConfig;
  private readonly logger: StructuredLogger;
  private readonly scheduler: HostTickScheduler;
  private readonly tickAdapter: TickAdapter;
  private readonly auth: AuthGate;
  private readonly bindPolicy: BindPolicy;
  private readonly stdioStreams?: StdioStreams;
  private stateInternal: ServerState = "stopped";
  private httpHandle: HttpServerHandle | null = null;
  private bridge: StdioBridge | null = null;
  private unsubscribeRegistry: (() => void) | null = null;

  constructor(options: ServerManagerOptions) {
    const { config, logger } = options;
    this.config = config;
    this.logger = logger;
    this.stdioStreams = options.stdio;
    this.host = options.host ?? new SceneHost();
    this.scheduler =
      options.scheduler ??
      new IntervalTickScheduler({ intervalMs: config.tick.intervalMs, budgetMs: config.tick.budgetMs, logger });
    this.registry = new CapabilityRegistry({ logger });
    this.table = options.table ?? new JobTable({ capacity: config.jobs.capacity, logger });
    this.tickAdapter = new TickAdapter({ table: this.table, outputLimitBytes: config.jobs.outputLimitBytes, logger });
    this.broker = new ExecutionBroker({
      registry: this.registry,
      table: this.table,
      scheduler: this.tickAdapter,
      defaultTimeoutMs: config.jobs.timeoutMs,
      logger,
    });
    this.router = new ProtocolRouter({
      registry: this.registry,
      broker: this.broker,
      serverInfo: options.serverInfo,
      logger,
    });
    this.hub = new SseSessionHub({
      router: this.router,
      broker: this.broker,
      logger,
      heartbeatMs: config.sse.heartbeatMs,
    });
    this.auth = new AuthGate({ token: config.http.token, allowQueryToken: !config.http.allowRemote });
    this.bindPolicy = new BindPolicy({ allowRemote: config.http.allowRemote });
  }

  get state(): ServerState {
    return this.stateInternal;
  }

  /** Port bound by the HTTP listener, `null` while it is not running. */
  get httpPort(): number | null {
    return this.httpHandle?.port ?? null;
  }

  /** The stdio bridge, once started. */
  get stdioBridge(): StdioBridge | null {
    return this.bridge;
  }

  async start(): Promise<void> {
    if (this.stateInternal !== "stopped") {
      throw new Error(`cannot start while ${this.stateInternal}`);
    }
    this.stateInternal = "starting";
    try {
      const swept = this.table.sweep("orphaned");
      if (swept > 0) {
        this.logger.warn("startup_sweep", { orphaned_jobs: swept });
      }
      this.ensureBuiltins();
      this.tickAdapter.attach(this.scheduler);
      this.unsubscribeRegistry = this.registry.onChange((change) => {
        this.hub.notifyListChanged(change.kind).catch((error: unknown) => {
          this.logger.warn("list_changed_broadcast_failed", {
            kind: change.kind,
            message: error instanceof Error ? error.message : String(error),
          });
        });
      });

      if (this.config.http.enabled) {
        this.httpHandle = await startHttpServer(
          { host: this.config.http.host, port: this.config.http.port, path: this.config.http.path },
          {
            router: this.router,
            hub: this.hub,
            broker: this.broker,
            auth: this.auth,
            bindPolicy: this.bindPolicy,
            logger: this.logger,
          },
        );
      }

      if (this.config.enableStdio && this.stdioStreams) {
        const bridge = new StdioBridge({
          router: this.router,
          broker: this.broker,
          auth: this.auth,
          token: this.stdioStreams.token,
          input: this.stdioStreams.input,
          output: this.stdioStreams.output,
          logger: this.logger,
        });
        this.bridge = bridge;
        await bridge.start();
      }
    } catch (error) {
      this.logger.error("server_start_failed", { message: error instanceof Error ? error.message : String(error) });
      await this.teardown();
      this.stateInternal = "stopped";
      throw error;
    }

    this.stateInternal = "running";
    this.logger.info("server_started", {
      http_port: this.httpPort,
      stdio: this.bridge?.isOpen ?? false,
      capabilities: this.registry.size,
    });
  }

  async stop(): Promise<void> {
    if (this.stateInternal !== "running") {
      return;
    }
    this.stateInternal = "stopping";
    try {
      await this.teardown();
    } finally {
      this.stateInternal = "stopped";
      this.logger.info("server_stopped", {});
    }
  }

  private async teardown(): Promise<void> {
    const handle = this.httpHandle;
    this.httpHandle = null;
    this.bridge?.close("server_stopping");
    this.bridge = null;
    this.hub.closeAll("server_stopping");
    const cancelled = this.broker.cancelAll("server_stopping");
    if (cancelled > 0) {
      this.logger.warn("jobs_cancelled_on_stop", { jobs: cancelled });
    }
    this.tickAdapter.detach();
    this.unsubscribeRegistry?.();
    this.unsubscribeRegistry = null;
    if (handle) {
      await handle.close();
    }
  }

  /** Registers the built-in capabilities that are missing and protects `run_code`. */
  private ensureBuiltins(): void {
    const builtins: CapabilityDescriptor[] = [
      createRunCodeTool(this.host),
      ...createSceneResources(this.host.scene),
      ...createScenePrompts(this.host.scene),
    ];
    for (const descriptor of builtins) {
      if (!this.registry.get(descriptor.kind, descriptor.name)) {
        this.registry.register(descriptor);
      }
    }
    this.registry.protect("tool", RUN_CODE_TOOL);
  }
}
