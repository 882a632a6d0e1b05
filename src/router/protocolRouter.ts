import { LATEST_PROTOCOL_VERSION, SUPPORTED_PROTOCOL_VERSIONS } from "@modelcontextprotocol/sdk/types.js";
import type { z } from "zod";

import type { ExecutionBroker, InvocationResult } from "../broker/executionBroker.js";
import type { CapabilityKind } from "../host/types.js";
import { runWithJsonRpcContext, type JsonRpcRouteContext } from "../infra/jsonRpcContext.js";
import type { StructuredLogger } from "../logger.js";
import type { CapabilityRegistry } from "../registry/capabilityRegistry.js";
import { PromptMessagesSchema, formatIssues, type CapabilityDescriptor } from "../registry/capabilities.js";
import {
  InternalError,
  InvalidRequestError,
  JsonRpcError,
  MethodNotFoundError,
  UnknownCapabilityError,
  ValidationError,
  toJsonRpc,
} from "../rpc/errors.js";
import type { JsonRpcId, JsonRpcResponse } from "../rpc/types.js";
import {
  CancelledNotificationParamsSchema,
  CapabilitiesDescribeParamsSchema,
  CapabilitiesInvokeParamsSchema,
  CapabilitiesListParamsSchema,
  CapabilityKindSchema,
  InitializeParamsSchema,
  JsonRpcEnvelopeSchema,
  ListParamsSchema,
  PromptsGetParamsSchema,
  ResourcesReadParamsSchema,
  ToolsCallParamsSchema,
} from "./schemas.js";

/** Routing metadata supplied by the transport; the router adds the request id. */
export type RouteContext = Omit<JsonRpcRouteContext, "requestId">;

export interface ServerInfo {
  readonly name: string;
  readonly version: string;
}

export interface ProtocolRouterOptions {
  readonly registry: CapabilityRegistry;
  readonly broker: ExecutionBroker;
  readonly serverInfo?: ServerInfo;
  readonly instructions?: string;
  readonly logger?: Pick<StructuredLogger, "debug" | "info" | "warn" | "error">;
}

/** Entry returned by `capabilities/list` and `capabilities/describe`. */
export interface CapabilitySummary {
  readonly name: string;
  readonly kind: CapabilityKind;
  readonly description: string;
  readonly schema: unknown;
  readonly uri?: string;
  readonly mimeType?: string;
}

interface MethodCall {
  readonly id: JsonRpcId;
  readonly context: RouteContext;
}

type MethodHandler = (params: unknown, call: MethodCall) => Promise<unknown> | unknown;

export const DEFAULT_SERVER_INFO: ServerInfo = { name: "tick-broker", version: "0.1.0" };

/** Text returned by `tools/call` when a job succeeded without printing anything. */
export const EMPTY_OUTPUT_TEXT = "Executed successfully (no output)";

function parseParams<S extends z.ZodTypeAny>(schema: S, params: unknown): z.output<S> {
  const parsed = schema.safeParse(params ?? {});
  if (!parsed.success) {
    throw new ValidationError("Invalid params", {
      hint: formatIssues(parsed.error.issues),
      issues: parsed.error.issues,
    });
  }
  return parsed.data;
}

function extractRequestId(candidate: unknown): JsonRpcId {
  if (typeof candidate !== "object" || candidate === null || !("id" in candidate)) {
    return null;
  }
  const { id } = candidate;
  return typeof id === "string" || typeof id === "number" ? id : null;
}

export function summariseCapability(descriptor: CapabilityDescriptor): CapabilitySummary {
  const summary: CapabilitySummary = {
    name: descriptor.name,
    kind: descriptor.kind,
    description: descriptor.description,
    schema: descriptor.jsonSchema,
  };
  return descriptor.kind === "resource" ? { ...summary, uri: descriptor.uri, mimeType: descriptor.mimeType } : summary;
}

function correlationFor(id: JsonRpcId): string | null {
  return id === null ? null : String(id);
}

function ambiguousNameHint(name: string, kinds: readonly CapabilityKind[]): string {
  return `'${name}' names a ${kinds.join(" and a ")}; pass kind to choose`;
}

/**
 * Transport-agnostic dispatcher. It receives a decoded JSON value, validates
 * the envelope and parameters with zod, and answers with a JSON-RPC response
 * (or `null` for notifications). Invocation failures are part of the result
 * payload; only protocol-level problems become JSON-RPC errors.
 */
export class ProtocolRouter {
  private readonly registry: CapabilityRegistry;
  private readonly broker: ExecutionBroker;
  private readonly serverInfo: ServerInfo;
  private readonly instructions?: string;
  private readonly logger?: Pick<StructuredLogger, "debug" | "info" | "warn" | "error">;
  private readonly methods: ReadonlyMap<string, MethodHandler>;
  private readonly notifications: ReadonlyMap<string, MethodHandler>;

  constructor(options: ProtocolRouterOptions) {
    this.registry = options.registry;
    this.broker = options.broker;
    this.serverInfo = options.serverInfo ?? DEFAULT_SERVER_INFO;
    this.instructions = options.instructions;
    this.logger = options.logger;
    this.methods = new Map<string, MethodHandler>([
      ["initialize", (params) => this.initialize(params)],
      ["ping", () => ({})],
      ["capabilities/list", (params) => this.listCapabilities(params)],
      ["capabilities/describe", (params) => this.describeCapability(params)],
      ["capabilities/invoke", (params, call) => this.invokeCapability(params, call)],
      ["tools/list", (params) => this.listTools(params)],
      ["tools/call", (params, call) => this.callTool(params, call)],
      ["resources/list", (params) => this.listResources(params)],
      ["resources/read", (params, call) => this.readResource(params, call)],
      ["prompts/list", (params) => this.listPrompts(params)],
      ["prompts/get", (params, call) => this.getPrompt(params, call)],
    ]);
    this.notifications = new Map<string, MethodHandler>([
      ["notifications/initialized", () => this.logger?.info("client_initialized", {})],
      ["notifications/cancelled", (params, call) => this.cancelRequest(params, call)],
    ]);
  }

  /** Names of the request methods the router answers. */
  get methodNames(): string[] {
    return [...this.methods.keys()];
  }

  async dispatch(message: unknown, context: RouteContext = {}): Promise<JsonRpcResponse | null> {
    const envelope = JsonRpcEnvelopeSchema.safeParse(message);
    if (!envelope.success) {
      const id = extractRequestId(message);
      return toJsonRpc(
        id,
        new InvalidRequestError("Invalid Request", { requestId: id, hint: formatIssues(envelope.error.issues) }),
      );
    }

    const { method, params } = envelope.data;
    const isNotification = envelope.data.id === undefined;
    const id: JsonRpcId = envelope.data.id ?? null;

    return runWithJsonRpcContext({ ...context, requestId: id }, async (): Promise<JsonRpcResponse | null> => {
      const call: MethodCall = { id, context };
      if (isNotification) {
        await this.handleNotification(method, params, call);
        return null;
      }

      const handler = this.methods.get(method);
      if (!handler) {
        this.logger?.warn("rpc_method_not_found", { method });
        return toJsonRpc(id, new MethodNotFoundError("Method not found", { hint: `Unknown method '${method}'` }));
      }

      try {
        const result = await handler(params, call);
        return { jsonrpc: "2.0", id, result };
      } catch (error) {
        if (error instanceof JsonRpcError) {
          this.logger?.warn("rpc_error", { method, code: error.code, message: error.message });
          return toJsonRpc(id, error);
        }
        const message = error instanceof Error ? error.message : String(error);
        this.logger?.error("rpc_handler_failed", { method, message });
        return toJsonRpc(id, new InternalError("Internal error", { hint: message }));
      }
    });
  }

  private async handleNotification(method: string, params: unknown, call: MethodCall): Promise<void> {
    const handler = this.notifications.get(method) ?? this.methods.get(method);
    if (!handler) {
      this.logger?.debug("rpc_notification_ignored", { method });
      return;
    }
    try {
      await handler(params, call);
    } catch (error) {
      this.logger?.warn("rpc_notification_failed", {
        method,
        message: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private initialize(params: unknown): unknown {
    const { protocolVersion } = parseParams(InitializeParamsSchema, params);
    const negotiated =
      protocolVersion && SUPPORTED_PROTOCOL_VERSIONS.includes(protocolVersion) ? protocolVersion : LATEST_PROTOCOL_VERSION;
    return {
      protocolVersion: negotiated,
      capabilities: {
        tools: { listChanged: true },
        resources: { listChanged: true, subscribe: false },
        prompts: { listChanged: true },
      },
      serverInfo: { name: this.serverInfo.name, version: this.serverInfo.version },
      ...(this.instructions ? { instructions: this.instructions } : {}),
    };
  }

  private listCapabilities(params: unknown): unknown {
    const { kind } = parseParams(CapabilitiesListParamsSchema, params);
    const descriptors: CapabilityDescriptor[] = kind ? this.registry.list(kind) : this.registry.list();
    return { capabilities: descriptors.map(summariseCapability) };
  }

  /**
   * Kinds a request may address. An explicit kind wins; otherwise every kind
   * registering the name, or `tool` when none does.
   */
  private candidateKinds(name: string, kind: CapabilityKind | undefined): CapabilityKind[] {
    if (kind) {
      return [kind];
    }
    const matches = CapabilityKindSchema.options.filter((candidate) => this.registry.get(candidate, name));
    return matches.length > 0 ? matches : ["tool"];
  }

  private describeCapability(params: unknown): CapabilitySummary {
    const parsed = parseParams(CapabilitiesDescribeParamsSchema, params);
    const { name } = parsed;
    const [kind = "tool", ...others] = this.candidateKinds(name, parsed.kind);
    if (others.length > 0) {
      throw new ValidationError("Invalid params", { hint: ambiguousNameHint(name, [kind, ...others]) });
    }
    const descriptor = this.registry.get(kind, name);
    if (!descriptor) {
      throw new UnknownCapabilityError(`Unknown ${kind} '${name}'`, { meta: { kind, name } });
    }
    return summariseCapability(descriptor);
  }

  private async invokeCapability(params: unknown, call: MethodCall): Promise<unknown> {
    const parsed = parseParams(CapabilitiesInvokeParamsSchema, params);
    const correlationId = parsed.correlation_id ?? correlationFor(call.id);
    const [kind = "tool", ...others] = this.candidateKinds(parsed.name, parsed.kind);
    if (others.length > 0) {
      return {
        correlation_id: correlationId,
        job_id: null,
        ok: false,
        error: { kind: "InvalidPayload", message: ambiguousNameHint(parsed.name, [kind, ...others]) },
      };
    }
    const result = await this.broker.invoke({ kind, name: parsed.name }, parsed.arguments, {
      correlationId,
      timeoutMs: parsed.timeout_ms,
      sessionId: call.context.sessionId,
      signal: call.context.signal,
    });
    return {
      correlation_id: correlationId,
      job_id: result.jobId,
      ok: result.ok,
      ...(result.output ? { output: result.output } : {}),
      ...(result.ok ? {} : { error: result.error }),
    };
  }

  private listTools(params: unknown): unknown {
    parseParams(ListParamsSchema, params);
    return {
      tools: this.registry.list("tool").map((tool) => ({
        name: tool.name,
        description: tool.description,
        inputSchema: tool.jsonSchema,
      })),
    };
  }

  private async callTool(params: unknown, call: MethodCall): Promise<unknown> {
    const { name, arguments: args } = parseParams(ToolsCallParamsSchema, params);
    const result = await this.broker.invoke({ kind: "tool", name }, args ?? {}, {
      correlationId: correlationFor(call.id),
      sessionId: call.context.sessionId,
      signal: call.context.signal,
    });
    if (result.ok) {
      return { content: [{ type: "text", text: result.output.text || EMPTY_OUTPUT_TEXT }], isError: false };
    }
    const printed = result.output?.text ? `\n\nOutput before the error:\n${result.output.text}` : "";
    return {
      content: [{ type: "text", text: `Error (${result.error.kind}): ${result.error.message}${printed}` }],
      isError: true,
    };
  }

  private listResources(params: unknown): unknown {
    parseParams(ListParamsSchema, params);
    return {
      resources: this.registry.list("resource").map((resource) => ({
        uri: resource.uri,
        name: resource.name,
        description: resource.description,
        mimeType: resource.mimeType,
      })),
    };
  }

  private async readResource(params: unknown, call: MethodCall): Promise<unknown> {
    const { uri } = parseParams(ResourcesReadParamsSchema, params);
    const resource = this.registry.findResource(uri);
    if (!resource) {
      throw new UnknownCapabilityError(`Unknown resource '${uri}'`, { meta: { kind: "resource", uri } });
    }
    const result = await this.broker.invoke({ kind: "resource", name: resource.name }, {}, {
      correlationId: correlationFor(call.id),
      sessionId: call.context.sessionId,
      signal: call.context.signal,
    });
    if (!result.ok) {
      throw this.invocationFailure(result);
    }
    const { value } = result.output;
    const text = typeof value === "string" ? value : JSON.stringify(value);
    return { contents: [{ uri: resource.uri, mimeType: resource.mimeType, text }] };
  }

  private listPrompts(params: unknown): unknown {
    parseParams(ListParamsSchema, params);
    return {
      prompts: this.registry.list("prompt").map((prompt) => ({
        name: prompt.name,
        ...(prompt.title ? { title: prompt.title } : {}),
        description: prompt.description,
        arguments: prompt.arguments,
      })),
    };
  }

  private async getPrompt(params: unknown, call: MethodCall): Promise<unknown> {
    const { name, arguments: args } = parseParams(PromptsGetParamsSchema, params);
    const prompt = this.registry.get("prompt", name);
    if (!prompt) {
      throw new UnknownCapabilityError(`Unknown prompt '${name}'`, { meta: { kind: "prompt", name } });
    }
    const result = await this.broker.invoke({ kind: "prompt", name }, args ?? {}, {
      correlationId: correlationFor(call.id),
      sessionId: call.context.sessionId,
      signal: call.context.signal,
    });
    if (!result.ok) {
      throw this.invocationFailure(result);
    }
    const messages = PromptMessagesSchema.safeParse(result.output.value);
    if (!messages.success) {
      throw new InternalError(`Prompt '${name}' produced malformed messages`, {
        hint: formatIssues(messages.error.issues),
      });
    }
    return { description: prompt.description, messages: messages.data };
  }

  private cancelRequest(params: unknown, call: MethodCall): void {
    const { requestId, reason } = parseParams(CancelledNotificationParamsSchema, params);
    const cancelled = this.broker.cancelByCorrelation(String(requestId), call.context.sessionId ?? undefined);
    this.logger?.info("request_cancelled", { target: requestId, reason: reason ?? null, jobs: cancelled });
  }

  /** Maps a failed invocation of a resource or prompt to a JSON-RPC error. */
  private invocationFailure(result: Extract<InvocationResult, { ok: false }>): JsonRpcError {
    const options = { meta: { kind: result.error.kind, job_id: result.jobId } };
    switch (result.error.kind) {
      case "UnknownCapability":
        return new UnknownCapabilityError(result.error.message, options);
      case "InvalidPayload":
        return new ValidationError("Invalid params", {
          ...options,
          hint: result.error.message,
          issues: result.error.issues,
        });
      default:
        return new InternalError(`${result.error.kind}: ${result.error.message}`, options);
    }
  }
}
