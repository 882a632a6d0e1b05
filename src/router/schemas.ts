import { z } from "zod";

import { MAX_JOB_TIMEOUT_MS } from "../broker/executionBroker.js";

/** Envelope every inbound message must satisfy before dispatch. */
export const JsonRpcEnvelopeSchema = z.object({
  jsonrpc: z.literal("2.0"),
  id: z.union([z.string(), z.number()]).optional(),
  method: z.string().trim().min(1, "method must be a non-empty string"),
  params: z.unknown().optional(),
});
export type JsonRpcEnvelope = z.infer<typeof JsonRpcEnvelopeSchema>;

export const CapabilityKindSchema = z.enum(["tool", "resource", "prompt"]);

export const CapabilitiesListParamsSchema = z
  .object({ kind: CapabilityKindSchema.optional() })
  .passthrough();

export const CapabilitiesDescribeParamsSchema = z
  .object({
    name: z.string().min(1),
    kind: CapabilityKindSchema.optional(),
  })
  .passthrough();

export const CapabilitiesInvokeParamsSchema = z
  .object({
    name: z.string().min(1),
    kind: CapabilityKindSchema.optional(),
    arguments: z.unknown().optional(),
    correlation_id: z.string().min(1).optional(),
    timeout_ms: z.number().int().positive().max(MAX_JOB_TIMEOUT_MS).optional(),
  })
  .passthrough();
export type CapabilitiesInvokeParams = z.infer<typeof CapabilitiesInvokeParamsSchema>;

export const InitializeParamsSchema = z
  .object({
    protocolVersion: z.string().optional(),
    clientInfo: z.object({ name: z.string(), version: z.string() }).passthrough().optional(),
  })
  .passthrough();

export const ToolsCallParamsSchema = z
  .object({
    name: z.string().min(1),
    arguments: z.record(z.unknown()).optional(),
  })
  .passthrough();

export const ResourcesReadParamsSchema = z.object({ uri: z.string().min(1) }).passthrough();

export const PromptsGetParamsSchema = z
  .object({
    name: z.string().min(1),
    arguments: z.record(z.string()).optional(),
  })
  .passthrough();

export const CancelledNotificationParamsSchema = z
  .object({
    requestId: z.union([z.string(), z.number()]),
    reason: z.string().optional(),
  })
  .passthrough();

/** Pagination cursor accepted (and ignored) by the list methods. */
export const ListParamsSchema = z.object({ cursor: z.string().optional() }).passthrough();
