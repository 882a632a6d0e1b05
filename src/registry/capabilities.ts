import { z } from "zod";
import { zodToJsonSchema } from "zod-to-json-schema";

import type { CapabilityKind, HostExecutionContext, HostTask } from "../host/types.js";

/** JSON schema advertised to clients, derived from the zod input schema. */
export type JsonSchema = ReturnType<typeof zodToJsonSchema>;

/**
 * Outcome of binding a raw payload to a capability: either a host task ready
 * to run or the schema issues explaining why the payload was refused.
 */
export type BoundInvocation =
  | { readonly ok: true; readonly task: HostTask }
  | { readonly ok: false; readonly issues: readonly z.ZodIssue[] };

interface CapabilityBase {
  readonly name: string;
  readonly description: string;
  readonly inputSchema: z.ZodTypeAny;
  readonly jsonSchema: JsonSchema;
  /** Validates the payload and closes over the handler. Never touches host state. */
  bind(raw: unknown): BoundInvocation;
}

export interface ToolDescriptor extends CapabilityBase {
  readonly kind: "tool";
}

export interface ResourceDescriptor extends CapabilityBase {
  readonly kind: "resource";
  readonly uri: string;
  readonly mimeType: string;
}

/** Argument advertised by `prompts/list`. */
export interface PromptArgument {
  readonly name: string;
  readonly description?: string;
  readonly required: boolean;
}

export interface PromptDescriptor extends CapabilityBase {
  readonly kind: "prompt";
  readonly title?: string;
  readonly arguments: readonly PromptArgument[];
}

/** Tagged variant over the three capability families. */
export type CapabilityDescriptor = ToolDescriptor | ResourceDescriptor | PromptDescriptor;

/** Narrows a descriptor union to the member matching `kind`. */
export type DescriptorOfKind<K extends CapabilityKind> = Extract<CapabilityDescriptor, { kind: K }>;

/** Message returned by a prompt, in MCP shape. */
export const PromptMessageSchema = z.object({
  role: z.enum(["user", "assistant"]),
  content: z.object({ type: z.literal("text"), text: z.string() }),
});
export type PromptMessage = z.infer<typeof PromptMessageSchema>;

export const PromptMessagesSchema = z.array(PromptMessageSchema);

const EMPTY_INPUT = z.object({}).strict();

function bindWith<S extends z.ZodTypeAny>(
  schema: S,
  run: (input: z.output<S>, context: HostExecutionContext) => unknown,
): (raw: unknown) => BoundInvocation {
  return (raw) => {
    const parsed = schema.safeParse(raw ?? {});
    if (!parsed.success) {
      return { ok: false, issues: parsed.error.issues };
    }
    const input: z.output<S> = parsed.data;
    return { ok: true, task: (context) => run(input, context) };
  };
}

export interface ToolDefinition<S extends z.ZodTypeAny> {
  readonly name: string;
  readonly description: string;
  readonly inputSchema: S;
  /** Runs on the host execution context. The return value becomes the job value. */
  readonly handler: (input: z.output<S>, context: HostExecutionContext) => unknown;
}

export function defineTool<S extends z.ZodTypeAny>(definition: ToolDefinition<S>): ToolDescriptor {
  return {
    kind: "tool",
    name: definition.name,
    description: definition.description,
    inputSchema: definition.inputSchema,
    jsonSchema: zodToJsonSchema(definition.inputSchema, { strictUnions: true }),
    bind: bindWith(definition.inputSchema, definition.handler),
  };
}

export interface ResourceDefinition {
  readonly name: string;
  readonly uri: string;
  readonly description: string;
  readonly mimeType?: string;
  /** Renders the resource body on the host execution context. */
  readonly read: (context: HostExecutionContext) => string;
}

export function defineResource(definition: ResourceDefinition): ResourceDescriptor {
  return {
    kind: "resource",
    name: definition.name,
    uri: definition.uri,
    mimeType: definition.mimeType ?? "text/markdown",
    description: definition.description,
    inputSchema: EMPTY_INPUT,
    jsonSchema: zodToJsonSchema(EMPTY_INPUT, { strictUnions: true }),
    bind: bindWith(EMPTY_INPUT, (_input, context) => definition.read(context)),
  };
}

export interface PromptDefinition<Shape extends z.ZodRawShape> {
  readonly name: string;
  readonly title?: string;
  readonly description: string;
  /** Prompt arguments travel as strings, so shapes are usually string fields. */
  readonly argsSchema: Shape;
  readonly render: (
    args: z.output<z.ZodObject<Shape>>,
    context: HostExecutionContext,
  ) => PromptMessage[];
}

function promptArgumentsFromShape(shape: z.ZodRawShape): PromptArgument[] {
  return Object.entries(shape).map(([name, field]) => ({
    name,
    description: field.description,
    required: !field.isOptional(),
  }));
}

export function definePrompt<Shape extends z.ZodRawShape>(definition: PromptDefinition<Shape>): PromptDescriptor {
  const schema = z.object(definition.argsSchema);
  return {
    kind: "prompt",
    name: definition.name,
    title: definition.title,
    description: definition.description,
    arguments: promptArgumentsFromShape(definition.argsSchema),
    inputSchema: schema,
    jsonSchema: zodToJsonSchema(schema, { strictUnions: true }),
    bind: bindWith(schema, definition.render),
  };
}

/** Formats zod issues as `path: message` strings for error payloads. */
export function formatIssues(issues: readonly z.ZodIssue[]): string {
  return issues.map((issue) => `${issue.path.join(".") || "root"}: ${issue.message}`).join("; ");
}
