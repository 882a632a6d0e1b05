import { z } from "zod";

import type { CodeEvaluator } from "../host/sceneHost.js";
import { defineTool, type ToolDescriptor } from "../registry/capabilities.js";

/** Name of the always-present code execution tool. */
export const RUN_CODE_TOOL = "run_code";

export const RunCodeInputSchema = z
  .object({
    code: z
      .string()
      .min(1, "code must not be empty")
      .describe("JavaScript source evaluated on the host. `scene`, `print` and `console` are in scope."),
  })
  .strict();

/**
 * Builds the privileged `run_code` tool. The code runs with full host access;
 * no sandboxing is attempted beyond the auth gate and the bind policy.
 */
export function createRunCodeTool(evaluator: CodeEvaluator): ToolDescriptor {
  return defineTool({
    name: RUN_CODE_TOOL,
    description:
      "Execute JavaScript on the host application's main context. Printed output is captured " +
      "and the value of the last expression is returned.",
    inputSchema: RunCodeInputSchema,
    handler: ({ code }, context) => evaluator.evaluate(code, context),
  });
}
