import { z } from "zod";
import { zodToJsonSchema } from "zod-to-json-schema";
import { formatZodError, JiraApiError, JiraTransportError } from "../errors.js";
import type { McpTool, McpToolContext, ToolError, ToolErrorKind, ToolInputSchema, ToolResult } from "./types.js";

export function toolSuccess(data: unknown): ToolResult {
  return { ok: true, data };
}

export function toolError(kind: ToolErrorKind, message: string, status?: number): ToolResult {
  return { ok: false, error: { kind, message, ...(status !== undefined && { status }) } };
}

export function classifyError(error: unknown): ToolError {
  if (error instanceof JiraApiError) {
    return { kind: "remote", message: error.message, status: error.status };
  }
  if (error instanceof JiraTransportError) {
    return { kind: "transport", message: error.message };
  }
  const message = error instanceof Error ? error.message : "Unknown error occurred";
  return { kind: "internal", message };
}

export function withErrorHandling(
  handler: (args: unknown, context: McpToolContext) => Promise<ToolResult> | ToolResult,
): (args: unknown, context: McpToolContext) => Promise<ToolResult> {
  return async (args: unknown, context: McpToolContext): Promise<ToolResult> => {
    try {
      return await handler(args, context);
    } catch (error) {
      const toolErr = classifyError(error);
      if (toolErr.kind === "internal") {
        context.logger.error("Tool handler error", {
          error: toolErr.message,
          stack: error instanceof Error ? error.stack : undefined,
        });
      } else {
        context.logger.warn("Jira call failed", toolErr);
      }
      return { ok: false, error: toolErr };
    }
  };
}

const JsonObjectSchema = z.object({
  type: z.literal("object"),
  properties: z.record(z.record(z.unknown())).default({}),
  required: z.array(z.string()).optional(),
});

/** JSON Schema advertised in tools/list, derived from the tool's zod schema. */
export function toInputSchema(schema: z.ZodTypeAny): ToolInputSchema {
  const json = JsonObjectSchema.parse(zodToJsonSchema(schema, { $refStrategy: "none" }));
  return {
    type: "object",
    properties: json.properties,
    ...(json.required && json.required.length > 0 && { required: json.required }),
  };
}

export function defineTool<T extends z.ZodTypeAny>(def: {
  name: string;
  description: string;
  schema: T;
  handler: (args: z.infer<T>, context: McpToolContext) => Promise<ToolResult> | ToolResult;
}): McpTool {
  return {
    name: def.name,
    description: def.description,
    schema: def.schema,
    handler: withErrorHandling(async (args: unknown, context: McpToolContext) => {
      const parsed = def.schema.safeParse(args ?? {});
      if (!parsed.success) {
        return toolError("validation", `Validation failed: ${formatZodError(parsed.error)}`);
      }
      return def.handler(parsed.data, context);
    }),
  };
}
