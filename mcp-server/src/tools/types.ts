import type { z } from "zod";
import type { IJiraService } from "../services/types.js";
import type { Logger } from "../logger.js";

export type ToolErrorKind = "validation" | "remote" | "transport" | "unknown_tool" | "internal";

export interface ToolError {
  kind: ToolErrorKind;
  message: string;
  /** HTTP status, present for remote errors. */
  status?: number;
}

export type ToolResult =
  | { ok: true; data: unknown }
  | { ok: false; error: ToolError };

// Type aliases rather than interfaces: the MCP SDK's Tool type carries an index signature.
export type ToolInputSchema = {
  type: "object";
  properties: Record<string, Record<string, unknown>>;
  required?: string[];
};

export type ToolDescriptor = {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
};

export interface McpToolContext {
  services: {
    jira: IJiraService;
  };
  logger: Logger;
}

export interface McpTool {
  name: string;
  description: string;
  schema: z.ZodTypeAny;
  handler: (args: unknown, context: McpToolContext) => Promise<ToolResult>;
}
