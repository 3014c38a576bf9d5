import { createLogger } from "./logger.js";
import { toInputSchema, toolError } from "./tools/tool-utils.js";
import type { McpTool, McpToolContext, ToolDescriptor, ToolResult } from "./tools/types.js";

const log = createLogger("dispatcher");

function deepFreeze(value: unknown): void {
  if (typeof value !== "object" || value === null || Object.isFrozen(value)) return;
  Object.freeze(value);
  for (const child of Object.values(value)) {
    deepFreeze(child);
  }
}

/**
 * Routes named tool invocations to their handlers.
 *
 * `dispatch` keeps the structured {@link ToolResult} so callers can branch on
 * the error kind; `callTool` is the outer boundary that flattens it to the
 * single text payload MCP clients receive.
 */
export class ToolDispatcher {
  private readonly tools: ReadonlyMap<string, McpTool>;
  private readonly descriptors: readonly ToolDescriptor[];
  private readonly context: McpToolContext;

  constructor(tools: McpTool[], context: McpToolContext) {
    const byName = new Map<string, McpTool>();
    for (const tool of tools) {
      if (byName.has(tool.name)) {
        throw new Error(`Duplicate tool name: ${tool.name}`);
      }
      byName.set(tool.name, tool);
    }
    this.tools = byName;
    const descriptors: ToolDescriptor[] = tools.map((tool) => ({
      name: tool.name,
      description: tool.description,
      inputSchema: toInputSchema(tool.schema),
    }));
    deepFreeze(descriptors);
    this.descriptors = descriptors;
    this.context = context;
  }

  listTools(): ToolDescriptor[] {
    return [...this.descriptors];
  }

  async dispatch(name: string, args: Record<string, unknown> | undefined): Promise<ToolResult> {
    const tool = this.tools.get(name);
    if (!tool) {
      log.warn("Unknown tool requested", { toolName: name });
      return toolError("unknown_tool", `Unknown tool: ${name}`);
    }

    log.info("Tool call started", { toolName: name });
    const start = performance.now();

    const result = await tool.handler(args ?? {}, this.context);

    const durationMs = Math.round(performance.now() - start);
    log.info("Tool call completed", {
      toolName: name,
      durationMs,
      ...(!result.ok && { errorKind: result.error.kind }),
    });

    return result;
  }

  async callTool(name: string, args: Record<string, unknown> | undefined): Promise<string> {
    return formatToolResult(await this.dispatch(name, args));
  }
}

export function formatToolResult(result: ToolResult): string {
  if (result.ok) {
    return JSON.stringify(result.data, null, 2);
  }
  if (result.error.kind === "unknown_tool") {
    return result.error.message;
  }
  return `Error: ${result.error.message}`;
}
