import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { CallToolRequestSchema, ListToolsRequestSchema } from "@modelcontextprotocol/sdk/types.js";
import { SERVER_NAME, SERVER_VERSION } from "./version.js";
import { formatToolResult, type ToolDispatcher } from "./dispatcher.js";

export interface McpServerDeps {
  dispatcher: ToolDispatcher;
}

export function createMcpServer(deps: McpServerDeps): Server {
  const { dispatcher } = deps;

  const mcpServer = new Server(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { capabilities: { tools: {} } },
  );

  mcpServer.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: dispatcher.listTools(),
  }));

  // Tool failures are reported in-band as text; they never become JSON-RPC errors.
  mcpServer.setRequestHandler(CallToolRequestSchema, async (request) => {
    const result = await dispatcher.dispatch(request.params.name, request.params.arguments);
    return {
      content: [{ type: "text" as const, text: formatToolResult(result) }],
      ...(!result.ok && { isError: true }),
    };
  });

  return mcpServer;
}
