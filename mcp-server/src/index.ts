#!/usr/bin/env node
import "dotenv/config";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createMcpServer } from "./server.js";
import { createHttpTransport } from "./transport.js";
import { ToolDispatcher } from "./dispatcher.js";
import { JiraService } from "./services/jira.js";
import { createDefaultTools } from "./tools/registry.js";
import { createLogger } from "./logger.js";
import { parseConfig, toJiraSettings, type AppConfig } from "./config.js";
import type { McpToolContext } from "./tools/types.js";

const log = createLogger("mcp-server");

async function serveStdio(dispatcher: ToolDispatcher): Promise<void> {
  const server = createMcpServer({ dispatcher });
  await server.connect(new StdioServerTransport());
  log.info("MCP server listening on stdio");
}

function serveHttp(dispatcher: ToolDispatcher, config: AppConfig): void {
  const app = createHttpTransport(() => createMcpServer({ dispatcher }), config.MCP_PATH);

  const server = app.listen(config.PORT, config.HOST, () => {
    log.info(`MCP Server listening on http://${config.HOST}:${config.PORT}`);
    log.info(`MCP endpoint: http://${config.HOST}:${config.PORT}${config.MCP_PATH}`);
    log.info(`Health check: http://${config.HOST}:${config.PORT}/health`);
  });

  const shutdown = () => {
    log.info("Shutting down gracefully...");
    server.close(() => {
      log.info("HTTP server closed");
      process.exit(0);
    });
    setTimeout(() => {
      log.warn("Forced shutdown after timeout");
      process.exit(1);
    }, 10_000).unref();
  };

  process.on("SIGTERM", shutdown);
  process.on("SIGINT", shutdown);
}

async function main() {
  const config = parseConfig();
  const settings = toJiraSettings(config);

  log.info("Starting Jira MCP Server...");
  log.info(`Configuration: JIRA_URL=${settings.baseUrl}, JIRA_TIMEOUT=${settings.timeoutSeconds}s, MCP_TRANSPORT=${config.MCP_TRANSPORT}`);

  const context: McpToolContext = {
    services: { jira: new JiraService({ settings }) },
    logger: createLogger("tools"),
  };
  const dispatcher = new ToolDispatcher(createDefaultTools(), context);

  if (config.MCP_TRANSPORT === "http") {
    serveHttp(dispatcher, config);
  } else {
    await serveStdio(dispatcher);
  }
}

main().catch((error) => {
  log.error("Failed to start MCP server:", error);
  process.exit(1);
});
