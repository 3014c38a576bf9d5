import express, { Request, Response, NextFunction } from "express";
import type { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { getErrorMessage } from "./errors.js";
import { createLogger } from "./logger.js";
import { SERVER_VERSION } from "./version.js";

/**
 * Standard JSON-RPC 2.0 error codes.
 * @see https://www.jsonrpc.org/specification#error_object
 */
const JSON_RPC_INTERNAL_ERROR = -32603;
const JSON_RPC_SERVER_ERROR = -32000;

const log = createLogger("transport");

function jsonRpcError(res: Response, status: number, code: number, message: string): void {
  res.status(status).json({ jsonrpc: "2.0", error: { code, message }, id: null });
}

function requestTiming(req: Request, res: Response, next: NextFunction): void {
  const start = performance.now();
  res.on("finish", () => {
    const durationMs = Math.round(performance.now() - start);
    log.debug("HTTP request", { method: req.method, path: req.path, status: res.statusCode, durationMs });
  });
  next();
}

/**
 * Stateless Streamable HTTP endpoint: every POST gets a fresh MCP server and
 * transport, both closed when the response ends.
 */
export function createHttpTransport(createServer: () => Server, mcpPath: string): express.Application {
  const app = express();

  app.use(express.json());
  app.use(requestTiming);

  app.get("/health", (_req: Request, res: Response) => {
    res.json({
      status: "healthy",
      timestamp: new Date().toISOString(),
      version: SERVER_VERSION,
    });
  });

  app.get("/ready", (_req: Request, res: Response) => {
    res.json({
      ready: true,
      timestamp: new Date().toISOString(),
    });
  });

  app.post(mcpPath, async (req: Request, res: Response) => {
    const mcpServer = createServer();
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: undefined,
    });
    res.on("close", () => {
      Promise.all([transport.close(), mcpServer.close()]).catch((error: unknown) => {
        log.warn("Failed to close MCP transport", { error: getErrorMessage(error) });
      });
    });

    try {
      await mcpServer.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      const body: unknown = req.body;
      const method =
        typeof body === "object" && body !== null && "method" in body && typeof body.method === "string"
          ? body.method
          : "unknown";
      log.error("Error handling MCP request", { method, error: getErrorMessage(error) });
      if (!res.headersSent) {
        jsonRpcError(res, 500, JSON_RPC_INTERNAL_ERROR, "Internal server error");
      }
    }
  });

  const methodNotAllowed = (_req: Request, res: Response) => {
    jsonRpcError(res, 405, JSON_RPC_SERVER_ERROR, "Method not allowed.");
  };

  app.get(mcpPath, methodNotAllowed);
  app.delete(mcpPath, methodNotAllowed);

  return app;
}
