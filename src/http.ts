import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import cors from "cors";
import express, { type Express, type Request, type Response } from "express";
import { createServer, SERVER_NAME, SERVER_VERSION } from "./server.js";
import type { CalendarServices } from "./types/tools.js";
import { createLogger } from "./utils/logger.js";

const logger = createLogger("http");

export const MCP_PATH = "/mcp";

function jsonRpcError(res: Response, status: number, code: number, message: string): void {
  res.status(status).json({ jsonrpc: "2.0", error: { code, message }, id: null });
}

/**
 * Stateless streamable HTTP: every POST gets a fresh MCP server and transport
 * over the shared calendar services. No session ids, so GET and DELETE are refused.
 */
export function createHttpApp(services: CalendarServices): Express {
  const app = express();
  app.use(cors({ exposedHeaders: ["Mcp-Session-Id"] }));
  app.use(express.json({ limit: "1mb" }));

  app.get("/health", (_req: Request, res: Response) => {
    res.json({ status: "ok", name: SERVER_NAME, version: SERVER_VERSION });
  });

  app.post(MCP_PATH, async (req: Request, res: Response) => {
    const server = createServer(services);
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: undefined,
      enableJsonResponse: true,
    });
    res.on("close", () => {
      Promise.all([transport.close(), server.close()]).catch((error: unknown) => {
        logger.warn({ error }, "Failed to close MCP request transport");
      });
    });

    try {
      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      logger.error({ error }, "Error handling MCP request");
      if (!res.headersSent) {
        jsonRpcError(res, 500, -32603, "Internal server error");
      }
    }
  });

  const methodNotAllowed = (_req: Request, res: Response) => {
    jsonRpcError(res, 405, -32000, "Method not allowed.");
  };
  app.get(MCP_PATH, methodNotAllowed);
  app.delete(MCP_PATH, methodNotAllowed);

  return app;
}
