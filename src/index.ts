#!/usr/bin/env node
/**
 * Database Gatekeeper MCP Server
 *
 * Read-only PostgreSQL tools for agents. Every statement is classified
 * before it can reach the database, and the database session itself is
 * read-only, so a mutation needs both layers to fail.
 *
 * Mode:
 * - live: DATABASE_URL is set and reachable at startup
 * - demo: otherwise; accepted statements are answered from synthetic data
 *
 * Transport:
 * - stdio (default): Standard I/O for local CLI usage
 * - streamable-http: HTTP transport for K8s deployment
 *   Set MCP_TRANSPORT=streamable-http and PORT=8000
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import express from "express";

import { loadConfig, type Config } from "./config.js";
import { resolveContext, type ServerContext } from "./context.js";
import { createServer, TOOL_NAMES } from "./server.js";

function logStartup(ctx: ServerContext) {
  console.error(`Mode: ${ctx.mode}${ctx.mode === "demo" ? ` (${ctx.reason})` : ""}`);
  console.error(`Tools: ${TOOL_NAMES.join(", ")}`);
}

async function runStdioTransport(ctx: ServerContext) {
  const server = createServer(ctx);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("Database Gatekeeper MCP server running on stdio");
  logStartup(ctx);
}

async function runHttpTransport(ctx: ServerContext, config: Config) {
  const app = express();
  app.use(express.json());

  // Stateless mode: a fresh server and transport per request
  app.post("/mcp", async (req, res) => {
    const server = createServer(ctx);
    const httpTransport = new StreamableHTTPServerTransport({
      sessionIdGenerator: undefined,
    });

    res.on("close", () => {
      Promise.all([httpTransport.close(), server.close()]).catch((error: unknown) => {
        console.error("Error closing MCP request transport:", error);
      });
    });

    try {
      await server.connect(httpTransport);
      await httpTransport.handleRequest(req, res, req.body);
    } catch (error) {
      console.error("Error handling MCP request:", error);
      if (!res.headersSent) {
        res.status(500).json({ error: "Internal server error" });
      }
    }
  });

  // Health check endpoint
  app.get("/health", (_req, res) => {
    res.json({ status: "healthy", transport: "streamable-http", mode: ctx.mode });
  });

  app.listen(config.port, config.host, () => {
    console.error(`Database Gatekeeper MCP server running on http://${config.host}:${config.port}`);
    console.error("MCP endpoint: POST /mcp");
    console.error("Health check: GET /health");
    logStartup(ctx);
  });
}

async function main() {
  const config = loadConfig();

  // Mode is fixed here for the lifetime of the process
  const ctx = await resolveContext(config);

  if (config.transport === "streamable-http") {
    await runHttpTransport(ctx, config);
  } else {
    await runStdioTransport(ctx);
  }
}

main().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
