/**
 * MCP server definition
 *
 * Tools:
 * - run_query: Execute a read-only SQL statement
 * - list_tables: Tables with row estimates
 * - describe_table: Column details for one table
 * - slow_queries: Long-running backend queries
 *
 * Resources:
 * - gatekeeper://policy: Allowed statements, row cap and current mode
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ServerContext } from "./context.js";
import { getPolicy } from "./resources/policy.js";
import { describeTable, describeTableSchema } from "./tools/describe-table.js";
import { listTables, listTablesSchema } from "./tools/list-tables.js";
import { runQuery, runQuerySchema } from "./tools/run-query.js";
import { slowQueries, slowQueriesSchema } from "./tools/slow-queries.js";

export const SERVER_NAME = "database-gatekeeper";
export const SERVER_VERSION = "1.0.0";
export const TOOL_NAMES = ["run_query", "list_tables", "describe_table", "slow_queries"] as const;

export function createServer(ctx: ServerContext): McpServer {
  const server = new McpServer(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      instructions:
        "Read-only PostgreSQL query tools. Only single SELECT, WITH and EXPLAIN statements are executed; " +
        "everything else is blocked.",
    }
  );

  // ==========================================================================
  // TOOLS
  // ==========================================================================

  server.tool(
    "run_query",
    "Execute a read-only SQL query. Only single SELECT, WITH (CTE) and EXPLAIN statements are allowed; " +
      "INSERT, UPDATE, DELETE, DROP and all other DML/DDL are blocked. Returns columns, rows (max 100), " +
      "row_count and truncated as JSON.",
    runQuerySchema,
    (params, extra) => runQuery(ctx, params, extra.signal)
  );

  server.tool(
    "list_tables",
    "List all tables in the database with their row counts.",
    listTablesSchema,
    (_params, extra) => listTables(ctx, extra.signal)
  );

  server.tool(
    "describe_table",
    "Show the schema of a table: column names, types, nullability and defaults.",
    describeTableSchema,
    (params, extra) => describeTable(ctx, params, extra.signal)
  );

  server.tool(
    "slow_queries",
    "Show currently running queries that have been active longer than a threshold (default 5 seconds).",
    slowQueriesSchema,
    (params, extra) => slowQueries(ctx, params, extra.signal)
  );

  // ==========================================================================
  // RESOURCES
  // ==========================================================================

  server.resource(
    "policy",
    "gatekeeper://policy",
    { description: "Statements the gatekeeper allows, the row cap and the current mode", mimeType: "application/json" },
    async () => ({
      contents: [
        {
          uri: "gatekeeper://policy",
          mimeType: "application/json",
          text: getPolicy(ctx),
        },
      ],
    })
  );

  return server;
}
