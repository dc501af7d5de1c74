/**
 * list_tables tool
 *
 * Lists user tables with their live row estimates
 */

import type { ServerContext } from "../context.js";
import { formatTable } from "../lib/format.js";
import { runCatalogQuery } from "./catalog.js";
import { textResult, type ToolResult } from "./result.js";

export const listTablesSchema = {};

export const LIST_TABLES_SQL = `SELECT schemaname || '.' || relname AS table_name,
       n_live_tup AS row_count
FROM pg_stat_user_tables
ORDER BY n_live_tup DESC`;

const MAX_TABLES = 1000;

export async function listTables(ctx: ServerContext, signal?: AbortSignal): Promise<ToolResult> {
  if (ctx.mode === "demo") {
    const rows = Object.entries(ctx.dataset.tables).map(([name, table]) => [
      name,
      table.rowCount,
      table.columns.length,
    ]);
    return textResult(formatTable(["TABLE", "ROWS", "COLUMNS"], rows));
  }

  const outcome = await runCatalogQuery(ctx, "listing tables", LIST_TABLES_SQL, { signal, maxRows: MAX_TABLES });
  if (!outcome.ok) return outcome.response;

  const { result } = outcome;
  if (result.rows.length === 0) {
    return textResult("No tables found.");
  }

  let text = formatTable(["TABLE", "ROWS"], result.rows);
  if (result.truncated) {
    text += `\n(showing ${result.rows.length} of ${result.rowCount} tables)`;
  }
  return textResult(text);
}
