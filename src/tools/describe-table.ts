/**
 * describe_table tool
 *
 * Shows column names, types, nullability and defaults for one table
 */

import { z } from "zod";
import type { ServerContext } from "../context.js";
import { formatTable } from "../lib/format.js";
import { runCatalogQuery } from "./catalog.js";
import { textResult, type ToolResult } from "./result.js";

export const describeTableSchema = {
  tableName: z.string().min(1).describe("Name of the table to describe"),
};

export const DESCRIBE_TABLE_SQL = `SELECT column_name, data_type, is_nullable, column_default
FROM information_schema.columns
WHERE table_name = $1
ORDER BY ordinal_position`;

const HEADERS = ["COLUMN", "TYPE", "NULLABLE", "DEFAULT"];

export async function describeTable(
  ctx: ServerContext,
  params: { tableName: string },
  signal?: AbortSignal
): Promise<ToolResult> {
  const { tableName } = params;

  if (ctx.mode === "demo") {
    const table = Object.hasOwn(ctx.dataset.tables, tableName) ? ctx.dataset.tables[tableName] : undefined;
    if (!table) {
      const available = Object.keys(ctx.dataset.tables).join(", ");
      return textResult(`Table '${tableName}' not found. Available tables: ${available}`);
    }
    const rows = table.columns.map((column) => [
      column.name,
      column.type,
      column.nullable ? "YES" : "NO",
      column.default,
    ]);
    return textResult(`Table: ${tableName} (${table.rowCount} rows)\n\n${formatTable(HEADERS, rows)}`);
  }

  const outcome = await runCatalogQuery(ctx, "describing table", DESCRIBE_TABLE_SQL, {
    values: [tableName],
    signal,
  });
  if (!outcome.ok) return outcome.response;

  if (outcome.result.rows.length === 0) {
    return textResult(`Table '${tableName}' not found.`);
  }
  return textResult(`Table: ${tableName}\n\n${formatTable(HEADERS, outcome.result.rows)}`);
}
