/**
 * MCP tool result shapes shared by every tool
 */

import type { BackendError } from "../errors.js";
import type { ResultSet } from "../gatekeeper/normalizer.js";

export type ToolResult = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

export function textResult(text: string): ToolResult {
  return { content: [{ type: "text", text }] };
}

export function errorResult(text: string): ToolResult {
  return { content: [{ type: "text", text }], isError: true };
}

/**
 * Wire shape of a query result. `row_count` is the untruncated count.
 */
export function renderResultSet(result: ResultSet): string {
  return JSON.stringify(
    {
      columns: result.columns,
      rows: result.rows,
      row_count: result.rowCount,
      truncated: result.truncated,
    },
    null,
    2
  );
}

/**
 * Caller-facing text for a backend failure. With redaction on, only the
 * SQLSTATE leaves the server; the full message stays in the log.
 */
export function backendErrorText(error: BackendError, redact: boolean): string {
  if (!redact) return error.message;
  return error.code ? `database error (SQLSTATE ${error.code}); details withheld` : "database error; details withheld";
}
