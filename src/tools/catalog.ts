/**
 * Shared live path for the catalog tools: fixed statements through the same
 * read-only executor as run_query.
 */

import type { LiveContext } from "../context.js";
import { ResultContractError } from "../errors.js";
import { executeReadOnly, type ExecuteOptions } from "../gatekeeper/executor.js";
import type { ResultSet } from "../gatekeeper/normalizer.js";
import { backendErrorText, errorResult, type ToolResult } from "./result.js";

export type CatalogOutcome = { ok: true; result: ResultSet } | { ok: false; response: ToolResult };

export async function runCatalogQuery(
  ctx: LiveContext,
  action: string,
  statement: string,
  options: ExecuteOptions = {}
): Promise<CatalogOutcome> {
  try {
    const outcome = await executeReadOnly(ctx.openSession, statement, options);
    if (!outcome.ok) {
      console.error(`Error ${action}:`, outcome.error.message);
      return {
        ok: false,
        response: errorResult(`Error ${action}: ${backendErrorText(outcome.error, ctx.redactBackendErrors)}`),
      };
    }
    return outcome;
  } catch (error) {
    if (error instanceof ResultContractError) {
      console.error(`Result contract violation while ${action}:`, error.message);
      return { ok: false, response: errorResult(`Internal error: ${error.message}`) };
    }
    throw error;
  }
}
