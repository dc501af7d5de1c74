/**
 * run_query tool
 *
 * Classifies the caller's statement and, only if it is read-only, runs it
 * against the live database or the demo dataset. The classifier runs in
 * both modes.
 */

import { z } from "zod";
import type { ServerContext } from "../context.js";
import { demoQuery } from "../demo/dataset.js";
import { ResultContractError } from "../errors.js";
import { classifyStatement, describeRejection } from "../gatekeeper/classifier.js";
import { executeReadOnly } from "../gatekeeper/executor.js";
import { backendErrorText, errorResult, renderResultSet, textResult, type ToolResult } from "./result.js";

export const runQuerySchema = {
  query: z.string().describe("A single read-only SQL statement (SELECT, WITH or EXPLAIN)"),
};

export async function runQuery(
  ctx: ServerContext,
  params: { query: string },
  signal?: AbortSignal
): Promise<ToolResult> {
  const classification = classifyStatement(params.query);

  if (classification.verdict === "rejected") {
    const message = describeRejection(classification.reason, classification.fragment);
    console.error(`${message} | query: ${params.query.slice(0, 100)}`);
    return errorResult(message);
  }

  try {
    if (ctx.mode === "demo") {
      return textResult(renderResultSet(demoQuery(ctx.dataset, classification.statement)));
    }

    const outcome = await executeReadOnly(ctx.openSession, classification.statement, { signal });
    if (!outcome.ok) {
      console.error("run_query backend failure:", outcome.error.message);
      return errorResult(`Error executing query: ${backendErrorText(outcome.error, ctx.redactBackendErrors)}`);
    }

    return textResult(renderResultSet(outcome.result));
  } catch (error) {
    if (error instanceof ResultContractError) {
      console.error("run_query result contract violation:", error.message);
      return errorResult(`Internal error: ${error.message}`);
    }
    throw error;
  }
}
