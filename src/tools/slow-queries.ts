/**
 * slow_queries tool
 *
 * Shows non-idle backends whose current query has been running longer
 * than a threshold
 */

import { z } from "zod";
import type { ServerContext } from "../context.js";
import type { Scalar } from "../gatekeeper/normalizer.js";
import { runCatalogQuery } from "./catalog.js";
import { textResult, type ToolResult } from "./result.js";

export const slowQueriesSchema = {
  thresholdSeconds: z
    .number()
    .positive()
    .optional()
    .describe("Minimum running time in seconds (default: 5)"),
};

export const SLOW_QUERIES_SQL = `SELECT pid,
       round(extract(epoch FROM now() - query_start)::numeric, 1) AS duration_seconds,
       state,
       query
FROM pg_stat_activity
WHERE state <> 'idle'
  AND pid <> pg_backend_pid()
  AND query_start IS NOT NULL
  AND now() - query_start > make_interval(secs => $1)
ORDER BY duration_seconds DESC`;

const DEFAULT_THRESHOLD_SECONDS = 5;
const QUERY_PREVIEW_LENGTH = 100;

interface SlowQuery {
  pid: Scalar;
  durationSeconds: Scalar;
  state: Scalar;
  query: Scalar;
}

export function renderSlowQueries(entries: readonly SlowQuery[], thresholdSeconds: number): string {
  if (entries.length === 0) {
    return `No slow queries detected (threshold: ${thresholdSeconds} seconds).`;
  }

  const lines = [`Slow queries (running > ${thresholdSeconds}s)`, ""];
  for (const entry of entries) {
    const query = String(entry.query ?? "");
    const preview = query.length > QUERY_PREVIEW_LENGTH ? `${query.slice(0, QUERY_PREVIEW_LENGTH)}...` : query;
    lines.push(`PID: ${entry.pid} | Duration: ${entry.durationSeconds}s | State: ${entry.state}`);
    lines.push(`  Query: ${preview}`);
    lines.push("");
  }
  return lines.join("\n").trimEnd();
}

export async function slowQueries(
  ctx: ServerContext,
  params: { thresholdSeconds?: number },
  signal?: AbortSignal
): Promise<ToolResult> {
  const thresholdSeconds = params.thresholdSeconds ?? DEFAULT_THRESHOLD_SECONDS;

  if (ctx.mode === "demo") {
    const entries = ctx.dataset.slowQueries.filter((entry) => entry.durationSeconds > thresholdSeconds);
    return textResult(renderSlowQueries(entries, thresholdSeconds));
  }

  const outcome = await runCatalogQuery(ctx, "checking slow queries", SLOW_QUERIES_SQL, {
    values: [thresholdSeconds],
    signal,
  });
  if (!outcome.ok) return outcome.response;

  const entries = outcome.result.rows.map(([pid, durationSeconds, state, query]) => ({
    pid,
    durationSeconds,
    state,
    query,
  }));
  return textResult(renderSlowQueries(entries, thresholdSeconds));
}
