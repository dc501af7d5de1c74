/**
 * gatekeeper://policy resource
 *
 * What the gatekeeper allows, so an agent can shape its statements before
 * calling run_query.
 */

import type { ServerContext } from "../context.js";
import { FORBIDDEN_KEYWORDS, READ_ONLY_PREFIXES } from "../gatekeeper/classifier.js";
import { MAX_ROWS } from "../gatekeeper/normalizer.js";

export function getPolicy(ctx: ServerContext): string {
  return JSON.stringify(
    {
      mode: ctx.mode,
      ...(ctx.mode === "demo" ? { demoReason: ctx.reason } : {}),
      allowedPrefixes: READ_ONLY_PREFIXES,
      forbiddenKeywords: FORBIDDEN_KEYWORDS,
      singleStatementOnly: true,
      maxRows: MAX_ROWS,
      session: "read-only, autocommit, one connection per call",
    },
    null,
    2
  );
}
