/**
 * Plain-text table rendering for catalog tools
 */

import type { Scalar } from "../gatekeeper/normalizer.js";

const COLUMN_GAP = "  ";

function cellText(value: Scalar): string {
  return value === null ? "" : String(value);
}

/**
 * Left-aligned fixed-width table: header, dashed rule, one line per row.
 * Columns are as wide as their longest cell; trailing spaces are dropped.
 */
export function formatTable(headers: readonly string[], rows: ReadonlyArray<readonly Scalar[]>): string {
  const cells = rows.map((row) => row.map(cellText));
  const widths = headers.map((header, i) =>
    Math.max(header.length, ...cells.map((row) => (row[i] ?? "").length))
  );

  const renderLine = (values: readonly string[]) =>
    values
      .map((value, i) => value.padEnd(widths[i] ?? 0))
      .join(COLUMN_GAP)
      .trimEnd();

  const ruleLength = widths.reduce((total, width) => total + width, 0) + COLUMN_GAP.length * (widths.length - 1);

  return [renderLine(headers), "-".repeat(ruleLength), ...cells.map(renderLine)].join("\n");
}
