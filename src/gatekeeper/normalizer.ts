/**
 * Result normalizer
 *
 * Turns whatever the driver handed back into a bounded table of plain
 * JSON scalars. Backend-specific types never cross this boundary.
 */

import { Buffer } from "node:buffer";
import { ResultContractError } from "../errors.js";

export const MAX_ROWS = 100;

export type Scalar = null | boolean | number | string;

export interface ResultSet {
  columns: string[];
  rows: Scalar[][];
  /** Rows the backend returned, before truncation */
  rowCount: number;
  truncated: boolean;
}

export function normalize(
  rawRows: ReadonlyArray<readonly unknown[]>,
  rawColumns: readonly string[],
  limit: number = MAX_ROWS
): ResultSet {
  const kept = rawRows.slice(0, limit);

  const rows = kept.map((row, rowIndex) => {
    if (row.length !== rawColumns.length) {
      throw new ResultContractError(
        `Row ${rowIndex} has ${row.length} values but the result has ${rawColumns.length} columns`
      );
    }
    return row.map((value, columnIndex) => {
      try {
        return toScalar(value);
      } catch (error) {
        if (error instanceof ResultContractError) {
          throw new ResultContractError(`Column "${rawColumns[columnIndex]}", row ${rowIndex}: ${error.message}`);
        }
        throw error;
      }
    });
  });

  return {
    columns: [...rawColumns],
    rows,
    rowCount: rawRows.length,
    truncated: rawRows.length > limit,
  };
}

export function toScalar(value: unknown): Scalar {
  if (value === null) return null;

  switch (typeof value) {
    case "boolean":
    case "string":
      return value;
    case "number":
      // JSON has no NaN or Infinity
      return Number.isFinite(value) ? value : String(value);
    case "bigint":
      return value.toString();
    case "object":
      return objectToText(value);
    default:
      throw new ResultContractError(`cannot represent a value of type ${typeof value}`);
  }
}

function objectToText(value: object): string {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      throw new ResultContractError("invalid date");
    }
    return value.toISOString();
  }

  if (value instanceof Uint8Array) {
    // bytea hex format
    return `\\x${Buffer.from(value).toString("hex")}`;
  }

  if (
    !Array.isArray(value) &&
    typeof value.toString === "function" &&
    value.toString !== Object.prototype.toString
  ) {
    return value.toString();
  }

  let text: string | undefined;
  try {
    text = JSON.stringify(value);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ResultContractError(`cannot serialize value: ${reason}`);
  }
  if (text === undefined) {
    throw new ResultContractError("value serializes to nothing");
  }
  return text;
}
