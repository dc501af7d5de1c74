/**
 * Synthetic e-commerce dataset served when no database is reachable
 *
 * Demo mode only replaces the backend. Statements still go through the
 * classifier before anything here is consulted.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import { normalize, type ResultSet } from "../gatekeeper/normalizer.js";

export const DEFAULT_DATASET_PATH = new URL("../../data/demo-dataset.json", import.meta.url);

const scalarSchema = z.union([z.null(), z.boolean(), z.number(), z.string()]);

const sampleSchema = z.object({
  columns: z.array(z.string()),
  rows: z.array(z.array(scalarSchema)),
});

const columnSchema = z.object({
  name: z.string(),
  type: z.string(),
  nullable: z.boolean(),
  default: z.string().nullable(),
});

const datasetSchema = z.object({
  tables: z.record(
    z.object({
      rowCount: z.number().int().nonnegative(),
      columns: z.array(columnSchema),
    })
  ),
  samples: z.object({
    orders: sampleSchema,
    failedPayments: sampleSchema,
    count: sampleSchema,
    info: sampleSchema,
  }),
  slowQueries: z.array(
    z.object({
      pid: z.number().int(),
      durationSeconds: z.number().nonnegative(),
      state: z.string(),
      query: z.string(),
    })
  ),
});

export type DemoDataset = z.infer<typeof datasetSchema>;
export type DemoTable = DemoDataset["tables"][string];
export type DemoSlowQuery = DemoDataset["slowQueries"][number];

export function loadDemoDataset(path: URL | string = DEFAULT_DATASET_PATH): DemoDataset {
  const raw: unknown = JSON.parse(readFileSync(path, "utf-8"));
  return datasetSchema.parse(raw);
}

/**
 * Pick a canned result by sniffing keywords in an accepted statement.
 */
export function demoQuery(dataset: DemoDataset, statement: string): ResultSet {
  const upper = statement.toUpperCase();
  const { samples } = dataset;

  let sample = samples.info;
  if (upper.includes("PAYMENT") && (upper.includes("FAIL") || upper.includes("ERROR"))) {
    sample = samples.failedPayments;
  } else if (upper.includes("ORDER")) {
    sample = samples.orders;
  } else if (upper.includes("COUNT")) {
    sample = samples.count;
  }

  return normalize(sample.rows, sample.columns);
}
