/**
 * Server context
 *
 * The live/demo decision is made once, before any tool is registered, and
 * the resulting object is frozen. Handlers receive it by reference and
 * never change it.
 */

import type { Config, DatabaseConfig } from "./config.js";
import { createSessionFactory, probeDatabase } from "./clients/database.js";
import { loadDemoDataset, type DemoDataset } from "./demo/dataset.js";
import type { SessionFactory } from "./gatekeeper/executor.js";

export type Mode = "live" | "demo";

export interface LiveContext {
  readonly mode: "live";
  readonly openSession: SessionFactory;
  readonly redactBackendErrors: boolean;
}

export interface DemoContext {
  readonly mode: "demo";
  readonly dataset: DemoDataset;
  /** Why the server fell back to demo data */
  readonly reason: string;
}

export type ServerContext = LiveContext | DemoContext;

export interface ContextDependencies {
  probe: (config: DatabaseConfig) => Promise<void>;
  createSessionFactory: (config: DatabaseConfig) => SessionFactory;
  loadDemoDataset: () => DemoDataset;
}

const defaultDependencies: ContextDependencies = {
  probe: probeDatabase,
  createSessionFactory,
  loadDemoDataset: () => loadDemoDataset(),
};

export async function resolveContext(
  config: Config,
  deps: ContextDependencies = defaultDependencies
): Promise<ServerContext> {
  if (!config.databaseUrl) {
    return demoContext(deps, "DATABASE_URL is not set");
  }

  const database: DatabaseConfig = {
    url: config.databaseUrl,
    queryTimeoutMs: config.queryTimeoutMs,
    connectTimeoutMs: config.connectTimeoutMs,
  };

  try {
    await deps.probe(database);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return demoContext(deps, `PostgreSQL not reachable (${message})`);
  }

  console.error("PostgreSQL connection verified");
  const context: LiveContext = {
    mode: "live",
    openSession: deps.createSessionFactory(database),
    redactBackendErrors: config.redactBackendErrors,
  };
  return Object.freeze(context);
}

function demoContext(deps: ContextDependencies, reason: string): DemoContext {
  console.error(`Warning: ${reason}. Running in DEMO mode with synthetic e-commerce data.`);
  const context: DemoContext = {
    mode: "demo",
    dataset: deps.loadDemoDataset(),
    reason,
  };
  return Object.freeze(context);
}
