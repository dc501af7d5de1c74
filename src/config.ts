/**
 * Process configuration from environment variables
 */

import { z } from "zod";
import { ConfigError } from "./errors.js";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .default("false")
  .transform((value) => value === "true" || value === "1");

const envSchema = z.object({
  DATABASE_URL: z
    .string()
    .trim()
    .optional()
    .transform((value) => (value ? value : undefined)),
  MCP_TRANSPORT: z
    .enum(["stdio", "streamable-http", "http"])
    .default("stdio")
    .transform((value): Transport => (value === "http" ? "streamable-http" : value)),
  PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  HOST: z.string().min(1).default("0.0.0.0"),
  QUERY_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  CONNECT_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  REDACT_BACKEND_ERRORS: booleanFlag,
});

export type Transport = "stdio" | "streamable-http";

export interface DatabaseConfig {
  url: string;
  queryTimeoutMs: number;
  connectTimeoutMs: number;
}

export interface Config {
  /** Unset means the server starts in demo mode */
  databaseUrl: string | undefined;
  transport: Transport;
  port: number;
  host: string;
  queryTimeoutMs: number;
  connectTimeoutMs: number;
  redactBackendErrors: boolean;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${problems.join("; ")}`);
  }

  const vars = parsed.data;
  return {
    databaseUrl: vars.DATABASE_URL,
    transport: vars.MCP_TRANSPORT,
    port: vars.PORT,
    host: vars.HOST,
    queryTimeoutMs: vars.QUERY_TIMEOUT_MS,
    connectTimeoutMs: vars.CONNECT_TIMEOUT_MS,
    redactBackendErrors: vars.REDACT_BACKEND_ERRORS,
  };
}
