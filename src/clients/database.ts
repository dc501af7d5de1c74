/**
 * PostgreSQL client
 *
 * One pg.Client per request, never pooled. Every session is switched to
 * read-only before it is handed out, and pg never opens a transaction on
 * its own, so each statement runs in its own read-only autocommit
 * transaction. Caller statements always go over the extended protocol,
 * which the server refuses to run with more than one command.
 */

import pg from "pg";
import type { DatabaseConfig } from "../config.js";
import type { RawResult, Session, SessionFactory } from "../gatekeeper/executor.js";

const { Client } = pg;

const APPLICATION_NAME = "database-gatekeeper-mcp";

function createClient(config: DatabaseConfig): pg.Client {
  const client = new Client({
    connectionString: config.url,
    connectionTimeoutMillis: config.connectTimeoutMs,
    statement_timeout: config.queryTimeoutMs,
    application_name: APPLICATION_NAME,
  });

  // An unhandled 'error' event would take the process down
  client.on("error", (error) => {
    console.error("PostgreSQL client error:", error.message);
  });

  return client;
}

function toSession(client: pg.Client): Session {
  let released = false;

  return {
    async run(statement: string, values?: readonly unknown[]): Promise<RawResult> {
      const query: pg.QueryArrayConfig & { queryMode: "extended" } = {
        text: statement,
        values: values ? [...values] : undefined,
        rowMode: "array",
        queryMode: "extended",
      };
      const result = await client.query<unknown[]>(query);
      return {
        columns: result.fields.map((field) => field.name),
        rows: result.rows,
      };
    },

    async release(): Promise<void> {
      if (released) return;
      released = true;
      await client.end();
    },
  };
}

export function createSessionFactory(config: DatabaseConfig): SessionFactory {
  return async () => {
    const client = createClient(config);
    const session = toSession(client);

    try {
      await client.connect();
      await client.query("SET SESSION CHARACTERISTICS AS TRANSACTION READ ONLY");
    } catch (error) {
      await session.release().catch((closeError: unknown) => {
        console.error("Failed to close PostgreSQL connection after setup error:", closeError);
      });
      throw error;
    }

    return session;
  };
}

/**
 * Startup reachability check. Throws with the driver's message when the
 * database cannot be reached.
 */
export async function probeDatabase(config: DatabaseConfig): Promise<void> {
  const client = createClient(config);
  try {
    await client.connect();
    await client.query("SELECT 1");
  } finally {
    await client.end().catch((closeError: unknown) => {
      console.error("Failed to close PostgreSQL probe connection:", closeError);
    });
  }
}
