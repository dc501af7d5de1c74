/**
 * Read-only session executor
 *
 * Runs one already-classified statement on a session that the backend
 * itself holds to read-only. The classifier is the first line; this is
 * the second, and it does not trust the first.
 */

import { BackendError, QueryCancelledError, toBackendError } from "../errors.js";
import { MAX_ROWS, normalize, type ResultSet } from "./normalizer.js";

export interface RawResult {
  columns: string[];
  rows: unknown[][];
}

/**
 * A single backend connection, already pinned to read-only + autocommit.
 * `release` must be safe to call more than once.
 */
export interface Session {
  run(statement: string, values?: readonly unknown[]): Promise<RawResult>;
  release(): Promise<void>;
}

export type SessionFactory = () => Promise<Session>;

export type ExecutionOutcome = { ok: true; result: ResultSet } | { ok: false; error: BackendError };

export interface ExecuteOptions {
  /** Bind values for fixed catalog statements; caller text never has any */
  values?: readonly unknown[];
  signal?: AbortSignal;
  maxRows?: number;
}

export async function executeReadOnly(
  openSession: SessionFactory,
  statement: string,
  options: ExecuteOptions = {}
): Promise<ExecutionOutcome> {
  const { values, signal, maxRows = MAX_ROWS } = options;

  if (signal?.aborted) {
    throw new QueryCancelledError();
  }

  let session: Session;
  try {
    session = await openSession();
  } catch (error) {
    return { ok: false, error: toBackendError(error) };
  }

  // Closing the connection is the only way to stop an in-flight query
  const onAbort = () => {
    void releaseSession(session);
  };
  signal?.addEventListener("abort", onAbort, { once: true });

  let raw: RawResult;
  try {
    if (signal?.aborted) {
      throw new QueryCancelledError();
    }
    raw = await session.run(statement, values);
  } catch (error) {
    if (signal?.aborted) {
      throw new QueryCancelledError();
    }
    return { ok: false, error: toBackendError(error) };
  } finally {
    signal?.removeEventListener("abort", onAbort);
    await releaseSession(session);
  }

  if (signal?.aborted) {
    throw new QueryCancelledError();
  }

  return { ok: true, result: normalize(raw.rows, raw.columns, maxRows) };
}

/**
 * Release never throws: a failed close must not turn a finished query into
 * a failure, but it is still reported.
 */
async function releaseSession(session: Session): Promise<void> {
  try {
    await session.release();
  } catch (error) {
    console.error("Failed to release database session:", error);
  }
}
