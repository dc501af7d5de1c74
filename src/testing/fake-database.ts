/**
 * In-process stand-in for PostgreSQL sessions, for tests
 */

import type { RawResult, Session, SessionFactory } from "../gatekeeper/executor.js";

export interface FakeDatabaseOptions {
  result?: RawResult;
  /** Thrown by run() */
  error?: unknown;
  /** Thrown by openSession() */
  openError?: unknown;
  /** Thrown by release() */
  releaseError?: unknown;
  /** run() stays pending until the session is released */
  hang?: boolean;
}

export interface RecordedCall {
  statement: string;
  values: readonly unknown[] | undefined;
}

export class FakeDatabase {
  opened = 0;
  released = 0;
  readonly calls: RecordedCall[] = [];

  constructor(private readonly options: FakeDatabaseOptions = {}) {}

  readonly openSession: SessionFactory = async () => {
    if (this.options.openError !== undefined) {
      throw this.options.openError;
    }
    this.opened += 1;

    let released = false;
    let terminate: ((error: Error) => void) | undefined;

    const session: Session = {
      run: async (statement, values) => {
        this.calls.push({ statement, values });
        if (released) {
          throw new Error("Client was closed and is not queryable");
        }
        if (this.options.hang) {
          return new Promise<RawResult>((_resolve, reject) => {
            terminate = reject;
          });
        }
        if (this.options.error !== undefined) {
          throw this.options.error;
        }
        return this.options.result ?? { columns: [], rows: [] };
      },
      release: async () => {
        if (released) return;
        released = true;
        this.released += 1;
        terminate?.(new Error("Connection terminated"));
        if (this.options.releaseError !== undefined) {
          throw this.options.releaseError;
        }
      },
    };
    return session;
  };
}
