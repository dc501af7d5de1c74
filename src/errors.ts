/**
 * Error types
 *
 * Validation rejections are not errors (see gatekeeper/classifier.ts).
 * Everything here is either an operational fault from the backend or a
 * broken contract inside the server.
 */

/**
 * Failure reported by PostgreSQL or the driver: connect, syntax,
 * permission, statement timeout.
 */
export class BackendError extends Error {
  readonly code: string | undefined;

  constructor(message: string, code?: string) {
    super(message);
    this.name = "BackendError";
    this.code = code;
  }
}

/**
 * A backend value or row shape that cannot be represented as a Scalar.
 */
export class ResultContractError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ResultContractError";
  }
}

export class QueryCancelledError extends Error {
  constructor(message = "Query cancelled by caller") {
    super(message);
    this.name = "QueryCancelledError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Wrap anything thrown by the driver as a BackendError, keeping the
 * SQLSTATE code when the driver attached one.
 */
export function toBackendError(error: unknown): BackendError {
  if (error instanceof BackendError) return error;
  if (error instanceof Error) {
    const code = "code" in error && typeof error.code === "string" ? error.code : undefined;
    return new BackendError(error.message, code);
  }
  return new BackendError(String(error));
}
