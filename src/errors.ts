export type ErrorKind =
  | "connection"
  | "execution"
  | "transaction"
  | "no-connection"
  | "unsupported"
  | "timeout"
  | "config";

/**
 * Base class for every failure sqlpane surfaces to the user. All of them are
 * recoverable at the UI boundary except `ConfigError`, which aborts startup.
 */
export abstract class SqlPaneError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Network or authentication failure while opening a pool. */
export class ConnectionError extends SqlPaneError {
  readonly kind = "connection";
}

/** A statement failed at the backend. */
export class ExecutionError extends SqlPaneError {
  readonly kind = "execution";
}

/** begin / commit / rollback failed, or the handle was already finished. */
export class TransactionError extends SqlPaneError {
  readonly kind = "transaction";
}

export class NoConnectionError extends SqlPaneError {
  readonly kind = "no-connection";

  constructor(message = "No database connection available.") {
    super(message);
  }
}

export class UnsupportedOperationError extends SqlPaneError {
  readonly kind = "unsupported";
}

export class FetchTimeoutError extends SqlPaneError {
  readonly kind = "timeout";

  constructor(readonly label: string, readonly timeoutMs: number) {
    super(`Timeout while fetching ${label} (${timeoutMs}ms)`);
  }
}

export class ConfigError extends SqlPaneError {
  readonly kind = "config";
}

const URL_CREDENTIALS = /(postgres(?:ql)?|mysql):\/\/([^:/@\s]+):[^@\s]*@/gi;
const PASSWORD_ASSIGNMENT = /password[=:]\s*['"]?[^'"\s]+['"]?/gi;

/**
 * Strips credentials from driver messages before they reach the screen or the
 * log file.
 */
export function redact(message: string): string {
  return message
    .replace(URL_CREDENTIALS, "$1://$2:[REDACTED]@")
    .replace(PASSWORD_ASSIGNMENT, "[REDACTED]");
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}

/**
 * Wraps a raw driver failure in `ExecutionError`, leaving errors that are
 * already classified untouched.
 */
export function toExecutionError(e: unknown): SqlPaneError {
  if (e instanceof SqlPaneError) return e;
  return new ExecutionError(redact(errorMessage(e)), { cause: e });
}

export function toTransactionError(e: unknown): TransactionError {
  if (e instanceof TransactionError) return e;
  return new TransactionError(redact(errorMessage(e)), { cause: e });
}
