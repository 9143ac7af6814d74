/**
 * Error taxonomy shared by the store, query engine, export encoder and
 * tool server. Each class carries a stable `code` that crosses the MCP wire.
 */

export type ErrorCode = "NOT_FOUND" | "INVALID_ARGUMENT" | "STORE_UNAVAILABLE" | "INTERNAL_ERROR";

export class TrafficLensError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class NotFoundError extends TrafficLensError {
  constructor(message: string) {
    super("NOT_FOUND", message);
  }
}

export class InvalidArgumentError extends TrafficLensError {
  constructor(message: string) {
    super("INVALID_ARGUMENT", message);
  }
}

export class StoreUnavailableError extends TrafficLensError {
  constructor(message: string, cause?: unknown) {
    super("STORE_UNAVAILABLE", message, { cause });
  }
}

export class InternalError extends TrafficLensError {
  constructor(message: string, cause?: unknown) {
    super("INTERNAL_ERROR", message, { cause });
  }
}

/**
 * Extract a human-readable message from an unknown error value.
 */
export function getErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : "Unknown error";
}

/**
 * Map any thrown value onto the taxonomy. Known errors pass through;
 * everything else becomes an InternalError.
 */
export function toTrafficLensError(err: unknown): TrafficLensError {
  if (err instanceof TrafficLensError) {
    return err;
  }
  return new InternalError(`Internal error: ${getErrorMessage(err)}`, err);
}
