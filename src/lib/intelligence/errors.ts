/**
 * Error types for the intelligence layer.
 * Every error carries a stable code so surfaces can render it as structured JSON.
 */

export type IntelligenceErrorCode =
  | "TRANSPORT_ERROR"
  | "REMOTE_ERROR"
  | "NO_MODEL_AVAILABLE"
  | "UNKNOWN_CATEGORY"
  | "STORAGE_UNAVAILABLE";

export class IntelligenceError extends Error {
  constructor(
    public readonly code: IntelligenceErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "IntelligenceError";
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/** Local model endpoint unreachable or timed out. */
export class TransportError extends IntelligenceError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("TRANSPORT_ERROR", message, details);
    this.name = "TransportError";
  }
}

/** Local model endpoint answered with a non-2xx status. */
export class RemoteError extends IntelligenceError {
  constructor(
    public readonly status: number | undefined,
    message: string,
    details?: Record<string, unknown>
  ) {
    super("REMOTE_ERROR", message, { ...details, status });
    this.name = "RemoteError";
  }
}

export type LocalModelError = TransportError | RemoteError;

export function isLocalModelError(err: unknown): err is LocalModelError {
  return err instanceof TransportError || err instanceof RemoteError;
}

export class NoModelAvailableError extends IntelligenceError {
  constructor(message = "No local model is available", details?: Record<string, unknown>) {
    super("NO_MODEL_AVAILABLE", message, details);
    this.name = "NoModelAvailableError";
  }
}

export class UnknownCategoryError extends IntelligenceError {
  constructor(
    public readonly category: string,
    validCategories: readonly string[]
  ) {
    super("UNKNOWN_CATEGORY", `Unknown calibration category: ${category}`, {
      category,
      validCategories: [...validCategories, "general"],
    });
    this.name = "UnknownCategoryError";
  }
}

/** The metrics database could not be opened, created or queried. */
export class StorageUnavailableError extends IntelligenceError {
  constructor(operation: string, cause: unknown) {
    super(
      "STORAGE_UNAVAILABLE",
      `Metrics storage unavailable during ${operation}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { operation }
    );
    this.name = "StorageUnavailableError";
    this.cause = cause;
  }
}
