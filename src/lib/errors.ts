/**
 * Raised when required startup configuration or a process-wide secret is
 * missing or invalid. Nothing downstream can proceed without it, so callers
 * let it propagate.
 */
export class ConfigurationError extends Error {
  details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "ConfigurationError";
    this.details = details;
  }
}

/**
 * A single input item (stream record, queue message) that cannot be decoded.
 * Terminal for that item only.
 */
export class MalformedInputError extends Error {
  details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "MalformedInputError";
    this.details = details;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
