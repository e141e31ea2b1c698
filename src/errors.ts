export class ConfigurationError extends Error {
  readonly code = "CONFIGURATION_ERROR";

  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/** The completion provider failed on connect or mid-stream. */
export class UpstreamError extends Error {
  readonly code = "UPSTREAM_ERROR";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "UpstreamError";
  }
}

export class StorageError extends Error {
  readonly code = "STORAGE_ERROR";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StorageError";
  }
}

export function normalizeErrorMessage(error: unknown, fallback = "Unexpected error"): string {
  if (error instanceof Error && error.message.trim()) {
    return error.message;
  }

  if (
    error instanceof Error
    && error.cause instanceof Error
    && error.cause.message.trim()
  ) {
    return error.cause.message;
  }

  if (typeof error === "string" && error.trim()) {
    return error;
  }

  return fallback;
}
