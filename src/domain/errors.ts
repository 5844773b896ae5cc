/**
 * Raised when the document directory cannot produce a complete chunk set.
 * Fatal to an initialize request and surfaced to its caller.
 */
export class IngestionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "IngestionError";
  }
}

/**
 * An embedding, vector store or language-model call failed. Recovered inside the
 * query path by switching to keyword retrieval.
 */
export class BackendUnavailableError extends Error {
  constructor(
    readonly backend: "embedding" | "vector_store" | "completion",
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "BackendUnavailableError";
  }
}

/** Startup configuration is missing or inconsistent. */
export class ConfigurationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : "unknown error";
}
