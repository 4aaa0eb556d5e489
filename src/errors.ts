/**
 * Base class for every error raised by docsieve.
 * The cause's stack is appended so the original failure stays visible in logs.
 */
export class DocsieveError extends Error {
  constructor(message: string, cause?: unknown) {
    const combinedMessage =
      cause instanceof Error ? `${message}: ${cause.message}` : message;
    super(combinedMessage, { cause });
    this.name = new.target.name;
    if (cause instanceof Error && cause.stack) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

/**
 * No usable text could be obtained for the document. Fatal.
 */
export class LoadError extends DocsieveError {
  constructor(
    message: string,
    public readonly source?: string,
    cause?: unknown
  ) {
    super(message, cause);
  }
}

/**
 * Invalid chunk size, overlap, concurrency or other settings. Fatal.
 */
export class ConfigurationError extends DocsieveError {}

/**
 * Extraction of a single chunk failed. Recovered by the worker pool.
 */
export class ExtractionError extends DocsieveError {
  constructor(
    public readonly chunkIndex: number,
    cause?: unknown
  ) {
    super(`Extraction failed for chunk ${chunkIndex}`, cause);
  }
}

/**
 * The consolidation pass failed. Recovered by falling back to the union merge.
 */
export class ConsolidationError extends DocsieveError {}

/**
 * Model output that is not the expected JSON shape
 */
export class MalformedOutputError extends DocsieveError {
  constructor(
    message: string,
    public readonly content?: string
  ) {
    super(message);
  }
}

/**
 * HTTP or SDK failure talking to an LLM provider
 */
export class ProviderError extends DocsieveError {
  constructor(
    message: string,
    public readonly provider: string,
    public readonly status?: number,
    cause?: unknown
  ) {
    super(message, cause);
  }
}

/**
 * Unknown tool or invalid tool arguments in the agent loop
 */
export class ToolError extends DocsieveError {
  constructor(
    message: string,
    public readonly tool: string,
    cause?: unknown
  ) {
    super(message, cause);
  }
}

/**
 * Normalize anything thrown into an Error instance
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
