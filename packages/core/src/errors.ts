export type RagErrorCode =
  | "CONFIGURATION"
  | "INDEX_NOT_FOUND"
  | "EMBEDDING_FAILURE"
  | "SEARCH_FAILURE"
  | "INVALID_ARGUMENT"
  | "EXTRACTION_FAILURE";

/**
 * Base error for everything the pipelines raise on purpose.
 * `retryable` marks transient collaborator failures.
 */
export class RagError extends Error {
  public readonly code: RagErrorCode;
  public readonly retryable: boolean;
  public readonly details?: unknown;

  constructor(
    message: string,
    code: RagErrorCode,
    opts: { retryable?: boolean; details?: unknown; cause?: unknown } = {}
  ) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = "RagError";
    this.code = code;
    this.retryable = opts.retryable ?? false;
    this.details = opts.details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Missing or invalid settings. Fatal, never retried.
 */
export class ConfigurationError extends RagError {
  constructor(message: string, details?: unknown) {
    super(message, "CONFIGURATION", { details });
    this.name = "ConfigurationError";
  }
}

export class IndexNotFoundError extends RagError {
  public readonly collection: string;

  constructor(collection: string, location: string) {
    super(
      `Index for collection '${collection}' not found at ${location}. Run \`npm run ingest\` to build it first.`,
      "INDEX_NOT_FOUND"
    );
    this.name = "IndexNotFoundError";
    this.collection = collection;
  }
}

export class EmbeddingError extends RagError {
  constructor(message: string, opts: { retryable?: boolean; cause?: unknown } = {}) {
    super(message, "EMBEDDING_FAILURE", { retryable: opts.retryable ?? true, cause: opts.cause });
    this.name = "EmbeddingError";
  }
}

export class SearchError extends RagError {
  constructor(message: string, opts: { retryable?: boolean; cause?: unknown } = {}) {
    super(message, "SEARCH_FAILURE", { retryable: opts.retryable ?? true, cause: opts.cause });
    this.name = "SearchError";
  }
}

export class InvalidArgumentError extends RagError {
  constructor(message: string) {
    super(message, "INVALID_ARGUMENT");
    this.name = "InvalidArgumentError";
  }
}

export type ExtractionFailureReason = "io" | "format";

export class ExtractionError extends RagError {
  public readonly reason: ExtractionFailureReason;
  public readonly path: string;

  constructor(path: string, reason: ExtractionFailureReason, message: string, cause?: unknown) {
    super(`Cannot extract text from ${path}: ${message}`, "EXTRACTION_FAILURE", { cause, details: { path, reason } });
    this.name = "ExtractionError";
    this.reason = reason;
    this.path = path;
  }
}

export function isRagError(err: unknown): err is RagError {
  return err instanceof RagError;
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
