/**
 * errors.ts - Error taxonomy for ingestion and retrieval
 *
 * Only faults that the caller has to act on are thrown:
 * - ConfigError: environment is malformed (raised at startup, never lazily)
 * - ConnectionError: the vector store is unreachable or misconfigured
 * - InvalidQueryError: a query was rejected before any backend call
 *
 * Batch write failures and malformed frontmatter are *values*, not errors.
 * See BatchFailure in pipeline/types.ts and FrontmatterResult in
 * pipeline/frontmatter.ts.
 */

export type ErrorCode = "ConfigError" | "ConnectionError" | "InvalidQueryError";

export interface SemanticIngestErrorOptions {
  /** The underlying error, when wrapping a library fault */
  cause?: unknown;
  /** Structured context for logs and CLI output */
  details?: Record<string, unknown>;
}

/**
 * Base class for every error this package throws on purpose.
 */
export class SemanticIngestError extends Error {
  readonly code: ErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    options: SemanticIngestErrorOptions = {}
  ) {
    super(message, { cause: options.cause });
    this.name = this.constructor.name;
    this.code = code;
    this.details = options.details;
  }
}

/**
 * Environment configuration could not be parsed (e.g., CHROMA_PORT=abc).
 */
export class ConfigError extends SemanticIngestError {
  constructor(message: string, options: SemanticIngestErrorOptions = {}) {
    super("ConfigError", message, options);
  }
}

/**
 * The vector store could not be reached. Fatal for the current operation;
 * nothing in this package retries it.
 */
export class ConnectionError extends SemanticIngestError {
  constructor(message: string, options: SemanticIngestErrorOptions = {}) {
    super("ConnectionError", message, options);
  }
}

/**
 * A search request was malformed: empty query, limit or threshold out of
 * range, or a metadata filter with unsupported values.
 */
export class InvalidQueryError extends SemanticIngestError {
  constructor(message: string, options: SemanticIngestErrorOptions = {}) {
    super("InvalidQueryError", message, options);
  }
}

/**
 * Returns true when an error thrown by the Chroma client (or fetch beneath it)
 * means the server could not be reached at all, as opposed to a rejected
 * request.
 */
export function isConnectionFailure(error: unknown): boolean {
  if (error instanceof ConnectionError) return true;
  if (!(error instanceof Error)) return false;
  if (error.name === "ChromaConnectionError") return true;

  const cause = error.cause;
  const text = `${error.message} ${cause instanceof Error ? cause.message : ""}`;
  return /ECONNREFUSED|ENOTFOUND|EHOSTUNREACH|ECONNRESET|fetch failed/i.test(text);
}

/**
 * Extracts a printable message from any thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
