/**
 * Error taxonomy shared by the token store, the embed service and the
 * query proxy. Every failure that reaches the HTTP boundary is one of
 * these, so the status code is decided in exactly one place.
 */

export type ErrorKind =
  | "validation"
  | "storage"
  | "unavailable"
  | "query_rejected"
  | "internal";

export class EmbedderError extends Error {
  public readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "EmbedderError";
    this.kind = kind;
  }
}

/** Caller input is malformed: blank query, bad TTL, non-object params. */
export class ValidationError extends EmbedderError {
  constructor(message: string) {
    super("validation", message);
    this.name = "ValidationError";
  }
}

/** The token store rejected or could not perform an operation. */
export class StorageError extends EmbedderError {
  constructor(message: string, cause?: unknown) {
    super("storage", message, { cause });
    this.name = "StorageError";
  }
}

export class UnavailableError extends EmbedderError {
  constructor(message: string, cause?: unknown) {
    super("unavailable", message, { cause });
    this.name = "UnavailableError";
  }
}

/** The graph database refused the query itself (syntax, semantics, constraints). */
export class QueryRejectedError extends EmbedderError {
  constructor(message: string, cause?: unknown) {
    super("query_rejected", message, { cause });
    this.name = "QueryRejectedError";
  }
}

export class InternalError extends EmbedderError {
  constructor(message: string, cause?: unknown) {
    super("internal", message, { cause });
    this.name = "InternalError";
  }
}

const STATUS_BY_KIND: Record<ErrorKind, number> = {
  validation: 400,
  query_rejected: 400,
  storage: 503,
  unavailable: 503,
  internal: 500,
};

export function httpStatusFor(error: unknown): number {
  return error instanceof EmbedderError ? STATUS_BY_KIND[error.kind] : 500;
}

export interface ErrorBody {
  success: false;
  error: { kind: ErrorKind; message: string };
}

export function toErrorBody(error: unknown): ErrorBody {
  if (error instanceof EmbedderError) {
    return { success: false, error: { kind: error.kind, message: error.message } };
  }
  // Unclassified errors may carry driver internals; keep them out of responses.
  return { success: false, error: { kind: "internal", message: "Internal server error" } };
}
