/**
 * Custom Error Types
 * Tagged error taxonomy shared by the data-access layer and its callers
 */

export type ErrorKind =
  | "Validation"
  | "NotFound"
  | "ForeignKey"
  | "Conflict"
  | "Cascade"
  | "Decode"
  | "StoreUnavailable"
  | "Config"
  | "Unknown";

/**
 * Base error class for all blogstore errors
 */
export class BlogStoreError extends Error {
  public readonly kind: ErrorKind;
  public readonly code: string;
  public readonly httpStatus: number;
  public readonly context?: Record<string, unknown>;
  public readonly retryable: boolean;

  constructor(
    message: string,
    kind: ErrorKind,
    options?: {
      cause?: unknown;
      context?: Record<string, unknown>;
      retryable?: boolean;
      httpStatus?: number;
    }
  ) {
    super(message);
    this.name = "BlogStoreError";
    this.kind = kind;
    this.code = toCode(kind);
    this.httpStatus = options?.httpStatus ?? 500;
    this.context = options?.context;
    this.retryable = options?.retryable ?? false;

    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }

    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      kind: this.kind,
      code: this.code,
      message: this.message,
      context: this.context,
      retryable: this.retryable,
      stack: this.stack,
    };
  }
}

// "ForeignKey" -> "FOREIGN_KEY_ERROR"
function toCode(kind: ErrorKind): string {
  return `${kind.replace(/([a-z])([A-Z])/g, "$1_$2").toUpperCase()}_ERROR`;
}

/**
 * Bad input shape or a missing required field
 */
export class ValidationError extends BlogStoreError {
  public readonly field?: string;
  public readonly issues: string[];

  constructor(
    message: string,
    options?: {
      field?: string;
      issues?: string[];
      context?: Record<string, unknown>;
    }
  ) {
    super(message, "Validation", { context: options?.context, httpStatus: 400 });
    this.name = "ValidationError";
    this.field = options?.field;
    this.issues = options?.issues ?? [];
  }
}

export class NotFoundError extends BlogStoreError {
  public readonly entityType: string;
  public readonly entityId: string;

  constructor(entityType: string, entityId: string) {
    super(`${entityType} not found: ${entityId}`, "NotFound", {
      context: { entityType, entityId },
      httpStatus: 404,
    });
    this.name = "NotFoundError";
    this.entityType = entityType;
    this.entityId = entityId;
  }
}

/**
 * A referenced entity does not exist at write time
 */
export class ForeignKeyError extends BlogStoreError {
  public readonly entityType: string;
  public readonly entityId: string;
  public readonly referencedBy: string;

  constructor(entityType: string, entityId: string, referencedBy: string) {
    super(
      `${referencedBy} references missing ${entityType}: ${entityId}`,
      "ForeignKey",
      { context: { entityType, entityId, referencedBy }, httpStatus: 400 }
    );
    this.name = "ForeignKeyError";
    this.entityType = entityType;
    this.entityId = entityId;
    this.referencedBy = referencedBy;
  }
}

/**
 * A conditional write found an item where none was allowed (or none where one was required),
 * or a table call found the table already there
 */
export class ConflictError extends BlogStoreError {
  public readonly key: string;

  constructor(message: string, key: string, cause?: unknown) {
    super(message, "Conflict", { cause, context: { key }, httpStatus: 409 });
    this.name = "ConflictError";
    this.key = key;
  }
}

export interface CascadeRef {
  entityType: string;
  id: string;
}

/**
 * Partial failure while deleting dependents. Already-deleted children are not restored.
 */
export class CascadeError extends BlogStoreError {
  public readonly root: CascadeRef;
  public readonly deleted: CascadeRef[];
  public readonly pending: CascadeRef[];

  constructor(
    root: CascadeRef,
    deleted: CascadeRef[],
    pending: CascadeRef[],
    cause?: unknown
  ) {
    const reason = cause instanceof Error ? `: ${cause.message}` : "";
    super(
      `Cascade delete of ${root.entityType} ${root.id} failed after removing ` +
        `${describeRefs(deleted)}; not removed: ${describeRefs(pending)}${reason}`,
      "Cascade",
      { cause, context: { root, deleted, pending } }
    );
    this.name = "CascadeError";
    this.root = root;
    this.deleted = deleted;
    this.pending = pending;
  }
}

function describeRefs(refs: CascadeRef[]): string {
  if (refs.length === 0) return "nothing";
  return refs.map((r) => `${r.entityType} ${r.id}`).join(", ");
}

/**
 * The store returned an item that does not match the entity shape
 */
export class DecodeError extends BlogStoreError {
  public readonly issues: string[];

  constructor(message: string, issues: string[], context?: Record<string, unknown>) {
    super(message, "Decode", { context });
    this.name = "DecodeError";
    this.issues = issues;
  }
}

/**
 * Transport or connection failure. Safe to retry.
 */
export class StoreUnavailableError extends BlogStoreError {
  constructor(message: string, cause?: unknown) {
    super(message, "StoreUnavailable", { cause, retryable: true, httpStatus: 503 });
    this.name = "StoreUnavailableError";
  }
}

export class ConfigError extends BlogStoreError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "Config", { context, retryable: false });
    this.name = "ConfigError";
  }
}

/**
 * Type guard to check if error is a blogstore error
 */
export function isBlogStoreError(error: unknown): error is BlogStoreError {
  return error instanceof BlogStoreError;
}

/**
 * Check an error by its kind tag rather than its class
 */
export function isErrorKind(error: unknown, kind: ErrorKind): error is BlogStoreError {
  return isBlogStoreError(error) && error.kind === kind;
}

export function isRetryableError(error: unknown): boolean {
  if (isBlogStoreError(error)) {
    return error.retryable;
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return (
      message.includes("timeout") ||
      message.includes("econnreset") ||
      message.includes("econnrefused")
    );
  }

  return false;
}

/**
 * Wrap an unknown error into a blogstore error
 */
export function wrapError(error: unknown, defaultMessage = "Unknown error"): BlogStoreError {
  if (isBlogStoreError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new BlogStoreError(error.message || defaultMessage, "Unknown", {
      cause: error,
    });
  }

  return new BlogStoreError(
    typeof error === "string" ? error : defaultMessage,
    "Unknown"
  );
}

/**
 * Status code a transport layer should answer with for this error
 */
export function toHttpStatus(error: unknown): number {
  return isBlogStoreError(error) ? error.httpStatus : 500;
}
