/**
 * Error taxonomy shared by every store.
 *
 * Each operation ends in a value or exactly one of these errors. Storage
 * faults that interrupt a transaction surface as TransactionError, which is
 * not a domain error: the caller retries the whole operation.
 */

export const ErrorCode = {
  NOT_FOUND: "NOT_FOUND",
  VALIDATION: "VALIDATION",
  CYCLE_DETECTED: "CYCLE_DETECTED",
  CONFLICT: "CONFLICT",
  FORBIDDEN: "FORBIDDEN",
  UNAUTHORIZED: "UNAUTHORIZED",
  TRANSACTION: "TRANSACTION",
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

const HTTP_STATUS: Record<ErrorCode, number> = {
  NOT_FOUND: 404,
  VALIDATION: 400,
  CYCLE_DETECTED: 400,
  CONFLICT: 409,
  FORBIDDEN: 403,
  UNAUTHORIZED: 401,
  TRANSACTION: 500,
};

export type ErrorDetails = Record<string, unknown>;

export class TaskweaveError extends Error {
  readonly code: ErrorCode;
  readonly details: ErrorDetails;
  readonly httpStatus: number;

  constructor(message: string, code: ErrorCode, details: ErrorDetails = {}, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "TaskweaveError";
    this.code = code;
    this.details = details;
    this.httpStatus = HTTP_STATUS[code];
  }

  toJSON(): { error: string; code: ErrorCode; details: ErrorDetails } {
    return { error: this.message, code: this.code, details: this.details };
  }
}

export class NotFoundError extends TaskweaveError {
  constructor(entity: string, id: number | string) {
    super(`${entity} ${id} not found`, ErrorCode.NOT_FOUND, { entity, id });
    this.name = "NotFoundError";
  }
}

export class ValidationError extends TaskweaveError {
  constructor(message: string, details: ErrorDetails = {}, code: ErrorCode = ErrorCode.VALIDATION) {
    super(message, code, details);
    this.name = "ValidationError";
  }
}

/** Reparenting that would close a loop, or a parent chain too deep to verify. */
export class CycleDetectedError extends ValidationError {
  constructor(taskId: number | null, parentId: number, reason: "descendant" | "depth") {
    super(
      reason === "descendant"
        ? `Task ${parentId} is ${taskId} or one of its descendants`
        : `Parent chain above task ${parentId} exceeds the maximum depth`,
      { taskId, parentId, reason },
      ErrorCode.CYCLE_DETECTED,
    );
    this.name = "CycleDetectedError";
  }
}

export class ConflictError extends TaskweaveError {
  constructor(message: string, details: ErrorDetails = {}) {
    super(message, ErrorCode.CONFLICT, details);
    this.name = "ConflictError";
  }
}

export class ForbiddenError extends TaskweaveError {
  constructor(message: string, details: ErrorDetails = {}) {
    super(message, ErrorCode.FORBIDDEN, details);
    this.name = "ForbiddenError";
  }
}

export class UnauthorizedError extends TaskweaveError {
  constructor(message = "Could not validate credentials") {
    super(message, ErrorCode.UNAUTHORIZED);
    this.name = "UnauthorizedError";
  }
}

export class TransactionError extends TaskweaveError {
  constructor(cause: unknown) {
    super(
      `Transaction aborted: ${cause instanceof Error ? cause.message : String(cause)}`,
      ErrorCode.TRANSACTION,
      {},
      cause,
    );
    this.name = "TransactionError";
  }
}

export function isTaskweaveError(e: unknown): e is TaskweaveError {
  return e instanceof TaskweaveError;
}

/** SQLite reports constraint failures through error codes on the thrown object. */
export function isUniqueViolation(e: unknown): boolean {
  return (
    e instanceof Error &&
    "code" in e &&
    (e.code === "SQLITE_CONSTRAINT_UNIQUE" || e.code === "SQLITE_CONSTRAINT_PRIMARYKEY")
  );
}
