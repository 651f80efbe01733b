import { describe, it, expect } from "vitest";
import {
  ConflictError,
  CycleDetectedError,
  ErrorCode,
  ForbiddenError,
  NotFoundError,
  TaskweaveError,
  TransactionError,
  UnauthorizedError,
  ValidationError,
  isTaskweaveError,
  isUniqueViolation,
} from "./errors.js";

describe("error taxonomy", () => {
  it("maps each error to its HTTP status", () => {
    expect(new NotFoundError("Task", 4).httpStatus).toBe(404);
    expect(new ValidationError("bad").httpStatus).toBe(400);
    expect(new CycleDetectedError(1, 2, "descendant").httpStatus).toBe(400);
    expect(new ConflictError("dup").httpStatus).toBe(409);
    expect(new ForbiddenError("no").httpStatus).toBe(403);
    expect(new UnauthorizedError().httpStatus).toBe(401);
    expect(new TransactionError(new Error("disk I/O error")).httpStatus).toBe(500);
  });

  it("NotFoundError names the entity and id", () => {
    const e = new NotFoundError("Project", 12);
    expect(e.message).toBe("Project 12 not found");
    expect(e.toJSON()).toEqual({
      error: "Project 12 not found",
      code: "NOT_FOUND",
      details: { entity: "Project", id: 12 },
    });
  });

  it("CycleDetectedError is a ValidationError with its own code", () => {
    const e = new CycleDetectedError(3, 7, "descendant");
    expect(e).toBeInstanceOf(ValidationError);
    expect(e.code).toBe(ErrorCode.CYCLE_DETECTED);
    expect(e.message).toBe("Task 7 is 3 or one of its descendants");
    expect(new CycleDetectedError(null, 7, "depth").message).toBe(
      "Parent chain above task 7 exceeds the maximum depth",
    );
  });

  it("TransactionError keeps the underlying fault as cause", () => {
    const fault = new Error("database is locked");
    const e = new TransactionError(fault);
    expect(e.message).toBe("Transaction aborted: database is locked");
    expect(e.cause).toBe(fault);
  });

  it("UnauthorizedError has a default message", () => {
    expect(new UnauthorizedError().message).toBe("Could not validate credentials");
  });

  it("isTaskweaveError recognises subclasses only", () => {
    expect(isTaskweaveError(new ConflictError("x"))).toBe(true);
    expect(isTaskweaveError(new TaskweaveError("x", ErrorCode.VALIDATION))).toBe(true);
    expect(isTaskweaveError(new Error("x"))).toBe(false);
    expect(isTaskweaveError("x")).toBe(false);
  });

  it("isUniqueViolation reads SQLite constraint codes", () => {
    const unique = Object.assign(new Error("UNIQUE constraint failed"), { code: "SQLITE_CONSTRAINT_UNIQUE" });
    const pk = Object.assign(new Error("UNIQUE constraint failed"), { code: "SQLITE_CONSTRAINT_PRIMARYKEY" });
    const check = Object.assign(new Error("CHECK constraint failed"), { code: "SQLITE_CONSTRAINT_CHECK" });
    expect(isUniqueViolation(unique)).toBe(true);
    expect(isUniqueViolation(pk)).toBe(true);
    expect(isUniqueViolation(check)).toBe(false);
    expect(isUniqueViolation(new Error("plain"))).toBe(false);
  });
});
