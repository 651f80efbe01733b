import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type Database from "better-sqlite3";
import { openDatabase, runInTransaction } from "./database.js";
import { runMigration } from "../migrations/001-initial-schema.js";
import { ConflictError, TransactionError } from "../errors.js";

vi.mock("../util/logger.js", () => ({
  getLogger: () => ({ info: () => {}, warn: () => {}, error: () => {}, debug: () => {} }),
}));

describe("openDatabase", () => {
  let db: Database.Database;

  beforeEach(() => {
    db = openDatabase(":memory:");
  });

  afterEach(() => {
    db.close();
  });

  it("enables foreign keys", () => {
    expect(db.pragma("foreign_keys", { simple: true })).toBe(1);
  });

  it("the schema can be applied twice", () => {
    expect(() => runMigration(db)).not.toThrow();
  });

  it("refuses a row that points at a missing parent", () => {
    expect(() =>
      db
        .prepare("INSERT INTO projects (name, workspace_id, owner_id, is_public, created_at, updated_at) VALUES (?, ?, ?, ?, ?, ?)")
        .run("P", 42, 1, 1, "t", "t"),
    ).toThrow(/FOREIGN KEY/);
  });
});

describe("runInTransaction", () => {
  let db: Database.Database;
  const count = () => db.prepare("SELECT COUNT(*) AS n FROM users").get();
  const insert = (email: string) =>
    db.prepare("INSERT INTO users (email, name, created_at) VALUES (?, ?, ?)").run(email, "U", "t");

  beforeEach(() => {
    db = openDatabase(":memory:");
  });

  afterEach(() => {
    db.close();
  });

  it("returns the callback's value and commits", () => {
    const id = runInTransaction(db, () => Number(insert("a@example.com").lastInsertRowid));
    expect(id).toBe(1);
    expect(count()).toEqual({ n: 1 });
  });

  it("rolls back and rethrows a domain error unchanged", () => {
    const conflict = new ConflictError("taken");
    expect(() =>
      runInTransaction(db, () => {
        insert("a@example.com");
        throw conflict;
      }),
    ).toThrow(conflict);
    expect(count()).toEqual({ n: 0 });
  });

  it("wraps any other failure as TransactionError", () => {
    let caught: unknown;
    try {
      runInTransaction(db, () => {
        insert("a@example.com");
        insert("a@example.com");
      });
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(TransactionError);
    expect(caught).toMatchObject({ code: "TRANSACTION", httpStatus: 500 });
    expect(count()).toEqual({ n: 0 });
  });

  it("a failed inner transaction rolls back the outer one", () => {
    expect(() =>
      runInTransaction(db, () => {
        insert("outer@example.com");
        runInTransaction(db, () => {
          throw new ConflictError("inner");
        });
      }),
    ).toThrow("inner");
    expect(count()).toEqual({ n: 0 });
  });
});
