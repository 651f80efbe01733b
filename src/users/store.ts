/**
 * UserStore -- accounts that principals resolve to.
 *
 * Accounts are looked up, never joined: entities record principal ids as plain
 * integers so ownership survives the account.
 */

import type Database from "better-sqlite3";
import type { User, CreateUserInput } from "./types.js";
import { runInTransaction, systemClock, type Clock } from "../db/database.js";
import { ConflictError, ValidationError, isUniqueViolation } from "../errors.js";
import { getLogger } from "../util/logger.js";

const log = getLogger("user-store");

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+$/;

export class UserStore {
  constructor(
    private db: Database.Database,
    private clock: Clock = systemClock,
  ) {}

  list(): User[] {
    return this.db.prepare("SELECT * FROM users ORDER BY id ASC").all() as User[];
  }

  get(id: number): User | undefined {
    return this.db.prepare("SELECT * FROM users WHERE id = ?").get(id) as User | undefined;
  }

  /** Case-insensitive; the column is declared COLLATE NOCASE. */
  findByEmail(email: string): User | undefined {
    return this.db.prepare("SELECT * FROM users WHERE email = ?").get(email.trim()) as User | undefined;
  }

  create(input: CreateUserInput): User {
    const email = input.email.trim();
    const name = input.name.trim();
    if (!EMAIL_PATTERN.test(email)) {
      throw new ValidationError(`'${input.email}' is not an email address`, { field: "email" });
    }
    if (name.length === 0) {
      throw new ValidationError("User name must not be empty", { field: "name" });
    }

    return runInTransaction(this.db, () => {
      let id: number;
      try {
        const result = this.db
          .prepare("INSERT INTO users (id, email, name, created_at) VALUES (?, ?, ?, ?)")
          .run(input.id ?? null, email, name, this.clock().toISOString());
        id = Number(result.lastInsertRowid);
      } catch (e) {
        if (isUniqueViolation(e)) {
          throw new ConflictError(`A user with email '${email}' or id ${input.id ?? "?"} already exists`, { email });
        }
        throw e;
      }
      log.info({ id, email }, "user created");
      return this.require(id);
    });
  }

  /** Create the account with a fixed id unless one with that id already exists. */
  ensure(input: CreateUserInput & { id: number }): User {
    return this.get(input.id) ?? this.create(input);
  }

  private require(id: number): User {
    const user = this.get(id);
    if (!user) throw new Error(`user ${id} vanished inside its own transaction`);
    return user;
  }
}
