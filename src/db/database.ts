import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { runMigration } from "../migrations/001-initial-schema.js";
import { TransactionError, isTaskweaveError } from "../errors.js";
import { getLogger } from "../util/logger.js";

const log = getLogger("database");

/** Open (or create) the database, enable foreign keys and bring the schema up to date. */
export function openDatabase(path: string): Database.Database {
  if (path !== ":memory:") {
    mkdirSync(dirname(path), { recursive: true });
  }

  const db = new Database(path);
  db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");
  db.pragma("busy_timeout = 5000");

  runMigration(db);
  log.info({ path }, "database opened");
  return db;
}

/**
 * Run `fn` as one IMMEDIATE transaction. Called inside another transaction it
 * becomes a savepoint of the outer one.
 *
 * Domain errors propagate unchanged after the rollback; anything else is a
 * storage fault and is rethrown as TransactionError.
 */
export function runInTransaction<T>(db: Database.Database, fn: () => T): T {
  try {
    return db.transaction(fn).immediate();
  } catch (e) {
    if (isTaskweaveError(e)) throw e;
    log.error({ err: e }, "transaction rolled back");
    throw new TransactionError(e);
  }
}

/** Source of "now"; injectable so tests control completion and creation instants. */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
