/**
 * Shared setup for store and router tests: an in-memory database with the
 * schema applied, a controllable clock, three people and the automation
 * account that hint-less soft requests fall back to.
 */

import type Database from "better-sqlite3";
import type { Principal } from "../identity/types.js";
import type { LimitsConfig } from "../config.js";
import { openDatabase, type Clock } from "../db/database.js";
import { createServices, type Services } from "../app.js";
import { StaticTokenVerifier } from "../identity/resolver.js";

export interface TestClock {
  clock: Clock;
  set(iso: string): void;
  advance(ms: number): void;
}

export function testClock(start = "2024-03-01T09:00:00.000Z"): TestClock {
  let now = new Date(start).getTime();
  return {
    clock: () => new Date(now),
    set: (iso) => {
      now = new Date(iso).getTime();
    },
    advance: (ms) => {
      now += ms;
    },
  };
}

export const alice: Principal = { userId: 1, admin: true };
export const bob: Principal = { userId: 2, admin: false };
export const carol: Principal = { userId: 3, admin: false };
export const system: Principal = { userId: 4, admin: false };

export interface TestContext {
  db: Database.Database;
  services: Services;
  time: TestClock;
}

export function setup(limits?: LimitsConfig): TestContext {
  const db = openDatabase(":memory:");
  const time = testClock();
  const services = createServices(db, {
    clock: time.clock,
    limits,
    identity: { fallbackUserId: system.userId, adminUserIds: [alice.userId] },
    verifier: new StaticTokenVerifier({ "alice-token": 1, "bob-token": 2, "ghost-token": 99 }),
  });
  services.users.create({ id: 1, email: "alice@example.com", name: "Alice" });
  services.users.create({ id: 2, email: "bob@example.com", name: "Bob" });
  services.users.create({ id: 3, email: "carol@example.com", name: "Carol" });
  services.users.create({ id: 4, email: "automation@example.com", name: "Automation" });
  return { db, services, time };
}
