import { describe, it, expect, vi } from "vitest";
import { IdentityResolver, StaticTokenVerifier, type AccountDirectory } from "./resolver.js";
import { UnauthorizedError } from "../errors.js";
import type { User } from "../users/types.js";

vi.mock("../util/logger.js", () => ({
  getLogger: () => ({ info: () => {}, warn: () => {}, error: () => {}, debug: () => {} }),
}));

const accounts: User[] = [
  { id: 1, email: "system@example.com", name: "System", created_at: "2024-01-01T00:00:00.000Z" },
  { id: 5, email: "dana@example.com", name: "Dana", created_at: "2024-01-01T00:00:00.000Z" },
];

const directory: AccountDirectory = {
  get: (id) => accounts.find((u) => u.id === id),
  findByEmail: (email) => accounts.find((u) => u.email === email.toLowerCase()),
};

function makeResolver(dir: AccountDirectory = directory) {
  return new IdentityResolver(dir, new StaticTokenVerifier({ "dana-token": 5, "ghost-token": 42 }), {
    fallbackUserId: 1,
    adminUserIds: [5],
  });
}

describe("IdentityResolver.resolveStrict", () => {
  it("resolves a valid credential to its account", () => {
    expect(makeResolver().resolveStrict("dana-token")).toEqual({ userId: 5, admin: true });
  });

  it("trims surrounding whitespace", () => {
    expect(makeResolver().resolveStrict("  dana-token ").userId).toBe(5);
  });

  it("rejects a missing credential", () => {
    expect(() => makeResolver().resolveStrict(undefined)).toThrow("Missing bearer credential");
    expect(() => makeResolver().resolveStrict("   ")).toThrow(UnauthorizedError);
  });

  it("rejects a credential the verifier does not know", () => {
    expect(() => makeResolver().resolveStrict("nope")).toThrow("Could not validate credentials");
  });

  it("rejects a verified id without an account", () => {
    expect(() => makeResolver().resolveStrict("ghost-token")).toThrow(UnauthorizedError);
  });
});

describe("IdentityResolver.resolveSoft", () => {
  it("resolves a known email hint", () => {
    expect(makeResolver().resolveSoft("dana@example.com")).toEqual({ userId: 5, admin: true });
  });

  it("falls back when the hint is absent or blank", () => {
    const resolver = makeResolver();
    expect(resolver.resolveSoft(undefined)).toEqual({ userId: 1, admin: false });
    expect(resolver.resolveSoft("  ")).toEqual({ userId: 1, admin: false });
  });

  it("falls back when the hint names no account", () => {
    expect(makeResolver().resolveSoft("nobody@example.com")).toEqual({ userId: 1, admin: false });
  });

  it("falls back instead of throwing when the lookup fails", () => {
    const broken: AccountDirectory = {
      get: () => undefined,
      findByEmail: () => {
        throw new Error("database is locked");
      },
    };
    expect(makeResolver(broken).resolveSoft("dana@example.com")).toEqual({ userId: 1, admin: false });
  });

  it("never grants the admin capability to the fallback principal", () => {
    const resolver = new IdentityResolver(directory, new StaticTokenVerifier({}), {
      fallbackUserId: 5,
      adminUserIds: [5],
    });
    expect(resolver.resolveSoft(undefined)).toEqual({ userId: 5, admin: false });
    expect(resolver.resolveSoft("dana@example.com")).toEqual({ userId: 5, admin: true });
  });

  it("exposes the configured fallback id", () => {
    expect(makeResolver().fallbackUserId).toBe(1);
  });
});
