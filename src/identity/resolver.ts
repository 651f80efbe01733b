/**
 * IdentityResolver -- the single place where request credentials become a
 * Principal.
 *
 * Strict mode fails closed: no credential, a rejected credential, or a
 * verified id without an account is Unauthorized.
 *
 * Soft mode never fails: an absent, unknown or unreadable hint resolves to the
 * configured fallback principal, which never holds the admin capability.
 */

import type { CredentialVerifier, IdentityOptions, Principal } from "./types.js";
import type { User } from "../users/types.js";
import { UnauthorizedError } from "../errors.js";
import { getLogger } from "../util/logger.js";

const log = getLogger("identity");

/** The slice of UserStore the resolver reads. */
export interface AccountDirectory {
  get(id: number): User | undefined;
  findByEmail(email: string): User | undefined;
}

export class IdentityResolver {
  private readonly admins: ReadonlySet<number>;

  constructor(
    private accounts: AccountDirectory,
    private verifier: CredentialVerifier,
    private options: IdentityOptions,
  ) {
    this.admins = new Set(options.adminUserIds ?? []);
  }

  get fallbackUserId(): number {
    return this.options.fallbackUserId;
  }

  resolveStrict(credential: string | undefined): Principal {
    const token = credential?.trim();
    if (!token) {
      throw new UnauthorizedError("Missing bearer credential");
    }

    const userId = this.verifier.verify(token);
    if (userId === null) {
      throw new UnauthorizedError();
    }

    if (!this.accounts.get(userId)) {
      log.warn({ userId }, "verified credential names an unknown account");
      throw new UnauthorizedError();
    }

    return this.principal(userId);
  }

  resolveSoft(hint: string | undefined): Principal {
    const email = hint?.trim();
    if (!email) {
      return this.fallback("no hint");
    }

    let user: User | undefined;
    try {
      user = this.accounts.findByEmail(email);
    } catch (e) {
      log.warn({ err: e }, "account lookup failed during soft resolution");
      return this.fallback("lookup failed");
    }

    if (!user) {
      return this.fallback("unknown hint");
    }
    return this.principal(user.id);
  }

  private fallback(reason: string): Principal {
    log.debug({ reason, userId: this.options.fallbackUserId }, "using fallback principal");
    // Never admin, whatever adminUserIds says.
    return { userId: this.options.fallbackUserId, admin: false };
  }

  private principal(userId: number): Principal {
    return { userId, admin: this.admins.has(userId) };
  }
}

/** Verifier backed by the `auth.tokens` map of the config file. */
export class StaticTokenVerifier implements CredentialVerifier {
  private readonly tokens: ReadonlyMap<string, number>;

  constructor(tokens: Record<string, number>) {
    this.tokens = new Map(Object.entries(tokens));
  }

  verify(credential: string): number | null {
    return this.tokens.get(credential) ?? null;
  }
}
