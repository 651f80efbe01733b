/**
 * The resolved actor of a request. Both authorization regimes produce this
 * same value; nothing past the boundary can tell which one did.
 */
export interface Principal {
  readonly userId: number;
  /** Holds the capability to list every workspace in the system. */
  readonly admin: boolean;
}

/** Turns an opaque strict-mode credential into a user id, or null when it is not valid. */
export interface CredentialVerifier {
  verify(credential: string): number | null;
}

export interface IdentityOptions {
  fallbackUserId: number;
  adminUserIds?: readonly number[];
}
