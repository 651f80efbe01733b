/**
 * Composition root: every store over one database handle, plus the identity
 * resolver the HTTP boundary uses.
 */

import type Database from "better-sqlite3";
import type { LimitsConfig } from "./config.js";
import type { CredentialVerifier, IdentityOptions } from "./identity/types.js";
import { DEFAULT_LIMITS, SYSTEM_USER_ID } from "./config.js";
import { systemClock, type Clock } from "./db/database.js";
import { IdentityResolver, StaticTokenVerifier } from "./identity/resolver.js";
import { UserStore } from "./users/store.js";
import { WorkspaceStore } from "./workspaces/store.js";
import { TeamStore } from "./teams/store.js";
import { ProjectStore } from "./projects/store.js";
import { SectionStore } from "./sections/store.js";
import { TaskStore } from "./tasks/store.js";
import { TaskQuery } from "./tasks/query.js";
import { TagStore } from "./tags/store.js";
import { CustomFieldStore } from "./custom-fields/store.js";
import { CommentStore } from "./comments/store.js";
import { AttachmentStore } from "./attachments/store.js";

export interface ServiceOptions {
  clock?: Clock;
  limits?: LimitsConfig;
  identity?: IdentityOptions;
  verifier?: CredentialVerifier;
}

export interface Services {
  users: UserStore;
  workspaces: WorkspaceStore;
  teams: TeamStore;
  projects: ProjectStore;
  sections: SectionStore;
  tasks: TaskStore;
  query: TaskQuery;
  tags: TagStore;
  fields: CustomFieldStore;
  comments: CommentStore;
  attachments: AttachmentStore;
  identity: IdentityResolver;
}

export function createServices(db: Database.Database, options: ServiceOptions = {}): Services {
  const clock = options.clock ?? systemClock;
  const limits = options.limits ?? DEFAULT_LIMITS;
  const users = new UserStore(db, clock);

  return {
    users,
    workspaces: new WorkspaceStore(db, clock),
    teams: new TeamStore(db, clock),
    projects: new ProjectStore(db, clock),
    sections: new SectionStore(db, clock),
    tasks: new TaskStore(db, clock, limits.maxTaskDepth),
    query: new TaskQuery(db, limits),
    tags: new TagStore(db, clock),
    fields: new CustomFieldStore(db, clock),
    comments: new CommentStore(db, clock),
    attachments: new AttachmentStore(db, clock),
    identity: new IdentityResolver(
      users,
      options.verifier ?? new StaticTokenVerifier({}),
      options.identity ?? { fallbackUserId: SYSTEM_USER_ID },
    ),
  };
}

export type { Principal } from "./identity/types.js";
export { openDatabase } from "./db/database.js";
export { loadConfig, defaultConfig, type TaskweaveConfig } from "./config.js";
export * from "./errors.js";
