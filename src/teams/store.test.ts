import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { setup, alice, bob, carol, type TestContext } from "../testing/fixtures.js";
import { ForbiddenError, NotFoundError, ValidationError } from "../errors.js";

vi.mock("../util/logger.js", () => ({
  getLogger: () => ({ info: () => {}, warn: () => {}, error: () => {}, debug: () => {} }),
}));

describe("TeamStore", () => {
  let ctx: TestContext;
  let wsId: number;

  beforeEach(() => {
    ctx = setup();
    wsId = ctx.services.workspaces.create(alice, { name: "W" }).id;
    ctx.services.workspaces.addMember(alice, wsId, bob.userId);
  });

  afterEach(() => {
    ctx.db.close();
  });

  it("creates and lists teams of a workspace", () => {
    const a = ctx.services.teams.create(bob, { workspace_id: wsId, name: "Design" });
    const b = ctx.services.teams.create(alice, { workspace_id: wsId, name: "Platform" });

    expect(a).toEqual({
      id: 1,
      name: "Design",
      workspace_id: wsId,
      created_at: "2024-03-01T09:00:00.000Z",
      member_ids: [],
    });
    expect(ctx.services.teams.list(alice, wsId).map((t) => t.id)).toEqual([a.id, b.id]);
  });

  it("non-members cannot see or create teams", () => {
    const team = ctx.services.teams.create(alice, { workspace_id: wsId, name: "Design" });
    expect(() => ctx.services.teams.get(carol, team.id)).toThrow("Team 1 not found");
    expect(() => ctx.services.teams.list(carol, wsId)).toThrow(NotFoundError);
    expect(() => ctx.services.teams.create(carol, { workspace_id: wsId, name: "X" })).toThrow(ForbiddenError);
  });

  it("members must belong to the workspace", () => {
    const team = ctx.services.teams.create(alice, { workspace_id: wsId, name: "Design" });
    expect(() => ctx.services.teams.addMember(alice, team.id, carol.userId)).toThrow(ValidationError);
  });

  it("addMember and removeMember are idempotent", () => {
    const team = ctx.services.teams.create(alice, { workspace_id: wsId, name: "Design" });
    ctx.services.teams.addMember(alice, team.id, bob.userId);
    expect(ctx.services.teams.addMember(alice, team.id, bob.userId).member_ids).toEqual([2]);

    ctx.services.teams.removeMember(alice, team.id, bob.userId);
    expect(ctx.services.teams.removeMember(alice, team.id, bob.userId).member_ids).toEqual([]);
  });

  it("deleting a team clears team_id on its projects", () => {
    const team = ctx.services.teams.create(alice, { workspace_id: wsId, name: "Design" });
    const project = ctx.services.projects.create(alice, { workspace_id: wsId, name: "P", team_id: team.id });
    expect(project.team_id).toBe(team.id);

    ctx.services.teams.delete(alice, team.id);
    expect(ctx.services.projects.get(alice, project.id).team_id).toBeNull();
    expect(() => ctx.services.teams.get(alice, team.id)).toThrow(NotFoundError);
  });
});
