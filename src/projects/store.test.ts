import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { setup, alice, bob, carol, type TestContext } from "../testing/fixtures.js";
import { ForbiddenError, NotFoundError, ValidationError } from "../errors.js";

vi.mock("../util/logger.js", () => ({
  getLogger: () => ({ info: () => {}, warn: () => {}, error: () => {}, debug: () => {} }),
}));

describe("ProjectStore", () => {
  let ctx: TestContext;
  let wsId: number;

  beforeEach(() => {
    ctx = setup();
    wsId = ctx.services.workspaces.create(alice, { name: "W" }).id;
    ctx.services.workspaces.addMember(alice, wsId, bob.userId);
    ctx.services.workspaces.addMember(alice, wsId, carol.userId);
  });

  afterEach(() => {
    ctx.db.close();
  });

  it("creates a public project owned by the caller", () => {
    const project = ctx.services.projects.create(bob, { workspace_id: wsId, name: "Launch" });
    expect(project).toEqual({
      id: 1,
      name: "Launch",
      description: null,
      workspace_id: wsId,
      team_id: null,
      owner_id: 2,
      is_public: true,
      created_at: "2024-03-01T09:00:00.000Z",
      updated_at: "2024-03-01T09:00:00.000Z",
    });
  });

  it("rejects a team from another workspace and a missing team", () => {
    const other = ctx.services.workspaces.create(alice, { name: "Other" });
    const foreignTeam = ctx.services.teams.create(alice, { workspace_id: other.id, name: "T" });

    expect(() =>
      ctx.services.projects.create(alice, { workspace_id: wsId, name: "P", team_id: foreignTeam.id }),
    ).toThrow(ValidationError);
    expect(() => ctx.services.projects.create(alice, { workspace_id: wsId, name: "P", team_id: 404 })).toThrow(
      "Team 404 not found",
    );
  });

  it("update() is partial and limited to the project or workspace owner", () => {
    const project = ctx.services.projects.create(bob, {
      workspace_id: wsId,
      name: "Launch",
      description: "Q2 launch",
    });

    expect(() => ctx.services.projects.update(carol, project.id, { name: "Mine" })).toThrow(ForbiddenError);

    const byOwner = ctx.services.projects.update(bob, project.id, { is_public: false });
    expect(byOwner.is_public).toBe(false);
    expect(byOwner.description).toBe("Q2 launch");

    const byWorkspaceOwner = ctx.services.projects.update(alice, project.id, { description: null });
    expect(byWorkspaceOwner.description).toBeNull();
    expect(byWorkspaceOwner.name).toBe("Launch");
  });

  it("list() returns the workspace's projects to members only", () => {
    ctx.services.projects.create(alice, { workspace_id: wsId, name: "A" });
    ctx.services.projects.create(bob, { workspace_id: wsId, name: "B" });
    const outsider = { userId: 9, admin: false };

    expect(ctx.services.projects.list(carol, wsId).map((p) => p.name)).toEqual(["A", "B"]);
    expect(() => ctx.services.projects.list(outsider, wsId)).toThrow(NotFoundError);
  });

  it("delete() removes everything reachable from the project", () => {
    const project = ctx.services.projects.create(alice, { workspace_id: wsId, name: "P" });
    const section = ctx.services.sections.create(alice, { project_id: project.id, name: "Todo" });
    const task = ctx.services.tasks.create(alice, { project_id: project.id, name: "A", section_id: section.id });
    const sub = ctx.services.tasks.create(alice, { project_id: project.id, name: "B", parent_task_id: task.id });
    const comment = ctx.services.comments.create(alice, { task_id: sub.id, text: "note" });
    const attachment = ctx.services.attachments.create(alice, {
      comment_id: comment.id,
      filename: "a.png",
      reference: "blob://a",
    });
    const field = ctx.services.fields.defineField(alice, { project_id: project.id, name: "Pts", value_type: "number" });
    ctx.services.fields.setValue(alice, task.id, field.id, 3);

    expect(() => ctx.services.projects.delete(carol, project.id)).toThrow(ForbiddenError);
    ctx.services.projects.delete(alice, project.id);

    expect(() => ctx.services.projects.get(alice, project.id)).toThrow(NotFoundError);
    expect(() => ctx.services.sections.get(alice, section.id)).toThrow(NotFoundError);
    expect(() => ctx.services.tasks.get(alice, task.id)).toThrow(NotFoundError);
    expect(() => ctx.services.tasks.get(alice, sub.id)).toThrow(NotFoundError);
    expect(() => ctx.services.comments.get(alice, comment.id)).toThrow(NotFoundError);
    expect(() => ctx.services.attachments.get(alice, attachment.id)).toThrow(NotFoundError);
    expect(() => ctx.services.fields.getField(alice, field.id)).toThrow(NotFoundError);
    const values = ctx.db.prepare("SELECT COUNT(*) AS n FROM custom_field_values").get();
    expect(values).toEqual({ n: 0 });
  });
});
