import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { setup, alice, bob, carol, type TestContext } from "../testing/fixtures.js";
import { resolveTarget } from "./store.js";
import { ForbiddenError, NotFoundError, ValidationError } from "../errors.js";

vi.mock("../util/logger.js", () => ({
  getLogger: () => ({ info: () => {}, warn: () => {}, error: () => {}, debug: () => {} }),
}));

describe("resolveTarget", () => {
  it("accepts exactly one target", () => {
    expect(resolveTarget({ task_id: 4 })).toEqual({ column: "task_id", id: 4 });
    expect(resolveTarget({ task_id: null, comment_id: 7 })).toEqual({ column: "comment_id", id: 7 });
  });

  it("rejects none or both", () => {
    expect(() => resolveTarget({})).toThrow("Exactly one of 'task_id' and 'comment_id' is required");
    expect(() => resolveTarget({ task_id: 1, comment_id: 2 })).toThrow(ValidationError);
  });
});

describe("AttachmentStore", () => {
  let ctx: TestContext;
  let taskId: number;

  beforeEach(() => {
    ctx = setup();
    const ws = ctx.services.workspaces.create(alice, { name: "W" });
    ctx.services.workspaces.addMember(alice, ws.id, bob.userId);
    ctx.services.workspaces.addMember(alice, ws.id, carol.userId);
    const project = ctx.services.projects.create(alice, { workspace_id: ws.id, name: "P" });
    taskId = ctx.services.tasks.create(alice, { project_id: project.id, name: "A" }).id;
  });

  afterEach(() => {
    ctx.db.close();
  });

  it("stores metadata for a task attachment", () => {
    const attachment = ctx.services.attachments.create(bob, {
      task_id: taskId,
      filename: "plan.pdf",
      reference: "s3://bucket/plan.pdf",
    });
    expect(attachment).toEqual({
      id: 1,
      filename: "plan.pdf",
      reference: "s3://bucket/plan.pdf",
      task_id: taskId,
      comment_id: null,
      uploader_id: bob.userId,
      created_at: "2024-03-01T09:00:00.000Z",
    });
    expect(ctx.services.attachments.list(alice, { task_id: taskId })).toEqual([attachment]);
  });

  it("lists comment attachments separately from task attachments", () => {
    const comment = ctx.services.comments.create(bob, { task_id: taskId, text: "x" });
    ctx.services.attachments.create(bob, { task_id: taskId, filename: "t.txt", reference: "r1" });
    ctx.services.attachments.create(bob, { comment_id: comment.id, filename: "c.txt", reference: "r2" });

    expect(ctx.services.attachments.list(bob, { comment_id: comment.id }).map((a) => a.filename)).toEqual(["c.txt"]);
    expect(ctx.services.attachments.list(bob, { task_id: taskId }).map((a) => a.filename)).toEqual(["t.txt"]);
  });

  it("requires exactly one target on create", () => {
    expect(() =>
      ctx.services.attachments.create(bob, { task_id: taskId, comment_id: 1, filename: "x", reference: "r" }),
    ).toThrow(ValidationError);
    expect(() => ctx.services.attachments.create(bob, { filename: "x", reference: "r" })).toThrow(ValidationError);
  });

  it("an unknown comment target is not found", () => {
    expect(() => ctx.services.attachments.create(bob, { comment_id: 9, filename: "x", reference: "r" })).toThrow(
      "Comment 9 not found",
    );
  });

  it("the uploader may delete", () => {
    const attachment = ctx.services.attachments.create(bob, { task_id: taskId, filename: "x", reference: "r" });
    ctx.services.attachments.delete(bob, attachment.id);
    expect(() => ctx.services.attachments.get(bob, attachment.id)).toThrow(`Attachment ${attachment.id} not found`);
  });

  it("the workspace owner may delete someone else's attachment", () => {
    const attachment = ctx.services.attachments.create(bob, { task_id: taskId, filename: "x", reference: "r" });
    ctx.services.attachments.delete(alice, attachment.id);
    expect(ctx.services.attachments.list(alice, { task_id: taskId })).toEqual([]);
  });

  it("other members may not delete", () => {
    const attachment = ctx.services.attachments.create(bob, { task_id: taskId, filename: "x", reference: "r" });
    expect(() => ctx.services.attachments.delete(carol, attachment.id)).toThrow(ForbiddenError);
    expect(() => ctx.services.attachments.delete(carol, attachment.id)).toThrow(
      `Only the uploader or the workspace owner may delete attachment ${attachment.id}`,
    );
  });

  it("hides attachments from non-members", () => {
    const outsider = ctx.services.users.create({ email: "dave@example.com", name: "Dave" });
    const attachment = ctx.services.attachments.create(bob, { task_id: taskId, filename: "x", reference: "r" });
    expect(() => ctx.services.attachments.get({ userId: outsider.id, admin: false }, attachment.id)).toThrow(
      NotFoundError,
    );
  });
});
