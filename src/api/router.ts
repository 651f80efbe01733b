/**
 * REST API router over the taskweave stores.
 *
 * Handles every /api/* route for an already-resolved Principal. Decoupled from
 * the HTTP server so it can be tested without sockets and so both
 * authorization surfaces share one route table.
 *
 * Endpoints:
 *   GET    /api/me
 *   GET    /api/users/:id
 *   GET    /api/workspaces[?all=true]        POST /api/workspaces
 *   GET|PATCH|DELETE /api/workspaces/:id
 *   GET    /api/workspaces/:id/members       POST /api/workspaces/:id/members
 *   DELETE /api/workspaces/:id/members/:userId
 *   GET    /api/workspaces/:id/teams         POST /api/teams
 *   GET|DELETE /api/teams/:id
 *   GET    /api/teams/:id/members            POST /api/teams/:id/members
 *   DELETE /api/teams/:id/members/:userId
 *   GET    /api/workspaces/:id/projects      POST /api/projects
 *   GET|PATCH|DELETE /api/projects/:id
 *   GET    /api/projects/:id/sections        POST /api/sections
 *   GET|PATCH|DELETE /api/sections/:id
 *   GET    /api/tasks?workspace_id=&...      POST /api/tasks
 *   GET|PATCH|DELETE /api/tasks/:id
 *   GET    /api/tasks/:id/subtasks
 *   GET|POST|DELETE /api/tasks/:id/followers (POST/DELETE act on the caller)
 *   GET    /api/workspaces/:id/tags          POST /api/tags
 *   GET|PATCH|DELETE /api/tags/:id
 *   GET    /api/tasks/:id/tags
 *   PUT|DELETE /api/tasks/:id/tags/:tagId
 *   GET    /api/projects/:id/custom-fields   POST /api/custom-fields
 *   GET|PATCH|DELETE /api/custom-fields/:id
 *   GET    /api/tasks/:id/custom-fields
 *   PUT|DELETE /api/tasks/:id/custom-fields/:fieldId   (PUT body: { value })
 *   GET    /api/tasks/:id/comments           POST /api/comments
 *   GET|PATCH|DELETE /api/comments/:id
 *   GET    /api/tasks/:id/attachments
 *   GET    /api/comments/:id/attachments     POST /api/attachments
 *   GET|DELETE /api/attachments/:id
 */

import type { ServerResponse } from "node:http";
import type { Principal } from "../identity/types.js";
import type { Services } from "../app.js";
import type { FieldType } from "../custom-fields/types.js";
import { isFieldType } from "../custom-fields/types.js";
import { isTaskweaveError, NotFoundError, ValidationError } from "../errors.js";
import {
  type Body,
  flag,
  int,
  nullableInt,
  nullableStr,
  optBool,
  optInt,
  optOptions,
  optStr,
  str,
  taskFilters,
} from "./params.js";
import { getLogger } from "../util/logger.js";

const log = getLogger("api-router");

type Method = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

interface RouteContext {
  principal: Principal;
  /** Numeric path segments, in order. */
  ids: number[];
  query: URLSearchParams;
  body: Body;
}

interface Reply {
  status: number;
  body?: unknown;
}

interface Route {
  method: Method;
  pattern: RegExp;
  handler: (ctx: RouteContext) => Reply;
}

const ok = (body: unknown): Reply => ({ status: 200, body });
const created = (body: unknown): Reply => ({ status: 201, body });
const noContent = (): Reply => ({ status: 204 });

export class ApiRouter {
  private routes: Route[];

  constructor(private services: Services) {
    this.routes = this.buildRoutes();
  }

  /**
   * Handle a request. Returns true if the route matched (response was sent),
   * false if no route matched (caller should send 404).
   */
  handle(method: string, url: string, principal: Principal, res: ServerResponse, body?: Body): boolean {
    const [path, queryString] = url.split("?", 2);

    for (const route of this.routes) {
      if (route.method !== method) continue;
      const match = route.pattern.exec(path);
      if (!match) continue;

      const ctx: RouteContext = {
        principal,
        ids: match.slice(1).map(Number),
        query: new URLSearchParams(queryString ?? ""),
        body: body ?? {},
      };
      this.dispatch(route, ctx, res);
      return true;
    }
    return false;
  }

  private dispatch(route: Route, ctx: RouteContext, res: ServerResponse): void {
    try {
      const reply = route.handler(ctx);
      sendJson(res, reply.status, reply.body);
    } catch (e) {
      if (isTaskweaveError(e)) {
        if (e.httpStatus >= 500) log.error({ err: e }, "storage fault while handling request");
        sendJson(res, e.httpStatus, e.toJSON());
        return;
      }
      log.error({ err: e }, "unhandled API error");
      sendJson(res, 500, { error: "Internal server error" });
    }
  }

  private buildRoutes(): Route[] {
    const s = this.services;
    const route = (method: Method, path: string, handler: Route["handler"]): Route => ({
      method,
      pattern: new RegExp(`^/api${path.replace(/:\w+/g, "(\\d+)")}$`),
      handler,
    });

    return [
      route("GET", "/me", ({ principal }) => ok({ user_id: principal.userId, admin: principal.admin })),
      // Any authenticated caller may look up an account, e.g. to name an assignee.
      route("GET", "/users/:id", ({ ids: [id] }) => {
        const user = s.users.get(id);
        if (!user) throw new NotFoundError("User", id);
        return ok(user);
      }),

      // ── Workspaces ──────────────────────────────────────────────────
      route("GET", "/workspaces", ({ principal, query }) =>
        ok({ data: s.workspaces.list(principal, { all: flag(query, "all") }) }),
      ),
      route("POST", "/workspaces", ({ principal, body }) =>
        created(s.workspaces.create(principal, { name: str(body, "name") })),
      ),
      route("GET", "/workspaces/:id", ({ principal, ids: [id] }) => ok(s.workspaces.get(principal, id))),
      route("PATCH", "/workspaces/:id", ({ principal, ids: [id], body }) =>
        ok(s.workspaces.update(principal, id, { name: optStr(body, "name") })),
      ),
      route("DELETE", "/workspaces/:id", ({ principal, ids: [id] }) => {
        s.workspaces.delete(principal, id);
        return noContent();
      }),
      route("GET", "/workspaces/:id/members", ({ principal, ids: [id] }) =>
        ok({ data: s.workspaces.listMembers(principal, id) }),
      ),
      route("POST", "/workspaces/:id/members", ({ principal, ids: [id], body }) => {
        s.workspaces.addMember(principal, id, int(body, "user_id"));
        return ok({ data: s.workspaces.listMembers(principal, id) });
      }),
      route("DELETE", "/workspaces/:id/members/:userId", ({ principal, ids: [id, userId] }) => {
        s.workspaces.removeMember(principal, id, userId);
        return noContent();
      }),

      // ── Teams ───────────────────────────────────────────────────────
      route("GET", "/workspaces/:id/teams", ({ principal, ids: [id] }) => ok({ data: s.teams.list(principal, id) })),
      route("POST", "/teams", ({ principal, body }) =>
        created(s.teams.create(principal, { workspace_id: int(body, "workspace_id"), name: str(body, "name") })),
      ),
      route("GET", "/teams/:id", ({ principal, ids: [id] }) => ok(s.teams.get(principal, id))),
      route("DELETE", "/teams/:id", ({ principal, ids: [id] }) => {
        s.teams.delete(principal, id);
        return noContent();
      }),
      route("GET", "/teams/:id/members", ({ principal, ids: [id] }) =>
        ok({ data: s.teams.get(principal, id).member_ids }),
      ),
      route("POST", "/teams/:id/members", ({ principal, ids: [id], body }) =>
        ok(s.teams.addMember(principal, id, int(body, "user_id"))),
      ),
      route("DELETE", "/teams/:id/members/:userId", ({ principal, ids: [id, userId] }) =>
        ok(s.teams.removeMember(principal, id, userId)),
      ),

      // ── Projects ────────────────────────────────────────────────────
      route("GET", "/workspaces/:id/projects", ({ principal, ids: [id] }) =>
        ok({ data: s.projects.list(principal, id) }),
      ),
      route("POST", "/projects", ({ principal, body }) =>
        created(
          s.projects.create(principal, {
            workspace_id: int(body, "workspace_id"),
            name: str(body, "name"),
            description: nullableStr(body, "description"),
            team_id: nullableInt(body, "team_id"),
            is_public: optBool(body, "is_public"),
          }),
        ),
      ),
      route("GET", "/projects/:id", ({ principal, ids: [id] }) => ok(s.projects.get(principal, id))),
      route("PATCH", "/projects/:id", ({ principal, ids: [id], body }) =>
        ok(
          s.projects.update(principal, id, {
            name: optStr(body, "name"),
            description: nullableStr(body, "description"),
            team_id: nullableInt(body, "team_id"),
            is_public: optBool(body, "is_public"),
          }),
        ),
      ),
      route("DELETE", "/projects/:id", ({ principal, ids: [id] }) => {
        s.projects.delete(principal, id);
        return noContent();
      }),

      // ── Sections ────────────────────────────────────────────────────
      route("GET", "/projects/:id/sections", ({ principal, ids: [id] }) =>
        ok({ data: s.sections.list(principal, id) }),
      ),
      route("POST", "/sections", ({ principal, body }) =>
        created(
          s.sections.create(principal, {
            project_id: int(body, "project_id"),
            name: str(body, "name"),
            position: optInt(body, "position"),
          }),
        ),
      ),
      route("GET", "/sections/:id", ({ principal, ids: [id] }) => ok(s.sections.get(principal, id))),
      route("PATCH", "/sections/:id", ({ principal, ids: [id], body }) =>
        ok(s.sections.update(principal, id, { name: optStr(body, "name"), position: optInt(body, "position") })),
      ),
      route("DELETE", "/sections/:id", ({ principal, ids: [id] }) => {
        s.sections.delete(principal, id);
        return noContent();
      }),

      // ── Tasks ───────────────────────────────────────────────────────
      route("GET", "/tasks", ({ principal, query }) => ok(s.query.query(principal, taskFilters(query)))),
      route("POST", "/tasks", ({ principal, body }) =>
        created(
          s.tasks.create(principal, {
            project_id: int(body, "project_id"),
            name: str(body, "name"),
            description: nullableStr(body, "description"),
            section_id: nullableInt(body, "section_id"),
            parent_task_id: nullableInt(body, "parent_task_id"),
            assignee_id: nullableInt(body, "assignee_id"),
            due_date: nullableStr(body, "due_date"),
            completed: optBool(body, "completed"),
            position: optInt(body, "position"),
          }),
        ),
      ),
      route("GET", "/tasks/:id", ({ principal, ids: [id] }) => ok(s.tasks.get(principal, id))),
      route("PATCH", "/tasks/:id", ({ principal, ids: [id], body }) =>
        ok(
          s.tasks.update(principal, id, {
            name: optStr(body, "name"),
            description: nullableStr(body, "description"),
            section_id: nullableInt(body, "section_id"),
            parent_task_id: nullableInt(body, "parent_task_id"),
            assignee_id: nullableInt(body, "assignee_id"),
            due_date: nullableStr(body, "due_date"),
            completed: optBool(body, "completed"),
            position: optInt(body, "position"),
            project_id: optInt(body, "project_id"),
          }),
        ),
      ),
      route("DELETE", "/tasks/:id", ({ principal, ids: [id] }) => {
        s.tasks.delete(principal, id);
        return noContent();
      }),
      route("GET", "/tasks/:id/subtasks", ({ principal, ids: [id] }) =>
        ok({ data: s.tasks.listSubtasks(principal, id) }),
      ),
      route("GET", "/tasks/:id/followers", ({ principal, ids: [id] }) =>
        ok({ data: s.tasks.listFollowers(principal, id) }),
      ),
      route("POST", "/tasks/:id/followers", ({ principal, ids: [id] }) => {
        s.tasks.follow(principal, id);
        return ok({ data: s.tasks.listFollowers(principal, id) });
      }),
      route("DELETE", "/tasks/:id/followers", ({ principal, ids: [id] }) => {
        s.tasks.unfollow(principal, id);
        return noContent();
      }),

      // ── Tags ────────────────────────────────────────────────────────
      route("GET", "/workspaces/:id/tags", ({ principal, ids: [id] }) => ok({ data: s.tags.list(principal, id) })),
      route("POST", "/tags", ({ principal, body }) =>
        created(
          s.tags.create(principal, {
            workspace_id: int(body, "workspace_id"),
            name: str(body, "name"),
            color: nullableStr(body, "color"),
          }),
        ),
      ),
      route("GET", "/tags/:id", ({ principal, ids: [id] }) => ok(s.tags.get(principal, id))),
      route("PATCH", "/tags/:id", ({ principal, ids: [id], body }) =>
        ok(s.tags.update(principal, id, { name: optStr(body, "name"), color: nullableStr(body, "color") })),
      ),
      route("DELETE", "/tags/:id", ({ principal, ids: [id] }) => {
        s.tags.delete(principal, id);
        return noContent();
      }),
      route("GET", "/tasks/:id/tags", ({ principal, ids: [id] }) => ok({ data: s.tags.listForTask(principal, id) })),
      route("PUT", "/tasks/:id/tags/:tagId", ({ principal, ids: [taskId, tagId] }) => {
        s.tags.attach(principal, taskId, tagId);
        return ok({ data: s.tags.listForTask(principal, taskId) });
      }),
      route("DELETE", "/tasks/:id/tags/:tagId", ({ principal, ids: [taskId, tagId] }) => {
        s.tags.detach(principal, taskId, tagId);
        return noContent();
      }),

      // ── Custom fields ───────────────────────────────────────────────
      route("GET", "/projects/:id/custom-fields", ({ principal, ids: [id] }) =>
        ok({ data: s.fields.listFields(principal, id) }),
      ),
      route("POST", "/custom-fields", ({ principal, body }) =>
        created(
          s.fields.defineField(principal, {
            project_id: int(body, "project_id"),
            name: str(body, "name"),
            value_type: fieldType(str(body, "value_type")),
            options: optOptions(body, "options"),
          }),
        ),
      ),
      route("GET", "/custom-fields/:id", ({ principal, ids: [id] }) => ok(s.fields.getField(principal, id))),
      route("PATCH", "/custom-fields/:id", ({ principal, ids: [id], body }) => {
        const valueType = optStr(body, "value_type");
        return ok(
          s.fields.updateField(principal, id, {
            name: optStr(body, "name"),
            value_type: valueType === undefined ? undefined : fieldType(valueType),
            options: optOptions(body, "options"),
          }),
        );
      }),
      route("DELETE", "/custom-fields/:id", ({ principal, ids: [id] }) => {
        s.fields.deleteField(principal, id);
        return noContent();
      }),
      route("GET", "/tasks/:id/custom-fields", ({ principal, ids: [id] }) =>
        ok({ data: s.fields.listValues(principal, id) }),
      ),
      route("PUT", "/tasks/:id/custom-fields/:fieldId", ({ principal, ids: [taskId, fieldId], body }) => {
        if (!("value" in body)) {
          throw new ValidationError("Missing required 'value' field", { field: "value" });
        }
        return ok(s.fields.setValue(principal, taskId, fieldId, body.value));
      }),
      route("DELETE", "/tasks/:id/custom-fields/:fieldId", ({ principal, ids: [taskId, fieldId] }) => {
        s.fields.clearValue(principal, taskId, fieldId);
        return noContent();
      }),

      // ── Comments ────────────────────────────────────────────────────
      route("GET", "/tasks/:id/comments", ({ principal, ids: [id] }) => ok({ data: s.comments.list(principal, id) })),
      route("POST", "/comments", ({ principal, body }) =>
        created(s.comments.create(principal, { task_id: int(body, "task_id"), text: str(body, "text") })),
      ),
      route("GET", "/comments/:id", ({ principal, ids: [id] }) => ok(s.comments.get(principal, id))),
      route("PATCH", "/comments/:id", ({ principal, ids: [id], body }) =>
        ok(s.comments.update(principal, id, str(body, "text"))),
      ),
      route("DELETE", "/comments/:id", ({ principal, ids: [id] }) => {
        s.comments.delete(principal, id);
        return noContent();
      }),

      // ── Attachments ─────────────────────────────────────────────────
      route("GET", "/tasks/:id/attachments", ({ principal, ids: [id] }) =>
        ok({ data: s.attachments.list(principal, { task_id: id }) }),
      ),
      route("GET", "/comments/:id/attachments", ({ principal, ids: [id] }) =>
        ok({ data: s.attachments.list(principal, { comment_id: id }) }),
      ),
      route("POST", "/attachments", ({ principal, body }) =>
        created(
          s.attachments.create(principal, {
            task_id: nullableInt(body, "task_id"),
            comment_id: nullableInt(body, "comment_id"),
            filename: str(body, "filename"),
            reference: str(body, "reference"),
          }),
        ),
      ),
      route("GET", "/attachments/:id", ({ principal, ids: [id] }) => ok(s.attachments.get(principal, id))),
      route("DELETE", "/attachments/:id", ({ principal, ids: [id] }) => {
        s.attachments.delete(principal, id);
        return noContent();
      }),
    ];
  }
}

function fieldType(value: string): FieldType {
  if (!isFieldType(value)) {
    throw new ValidationError(`Unknown field type '${value}'`, { field: "value_type" });
  }
  return value;
}

export function sendJson(res: ServerResponse, status: number, body?: unknown): void {
  if (body === undefined) {
    res.writeHead(status);
    res.end();
    return;
  }
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}
