/**
 * HTTP server for the taskweave REST API.
 *
 *   GET  /health            health check, no auth
 *   *    /api/*             strict surface: Authorization: Bearer <token>
 *   *    /automation/api/*  soft surface: x-api-key must match
 *                             automation.apiKey; x-acting-user names the
 *                             acting account by email, else the fallback
 *
 * Both surfaces resolve a Principal and hand the request to the same
 * ApiRouter with the /automation prefix stripped.
 */

import { timingSafeEqual } from "node:crypto";
import { createServer, type Server, type IncomingMessage, type ServerResponse } from "node:http";
import type { ApiRouter } from "./router.js";
import type { IdentityResolver } from "../identity/resolver.js";
import type { Principal } from "../identity/types.js";
import type { Body } from "./params.js";
import { sendJson } from "./router.js";
import { isTaskweaveError } from "../errors.js";
import { getLogger } from "../util/logger.js";

const log = getLogger("http");

/** Request bodies above this size are refused with 413. */
export const MAX_BODY_BYTES = 1024 * 1024;

const AUTOMATION_PREFIX = "/automation";

export interface HttpServerConfig {
  port: number;
  bind?: string;
  /** Shared key of the automation surface; the surface is closed without one. */
  automationApiKey?: string;
}

class BodyError extends Error {
  constructor(
    readonly status: number,
    message: string,
  ) {
    super(message);
  }
}

export class HttpServer {
  private server: Server | null = null;

  constructor(
    private config: HttpServerConfig,
    private router: ApiRouter,
    private identity: IdentityResolver,
  ) {}

  /** Bound port; differs from the configured one when that was 0. */
  get port(): number {
    const address = this.server?.address();
    if (address && typeof address === "object") return address.port;
    return this.config.port;
  }

  async start(): Promise<void> {
    const server = createServer((req, res) => {
      res.setHeader("Access-Control-Allow-Origin", "*");
      res.setHeader("Access-Control-Allow-Methods", "GET, POST, PUT, PATCH, DELETE, OPTIONS");
      res.setHeader("Access-Control-Allow-Headers", "Content-Type, Authorization, x-api-key, x-acting-user");

      if (req.method === "OPTIONS") {
        res.writeHead(204);
        res.end();
        return;
      }

      this.handleRequest(req, res).catch((e: unknown) => {
        log.error({ err: e }, "unhandled request error");
        if (!res.headersSent) sendJson(res, 500, { error: "Internal server error" });
      });
    });
    this.server = server;

    const bind = this.config.bind ?? "127.0.0.1";
    await new Promise<void>((resolve, reject) => {
      server.once("error", reject);
      server.listen(this.config.port, bind, () => {
        server.off("error", reject);
        log.info({ port: this.port, bind }, "http server listening");
        resolve();
      });
    });
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
  }

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = req.url ?? "/";
    const method = req.method ?? "GET";

    if (url === "/health" && method === "GET") {
      sendJson(res, 200, { status: "ok", uptime: process.uptime() });
      return;
    }

    let path = url;
    let principal: Principal;
    if (url.startsWith(`${AUTOMATION_PREFIX}/api/`)) {
      if (!this.automationKeyMatches(req)) {
        sendJson(res, 401, { error: "Invalid or missing automation API key", code: "UNAUTHORIZED" });
        return;
      }
      principal = this.identity.resolveSoft(header(req, "x-acting-user"));
      path = url.slice(AUTOMATION_PREFIX.length);
    } else if (url.startsWith("/api/")) {
      try {
        principal = this.identity.resolveStrict(bearer(req));
      } catch (e) {
        if (isTaskweaveError(e)) {
          sendJson(res, e.httpStatus, e.toJSON());
          return;
        }
        throw e;
      }
    } else {
      sendJson(res, 404, { error: "Not found" });
      return;
    }

    let body: Body | undefined;
    if (method === "POST" || method === "PUT" || method === "PATCH") {
      try {
        body = await readJsonBody(req);
      } catch (e) {
        if (e instanceof BodyError) {
          sendJson(res, e.status, { error: e.message });
          return;
        }
        throw e;
      }
    }

    if (!this.router.handle(method, path, principal, res, body)) {
      sendJson(res, 404, { error: "Not found" });
    }
  }

  private automationKeyMatches(req: IncomingMessage): boolean {
    const expected = this.config.automationApiKey;
    if (!expected) return false;
    const given = Buffer.from(header(req, "x-api-key") ?? "");
    const wanted = Buffer.from(expected);
    // Constant time once lengths agree.
    return given.length === wanted.length && timingSafeEqual(given, wanted);
  }
}

function header(req: IncomingMessage, name: string): string | undefined {
  const value = req.headers[name];
  return Array.isArray(value) ? value[0] : value;
}

function bearer(req: IncomingMessage): string | undefined {
  const match = req.headers.authorization?.match(/^Bearer\s+(.+)$/i);
  return match?.[1];
}

/** Empty body reads as `{}`; anything but a JSON object is a 400. */
function readJsonBody(req: IncomingMessage): Promise<Body> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    req.on("data", (chunk: Buffer) => {
      size += chunk.length;
      // Past the limit the rest is drained and discarded.
      if (size <= MAX_BODY_BYTES) chunks.push(chunk);
    });
    req.on("end", () => {
      if (size > MAX_BODY_BYTES) {
        reject(new BodyError(413, "Request body too large"));
        return;
      }
      const text = Buffer.concat(chunks).toString("utf-8").trim();
      if (text.length === 0) {
        resolve({});
        return;
      }
      let parsed: unknown;
      try {
        parsed = JSON.parse(text);
      } catch {
        reject(new BodyError(400, "Invalid JSON body"));
        return;
      }
      if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
        reject(new BodyError(400, "Request body must be a JSON object"));
        return;
      }
      resolve({ ...parsed });
    });
    req.on("error", reject);
  });
}
