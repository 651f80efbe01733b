import { readFileSync, existsSync } from "node:fs";
import { join } from "node:path";
import { homedir } from "node:os";

export interface DatabaseConfig {
  path: string;
}

export interface ServerConfig {
  /** Port to listen on */
  port: number;
  /** Bind address (default: "127.0.0.1") */
  bind?: string;
}

export interface AuthConfig {
  /** Opaque bearer token → user id. The strict-mode credential verifier reads this map. */
  tokens: Record<string, number>;
}

export interface AutomationConfig {
  /** Transport key required on every soft-mode request (x-api-key header) */
  apiKey?: string;
  /** Principal used when the x-acting-user hint is absent or unknown */
  fallbackUserId: number;
}

export interface IdentityConfig {
  /** Principals allowed to list every workspace in the system */
  adminUserIds: number[];
}

export interface LimitsConfig {
  maxTaskDepth: number;
  defaultPageSize: number;
  maxPageSize: number;
}

export interface LogConfig {
  level: string;
}

export interface TaskweaveConfig {
  database: DatabaseConfig;
  server: ServerConfig;
  auth: AuthConfig;
  automation: AutomationConfig;
  identity: IdentityConfig;
  limits: LimitsConfig;
  log: LogConfig;
}

const CONFIG_DIR = join(homedir(), ".taskweave");
const CONFIG_PATH = join(CONFIG_DIR, "config.json");

/** Account id `taskweave init` reserves for unattributed automation requests. */
export const SYSTEM_USER_ID = 2;

export const DEFAULT_LIMITS: LimitsConfig = {
  maxTaskDepth: 64,
  defaultPageSize: 20,
  maxPageSize: 200,
};

const DEFAULTS: TaskweaveConfig = {
  database: {
    path: join(CONFIG_DIR, "taskweave.db"),
  },
  server: {
    port: 8400,
    bind: "127.0.0.1",
  },
  auth: {
    tokens: {},
  },
  automation: {
    fallbackUserId: SYSTEM_USER_ID,
  },
  identity: {
    adminUserIds: [],
  },
  limits: DEFAULT_LIMITS,
  log: {
    level: "info",
  },
};

export function getConfigDir(): string {
  return CONFIG_DIR;
}

export function getConfigPath(): string {
  return CONFIG_PATH;
}

export function configExists(): boolean {
  return existsSync(CONFIG_PATH);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };
  for (const key of Object.keys(source)) {
    const sourceVal = source[key];
    const targetVal = target[key];
    if (isPlainObject(sourceVal) && isPlainObject(targetVal)) {
      result[key] = deepMerge(targetVal, sourceVal);
    } else if (sourceVal !== undefined) {
      result[key] = sourceVal;
    }
  }
  return result;
}

function isPositiveInt(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value > 0;
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = raw[key];
  if (!isPlainObject(value)) {
    throw new Error(`Config section '${key}' must be an object`);
  }
  return value;
}

/** Check a merged config object and narrow it to TaskweaveConfig. */
export function validateConfig(raw: Record<string, unknown>): TaskweaveConfig {
  const database = section(raw, "database");
  if (typeof database.path !== "string" || database.path.length === 0) {
    throw new Error("Config 'database.path' must be a non-empty string");
  }

  const server = section(raw, "server");
  if (typeof server.port !== "number" || !Number.isInteger(server.port) || server.port < 0 || server.port > 65535) {
    throw new Error("Config 'server.port' must be an integer between 0 and 65535");
  }
  const bind = server.bind;
  if (bind !== undefined && typeof bind !== "string") {
    throw new Error("Config 'server.bind' must be a string");
  }

  const auth = section(raw, "auth");
  const tokens = auth.tokens;
  if (!isPlainObject(tokens)) {
    throw new Error("Config 'auth.tokens' must map tokens to user ids");
  }
  const tokenMap: Record<string, number> = {};
  for (const [token, userId] of Object.entries(tokens)) {
    if (!isPositiveInt(userId)) {
      throw new Error(`Config 'auth.tokens' entry for token ending '${token.slice(-4)}' must be a positive integer user id`);
    }
    tokenMap[token] = userId;
  }

  const automation = section(raw, "automation");
  const fallbackUserId = automation.fallbackUserId;
  if (!isPositiveInt(fallbackUserId)) {
    throw new Error("Config 'automation.fallbackUserId' must be a positive integer");
  }
  const apiKey = automation.apiKey;
  if (apiKey !== undefined && (typeof apiKey !== "string" || apiKey.length === 0)) {
    throw new Error("Config 'automation.apiKey' must be a non-empty string");
  }

  const identity = section(raw, "identity");
  const adminUserIds = identity.adminUserIds;
  if (!Array.isArray(adminUserIds) || !adminUserIds.every(isPositiveInt)) {
    throw new Error("Config 'identity.adminUserIds' must be an array of positive integers");
  }
  if (adminUserIds.includes(fallbackUserId)) {
    throw new Error("Config 'automation.fallbackUserId' must not be listed in 'identity.adminUserIds'");
  }

  const limits = section(raw, "limits");
  const { maxTaskDepth, defaultPageSize, maxPageSize } = limits;
  if (!isPositiveInt(maxTaskDepth)) {
    throw new Error("Config 'limits.maxTaskDepth' must be a positive integer");
  }
  if (!isPositiveInt(maxPageSize)) {
    throw new Error("Config 'limits.maxPageSize' must be a positive integer");
  }
  if (!isPositiveInt(defaultPageSize) || defaultPageSize > maxPageSize) {
    throw new Error("Config 'limits.defaultPageSize' must be a positive integer no larger than 'limits.maxPageSize'");
  }

  const log = section(raw, "log");
  if (typeof log.level !== "string") {
    throw new Error("Config 'log.level' must be a string");
  }

  return {
    database: { path: database.path },
    server: { port: server.port, ...(typeof bind === "string" && { bind }) },
    auth: { tokens: tokenMap },
    automation: {
      fallbackUserId,
      ...(typeof apiKey === "string" && { apiKey }),
    },
    identity: { adminUserIds },
    limits: { maxTaskDepth, defaultPageSize, maxPageSize },
    log: { level: log.level },
  };
}

export function loadConfig(path?: string): TaskweaveConfig {
  const configPath = path ?? CONFIG_PATH;

  if (!existsSync(configPath)) {
    throw new Error(
      `Config file not found at ${configPath}\nRun 'taskweave init' to create one.`,
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, "utf-8"));
  } catch (e) {
    throw new Error(
      `Failed to parse config at ${configPath}: ${e instanceof Error ? e.message : e}`,
    );
  }

  if (!isPlainObject(raw)) {
    throw new Error(`Config at ${configPath} must be a JSON object`);
  }

  const defaults: Record<string, unknown> = { ...DEFAULTS };
  return validateConfig(deepMerge(defaults, raw));
}

export function defaultConfig(): TaskweaveConfig {
  return structuredClone(DEFAULTS);
}
