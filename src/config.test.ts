import { describe, it, expect, vi, beforeEach } from "vitest";

vi.mock("node:fs", () => ({
  readFileSync: vi.fn(),
  existsSync: vi.fn(),
}));

vi.mock("node:os", () => ({
  homedir: vi.fn(() => "/mock/home"),
}));

import { readFileSync, existsSync } from "node:fs";
import { loadConfig, getConfigDir, getConfigPath, configExists, deepMerge, defaultConfig } from "./config.js";

const mockedExistsSync = vi.mocked(existsSync);
const mockedReadFileSync = vi.mocked(readFileSync);

function fileContains(config: unknown): void {
  mockedExistsSync.mockReturnValue(true);
  mockedReadFileSync.mockReturnValue(JSON.stringify(config));
}

beforeEach(() => {
  vi.resetAllMocks();
});

// ---------------------------------------------------------------------------
// paths
// ---------------------------------------------------------------------------
describe("getConfigDir", () => {
  it("returns ~/.taskweave based on mocked homedir", () => {
    expect(getConfigDir()).toBe("/mock/home/.taskweave");
    expect(getConfigPath()).toBe("/mock/home/.taskweave/config.json");
  });
});

describe("configExists", () => {
  it("returns true when config file exists", () => {
    mockedExistsSync.mockReturnValue(true);
    expect(configExists()).toBe(true);
    expect(mockedExistsSync).toHaveBeenCalledWith("/mock/home/.taskweave/config.json");
  });

  it("returns false when config file does not exist", () => {
    mockedExistsSync.mockReturnValue(false);
    expect(configExists()).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// deepMerge
// ---------------------------------------------------------------------------
describe("deepMerge", () => {
  it("merges nested objects key by key", () => {
    const merged = deepMerge({ server: { port: 1, bind: "a" } }, { server: { port: 2 } });
    expect(merged).toEqual({ server: { port: 2, bind: "a" } });
  });

  it("replaces arrays instead of merging them", () => {
    const merged = deepMerge({ ids: [1, 2, 3] }, { ids: [9] });
    expect(merged).toEqual({ ids: [9] });
  });

  it("ignores undefined source values", () => {
    const merged = deepMerge({ level: "info" }, { level: undefined });
    expect(merged).toEqual({ level: "info" });
  });
});

// ---------------------------------------------------------------------------
// loadConfig
// ---------------------------------------------------------------------------
describe("loadConfig", () => {
  describe("valid configs", () => {
    it("an empty object yields the defaults", () => {
      fileContains({});
      const config = loadConfig("/etc/taskweave.json");

      expect(config).toEqual(defaultConfig());
      expect(config.server).toEqual({ port: 8400, bind: "127.0.0.1" });
      expect(config.database.path).toBe("/mock/home/.taskweave/taskweave.db");
      expect(config.limits).toEqual({ maxTaskDepth: 64, defaultPageSize: 20, maxPageSize: 200 });
      expect(config.automation).toEqual({ fallbackUserId: 2 });
    });

    it("uses the default config path when none is provided", () => {
      fileContains({});
      loadConfig();
      expect(mockedReadFileSync).toHaveBeenCalledWith("/mock/home/.taskweave/config.json", "utf-8");
    });

    it("user-provided values override defaults (deep merge)", () => {
      fileContains({ server: { port: 9000 }, limits: { maxTaskDepth: 8 } });
      const config = loadConfig("/x.json");

      expect(config.server).toEqual({ port: 9000, bind: "127.0.0.1" });
      expect(config.limits).toEqual({ maxTaskDepth: 8, defaultPageSize: 20, maxPageSize: 200 });
    });

    it("keeps token maps and automation settings", () => {
      fileContains({
        auth: { tokens: { "test-token": 2 } },
        automation: { apiKey: "test-secret", fallbackUserId: 3 },
        identity: { adminUserIds: [2] },
      });
      const config = loadConfig("/x.json");

      expect(config.auth.tokens).toEqual({ "test-token": 2 });
      expect(config.automation).toEqual({ apiKey: "test-secret", fallbackUserId: 3 });
      expect(config.identity.adminUserIds).toEqual([2]);
    });

    it("accepts port 0", () => {
      fileContains({ server: { port: 0 } });
      expect(loadConfig("/x.json").server.port).toBe(0);
    });
  });

  describe("missing config file", () => {
    it("throws and suggests running 'taskweave init'", () => {
      mockedExistsSync.mockReturnValue(false);
      expect(() => loadConfig("/nope.json")).toThrow(
        "Config file not found at /nope.json\nRun 'taskweave init' to create one.",
      );
    });
  });

  describe("invalid JSON", () => {
    it("includes the path in the parse error", () => {
      mockedExistsSync.mockReturnValue(true);
      mockedReadFileSync.mockReturnValue("{ not json");
      expect(() => loadConfig("/bad.json")).toThrow("Failed to parse config at /bad.json");
    });

    it("rejects a JSON array", () => {
      fileContains([1, 2]);
      expect(() => loadConfig("/arr.json")).toThrow("Config at /arr.json must be a JSON object");
    });
  });

  describe("validation errors", () => {
    it("rejects a section that is not an object", () => {
      fileContains({ server: "8400" });
      expect(() => loadConfig("/x.json")).toThrow("Config section 'server' must be an object");
    });

    it("rejects an out-of-range port", () => {
      fileContains({ server: { port: 70000 } });
      expect(() => loadConfig("/x.json")).toThrow("Config 'server.port' must be an integer between 0 and 65535");
    });

    it("rejects a non-positive fallback principal", () => {
      fileContains({ automation: { fallbackUserId: 0 } });
      expect(() => loadConfig("/x.json")).toThrow("Config 'automation.fallbackUserId' must be a positive integer");
    });

    it("rejects a fallback principal that is also an admin", () => {
      fileContains({ automation: { fallbackUserId: 1 }, identity: { adminUserIds: [1] } });
      expect(() => loadConfig("/x.json")).toThrow(
        "Config 'automation.fallbackUserId' must not be listed in 'identity.adminUserIds'",
      );
    });

    it("rejects an empty automation key", () => {
      fileContains({ automation: { apiKey: "" } });
      expect(() => loadConfig("/x.json")).toThrow("Config 'automation.apiKey' must be a non-empty string");
    });

    it("rejects a token mapped to something other than a user id", () => {
      fileContains({ auth: { tokens: { "test-token": "alice" } } });
      expect(() => loadConfig("/x.json")).toThrow("entry for token ending 'oken' must be a positive integer user id");
    });

    it("rejects admin ids that are not positive integers", () => {
      fileContains({ identity: { adminUserIds: [1, -2] } });
      expect(() => loadConfig("/x.json")).toThrow(
        "Config 'identity.adminUserIds' must be an array of positive integers",
      );
    });

    it("rejects a default page size above the maximum", () => {
      fileContains({ limits: { defaultPageSize: 500 } });
      expect(() => loadConfig("/x.json")).toThrow(
        "Config 'limits.defaultPageSize' must be a positive integer no larger than 'limits.maxPageSize'",
      );
    });
  });
});
