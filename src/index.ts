#!/usr/bin/env node

import { mkdirSync, writeFileSync } from "node:fs";
import { randomBytes } from "node:crypto";
import { loadConfig, getConfigDir, getConfigPath, configExists, defaultConfig, SYSTEM_USER_ID } from "./config.js";
import { initLogger, getLogger } from "./util/logger.js";
import { openDatabase } from "./db/database.js";
import { createServices } from "./app.js";
import { StaticTokenVerifier } from "./identity/resolver.js";
import { UserStore } from "./users/store.js";
import { ApiRouter } from "./api/router.js";
import { HttpServer } from "./api/server.js";

function printUsage(): void {
  console.log(`
taskweave: workspaces, projects and tasks over a REST API

Usage:
  taskweave start                    Start the HTTP server
  taskweave init                     Create config, database and the first account
  taskweave user add <email> <name>  Register an account
  taskweave user list                List accounts
  taskweave help                     Show this help

Options:
  --config <path>   Path to config file (default: ~/.taskweave/config.json)
`);
}

function cmdInit(): void {
  mkdirSync(getConfigDir(), { recursive: true });

  if (configExists()) {
    console.log(`Config already exists at ${getConfigPath()}`);
    return;
  }

  const config = defaultConfig();
  const token = randomBytes(24).toString("hex");
  config.auth.tokens = { [token]: 1 };
  config.automation.apiKey = randomBytes(24).toString("hex");
  config.automation.fallbackUserId = SYSTEM_USER_ID;
  config.identity.adminUserIds = [1];

  writeFileSync(getConfigPath(), JSON.stringify(config, null, 2) + "\n");
  console.log(`Created config at ${getConfigPath()}`);

  const db = openDatabase(config.database.path);
  try {
    const users = new UserStore(db);
    const admin = users.ensure({ id: 1, email: "admin@localhost", name: "Administrator" });
    const system = users.ensure({ id: SYSTEM_USER_ID, email: "system@localhost", name: "Automation" });
    console.log(`Database ready at ${config.database.path}`);
    console.log(`Automation requests without x-acting-user act as account ${system.id} (${system.email})`);
    console.log(`Account ${admin.id} (${admin.email}) can authenticate with:`);
    console.log(`  Authorization: Bearer ${token}`);
  } finally {
    db.close();
  }

  console.log("\nNext steps:");
  console.log("1. Add accounts with 'taskweave user add <email> <name>'");
  console.log(`2. Map their tokens to ids under 'auth.tokens' in ${getConfigPath()}`);
  console.log("3. Run 'taskweave start'");
}

function cmdUser(subArgs: string[], configPath?: string): void {
  const config = loadConfig(configPath);
  initLogger(config.log.level);
  const db = openDatabase(config.database.path);
  const users = new UserStore(db);

  try {
    const subcommand = subArgs[0];

    if (!subcommand || subcommand === "list") {
      const list = users.list();
      if (list.length === 0) {
        console.log("No accounts. Add one with 'taskweave user add <email> <name>'.");
        return;
      }
      console.log(`\n  Accounts (${list.length})\n`);
      for (const user of list) {
        console.log(`  ${user.id}\t${user.email}\t${user.name}`);
      }
      console.log();
      return;
    }

    if (subcommand === "add") {
      const email = subArgs[1];
      const name = subArgs.slice(2).join(" ");
      if (!email || !name) {
        console.error("Usage: taskweave user add <email> <name>");
        process.exitCode = 1;
        return;
      }
      const user = users.create({ email, name });
      console.log(`Created account ${user.id} (${user.email})`);
      return;
    }

    console.error(`Unknown user subcommand: ${subcommand}`);
    console.log("Usage: taskweave user [list|add <email> <name>]");
    process.exitCode = 1;
  } finally {
    db.close();
  }
}

async function cmdStart(configPath?: string): Promise<void> {
  const config = loadConfig(configPath);
  initLogger(config.log.level);
  const log = getLogger("main");
  log.info("starting taskweave");

  const db = openDatabase(config.database.path);
  const services = createServices(db, {
    limits: config.limits,
    identity: {
      fallbackUserId: config.automation.fallbackUserId,
      adminUserIds: config.identity.adminUserIds,
    },
    verifier: new StaticTokenVerifier(config.auth.tokens),
  });

  if (!services.users.get(config.automation.fallbackUserId)) {
    log.warn(
      { userId: config.automation.fallbackUserId },
      "fallback principal has no account; automation requests will still act as it",
    );
  }

  const server = new HttpServer(
    { port: config.server.port, bind: config.server.bind, automationApiKey: config.automation.apiKey },
    new ApiRouter(services),
    services.identity,
  );
  await server.start();

  const shutdown = async (signal: string) => {
    log.info({ signal }, "shutting down");
    await server.stop();
    db.close();
    process.exit(0);
  };

  process.on("SIGINT", () => {
    shutdown("SIGINT").catch(fail);
  });
  process.on("SIGTERM", () => {
    shutdown("SIGTERM").catch(fail);
  });

  log.info({ port: server.port }, "taskweave is running");
}

// CLI entry point
const args = process.argv.slice(2);
const command = args[0];
const configIdx = args.indexOf("--config");
const configPath = configIdx >= 0 ? args[configIdx + 1] : undefined;
const positional = configIdx >= 0 ? [...args.slice(0, configIdx), ...args.slice(configIdx + 2)] : args;

function fail(e: unknown): never {
  console.error("Error:", e instanceof Error ? e.message : e);
  process.exit(1);
}

switch (command) {
  case "start":
  case "--config":
  case undefined:
    cmdStart(configPath).catch(fail);
    break;

  case "init":
    try {
      cmdInit();
    } catch (e) {
      fail(e);
    }
    break;

  case "user":
    try {
      cmdUser(positional.slice(1), configPath);
    } catch (e) {
      fail(e);
    }
    break;

  case "help":
  case "--help":
  case "-h":
    printUsage();
    break;

  default:
    console.error(`Unknown command: ${command}`);
    printUsage();
    process.exit(1);
}
