import pino from "pino";

const logger: pino.Logger = pino({ name: "taskweave", level: process.env.TASKWEAVE_LOG_LEVEL ?? "info" });

const children = new Set<pino.Logger>();

/** Applies `level` to the root logger and every component logger handed out so far. */
export function initLogger(level: string): void {
  logger.level = level;
  for (const child of children) child.level = level;
}

/** Child logger tagged with a component name. */
export function getLogger(name?: string): pino.Logger {
  if (!name) return logger;
  const child = logger.child({ component: name });
  children.add(child);
  return child;
}
