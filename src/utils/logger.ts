import pino from "pino";

export type Logger = pino.Logger;

const LOG_LEVELS = new Set(["trace", "debug", "info", "warn", "error", "fatal", "silent"]);

function resolveLevel(): string {
  const level = (process.env.PROMPTLOOM_LOG_LEVEL ?? process.env.LOG_LEVEL ?? "info").toLowerCase();
  return LOG_LEVELS.has(level) ? level : "info";
}

/**
 * Logs go to stderr so stdout stays free for CLI output and the MCP stdio transport.
 */
export function createLogger(name = "promptloom"): Logger {
  return pino(
    {
      name,
      level: resolveLevel(),
      redact: {
        paths: ["token", "*.token", "headers.Authorization"],
        censor: "[REDACTED]",
      },
    },
    pino.destination({ dest: 2, sync: true }),
  );
}

export const logger = createLogger();

const children = new Map<string, Logger>();

export function getLogger(module: string): Logger {
  let child = children.get(module);
  if (!child) {
    child = logger.child({ module });
    children.set(module, child);
  }
  return child;
}

/** Applies a level chosen at runtime, e.g. from `--verbose`. Children created earlier follow. */
export function setLogLevel(level: string): void {
  if (!LOG_LEVELS.has(level)) {
    return;
  }
  logger.level = level;
  for (const child of children.values()) {
    child.level = level;
  }
}
