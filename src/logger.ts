// src/logger.ts
import { pino } from "pino";
import type { Logger, LevelWithSilent } from "pino";

export type { Logger } from "pino";

function defaultLevel(): LevelWithSilent {
  // Keep test output clean unless a level is asked for explicitly.
  if (process.env["VITEST"] === "true" || process.env["NODE_ENV"] === "test") return "silent";
  return "info";
}

let rootLogger: Logger | undefined;
const loggerCache = new Map<string, Logger>();

function root(): Logger {
  if (!rootLogger) {
    rootLogger = pino({
      name: "httpchain",
      level: defaultLevel(),
      base: { pid: process.pid },
    });
  }
  return rootLogger;
}

/**
 * Child logger tagged with `category`. Loggers without an explicit level are
 * cached per category.
 */
export function createLogger(category: string, level?: LevelWithSilent): Logger {
  if (level) return root().child({ category }, { level });

  let logger = loggerCache.get(category);
  if (!logger) {
    logger = root().child({ category });
    loggerCache.set(category, logger);
  }
  return logger;
}
