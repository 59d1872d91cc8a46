/**
 * Logging Configuration
 * Application-wide winston logger with console output
 */

import { winston } from "@/deps.ts";
import type { Logger } from "@/deps.ts";

export type LogLevelName = "DEBUG" | "INFO" | "WARN" | "ERROR" | "SILENT";

const WINSTON_LEVELS: Record<Exclude<LogLevelName, "SILENT">, string> = {
  DEBUG: "debug",
  INFO: "info",
  WARN: "warn",
  ERROR: "error",
};

const consoleFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ timestamp, level, message, module, ...meta }) => {
    const scope = typeof module === "string" ? ` (${module})` : "";
    const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
    return `${String(timestamp)} [${level.toUpperCase()}]${scope} ${String(message)}${extra}`;
  }),
);

const rootLogger = winston.createLogger({
  level: "info",
  format: consoleFormat,
  transports: [new winston.transports.Console()],
});

applyLevel(parseLogLevel(process.env.LOG_LEVEL));

function applyLevel(level: LogLevelName): void {
  if (level === "SILENT") {
    rootLogger.silent = true;
    return;
  }

  rootLogger.silent = false;
  rootLogger.level = WINSTON_LEVELS[level];
}

/**
 * Parse a LOG_LEVEL value, falling back to INFO
 */
export function parseLogLevel(value: string | undefined): LogLevelName {
  switch (value?.toUpperCase()) {
    case "DEBUG":
      return "DEBUG";
    case "WARN":
      return "WARN";
    case "ERROR":
      return "ERROR";
    case "SILENT":
      return "SILENT";
    default:
      return "INFO";
  }
}

/**
 * Configure the root logger level
 */
export function setupLogging(level: LogLevelName): void {
  applyLevel(level);
  if (level !== "SILENT") {
    rootLogger.debug(`Logging configured at level ${level}`);
  }
}

/**
 * Get a logger, optionally scoped to a module name
 */
export function getLogger(module?: string): Logger {
  return module ? rootLogger.child({ module }) : rootLogger;
}
