/**
 * Logging — a winston root logger plus component-scoped wrappers.
 *
 *   const logger = getLogger("axl");
 *   logger.debug("calling getPhone", { requestId });
 *
 * LOG_LEVEL (default info, `silent` disables output), LOG_FORMAT
 * (`text` | `json`) and LOG_FILE are read when the root logger is created.
 */

import winston from "winston";
import { getEnvOrDefault } from "./config";

export type LogMeta = Record<string, unknown>;

let rootLogger: winston.Logger | null = null;
const loggerCache = new Map<string, Logger>();

// ── Logger ──────────────────────────────────────────────────────────────────

export class Logger {
  constructor(
    readonly component: string,
    private readonly root: () => winston.Logger
  ) {}

  debug(message: string, meta?: LogMeta): void {
    this.log("debug", message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.log("info", message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.log("warn", message, meta);
  }

  error(message: string, error?: unknown, meta?: LogMeta): void {
    const extra: LogMeta = { ...meta };
    if (error instanceof Error) {
      extra.error = error.message;
      if (error.stack) extra.errorStack = error.stack;
    } else if (error !== undefined) {
      extra.error = String(error);
    }
    this.log("error", message, extra);
  }

  /** `logger.child("transport")` on "axl" logs as "axl.transport". */
  child(subComponent: string): Logger {
    return getLogger(`${this.component}.${subComponent}`);
  }

  private log(level: string, message: string, meta?: LogMeta): void {
    this.root().log(level, message, { component: this.component, ...meta });
  }
}

// ── Formats ─────────────────────────────────────────────────────────────────

const textFormat = winston.format.printf((info) => {
  const { level, message, timestamp, component, ...rest } = info;
  const extra = Object.keys(rest).length > 0 ? ` ${JSON.stringify(rest)}` : "";
  return `${level.toUpperCase().padEnd(5)} ${String(timestamp)} [${String(component)}] ${String(message)}${extra}`;
});

function buildFormat(kind: string): winston.Logform.Format {
  return kind === "json"
    ? winston.format.combine(winston.format.timestamp(), winston.format.json())
    : winston.format.combine(winston.format.timestamp(), textFormat);
}

function createRootLogger(): winston.Logger {
  const level = getEnvOrDefault("LOG_LEVEL", "info").toLowerCase();
  const format = buildFormat(getEnvOrDefault("LOG_FORMAT", "text"));
  const logFile = process.env.LOG_FILE;

  const transports: winston.transport[] = [new winston.transports.Console({ format })];
  if (logFile) transports.push(new winston.transports.File({ filename: logFile, format }));

  return winston.createLogger({
    level: level === "silent" ? "error" : level,
    silent: level === "silent",
    transports,
    exitOnError: false,
  });
}

// ── Factory ─────────────────────────────────────────────────────────────────

function root(): winston.Logger {
  rootLogger ??= createRootLogger();
  return rootLogger;
}

export function getLogger(component: string): Logger {
  let logger = loggerCache.get(component);
  if (!logger) {
    logger = new Logger(component, root);
    loggerCache.set(component, logger);
  }
  return logger;
}

/** Drop the root logger so the next call re-reads LOG_* (for tests). */
export function resetLogging(): void {
  rootLogger?.close();
  rootLogger = null;
}
