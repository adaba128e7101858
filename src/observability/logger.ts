// src/observability/logger.ts
// Structured JSON logging
//
// Pino root logger with module-scoped children. JSON by default, pino-pretty
// when LOG_PRETTY=true. LOG_LEVEL=silent mutes everything (used by tests).

import pino, { type Logger } from "pino";

/* ---------- Types ---------- */
type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

const VALID_LEVELS: readonly LogLevel[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
];

/* ---------- Configuration ---------- */

/**
 * Configured log level from the environment; defaults to 'info'.
 */
function getLogLevel(): LogLevel {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  return VALID_LEVELS.find((l) => l === level) ?? "info";
}

function isPrettyEnabled(): boolean {
  return process.env.LOG_PRETTY === "true";
}

/* ---------- Logger Factory ---------- */

let rootLogger: Logger | null = null;

function getRootLogger(): Logger {
  if (!rootLogger) {
    const options: pino.LoggerOptions = {
      level: getLogLevel(),
      base: {
        service: "compliance-scanner",
        version: process.env.npm_package_version || "unknown",
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    };

    rootLogger = isPrettyEnabled()
      ? pino({
          ...options,
          transport: {
            target: "pino-pretty",
            options: {
              colorize: true,
              translateTime: "SYS:standard",
              ignore: "pid,hostname",
            },
          },
        })
      : pino(options);
  }

  return rootLogger;
}

/**
 * Create a logger, optionally scoped to a module.
 *
 * @example
 * const log = createLogger('compliance/engine');
 * log.info({ format, blocks: 3 }, 'scan finished');
 */
export function createLogger(moduleName?: string): Logger {
  const root = getRootLogger();
  return moduleName ? root.child({ module: moduleName }) : root;
}

export function createChildLogger(
  parent: Logger,
  bindings: Record<string, unknown>
): Logger {
  return parent.child(bindings);
}

export type { Logger };
