// Copyright (c) 2025 trsdn. MIT License — see LICENSE for details.
import pino from "pino";
import type { Logger, DestinationStream } from "pino";
import * as fs from "node:fs";
import * as path from "node:path";

export type { Logger };

/**
 * Configuration options for creating a pino logger instance.
 *
 * @property level - Log severity threshold. Messages below this level are suppressed.
 * @property name - Logger name included in every log entry.
 * @property pretty - Enable pino-pretty for human-readable output. Defaults to true in non-production.
 */
export interface LoggerOptions {
  level?: "debug" | "info" | "warn" | "error";
  name?: string;
  pretty?: boolean;
}

/**
 * Contextual metadata attached to child loggers for check-scoped logging.
 *
 * @property mode - Run mode (e.g. "morning", "quick_check").
 * @property pipeline - Pipeline being probed or evaluated.
 */
export interface CheckContext {
  mode?: string;
  pipeline?: string;
}

const REDACT = {
  paths: [
    "*.password",
    "*.pass",
    "*.token",
    "*.secret",
    "*.webhook_url",
    "*.authorization",
  ],
  censor: "[REDACTED]",
};

let logDestination: DestinationStream | undefined;

/**
 * Redirect all logger output to a file. Cron captures stdout as well, so this is
 * only needed when a dedicated per-day log file is wanted.
 */
export function redirectLogToFile(filePath: string): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  logDestination = pino.destination({ dest: filePath, sync: false });
  const newLogger = pino(
    {
      name: logger.bindings()["name"] ?? "pipeline-monitor",
      level: logger.level,
      redact: REDACT,
    },
    logDestination,
  );
  Object.assign(logger, newLogger);
}

/**
 * Expand `{date}` in a log file path to today's YYYYMMDD stamp.
 */
export function dailyLogPath(template: string, now: Date = new Date()): string {
  const stamp = [
    now.getFullYear(),
    String(now.getMonth() + 1).padStart(2, "0"),
    String(now.getDate()).padStart(2, "0"),
  ].join("");
  return template.replace(/\{date\}/g, stamp);
}

/**
 * Create a new pino logger with the given options.
 *
 * Sensitive fields (password, token, secret, webhook_url, authorization) are
 * redacted. If {@link redirectLogToFile} was called, the logger writes to the
 * file destination instead of stdout.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const {
    level = "info",
    name = "pipeline-monitor",
    pretty = process.env["NODE_ENV"] !== "production",
  } = options;

  const transport = !logDestination && pretty
    ? { target: "pino-pretty", options: { colorize: true } }
    : undefined;

  const pinoOptions = {
    name,
    level,
    transport,
    redact: REDACT,
  };

  return logDestination ? pino(pinoOptions, logDestination) : pino(pinoOptions);
}

/** Default logger instance for convenience. */
export const logger = createLogger({ level: parseLevel(process.env["LOG_LEVEL"]) });

function parseLevel(value: string | undefined): LoggerOptions["level"] {
  switch (value) {
    case "debug":
    case "info":
    case "warn":
    case "error":
      return value;
    default:
      return "info";
  }
}
