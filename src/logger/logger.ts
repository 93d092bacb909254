/**
 * Logging
 *
 * winston-backed implementation of the core Logger interface. Core modules
 * only log at debug level; user-facing lines come from progress events.
 */

import * as winston from "winston";
import { z } from "zod";
import type { Logger, ProgressListener } from "#/core";
import { formatProgressEvent } from "#/formatters";

export const LogLevelSchema = z.enum(["error", "warn", "info", "debug"]);
export type LogLevel = z.infer<typeof LogLevelSchema>;

export interface LoggerOptions {
  level?: LogLevel;
  silent?: boolean;
  /** Write here instead of the console */
  destination?: NodeJS.WritableStream;
}

const SENSITIVE_KEYS = ["token", "password", "secret"];

// Level from LOG_LEVEL, or info
function getDefaultLogLevel(): LogLevel {
  const parsed = LogLevelSchema.safeParse(process.env.LOG_LEVEL?.toLowerCase());
  return parsed.success ? parsed.data : "info";
}

const redactFormat = winston.format((info) => {
  for (const key of Object.keys(info)) {
    if (SENSITIVE_KEYS.includes(key.toLowerCase())) {
      info[key] = "[REDACTED]";
    }
  }
  return info;
});

const lineFormat = winston.format.printf(({ level, message, timestamp, ...meta }) => {
  const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
  return `${String(timestamp)} ${level.toUpperCase()}: ${String(message)}${extra}`;
});

export function createLogger(options: LoggerOptions = {}): Logger {
  const format = winston.format.combine(
    redactFormat(),
    winston.format.timestamp({ format: "HH:mm:ss" }),
    lineFormat
  );
  const transport = options.destination
    ? new winston.transports.Stream({ stream: options.destination, format })
    : new winston.transports.Console({ format });

  const logger = winston.createLogger({
    level: options.level ?? getDefaultLogLevel(),
    silent: options.silent,
    transports: [transport],
  });

  const log =
    (level: LogLevel) =>
    (message: string, meta: Record<string, unknown> = {}): void => {
      logger.log(level, message, meta);
    };

  return {
    debug: log("debug"),
    info: log("info"),
    warn: log("warn"),
    error: log("error"),
  };
}

/**
 * Progress listener that writes each event as info lines.
 */
export function createProgressReporter(logger: Logger): ProgressListener {
  return (event) => {
    for (const line of formatProgressEvent(event)) {
      logger.info(line);
    }
  };
}
