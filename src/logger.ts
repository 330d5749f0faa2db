import winston from "winston"

import type { LogLevel } from "@/config"

const { combine, timestamp, printf, errors } = winston.format

const lineFormat = printf(({ level, message, timestamp, stack }) => {
  return `${timestamp} [${level}]: ${stack || message}`
})

export interface LoggerOptions {
  level?: LogLevel
  /** Drops every message; used by tests and JSON-only runs. */
  silent?: boolean
}

/**
 * Creates the diagnostic logger. Everything goes to stderr so that ink and
 * JSON output on stdout stay parseable.
 */
export function createLogger(options: LoggerOptions = {}): winston.Logger {
  return winston.createLogger({
    level: options.level ?? "warn",
    silent: options.silent ?? false,
    format: combine(
      errors({ stack: true }),
      timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
      lineFormat,
    ),
    transports: [
      new winston.transports.Console({
        stderrLevels: ["error", "warn", "info", "http", "verbose", "debug", "silly"],
      }),
    ],
  })
}

export type Logger = winston.Logger
