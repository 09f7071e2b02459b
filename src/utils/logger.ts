/**
 * Logger Module
 * Structured logging using pino with file and console output
 */

import pino, { type Logger as PinoLogger } from "pino";
import * as fs from "node:fs";
import * as path from "node:path";
import { getLogsDir } from "./index.js";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface LoggerOptions {
  level?: LogLevel;
  enableFileLogging?: boolean;
  logDir?: string;
}

const VALID_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

/**
 * Ensures the log directory exists
 */
function ensureLogDir(logDir: string): void {
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }
}

/**
 * Determine if we're in development mode
 */
function isDevelopment(): boolean {
  return process.env.NODE_ENV !== "production";
}

function isTestRun(): boolean {
  return process.env.VITEST !== undefined;
}

export function isLogLevel(value: string): value is LogLevel {
  return VALID_LEVELS.some((level) => level === value);
}

/**
 * Get log level from environment or default
 */
export function getLogLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  if (isTestRun()) return "silent";
  return isDevelopment() ? "info" : "warn";
}

/**
 * Create a logger instance for a specific component
 *
 * Console output goes to stderr so generated announcement text on stdout
 * stays clean for piping.
 *
 * @example
 * ```typescript
 * const logger = createLogger("provider");
 * logger.info({ endpoint: "pokemon_stats.json" }, "Fetched dataset");
 * logger.error({ err }, "Failed to fetch dataset");
 * ```
 */
export function createLogger(component: string, options: LoggerOptions = {}): PinoLogger {
  const { level = getLogLevel(), enableFileLogging = false, logDir } = options;

  const baseOptions: pino.LoggerOptions = {
    name: component,
    level,
  };

  if (enableFileLogging) {
    const dir = logDir ?? getLogsDir();
    ensureLogDir(dir);

    const destination = pino.destination({
      dest: path.join(dir, `${component}.log`),
      sync: false,
    });

    return pino(baseOptions, destination);
  }

  // Pretty printing runs in a worker thread; keep it out of silent test runs
  if (isDevelopment() && level !== "silent") {
    return pino({
      ...baseOptions,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:HH:MM:ss",
          ignore: "pid,hostname",
          destination: 2,
        },
      },
    });
  }

  return pino(baseOptions, pino.destination(2));
}

/**
 * Logger type export for use in type annotations
 */
export type Logger = PinoLogger;
