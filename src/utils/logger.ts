/**
 * Logger Module
 * Structured logging using pino, written to stderr so that stdout stays free
 * for reports and the language server protocol.
 */

import pino, { type Logger as PinoLogger } from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface LoggerOptions {
  level?: LogLevel;
  /** Pretty-print with pino-pretty. Defaults to true when stderr is a terminal. */
  pretty?: boolean;
}

const VALID_LEVELS: readonly LogLevel[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
];

function isLogLevel(value: string): value is LogLevel {
  return VALID_LEVELS.some((level) => level === value);
}

/**
 * Level overriding the environment, set by the CLI's --verbose flag
 */
let levelOverride: LogLevel | null = null;

/**
 * Loggers that follow the process-wide level
 */
const trackedLoggers = new Set<PinoLogger>();

/**
 * Get log level from override, environment or default
 */
export function getLogLevel(): LogLevel {
  if (levelOverride) return levelOverride;
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return "warn";
}

/**
 * Sets the level of every logger created without an explicit level.
 */
export function setLogLevel(level: LogLevel): void {
  levelOverride = level;
  for (const logger of trackedLoggers) {
    logger.level = level;
  }
}

/**
 * Create a logger instance for a specific component
 *
 * @param component - The component name (e.g., "parser", "analyzer", "lsp")
 * @param options - Optional configuration
 * @returns A configured pino logger instance
 *
 * @example
 * ```typescript
 * const logger = createLogger("parser");
 * logger.info({ file: "kernels.py" }, "Parsing file");
 * logger.error({ err }, "Failed to parse file");
 * ```
 */
export function createLogger(
  component: string,
  options: LoggerOptions = {}
): PinoLogger {
  const {
    level,
    pretty = Boolean(process.stderr.isTTY) && process.env.NODE_ENV !== "test",
  } = options;

  const baseOptions: pino.LoggerOptions = {
    name: component,
    level: level ?? getLogLevel(),
  };

  const logger = pretty
    ? pino({
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
    })
    : pino(baseOptions, pino.destination(2));

  if (level === undefined) {
    trackedLoggers.add(logger);
  }
  return logger;
}

/**
 * Logger type export for use in type annotations
 */
export type Logger = PinoLogger;

