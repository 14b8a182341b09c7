/**
 * ensure-conda Engine — Structured Logger
 *
 * Wraps pino for structured logging. Every engine module logs through
 * an injected instance of this logger.
 *
 * The default level is "silent": the CLI prints its own human-readable
 * lines and the result path must stay the only thing on stdout. With a
 * higher verbosity the structured logs go to stderr.
 *
 * NOTE: pino.destination() is used instead of pino transports because
 * transports spawn worker_threads that keep the process alive.
 */

import pino from "pino";

export type LogLevel = "silent" | "trace" | "debug" | "info" | "warn" | "error";

export interface LoggerOptions {
  level: LogLevel;
}

const DEFAULT_OPTIONS: LoggerOptions = {
  level: "silent",
};

export function createLogger(
  options: Partial<LoggerOptions> = {},
): pino.Logger {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  return pino(
    {
      level: opts.level,
      base: undefined,
      formatters: {
        level(label: string) {
          return { level: label };
        },
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination({ fd: 2, sync: true }),
  );
}

/**
 * Map a CLI verbosity (0-3) to a log level.
 */
export function levelForVerbosity(verbosity: number): LogLevel {
  if (verbosity <= 0) return "silent";
  if (verbosity === 1) return "info";
  if (verbosity === 2) return "debug";
  return "trace";
}

export type Logger = pino.Logger;
