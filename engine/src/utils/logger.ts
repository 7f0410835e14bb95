/**
 * Compile-CAR Engine -- Structured Logger
 *
 * Wraps pino. Silent unless asked otherwise, so the CLI's own progress
 * output stays clean; with --verbose the engine logs at debug level.
 *
 * Logs always go to stderr through a synchronous pino.destination(), never
 * a transport: transports run in worker threads that outlive a short CLI run.
 */

import pino from "pino";

export type LogLevel = "silent" | "debug" | "info" | "warn" | "error";

export interface LoggerOptions {
  level: LogLevel;
  /** Value of the `name` field on every line */
  name: string;
}

const DEFAULT_OPTIONS: LoggerOptions = {
  level: "silent",
  name: "compile-car",
};

export function createLogger(
  options: Partial<LoggerOptions> = {},
): pino.Logger {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  return pino(
    {
      name: opts.name,
      level: opts.level,
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

export type Logger = pino.Logger;
