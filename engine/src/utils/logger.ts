/**
 * phpforge Engine — Structured Logger
 *
 * Wraps pino. Silent by default so the CLI owns what the operator sees;
 * with --verbose the engine's structured logs go to stderr.
 *
 * pino.destination() is used instead of transports: transports spawn
 * worker threads, which would outlive a short provisioning run.
 */

import pino from "pino";

export interface LoggerOptions {
  level: "silent" | "debug" | "info" | "warn" | "error";
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
      name: "phpforge",
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
