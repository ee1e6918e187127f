import pino from "pino";

import type { LogLevel } from "../config/env.js";

export type LogSeverity = "debug" | "info" | "warn" | "error";

/**
 * Logging collaborator handed to the resolver, worker, client and routers.
 * Nothing in the call graph reaches for a process-wide logger.
 */
export interface Logger {
  log(level: LogSeverity, message: string, meta?: Record<string, unknown>): void;
}

export interface PinoLoggerOptions {
  readonly level?: LogLevel;
  /** Tag attached to every line, e.g. "client" or "worker". */
  readonly component: string;
  /** 1 for stdout, 2 for stderr. The worker must log to stderr. */
  readonly fd?: 1 | 2;
}

export function createLogger(options: PinoLoggerOptions): Logger {
  const { level = "info", component, fd = 2 } = options;
  const instance = pino(
    {
      level,
      base: { component },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination({ fd, sync: true }),
  );

  return {
    log(severity, message, meta) {
      if (meta) {
        instance[severity](meta, message);
      } else {
        instance[severity](message);
      }
    },
  };
}

export const silentLogger: Logger = {
  log() {},
};
