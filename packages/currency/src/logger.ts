/**
 * @mintage/currency — Structured logging.
 *
 * pino JSON logs; pretty-printed through pino-pretty in development.
 */

import pino from "pino";
import type { Logger } from "pino";
import type { AppConfig, LogLevel } from "./config.js";

export type { Logger };

export interface LoggerOptions {
  readonly level: LogLevel;
  readonly pretty?: boolean | undefined;
}

export function createLogger(options: LoggerOptions): Logger {
  return pino({
    name: "mintage",
    level: options.level,
    ...(options.pretty === true ? { transport: { target: "pino-pretty" } } : {}),
  });
}

export function createLoggerFromConfig(config: AppConfig): Logger {
  return createLogger({
    level: config.LOG_LEVEL,
    pretty: config.NODE_ENV === "development",
  });
}

/** A logger that drops everything. */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
