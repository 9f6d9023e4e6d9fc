/**
 * peerweave logger.
 *
 * Winston-backed factory for the small Logger interface every component
 * receives by injection. Embedders can pass their own Logger instead.
 */

import winston from "winston";
import type { Logger } from "./types.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface MeshLoggerOptions {
  /** Prefix for all log lines. Default: "peerweave". */
  prefix?: string;
  /** Minimum log level. Default: "info". */
  level?: LogLevel;
}

const LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

/** Runtime check for a LogLevel string (config and env input). */
export function isLogLevel(v: unknown): v is LogLevel {
  return typeof v === "string" && (LEVELS as readonly string[]).includes(v);
}

/** Create a console logger with timestamped, prefixed lines. */
export function createMeshLogger(opts?: MeshLoggerOptions): Logger {
  const prefix = opts?.prefix ?? "peerweave";
  const minLevel = opts?.level ?? "info";

  const winstonLogger = winston.createLogger({
    level: minLevel,
    format: winston.format.combine(
      winston.format.timestamp({ format: "YYYY-MM-DDTHH:mm:ss.SSSZ" }),
      winston.format.printf(({ timestamp, level, message }) =>
        `${String(timestamp)} [${prefix}:${level}] ${String(message)}`
      ),
    ),
    transports: [
      new winston.transports.Console({ forceConsole: true }),
    ],
  });

  return {
    info: (msg: string) => winstonLogger.info(msg),
    warn: (msg: string) => winstonLogger.warn(msg),
    error: (msg: string) => winstonLogger.error(msg),
    debug: (msg: string) => winstonLogger.debug(msg),
  };
}

/** Logger that drops everything (embedding, tests). */
export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
};
