/**
 * Logger
 *
 * Thin facade over winston. Call sites use the short verbs (info, success,
 * warning, error, dim) and may pass structured metadata as a second argument.
 * Console output is colourised text in development and JSON in production.
 */

import winston from "winston";
import { CONFIG } from "../config.js";

export type LogMeta = Record<string, unknown>;

const consoleFormat = winston.format.printf(({ level, message, timestamp, ...metadata }) => {
  let line = `${String(timestamp)} ${level}: ${String(message)}`;
  if (Object.keys(metadata).length > 0) {
    line += ` ${JSON.stringify(metadata)}`;
  }
  return line;
});

export function createLogger(level: string = CONFIG.logLevel, production: boolean = CONFIG.nodeEnv === "production"): winston.Logger {
  return winston.createLogger({
    level,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.splat()
    ),
    transports: [
      new winston.transports.Console({
        stderrLevels: ["error", "warn", "info", "debug"],
        format: production
          ? winston.format.json()
          : winston.format.combine(winston.format.colorize(), consoleFormat),
      }),
    ],
  });
}

const logger = createLogger();

function write(level: string, message: string, meta?: LogMeta): void {
  logger.log({ ...meta, level, message });
}

export const log = {
  info: (message: string, meta?: LogMeta) => write("info", message, meta),
  success: (message: string, meta?: LogMeta) => write("info", `✅ ${message}`, meta),
  warning: (message: string, meta?: LogMeta) => write("warn", message, meta),
  error: (message: string, meta?: LogMeta) => write("error", message, meta),
  /** Debug-level detail */
  dim: (message: string, meta?: LogMeta) => write("debug", message, meta),
};
