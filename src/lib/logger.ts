/**
 * Application logger (winston).
 *
 * Console output is always on outside tests; set LOG_FILE to also keep a JSON log on disk.
 */

import winston from "winston";
import { env } from "@/lib/env";

type LogMeta = Record<string, unknown>;

function resolveLevel(): string {
  if (env.DEBUG) return "debug";
  return env.LOG_LEVEL || "info";
}

const logger = winston.createLogger({
  level: resolveLevel(),
  silent: process.env.NODE_ENV === "test",
  format: winston.format.combine(
    winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
    winston.format.errors({ stack: true }),
    winston.format.splat(),
    winston.format.json()
  ),
  defaultMeta: { service: "service-assistant" },
  transports: [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.timestamp({ format: "HH:mm:ss" }),
        winston.format.printf(({ timestamp, level, message, service, operation, step, ...meta }) => {
          let prefix = "";
          if (typeof operation === "string") {
            prefix = `[${operation}]`;
            if (typeof step === "string") prefix += ` ${step} ->`;
            prefix += " ";
          }

          const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
          return `${String(timestamp)} [${level}] ${String(service)}: ${prefix}${String(message)}${metaStr}`;
        })
      ),
    }),
  ],
});

if (env.LOG_FILE) {
  logger.add(
    new winston.transports.File({
      filename: env.LOG_FILE,
      maxsize: 10485760,
      maxFiles: 5,
      tailable: true,
    })
  );
}

export const logOperation = {
  start: (operation: string, message: string, meta?: LogMeta) => {
    logger.info(message, { ...meta, operation, step: "START" });
  },

  step: (operation: string, message: string, meta?: LogMeta) => {
    logger.info(message, { ...meta, operation });
  },

  complete: (operation: string, message: string, meta?: LogMeta) => {
    logger.info(message, { ...meta, operation, step: "DONE" });
  },

  error: (operation: string, message: string, error: unknown, meta?: LogMeta) => {
    const err = error instanceof Error ? error : new Error(String(error));
    logger.error(message, { ...meta, operation, step: "ERROR", error: err.message, stack: err.stack });
  },
};

export default logger;

export { logger };
