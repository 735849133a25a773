// logger.ts
import { CsrLogger } from "@remote-csr/shared";
import { config } from "dotenv";
import winston from "winston";

import type { LogEntry } from "@remote-csr/shared";

config();

/** Custom levels so "success" & "warning" are first-class */
const customLevels = {
  error: 0,
  warning: 1,
  success: 2,
  info: 3,
  debug: 4,
} as const;

type LevelKey = keyof typeof customLevels;

const isLevelKey = (value: string): value is LevelKey => value in customLevels;

winston.addColors({
  error: "red",
  warning: "yellow",
  success: "green",
  info: "blue",
  debug: "gray",
});

/** Resolve env LOG_LEVEL with a tiny guard */
const envLevel = ((): LevelKey => {
  const raw = (process.env.LOG_LEVEL || "info").toLowerCase();
  return isLevelKey(raw) ? raw : "info";
})();

const isProd = process.env.NODE_ENV === "production";

/** CsrLogger shape for this process */
export const csrBackendLogger = new CsrLogger({
  includeTimestamp: true,
  includeSource: true,
  formatJson: isProd,
});

const isLogEntry = (value: unknown): value is LogEntry =>
  typeof value === "object" &&
  value !== null &&
  "message" in value &&
  "source" in value &&
  "level" in value;

/** Single formatter (CSR entry first, otherwise ts [LVL] msg) */
const baseFormat = winston.format.printf((info) => {
  if (isLogEntry(info.csrEntry)) {
    return csrBackendLogger.formatLogEntry(info.csrEntry);
  }

  const ts = typeof info.timestamp === "string" ? info.timestamp : new Date().toISOString();
  // `info.level` is colorized by the Console transport (level-only)
  const lvl = (info.level || "info").toUpperCase();
  const msg = typeof info.message === "string" ? info.message : String(info.message);
  return `${ts} [${lvl}] ${msg}`;
});

/** One logger, one format */
export const logger = winston.createLogger({
  levels: customLevels,
  level: envLevel,
  format: winston.format.combine(winston.format.timestamp(), winston.format.errors({ stack: true })),
  transports: [
    new winston.transports.Console({
      level: envLevel,
      handleExceptions: true,
      format: winston.format.combine(baseFormat, winston.format.colorize({ all: true })),
    }),
    ...(isProd
      ? [
          new winston.transports.File({
            filename: "logs/csr-audit.log",
            level: envLevel,
            maxsize: 5 * 1024 * 1024,
            maxFiles: 3,
            format: winston.format.combine(
              winston.format.timestamp(),
              winston.format.errors({ stack: true }),
              winston.format.json(),
            ),
          }),
        ]
      : []),
  ],
  exitOnError: false,
});

/** Bridge: route CsrLogger entries through Winston with colorized level */
export function logCsr(entry: LogEntry): void {
  logger.log(entry.level, entry.message, { csrEntry: entry });
}
