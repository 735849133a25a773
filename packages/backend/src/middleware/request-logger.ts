import { csrBackendLogger, logCsr } from "../logger";

import type { LogLevel } from "@remote-csr/shared";
import type { NextFunction, Request, Response } from "express";

const QUIET_PATHS = new Set(["/api/health"]);

export function requestLogLevel(statusCode: number): LogLevel {
  if (statusCode >= 500) return "error";
  if (statusCode >= 400) return "warning";
  return "debug";
}

/** One entry per finished request, with status and duration */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  if (QUIET_PATHS.has(req.path)) {
    next();
    return;
  }

  const started = Date.now();
  res.on("finish", () => {
    logCsr(
      csrBackendLogger.logTiming(
        requestLogLevel(res.statusCode),
        "backend",
        `${req.method} ${req.originalUrl} ${res.statusCode.toString()}`,
        Date.now() - started,
        { ip: req.ip },
      ),
    );
  });

  next();
}
