import { createCsrApiError } from "@remote-csr/shared";

import { ConfigurationError, CsrError, EncodingError, RemoteServiceError } from "../errors";
import { logger } from "../logger";

import type { BaseApiResponse } from "@remote-csr/shared";
import type { NextFunction, Request, Response } from "express";

/** HTTP status for an error raised while serving a request */
export function statusForError(err: unknown): number {
  if (err instanceof ConfigurationError || err instanceof EncodingError) return 400;
  if (err instanceof RemoteServiceError) return 502;
  // body-parser marks malformed JSON with a 4xx status
  if (
    err instanceof Error &&
    "status" in err &&
    typeof err.status === "number" &&
    err.status >= 400 &&
    err.status < 500
  ) {
    return err.status;
  }
  return 500;
}

export function errorBody(err: unknown): BaseApiResponse {
  if (err instanceof CsrError) {
    return {
      success: false,
      error: createCsrApiError(err.code, err.message, err.details),
    };
  }

  const status = statusForError(err);
  const message = err instanceof Error ? err.message : "Unknown error";
  return {
    success: false,
    error: createCsrApiError(
      status === 500 ? "INTERNAL_ERROR" : "BAD_REQUEST",
      status === 500 && process.env.NODE_ENV === "production"
        ? "An internal server error occurred"
        : message,
    ),
  };
}

export function errorHandler(err: unknown, req: Request, res: Response, next: NextFunction): void {
  const status = statusForError(err);

  logger.log(status >= 500 ? "error" : "warning", "Request failed", {
    error: err instanceof Error ? err.message : String(err),
    code: err instanceof CsrError ? err.code : undefined,
    stack: status >= 500 && err instanceof Error ? err.stack : undefined,
    url: req.url,
    method: req.method,
    ip: req.ip,
  });

  // If response already sent, delegate to default Express error handler
  if (res.headersSent) {
    next(err);
    return;
  }

  res.status(status).json(errorBody(err));
}
