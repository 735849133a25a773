// packages/backend/src/routes/api.ts
import { generateShortId } from "@remote-csr/shared";
import { Router } from "express";

import { csrBackendLogger, logCsr } from "../logger";
import { errorBody, statusForError } from "../middleware/error-handler";
import {
  buildCsr,
  parseBuildCsrRequest,
  parseCreateMockKeyRequest,
} from "../services/csr-request-service";

import type { MockKmsService } from "../services/mock-kms-service";
import type {
  CreateMockKeyResponse,
  HealthResponse,
  LogEntry,
  MockKeysResponse,
} from "@remote-csr/shared";

export const SERVICE_NAME = "Remote-key CSR Service";
export const SERVICE_VERSION = "1.0.0";

// Helper to both log and collect entries
const pushAndLog = (logs: LogEntry[], entry: LogEntry): void => {
  logs.push(entry);
  logCsr(entry);
};

export function createApiRouter(kms: MockKmsService): Router {
  const router = Router();

  // Health
  router.get("/health", (req, res) => {
    const logs: LogEntry[] = [];

    pushAndLog(
      logs,
      csrBackendLogger.createLogEntry("info", "backend", "Health check requested", {
        ip: req.ip,
        ua: req.get("User-Agent"),
        mockKeys: kms.listKeys().length,
      }),
    );

    const response: HealthResponse = {
      success: true,
      status: "OK",
      timestamp: new Date().toISOString(),
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      logs,
    };
    res.json(response);
  });

  // Mock KMS keys
  router.get("/mock/keys", (_req, res) => {
    const response: MockKeysResponse = { success: true, keys: kms.listKeys() };
    res.json(response);
  });

  router.post("/mock/keys", (req, res) => {
    const logs: LogEntry[] = [];
    try {
      const key = kms.createKey(parseCreateMockKeyRequest(req.body));
      pushAndLog(
        logs,
        csrBackendLogger.createLogEntry("success", "mock-kms", `Created ${key.keySpec} key`, {
          keyId: key.keyId,
          keyUsage: key.keyUsage,
        }),
      );
      const response: CreateMockKeyResponse = { success: true, key, logs };
      res.status(201).json(response);
    } catch (error) {
      const msg = error instanceof Error ? error.message : "Unknown error";
      pushAndLog(
        logs,
        csrBackendLogger.createLogEntry("error", "mock-kms", `Key creation failed: ${msg}`),
      );
      res.status(statusForError(error)).json({ ...errorBody(error), logs });
    }
  });

  // Build and sign a CSR
  router.post("/csr", async (req, res) => {
    const requestId = generateShortId();
    const logs: LogEntry[] = [];

    try {
      const request = parseBuildCsrRequest(req.body);
      pushAndLog(
        logs,
        csrBackendLogger.logBuildStep(
          "info",
          "backend",
          "configure",
          "CSR requested",
          requestId,
          { keyId: request.keyId, subject: request.subject },
        ),
      );

      const response = await buildCsr(kms, request, logs);
      res.json(response);
    } catch (error) {
      const msg = error instanceof Error ? error.message : "Unknown error";
      pushAndLog(
        logs,
        csrBackendLogger.logBuildStep(
          "error",
          "backend",
          "configure",
          `CSR build failed: ${msg}`,
          requestId,
        ),
      );
      res.status(statusForError(error)).json({ ...errorBody(error), logs });
    }
  });

  return router;
}
