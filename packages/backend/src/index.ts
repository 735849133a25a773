import cors from "cors";
import express from "express";

import { loadConfig } from "./config";
import { csrBackendLogger, logCsr } from "./logger";
import { errorHandler } from "./middleware/error-handler";
import { requestLogger } from "./middleware/request-logger";
import { createApiRouter, SERVICE_NAME } from "./routes/api";
import { createDocsRouter } from "./routes/docs";
import { MockKmsService } from "./services/mock-kms-service";

const { config, warnings } = loadConfig();

for (const warning of warnings) {
  logCsr(
    csrBackendLogger.createLogEntry("warning", "backend", warning.message, {
      variable: warning.variable,
    }),
  );
}

const kms = new MockKmsService(config.mockKmsKeys);
logCsr(
  csrBackendLogger.createLogEntry("success", "mock-kms", "Mock KMS ready", {
    keys: kms.listKeys().map((k) => `${k.keySpec}:${k.keyId}`),
  }),
);

const app = express();

// Middleware
app.use(cors());
app.use(express.json({ limit: "1mb" }));
app.use(requestLogger);

// Routes
app.use("/api/docs", createDocsRouter());
app.use("/api", createApiRouter(kms));

// Error handling
app.use(errorHandler);

// Start server
app.listen(config.port, () => {
  logCsr(
    csrBackendLogger.createLogEntry(
      "success",
      "backend",
      `${SERVICE_NAME} running on http://localhost:${config.port.toString()}`,
      { port: config.port, environment: config.environment },
    ),
  );

  logCsr(
    csrBackendLogger.createLogEntry("info", "backend", `Environment: ${config.environment}`, {
      logLevel: config.logLevel,
    }),
  );
});

export default app;
