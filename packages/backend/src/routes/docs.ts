import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";

import { createCsrApiError } from "@remote-csr/shared";
import { Router } from "express";
import swaggerUi from "swagger-ui-express";
import { parse as parseYaml } from "yaml";

import { csrBackendLogger, logCsr } from "../logger";

import type { BaseApiResponse } from "@remote-csr/shared";

// A type alias, not an interface, so it is assignable to swagger-ui-express's JsonObject
export type OpenApiDocument = {
  openapi: string;
  info: { title: string; version: string };
  paths: Record<string, unknown>;
  [key: string]: unknown;
};

export const OPENAPI_PATH = join(dirname(fileURLToPath(import.meta.url)), "../openapi/openapi.yaml");

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export function isOpenApiDocument(value: unknown): value is OpenApiDocument {
  return (
    isRecord(value) &&
    typeof value.openapi === "string" &&
    isRecord(value.info) &&
    typeof value.info.title === "string" &&
    typeof value.info.version === "string" &&
    isRecord(value.paths)
  );
}

/** Read and check the API description; throws if the file is missing or malformed */
export function loadOpenApiDocument(path: string = OPENAPI_PATH): OpenApiDocument {
  const parsed: unknown = parseYaml(readFileSync(path, "utf8"));
  if (!isOpenApiDocument(parsed)) {
    throw new Error(`${path} is not an OpenAPI document`);
  }
  return parsed;
}

/**
 * Swagger UI at /, the description at /openapi.json and /openapi.yaml.
 * If the description cannot be loaded every docs route answers 503.
 */
export function createDocsRouter(path: string = OPENAPI_PATH): Router {
  const router = Router();

  let document: OpenApiDocument;
  try {
    document = loadOpenApiDocument(path);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logCsr(
      csrBackendLogger.createLogEntry("error", "backend", `API docs disabled: ${message}`, { path }),
    );
    router.use((_req, res) => {
      const body: BaseApiResponse = {
        success: false,
        error: createCsrApiError("DOCS_UNAVAILABLE", "API description could not be loaded"),
      };
      res.status(503).json(body);
    });
    return router;
  }

  router.get("/openapi.json", (_req, res) => {
    res.json(document);
  });
  router.get("/openapi.yaml", (_req, res) => {
    res.type("text/yaml").sendFile(path);
  });

  router.use("/", swaggerUi.serve);
  router.get(
    "/",
    swaggerUi.setup(document, {
      customSiteTitle: `${document.info.title} ${document.info.version}`,
      customCss: ".swagger-ui .topbar { display: none }",
      swaggerOptions: { docExpansion: "list", displayRequestDuration: true },
    }),
  );

  logCsr(
    csrBackendLogger.createLogEntry("debug", "backend", "API docs mounted", {
      title: document.info.title,
      operations: Object.keys(document.paths).length,
    }),
  );

  return router;
}
