import { isKeySpec } from "@remote-csr/shared";
import { config as loadDotenv } from "dotenv";

import type { KeySpec, LogLevel } from "@remote-csr/shared";

loadDotenv();

export interface ServiceConfig {
  port: number;
  logLevel: LogLevel;
  environment: string;
  /** Key specs the mock KMS creates at startup */
  mockKmsKeys: KeySpec[];
}

export interface ConfigWarning {
  variable: string;
  message: string;
}

const DEFAULT_PORT = 3001;
const DEFAULT_MOCK_KMS_KEYS: KeySpec[] = ["RSA_2048", "ECC_NIST_P256"];
const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "success", "warning", "error"];

const isLogLevel = (value: string): value is LogLevel => LOG_LEVELS.some((l) => l === value);

/**
 * Read the service settings from the environment.
 * Invalid values fall back to their default and are reported in `warnings`.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): {
  config: ServiceConfig;
  warnings: ConfigWarning[];
} {
  const warnings: ConfigWarning[] = [];

  let port = DEFAULT_PORT;
  if (env.PORT) {
    const parsed = Number(env.PORT);
    if (Number.isInteger(parsed) && parsed > 0 && parsed < 65536) {
      port = parsed;
    } else {
      warnings.push({ variable: "PORT", message: `Invalid port ${env.PORT}, using ${DEFAULT_PORT}` });
    }
  }

  let logLevel: LogLevel = "info";
  if (env.LOG_LEVEL) {
    const raw = env.LOG_LEVEL.toLowerCase();
    if (isLogLevel(raw)) {
      logLevel = raw;
    } else {
      warnings.push({ variable: "LOG_LEVEL", message: `Unknown log level ${env.LOG_LEVEL}, using info` });
    }
  }

  let mockKmsKeys = DEFAULT_MOCK_KMS_KEYS;
  if (env.MOCK_KMS_KEYS !== undefined) {
    const specs = env.MOCK_KMS_KEYS.split(",")
      .map((s) => s.trim())
      .filter((s) => s.length > 0);
    const unknown = specs.filter((s) => !isKeySpec(s));
    if (unknown.length > 0) {
      warnings.push({
        variable: "MOCK_KMS_KEYS",
        message: `Unknown key specs ${unknown.join(", ")}, using ${DEFAULT_MOCK_KMS_KEYS.join(",")}`,
      });
    } else {
      mockKmsKeys = specs.filter(isKeySpec);
    }
  }

  return {
    config: {
      port,
      logLevel,
      environment: env.NODE_ENV || "development",
      mockKmsKeys,
    },
    warnings,
  };
}
