/**
 * Common types used throughout the remote CSR service
 */

export type LogLevel = "debug" | "info" | "success" | "warning" | "error";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  source: "backend" | "builder" | "mock-kms" | "external";
  message: string;
  context?: Record<string, unknown>;
}

export interface CsrApiError {
  code: string;
  message: string;
  details?: Record<string, unknown>;
  timestamp: string;
}

export interface BaseApiResponse {
  success: boolean;
  error?: CsrApiError;
  logs?: LogEntry[];
}
