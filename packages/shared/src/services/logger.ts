/**
 * Structured log entries for CSR build requests
 * Entries are plain data: routes return them to the caller, winston prints them
 */

import type { LogEntry, LogLevel } from "../types/common";

export interface CsrLogContext {
  requestId?: string;
  step?: "configure" | "negotiate" | "assemble" | "sign" | "encode";
  keyId?: string;
  signingAlgorithm?: string;
  extensionCount?: number;
  tbsSize?: number;
  duration?: number;
}

export interface LoggerConfig {
  includeTimestamp: boolean;
  includeSource: boolean;
  formatJson?: boolean;
}

export class CsrLogger {
  private config: LoggerConfig;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = {
      includeTimestamp: true,
      includeSource: true,
      formatJson: false,
      ...config,
    };
  }

  createLogEntry(
    level: LogLevel,
    source: LogEntry["source"],
    message: string,
    context?: CsrLogContext & Record<string, unknown>,
  ): LogEntry {
    return {
      timestamp: new Date().toISOString(),
      level,
      source,
      message,
      context,
    };
  }

  /**
   * Log one step of a build request
   */
  logBuildStep(
    level: LogLevel,
    source: LogEntry["source"],
    step: CsrLogContext["step"],
    message: string,
    requestId: string,
    additionalContext?: Record<string, unknown>,
  ): LogEntry {
    return this.createLogEntry(level, source, message, {
      requestId,
      step,
      ...additionalContext,
    });
  }

  logTiming(
    level: LogLevel,
    source: LogEntry["source"],
    operation: string,
    duration: number,
    additionalContext?: Record<string, unknown>,
  ): LogEntry {
    return this.createLogEntry(level, source, `${operation} completed`, {
      duration,
      ...additionalContext,
    });
  }

  /**
   * Format log entry for display
   */
  formatLogEntry(entry: LogEntry): string {
    const timestamp = this.config.includeTimestamp ? `${entry.timestamp} ` : "";
    const source = this.config.includeSource ? `[${entry.source.toUpperCase()}] ` : "";
    const level = `[${entry.level.toUpperCase()}] `;

    let contextStr = "";
    if (entry.context) {
      if (this.config.formatJson) {
        contextStr = ` ${JSON.stringify(entry.context)}`;
      } else {
        const ctx = entry.context;
        const contextParts: string[] = [];

        if (typeof ctx.requestId === "string") contextParts.push(`request:${ctx.requestId}`);
        if (typeof ctx.step === "string") contextParts.push(`step:${ctx.step}`);
        if (typeof ctx.keyId === "string") contextParts.push(`key:${ctx.keyId}`);
        if (typeof ctx.signingAlgorithm === "string") {
          contextParts.push(`alg:${ctx.signingAlgorithm}`);
        }
        if (typeof ctx.duration === "number") contextParts.push(`${ctx.duration.toString()}ms`);

        if (contextParts.length > 0) {
          contextStr = ` (${contextParts.join(", ")})`;
        }
      }
    }

    return `${timestamp}${source}${level}${entry.message}${contextStr}`;
  }
}
