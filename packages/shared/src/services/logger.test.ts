import { describe, expect, it } from "vitest";

import { CsrLogger } from "./logger";

describe("CsrLogger", () => {
  it("builds an entry with level, source and context", () => {
    const logger = new CsrLogger();
    const entry = logger.createLogEntry("debug", "mock-kms", "quiet", { keyId: "k" });

    expect(entry).toMatchObject({
      level: "debug",
      source: "mock-kms",
      message: "quiet",
      context: { keyId: "k" },
    });
    expect(Number.isNaN(Date.parse(entry.timestamp))).toBe(false);
  });

  it("tags build steps with the request id", () => {
    const logger = new CsrLogger();
    const entry = logger.logBuildStep("info", "builder", "negotiate", "first", "req-a", { keyId: "k" });

    expect(entry.context).toEqual({ requestId: "req-a", step: "negotiate", keyId: "k" });
  });

  it("reports timings as completed operations", () => {
    const logger = new CsrLogger();
    const entry = logger.logTiming("debug", "mock-kms", "Key generation", 7);

    expect(entry.message).toBe("Key generation completed");
    expect(entry.context).toEqual({ duration: 7 });
  });

  it("formats context as short tags", () => {
    const logger = new CsrLogger({ includeTimestamp: false });
    const entry = logger.logBuildStep("info", "builder", "sign", "Signing", "abc123", {
      keyId: "key-1",
      signingAlgorithm: "ECDSA_SHA_256",
      duration: 12,
    });

    expect(logger.formatLogEntry(entry)).toBe(
      "[BUILDER] [INFO] Signing (request:abc123, step:sign, key:key-1, alg:ECDSA_SHA_256, 12ms)",
    );
  });

  it("formats context as JSON when configured", () => {
    const logger = new CsrLogger({ includeTimestamp: false, includeSource: false, formatJson: true });
    const entry = logger.createLogEntry("error", "backend", "Failed", { keyId: "k" });

    expect(logger.formatLogEntry(entry)).toBe('[ERROR] Failed {"keyId":"k"}');
  });
});
