import { describe, it, expect } from "vitest";

import { requestLogLevel } from "./request-logger";

describe("requestLogLevel", () => {
  it.each([
    [200, "debug"],
    [201, "debug"],
    [404, "warning"],
    [400, "warning"],
    [502, "error"],
  ])("logs status %i at %s", (status, level) => {
    expect(requestLogLevel(status)).toBe(level);
  });
});
