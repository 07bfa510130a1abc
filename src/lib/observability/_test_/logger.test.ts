// src/lib/observability/_test_/logger.test.ts

import { describe, it, expect, vi, afterEach } from "vitest";
import { log, resolveLogLevel, setLogLevel } from "../logger";
import { withReportContext } from "../request-context";

describe("logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    setLogLevel("ERROR");
  });

  it("falls back to INFO for a missing or unknown LOG_LEVEL", () => {
    expect(resolveLogLevel(undefined)).toBe("INFO");
    expect(resolveLogLevel("LOUD")).toBe("INFO");
    expect(resolveLogLevel("DEBUG")).toBe("DEBUG");
  });

  it("drops lines below the configured level", () => {
    const out = vi.spyOn(console, "log").mockImplementation(() => undefined);
    setLogLevel("WARN");

    log("INFO", "QUIET");
    log("WARN", "LOUD", { attempt: 2 });

    expect(out).toHaveBeenCalledTimes(1);
    const line: unknown = JSON.parse(String(out.mock.calls[0]?.[0]));
    expect(line).toMatchObject({
      level: "WARN",
      message: "LOUD",
      attempt: 2,
      reportId: null,
    });
  });

  it("writes errors even when the environment would not parse as config", () => {
    vi.stubEnv("MODE", "production");
    vi.stubEnv("DATABASE_URL", "");
    const out = vi.spyOn(console, "error").mockImplementation(() => undefined);

    expect(() => log("ERROR", "STORE_FAILED", { message: "down" })).not.toThrow();
    expect(out).toHaveBeenCalledTimes(1);
  });

  it("tags lines with the report in scope", async () => {
    const out = vi.spyOn(console, "error").mockImplementation(() => undefined);

    await withReportContext("r-42", async () => {
      log("ERROR", "REPORT_RUN_CRASHED");
    });

    expect(JSON.parse(String(out.mock.calls[0]?.[0]))).toMatchObject({
      message: "REPORT_RUN_CRASHED",
      reportId: "r-42",
    });
  });
});
