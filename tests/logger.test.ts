import { describe, it, expect, vi, afterEach } from "vitest";
import { createLogger, silentLogger } from "../server/diagnosis/logger";
import { loadEnv } from "../server/env";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("createLogger", () => {
  it("prefixes messages with the scope and writes to stderr", () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const logger = createLogger("diagnosis");

    logger.info("Starting", { url: "https://example.com/" });

    expect(errorSpy).toHaveBeenCalledWith("[diagnosis] Starting", { url: "https://example.com/" });
  });

  it("routes warnings to console.warn", () => {
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    createLogger("server").warn("Slow response");
    expect(warnSpy).toHaveBeenCalledWith("[server] Slow response");
  });

  it("drops messages below the configured level", () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const logger = createLogger("diagnosis", "warn");

    logger.debug("hidden");
    logger.info("hidden");
    logger.error("shown");

    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledWith("[diagnosis] shown");
  });

  it("stays quiet when silent", () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    silentLogger.error("nothing");
    expect(errorSpy).not.toHaveBeenCalled();
  });
});

describe("loadEnv", () => {
  it("applies defaults", () => {
    expect(loadEnv({})).toEqual({ PORT: 5000, DIAGNOSIS_LOG_LEVEL: "info" });
  });

  it("coerces the port and reads the log level", () => {
    expect(loadEnv({ PORT: "8080", DIAGNOSIS_LOG_LEVEL: "debug" })).toEqual({ PORT: 8080, DIAGNOSIS_LOG_LEVEL: "debug" });
  });

  it("rejects unknown log levels", () => {
    expect(() => loadEnv({ DIAGNOSIS_LOG_LEVEL: "verbose" })).toThrow();
  });
});
