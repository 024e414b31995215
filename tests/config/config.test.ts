import { describe, it, expect, vi, afterEach } from "vitest";
import {
  DEFAULT_LOG_LEVEL,
  DEFAULT_MAX_CALL_DEPTH,
  DEFAULT_STEP_BOUND,
  loadConfig,
  resolveConfig,
} from "../../src/config/config.js";
import { createLogger, isLogLevel, silentLogger } from "../../src/config/logger.js";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("loadConfig", () => {
  it("uses defaults for an empty environment", () => {
    const config = loadConfig({});
    expect(config.stepBound).toBe(DEFAULT_STEP_BOUND);
    expect(config.maxCallDepth).toBe(DEFAULT_MAX_CALL_DEPTH);
    expect(config.logLevel).toBe(DEFAULT_LOG_LEVEL);
  });

  it("reads values from the environment", () => {
    const config = loadConfig({
      WASM_HARNESS_STEP_BOUND: "500",
      WASM_HARNESS_MAX_CALL_DEPTH: "64",
      WASM_HARNESS_LOG_LEVEL: "DEBUG",
    });
    expect(config.stepBound).toBe(500);
    expect(config.maxCallDepth).toBe(64);
    expect(config.logLevel).toBe("debug");
  });

  it("warns and falls back on bad values", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const config = loadConfig({ WASM_HARNESS_STEP_BOUND: "abc", WASM_HARNESS_MAX_CALL_DEPTH: "-3" });
    expect(config.stepBound).toBe(DEFAULT_STEP_BOUND);
    expect(config.maxCallDepth).toBe(DEFAULT_MAX_CALL_DEPTH);
    expect(warn).toHaveBeenCalledTimes(2);
    expect(warn.mock.calls[0][0]).toContain("WASM_HARNESS_STEP_BOUND=abc is not a positive integer, using 1000000");
  });

  it("rejects an unknown log level", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    expect(loadConfig({ WASM_HARNESS_LOG_LEVEL: "loud" }).logLevel).toBe("warn");
    expect(warn).toHaveBeenCalledTimes(1);
  });
});

describe("resolveConfig", () => {
  it("applies overrides over the environment", () => {
    const config = resolveConfig({ stepBound: 5, logger: silentLogger });
    expect(config.stepBound).toBe(5);
    expect(config.logger).toBe(silentLogger);
  });

  it("sends environment warnings to the resolved logger", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const messages: string[] = [];
    const logger = { ...silentLogger, warn: (message: string) => messages.push(message) };
    const config = resolveConfig({ logger }, { WASM_HARNESS_MAX_CALL_DEPTH: "zero" });
    expect(config.maxCallDepth).toBe(DEFAULT_MAX_CALL_DEPTH);
    expect(messages).toEqual(["WASM_HARNESS_MAX_CALL_DEPTH=zero is not a positive integer, using 1000"]);
    expect(warn).not.toHaveBeenCalled();
  });

  it("stays quiet with a silent logger", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    resolveConfig({ logger: silentLogger }, { WASM_HARNESS_STEP_BOUND: "abc" });
    expect(warn).not.toHaveBeenCalled();
  });
});

describe("logger", () => {
  it("drops messages below its level", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const logger = createLogger("warn");
    logger.info("hidden");
    logger.warn("shown");
    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toContain("shown");
  });

  it("recognizes level names", () => {
    expect(isLogLevel("silent")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
  });
});
