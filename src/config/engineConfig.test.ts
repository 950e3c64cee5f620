import { afterEach, describe, expect, it, vi } from "vitest";
import { engineLogger } from "../engine/logger";
import { CONFIG_KEYS, loadEngineConfig, resetEngineConfig } from "./engineConfig";

describe("loadEngineConfig", () => {
  it("uses defaults for an empty environment", () => {
    expect(loadEngineConfig({})).toEqual({
      logLevel: "warn",
      validationMode: "lenient",
      logCapacity: 500,
    });
  });

  it("reads and normalizes environment values", () => {
    expect(
      loadEngineConfig({
        FONT_STYLE_LOG_LEVEL: " DEBUG ",
        FONT_STYLE_VALIDATION_MODE: "Strict",
        FONT_STYLE_LOG_CAPACITY: "10",
      })
    ).toEqual({ logLevel: "debug", validationMode: "strict", logCapacity: 10 });
  });

  it("falls back per key on invalid values", () => {
    expect(
      loadEngineConfig({
        FONT_STYLE_LOG_LEVEL: "loud",
        FONT_STYLE_VALIDATION_MODE: "error",
        FONT_STYLE_LOG_CAPACITY: "-3",
      })
    ).toEqual({ logLevel: "warn", validationMode: "lenient", logCapacity: 500 });
  });
});

describe("engineLogger with configuration", () => {
  afterEach(() => {
    delete process.env[CONFIG_KEYS.logLevel];
    delete process.env[CONFIG_KEYS.logCapacity];
    resetEngineConfig();
    engineLogger.clear();
    vi.restoreAllMocks();
  });

  it("keeps only the configured number of entries", () => {
    process.env[CONFIG_KEYS.logCapacity] = "3";
    resetEngineConfig();
    engineLogger.clear();

    for (const action of ["a", "b", "c", "d", "e"]) {
      engineLogger.debug("Test", action);
    }

    expect(engineLogger.getEntries().map((e) => e.action)).toEqual(["c", "d", "e"]);
  });

  it("writes to the console only at or above the configured level", () => {
    process.env[CONFIG_KEYS.logLevel] = "error";
    resetEngineConfig();
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const error = vi.spyOn(console, "error").mockImplementation(() => {});

    engineLogger.warn("Test", "quiet");
    engineLogger.error("Test", "boom", { code: 7 });

    expect(warn).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledWith("[Test] boom", { code: 7 });
    expect(engineLogger.getEntries().map((e) => e.level)).toEqual(["warn", "error"]);
  });

  it("records durations for timed entries", () => {
    engineLogger.clear();
    engineLogger.timed("info", "Test", "step", Date.now(), { fileName: "A.ttf" });

    const [entry] = engineLogger.getEntries();
    expect(entry.metadata?.fileName).toBe("A.ttf");
    expect(typeof entry.metadata?.duration).toBe("number");
  });
});
