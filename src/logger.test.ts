import { describe, it, expect, vi, afterEach } from "vitest";
import { createConsoleLogger, createRecordingLogger, createSilentLogger } from "./logger.js";

describe("createRecordingLogger", () => {
  it("keeps entries in order", () => {
    const logger = createRecordingLogger();
    logger.info("one");
    logger.warn("two");
    logger.debug("three");
    logger.error("four");
    expect(logger.entries).toEqual([
      { level: "info", message: "one" },
      { level: "warn", message: "two" },
      { level: "debug", message: "three" },
      { level: "error", message: "four" },
    ]);
  });
});

describe("createConsoleLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("drops messages below its level", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    const logger = createConsoleLogger("warn");
    logger.debug("hidden");
    logger.info("hidden");
    logger.warn("shown");

    expect(debug).not.toHaveBeenCalled();
    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith("  ⚠ shown");
  });

  it("logs info by default", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    createConsoleLogger().info("hello");
    expect(log).toHaveBeenCalledWith("  hello");
  });

  it("prints nothing when silent", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    createConsoleLogger("silent").error("nope");
    expect(error).not.toHaveBeenCalled();
  });
});

describe("createSilentLogger", () => {
  it("accepts every level", () => {
    const logger = createSilentLogger();
    expect(() => {
      logger.debug("a");
      logger.info("b");
      logger.warn("c");
      logger.error("d");
    }).not.toThrow();
  });
});
