import { describe, it, expect, afterEach, vi } from "vitest";
import { createLogger, silentLogger } from "./logger.js";

describe("createLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("writes messages at or below its level with a tagged prefix", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const log = vi.spyOn(console, "log").mockImplementation(() => {});

    const logger = createLogger("info");
    logger.error("e");
    logger.warn("w");
    logger.info("i");
    logger.debug("d");

    expect(error).toHaveBeenCalledWith("[scoped-rules:error]", "e");
    expect(warn).toHaveBeenCalledWith("[scoped-rules:warn]", "w");
    expect(log).toHaveBeenCalledTimes(1);
    expect(log).toHaveBeenCalledWith("[scoped-rules:info]", "i");
  });

  it("defaults to warn", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const log = vi.spyOn(console, "log").mockImplementation(() => {});

    createLogger().warn("w");
    createLogger().info("i");
    expect(warn).toHaveBeenCalledTimes(1);
    expect(log).not.toHaveBeenCalled();
  });

  it("uses a custom prefix", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    createLogger("error", "cli").error("boom");
    expect(error).toHaveBeenCalledWith("[cli:error]", "boom");
  });

  it("stays quiet when silent", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    silentLogger.error("nothing");
    expect(error).not.toHaveBeenCalled();
  });
});
