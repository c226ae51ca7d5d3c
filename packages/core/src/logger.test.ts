/**
 * Tests for scoped logging
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { createLogger, getLogLevel, parseLogLevel, setLogLevel } from "./logger.js";

describe("parseLogLevel", () => {
  it("parses known names case-insensitively", () => {
    expect(parseLogLevel("DEBUG")).toBe("debug");
    expect(parseLogLevel("warning")).toBe("warn");
    expect(parseLogLevel("none")).toBe("silent");
  });

  it("falls back for unknown or missing values", () => {
    expect(parseLogLevel(undefined)).toBe("info");
    expect(parseLogLevel("loud", "error")).toBe("error");
  });
});

describe("createLogger", () => {
  const initial = getLogLevel();

  afterEach(() => {
    setLogLevel(initial);
    vi.restoreAllMocks();
  });

  it("prefixes messages with the scope", () => {
    setLogLevel("debug");
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    createLogger("renderer").warn("over budget", 42);
    expect(warn).toHaveBeenCalledWith("[renderer] over budget", 42);
  });

  it("drops messages below the minimum level", () => {
    setLogLevel("warn");
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const logger = createLogger("layout");
    logger.debug("hidden");
    logger.info("hidden");
    expect(debug).not.toHaveBeenCalled();
    expect(log).not.toHaveBeenCalled();
  });

  it("nests child scopes", () => {
    setLogLevel("info");
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    createLogger("layout").child("grid_2x2").error("boom");
    expect(error).toHaveBeenCalledWith("[layout:grid_2x2] boom");
  });
});
