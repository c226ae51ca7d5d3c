/**
 * Tests for engine configuration loading
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { DEFAULT_CONFIG, loadConfig, toRotation } from "./config.js";

describe("loadConfig", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("returns the defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it("reads GLANCE_* overrides", () => {
    const config = loadConfig({
      GLANCE_JPEG_QUALITY: "80",
      GLANCE_MAX_IMAGE_BYTES: "3000",
      GLANCE_ROTATION: "90",
      GLANCE_THEME: "ocean",
      GLANCE_FONT_PATHS: "a.json, b.json,",
    });
    expect(config.jpegQuality).toBe(80);
    expect(config.maxImageBytes).toBe(3000);
    expect(config.rotation).toBe(90);
    expect(config.theme).toBe("ocean");
    expect(config.fontPaths).toEqual(["a.json", "b.json"]);
  });

  it("ignores out-of-range values with a warning", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const config = loadConfig({ GLANCE_JPEG_QUALITY: "150", GLANCE_ROTATION: "45" });
    expect(config.jpegQuality).toBe(92);
    expect(config.rotation).toBe(0);
    expect(warn).toHaveBeenCalledTimes(2);
  });

  it("applies explicit overrides last", () => {
    const config = loadConfig({ GLANCE_SCALE: "3" }, { scale: 1 });
    expect(config.scale).toBe(1);
  });
});

describe("toRotation", () => {
  it("accepts quarter turns only", () => {
    expect(toRotation(270)).toBe(270);
    expect(toRotation(45)).toBeNull();
  });
});
